import type { SourceDefinition } from "../../domain/sources.js";
import type { EpochSeconds, Listing } from "../../types/listing.js";
import { fetchMarketplaceListings } from "./facebook-marketplace.js";
import { fetchGumtreeListings } from "./gumtree.js";
import { fetchRssListings } from "./rss.js";

export interface ListingSource {
  readonly id: string;
  fetchListings(): Promise<Listing[]>;
}

interface SourceFactoryOptions {
  timeoutMs: number;
  nowFn: () => EpochSeconds;
}

export function createListingSource(definition: SourceDefinition, options: SourceFactoryOptions): ListingSource {
  const fetchOptions = () => ({ timeoutMs: options.timeoutMs, now: options.nowFn() });

  switch (definition.kind) {
    case "gumtree":
      return {
        id: definition.id,
        fetchListings: () => fetchGumtreeListings(definition.url, definition.id, fetchOptions()),
      };
    case "facebook-marketplace":
      return {
        id: definition.id,
        fetchListings: () => fetchMarketplaceListings(definition.url, definition.id, fetchOptions()),
      };
    case "rss":
      return {
        id: definition.id,
        fetchListings: () => fetchRssListings(definition.url, definition.id, fetchOptions()),
      };
  }
}
