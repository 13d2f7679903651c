import { collectListings } from "../../domain/listing.js";
import { SOURCE_BASE_URLS } from "../../domain/sources.js";
import type { EpochSeconds, Listing } from "../../types/listing.js";
import { readAnchors } from "./anchors.js";
import { BROWSER_USER_AGENT, decodeEntities, ensureAbsoluteUrl, requestText, stripHtml } from "./http.js";

const ITEM_PATH_REGEX = /\/marketplace\/item\/(\d+)/;

export function parseMarketplaceItems(html: string, sourceId: string, now: EpochSeconds): Listing[] {
  const seen = new Set<string>();
  const candidates: unknown[] = [];

  for (const anchor of readAnchors(html)) {
    const href = decodeEntities(anchor.href);
    const idMatch = href.match(ITEM_PATH_REGEX);
    const id = idMatch?.[1];
    if (!id || seen.has(id)) continue;

    const title = stripHtml(anchor.html);
    if (!title) continue;
    const url = ensureAbsoluteUrl(`/marketplace/item/${id}/`, SOURCE_BASE_URLS["facebook-marketplace"]);
    if (!url) continue;
    seen.add(id);

    // Marketplace cards render price and title in one run of text; the price is not reliable enough to parse.
    candidates.push({ source: sourceId, id, title, price: null, createdTs: now, url });
  }

  return collectListings(candidates);
}

export async function fetchMarketplaceListings(
  url: string,
  sourceId: string,
  options: { timeoutMs: number; now: EpochSeconds },
): Promise<Listing[]> {
  const html = await requestText(url, {
    timeoutMs: options.timeoutMs,
    headers: {
      accept: "text/html,application/xhtml+xml",
      "user-agent": BROWSER_USER_AGENT,
    },
  });
  return parseMarketplaceItems(html, sourceId, options.now);
}
