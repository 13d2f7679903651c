import { collectListings } from "../../domain/listing.js";
import { SOURCE_BASE_URLS } from "../../domain/sources.js";
import type { EpochSeconds, Listing } from "../../types/listing.js";
import { hasAttribute, readAnchors } from "./anchors.js";
import {
  BROWSER_USER_AGENT,
  decodeEntities,
  ensureAbsoluteUrl,
  extractPrice,
  lastPathSegment,
  requestText,
  stripHtml,
} from "./http.js";

export function parseGumtreeResults(html: string, sourceId: string, now: EpochSeconds): Listing[] {
  const seen = new Set<string>();
  const candidates: unknown[] = [];

  for (const anchor of readAnchors(html)) {
    if (!hasAttribute(anchor.attributes, "data-q", "search-result-anchor")) continue;
    const url = ensureAbsoluteUrl(decodeEntities(anchor.href), SOURCE_BASE_URLS.gumtree);
    if (!url) continue;
    const id = lastPathSegment(url);
    if (!id || seen.has(id)) continue;
    seen.add(id);

    const title = stripHtml(anchor.html);
    candidates.push({
      source: sourceId,
      id,
      title,
      price: extractPrice(title),
      createdTs: now,
      url,
    });
  }

  return collectListings(candidates);
}

export async function fetchGumtreeListings(
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
  return parseGumtreeResults(html, sourceId, options.now);
}
