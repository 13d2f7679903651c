import { collectListings } from "../../domain/listing.js";
import type { EpochSeconds, Listing } from "../../types/listing.js";
import { decodeEntities, extractPrice, requestText, stripHtml, toEpochSeconds } from "./http.js";

function readTag(block: string, name: string): string {
  const match = block.match(new RegExp(`<${name}(?:\\s[^>]*)?>([\\s\\S]*?)<\\/${name}>`, "i"));
  return match?.[1]?.trim() ?? "";
}

export function parseRssListings(xml: string, sourceId: string, now: EpochSeconds): Listing[] {
  const seen = new Set<string>();
  const candidates: unknown[] = [];

  for (const match of xml.matchAll(/<item\b[^>]*>([\s\S]*?)<\/item>/gi)) {
    const block = match[1] ?? "";
    const title = stripHtml(decodeEntities(readTag(block, "title")));
    const link = decodeEntities(readTag(block, "link")).trim();
    const guid = decodeEntities(readTag(block, "guid")).trim();
    const id = guid || link;
    if (!id || seen.has(id)) continue;
    seen.add(id);

    candidates.push({
      source: sourceId,
      id,
      title,
      price: extractPrice(title),
      createdTs: toEpochSeconds(decodeEntities(readTag(block, "pubDate"))) ?? now,
      url: link,
    });
  }

  return collectListings(candidates);
}

export async function fetchRssListings(
  url: string,
  sourceId: string,
  options: { timeoutMs: number; now: EpochSeconds },
): Promise<Listing[]> {
  const xml = await requestText(url, {
    timeoutMs: options.timeoutMs,
    headers: {
      accept: "application/rss+xml, application/xml, text/xml;q=0.9, */*;q=0.8",
    },
  });
  return parseRssListings(xml, sourceId, options.now);
}
