import type { Listing } from "../types/listing.js";

export const KEY_AXES = ["source", "term", "price"] as const;

export type KeyAxis = (typeof KEY_AXES)[number];

export const UNTITLED_TOKEN = "(untitled)";

const KEY_PATTERN = new RegExp(`^(${KEY_AXES.join("|")}):.+$`);

function buildKey(axis: KeyAxis, value: string): string {
  return `${axis}:${value}`;
}

export function firstTitleToken(title: string): string {
  const token = title.trim().toLowerCase().split(/\s+/)[0];
  return token ? token : UNTITLED_TOKEN;
}

export function priceBucket(price: number): string {
  if (price === 0) return "free";
  if (price < 10) return "lt10";
  if (price < 100) return "lt100";
  if (price < 1000) return "lt1000";
  if (price < 10000) return "lt10000";
  return "gte10000";
}

export function deriveKeys(listing: Pick<Listing, "source" | "title" | "price">): string[] {
  const keys = [buildKey("source", listing.source), buildKey("term", firstTitleToken(listing.title))];
  if (listing.price !== null && Number.isFinite(listing.price) && listing.price >= 0) {
    keys.push(buildKey("price", priceBucket(listing.price)));
  }
  return keys;
}

export function isValidKey(key: string): boolean {
  return KEY_PATTERN.test(key);
}
