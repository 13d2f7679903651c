import { z } from "zod";
import type { Listing } from "../types/listing.js";

export const listingSchema = z.object({
  source: z.string().trim().min(1),
  id: z.string().trim().min(1),
  title: z.string().default(""),
  price: z.number().finite().min(0).nullable().default(null),
  createdTs: z.number().finite(),
  url: z.string().default(""),
});

/** Drops candidates that fail validation instead of failing the whole page. */
export function collectListings(candidates: unknown[]): Listing[] {
  const listings: Listing[] = [];
  for (const candidate of candidates) {
    const result = listingSchema.safeParse(candidate);
    if (result.success) listings.push(result.data);
  }
  return listings;
}
