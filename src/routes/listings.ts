import { Hono } from "hono";
import { z } from "zod";
import { deriveKeys } from "../domain/keys.js";
import { listingSchema } from "../domain/listing.js";
import { shouldNotify } from "../domain/scoring.js";
import type { ExcitationEngine } from "../services/excitation-engine.js";
import { readJsonBody } from "./request-body.js";

const scoreRequestSchema = listingSchema.extend({
  createdTs: z.number().finite().optional(),
});

const feedbackSchema = z.object({
  listing: listingSchema.extend({
    createdTs: z.number().finite().optional(),
  }),
  direction: z.enum(["up", "down"]),
});

export function createListingRouter(engine: ExcitationEngine): Hono {
  const app = new Hono();

  // Dry run: scores without recording the identity as seen.
  app.post("/score", async (c) => {
    const body = await readJsonBody(c, scoreRequestSchema);
    const now = engine.now();
    const listing = { ...body, createdTs: body.createdTs ?? now };
    const breakdown = await engine.score(listing, now);
    return c.json(
      {
        code: 200,
        message: "ok",
        data: {
          keys: deriveKeys(listing),
          threshold: engine.threshold,
          notify: shouldNotify(breakdown.excitation, engine.threshold),
          breakdown,
        },
      },
      200,
    );
  });

  app.post("/feedback", async (c) => {
    const body = await readJsonBody(c, feedbackSchema);
    const listing = { ...body.listing, createdTs: body.listing.createdTs ?? engine.now() };
    const data = await engine.applyFeedback(listing, body.direction);
    return c.json({ code: 200, message: "ok", data }, 200);
  });

  return app;
}
