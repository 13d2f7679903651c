import { Hono } from "hono";
import { z } from "zod";
import type { ExcitationEngine } from "../services/excitation-engine.js";
import { readJsonBody } from "./request-body.js";

const setWeightSchema = z.object({
  value: z.number().finite(),
});

const reinforceSchema = z.object({
  delta: z.number().finite().optional(),
});

const cooldownSchema = z.object({
  durationSeconds: z.number().finite().min(0).optional(),
});

export function createKeyRouter(engine: ExcitationEngine): Hono {
  const app = new Hono();

  app.get("/:key", async (c) => {
    const data = await engine.inspectKey(c.req.param("key"));
    return c.json({ code: 200, message: "ok", data }, 200);
  });

  app.put("/:key/weight", async (c) => {
    const body = await readJsonBody(c, setWeightSchema);
    const data = await engine.setWeight(c.req.param("key"), body.value);
    return c.json({ code: 200, message: "ok", data }, 200);
  });

  app.post("/:key/reinforce", async (c) => {
    const body = await readJsonBody(c, reinforceSchema);
    const data = await engine.reinforce(c.req.param("key"), body.delta);
    return c.json({ code: 200, message: "ok", data }, 200);
  });

  app.post("/:key/cooldown", async (c) => {
    const body = await readJsonBody(c, cooldownSchema);
    const data = await engine.startCooldown(c.req.param("key"), body.durationSeconds);
    return c.json({ code: 200, message: "ok", data }, 200);
  });

  app.delete("/:key/cooldown", async (c) => {
    const data = await engine.clearCooldown(c.req.param("key"));
    return c.json({ code: 200, message: "ok", data }, 200);
  });

  return app;
}
