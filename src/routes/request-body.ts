import type { Context } from "hono";
import type { z } from "zod";
import { AppError } from "../middleware/error-handler.js";

export async function readJsonBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.output<T>> {
  let raw: unknown;
  try {
    const text = await c.req.text();
    raw = text.trim() ? (JSON.parse(text) as unknown) : {};
  } catch {
    throw new AppError("Request body must be valid JSON", 400);
  }
  return schema.parse(raw);
}

export function toPositiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return parsed;
}
