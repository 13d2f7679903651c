import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { SOURCE_KINDS, type SourceDefinition } from "../domain/sources.js";

const sourceSchema = z.object({
  id: z.string().trim().min(1),
  kind: z.enum(SOURCE_KINDS),
  url: z.string().url(),
  enabled: z.boolean().default(true),
});

const sourcesFileSchema = z.object({
  version: z.number().int().optional(),
  sources: z
    .array(sourceSchema)
    .default([])
    .superRefine((sources, ctx) => {
      const ids = new Set<string>();
      sources.forEach((source, index) => {
        if (ids.has(source.id)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Duplicate source id: ${source.id}`,
            path: [index, "id"],
          });
        }
        ids.add(source.id);
      });
    }),
});

export function parseSourceDefinitions(input: unknown): SourceDefinition[] {
  return sourcesFileSchema.parse(input).sources;
}

export async function readSourceDefinitions(configPath: string): Promise<SourceDefinition[]> {
  const absolute = path.isAbsolute(configPath) ? configPath : path.resolve(process.cwd(), configPath);
  const raw = await fs.readFile(absolute, "utf8");
  return parseSourceDefinitions(JSON.parse(raw) as unknown);
}
