import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { CooldownRecord, EpochSeconds, SeenRecord, WeightRecord } from "../types/listing.js";

export type StoreBackend = "memory" | "file" | "redis";

export interface StoreHealth {
  backend: StoreBackend;
  ready: boolean;
}

/**
 * Durable weight, cooldown and seen tables. Weight and cooldown writes come
 * only from feedback callers; the scan loop reads them and writes seen records.
 */
export interface ExcitationStore {
  load(): Promise<void>;
  readWeight(key: string): Promise<WeightRecord | undefined>;
  writeWeight(key: string, record: WeightRecord): Promise<void>;
  readCooldown(key: string): Promise<CooldownRecord | undefined>;
  writeCooldown(key: string, record: CooldownRecord): Promise<void>;
  deleteCooldown(key: string): Promise<void>;
  hasSeen(source: string, id: string): Promise<boolean>;
  /** Insert-if-absent. Resolves true only for the call that created the record. */
  markSeen(source: string, id: string, seenTs: EpochSeconds): Promise<boolean>;
  save(): Promise<void>;
  health(): Promise<StoreHealth>;
  close(): Promise<void>;
}

export class StoreError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`Store ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "StoreError";
    this.operation = operation;
  }
}

export function seenIdentity(source: string, id: string): string {
  return `${encodeURIComponent(source)}:${encodeURIComponent(id)}`;
}

export class InMemoryExcitationStore implements ExcitationStore {
  protected readonly weights = new Map<string, WeightRecord>();
  protected readonly cooldowns = new Map<string, CooldownRecord>();
  protected readonly seen = new Map<string, SeenRecord>();

  async load(): Promise<void> {}

  async readWeight(key: string): Promise<WeightRecord | undefined> {
    return this.weights.get(key);
  }

  async writeWeight(key: string, record: WeightRecord): Promise<void> {
    this.weights.set(key, { ...record });
  }

  async readCooldown(key: string): Promise<CooldownRecord | undefined> {
    return this.cooldowns.get(key);
  }

  async writeCooldown(key: string, record: CooldownRecord): Promise<void> {
    this.cooldowns.set(key, { ...record });
  }

  async deleteCooldown(key: string): Promise<void> {
    this.cooldowns.delete(key);
  }

  async hasSeen(source: string, id: string): Promise<boolean> {
    return this.seen.has(seenIdentity(source, id));
  }

  async markSeen(source: string, id: string, seenTs: EpochSeconds): Promise<boolean> {
    const identity = seenIdentity(source, id);
    if (this.seen.has(identity)) return false;
    this.seen.set(identity, { source, id, seenTs });
    return true;
  }

  async save(): Promise<void> {}

  async health(): Promise<StoreHealth> {
    return { backend: "memory", ready: true };
  }

  async close(): Promise<void> {}
}

const stateFileSchema = z.object({
  version: z.literal(1),
  updatedAt: z.string().optional(),
  weights: z.record(z.object({ value: z.number(), updatedTs: z.number() })).default({}),
  cooldowns: z.record(z.object({ untilTs: z.number() })).default({}),
  seen: z.array(z.object({ source: z.string(), id: z.string(), seenTs: z.number() })).default([]),
});

type StateFileShapeV1 = z.infer<typeof stateFileSchema>;

/**
 * JSON file persistence for a single process; cross-process dedupe needs Redis.
 * Every acknowledged mutation has been written to disk before it resolves.
 */
export class FileBackedExcitationStore extends InMemoryExcitationStore {
  private readonly statePath: string;
  private readonly tmpPath: string;
  private dirty = false;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(statePath: string) {
    super();
    const absolute = path.isAbsolute(statePath) ? statePath : path.resolve(process.cwd(), statePath);
    this.statePath = absolute;
    this.tmpPath = `${absolute}.tmp`;
  }

  override async load(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.statePath, "utf8");
    } catch (error) {
      const code = (error as NodeJS.ErrnoException | undefined)?.code;
      if (code === "ENOENT") return;
      throw new StoreError("load", error);
    }

    let parsed: StateFileShapeV1;
    try {
      parsed = stateFileSchema.parse(JSON.parse(raw));
    } catch (error) {
      throw new StoreError("load", error);
    }

    for (const [key, record] of Object.entries(parsed.weights)) {
      this.weights.set(key, record);
    }
    for (const [key, record] of Object.entries(parsed.cooldowns)) {
      this.cooldowns.set(key, record);
    }
    for (const record of parsed.seen) {
      this.seen.set(seenIdentity(record.source, record.id), record);
    }
  }

  override async writeWeight(key: string, record: WeightRecord): Promise<void> {
    await super.writeWeight(key, record);
    await this.persist("writeWeight");
  }

  override async writeCooldown(key: string, record: CooldownRecord): Promise<void> {
    await super.writeCooldown(key, record);
    await this.persist("writeCooldown");
  }

  override async deleteCooldown(key: string): Promise<void> {
    await super.deleteCooldown(key);
    await this.persist("deleteCooldown");
  }

  override async markSeen(source: string, id: string, seenTs: EpochSeconds): Promise<boolean> {
    const inserted = await super.markSeen(source, id, seenTs);
    if (inserted) await this.persist("markSeen");
    return inserted;
  }

  /** Retries a write that failed earlier; a no-op when the file is current. */
  override async save(): Promise<void> {
    if (!this.dirty) return;
    await this.enqueueWrite("save");
  }

  override async health(): Promise<StoreHealth> {
    return { backend: "file", ready: true };
  }

  override async close(): Promise<void> {
    await this.save();
  }

  private async persist(operation: string): Promise<void> {
    this.dirty = true;
    await this.enqueueWrite(operation);
  }

  // Writes share one temp file, so they run one at a time.
  private enqueueWrite(operation: string): Promise<void> {
    const write = this.writeQueue.then(() => this.writeSnapshot(operation));
    this.writeQueue = write.then(
      () => undefined,
      () => undefined,
    );
    return write;
  }

  private async writeSnapshot(operation: string): Promise<void> {
    if (!this.dirty) return;
    this.dirty = false;
    const payload: StateFileShapeV1 = {
      version: 1,
      updatedAt: new Date().toISOString(),
      weights: Object.fromEntries(this.weights),
      cooldowns: Object.fromEntries(this.cooldowns),
      seen: Array.from(this.seen.values()),
    };
    try {
      await fs.mkdir(path.dirname(this.statePath), { recursive: true });
      await fs.writeFile(this.tmpPath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
      await fs.rename(this.tmpPath, this.statePath);
    } catch (error) {
      this.dirty = true;
      throw new StoreError(operation, error);
    }
  }
}
