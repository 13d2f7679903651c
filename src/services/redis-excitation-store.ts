import { Redis } from "ioredis";
import { logger } from "../utils/logger.js";
import type { CooldownRecord, EpochSeconds, WeightRecord } from "../types/listing.js";
import { StoreError, seenIdentity, type ExcitationStore, type StoreHealth } from "./excitation-store.js";

/** The subset of Redis commands the store issues. */
export interface RedisCommands {
  hset(key: string, fields: Record<string, string>): Promise<number>;
  hmget(key: string, ...fields: string[]): Promise<Array<string | null>>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  setIfAbsent(key: string, value: string): Promise<boolean>;
  del(key: string): Promise<number>;
  exists(key: string): Promise<number>;
  isReady(): boolean;
  quit(): Promise<unknown>;
}

export function ioredisCommands(redis: Redis): RedisCommands {
  return {
    hset: (key, fields) => redis.hset(key, fields),
    hmget: (key, ...fields) => redis.hmget(key, ...fields),
    get: (key) => redis.get(key),
    set: (key, value) => redis.set(key, value),
    setIfAbsent: async (key, value) => (await redis.set(key, value, "NX")) === "OK",
    del: (key) => redis.del(key),
    exists: (key) => redis.exists(key),
    isReady: () => redis.status === "ready",
    quit: () => redis.quit(),
  };
}

export function connectRedis(redisUrl: string): RedisCommands {
  const redis = new Redis(redisUrl, {
    lazyConnect: true,
    maxRetriesPerRequest: 1,
  });
  redis.connect().catch((error: unknown) => {
    logger.warn("redis_connect_failed", {
      message: error instanceof Error ? error.message : String(error),
    });
  });
  return ioredisCommands(redis);
}

interface RedisExcitationStoreOptions {
  client: RedisCommands;
  prefix: string;
}

function parseFiniteNumber(raw: string | null | undefined): number | undefined {
  if (raw === null || raw === undefined) return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Shared store for several scanner processes. Seen identities are written with
 * SET NX, so exactly one process wins the first evaluation of a listing.
 */
export class RedisExcitationStore implements ExcitationStore {
  private readonly client: RedisCommands;
  private readonly prefix: string;

  constructor(options: RedisExcitationStoreOptions) {
    this.client = options.client;
    this.prefix = options.prefix;
  }

  private weightKey(key: string): string {
    return `${this.prefix}:weight:${key}`;
  }

  private cooldownKey(key: string): string {
    return `${this.prefix}:cooldown:${key}`;
  }

  private seenKey(source: string, id: string): string {
    return `${this.prefix}:seen:${seenIdentity(source, id)}`;
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new StoreError(operation, error);
    }
  }

  async load(): Promise<void> {}

  async readWeight(key: string): Promise<WeightRecord | undefined> {
    const [rawValue, rawUpdatedTs] = await this.run("readWeight", () =>
      this.client.hmget(this.weightKey(key), "value", "updatedTs"),
    );
    const value = parseFiniteNumber(rawValue);
    const updatedTs = parseFiniteNumber(rawUpdatedTs);
    if (value === undefined || updatedTs === undefined) return undefined;
    return { value, updatedTs };
  }

  async writeWeight(key: string, record: WeightRecord): Promise<void> {
    await this.run("writeWeight", () =>
      this.client.hset(this.weightKey(key), {
        value: String(record.value),
        updatedTs: String(record.updatedTs),
      }),
    );
  }

  async readCooldown(key: string): Promise<CooldownRecord | undefined> {
    const raw = await this.run("readCooldown", () => this.client.get(this.cooldownKey(key)));
    const untilTs = parseFiniteNumber(raw);
    return untilTs === undefined ? undefined : { untilTs };
  }

  async writeCooldown(key: string, record: CooldownRecord): Promise<void> {
    await this.run("writeCooldown", () => this.client.set(this.cooldownKey(key), String(record.untilTs)));
  }

  async deleteCooldown(key: string): Promise<void> {
    await this.run("deleteCooldown", () => this.client.del(this.cooldownKey(key)));
  }

  async hasSeen(source: string, id: string): Promise<boolean> {
    const count = await this.run("hasSeen", () => this.client.exists(this.seenKey(source, id)));
    return count > 0;
  }

  async markSeen(source: string, id: string, seenTs: EpochSeconds): Promise<boolean> {
    return this.run("markSeen", () => this.client.setIfAbsent(this.seenKey(source, id), String(seenTs)));
  }

  async save(): Promise<void> {}

  async health(): Promise<StoreHealth> {
    return { backend: "redis", ready: this.client.isReady() };
  }

  async close(): Promise<void> {
    await this.run("close", () => this.client.quit());
  }
}
