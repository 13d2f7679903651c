import { describe, expect, test } from "vitest";
import { StoreError } from "../src/services/excitation-store.js";
import { RedisExcitationStore, type RedisCommands } from "../src/services/redis-excitation-store.js";
import { NOW } from "./helpers.js";

class FakeRedis implements RedisCommands {
  readonly strings = new Map<string, string>();
  readonly hashes = new Map<string, Map<string, string>>();
  ready = true;
  failing = false;

  private guard(): void {
    if (this.failing) throw new Error("ECONNREFUSED");
  }

  async hset(key: string, fields: Record<string, string>): Promise<number> {
    this.guard();
    const hash = this.hashes.get(key) ?? new Map<string, string>();
    let added = 0;
    for (const [field, value] of Object.entries(fields)) {
      if (!hash.has(field)) added += 1;
      hash.set(field, value);
    }
    this.hashes.set(key, hash);
    return added;
  }

  async hmget(key: string, ...fields: string[]): Promise<Array<string | null>> {
    this.guard();
    const hash = this.hashes.get(key);
    return fields.map((field) => hash?.get(field) ?? null);
  }

  async get(key: string): Promise<string | null> {
    this.guard();
    return this.strings.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<unknown> {
    this.guard();
    this.strings.set(key, value);
    return "OK";
  }

  async setIfAbsent(key: string, value: string): Promise<boolean> {
    this.guard();
    if (this.strings.has(key)) return false;
    this.strings.set(key, value);
    return true;
  }

  async del(key: string): Promise<number> {
    this.guard();
    return this.strings.delete(key) || this.hashes.delete(key) ? 1 : 0;
  }

  async exists(key: string): Promise<number> {
    this.guard();
    return this.strings.has(key) || this.hashes.has(key) ? 1 : 0;
  }

  isReady(): boolean {
    return this.ready;
  }

  async quit(): Promise<unknown> {
    this.ready = false;
    return "OK";
  }
}

function makeStore() {
  const client = new FakeRedis();
  const store = new RedisExcitationStore({ client, prefix: "test" });
  return { client, store };
}

describe("RedisExcitationStore", () => {
  test("writes a weight as one hash and reads it back", async () => {
    const { client, store } = makeStore();
    await store.writeWeight("source:gumtree", { value: -0.125, updatedTs: NOW });

    expect(client.hashes.get("test:weight:source:gumtree")?.get("value")).toBe("-0.125");
    expect(await store.readWeight("source:gumtree")).toEqual({ value: -0.125, updatedTs: NOW });
    expect(await store.readWeight("source:fb")).toBeUndefined();
  });

  test("treats a half-written or garbled weight hash as absent", async () => {
    const { client, store } = makeStore();
    await client.hset("test:weight:term:sofa", { value: "abc", updatedTs: String(NOW) });
    expect(await store.readWeight("term:sofa")).toBeUndefined();
  });

  test("stores cooldowns under their own key", async () => {
    const { client, store } = makeStore();
    await store.writeCooldown("term:sofa", { untilTs: NOW + 60 });
    expect(client.strings.get("test:cooldown:term:sofa")).toBe(String(NOW + 60));
    expect(await store.readCooldown("term:sofa")).toEqual({ untilTs: NOW + 60 });

    await store.deleteCooldown("term:sofa");
    expect(await store.readCooldown("term:sofa")).toBeUndefined();
  });

  test("markSeen uses set-if-absent on an encoded identity", async () => {
    const { client, store } = makeStore();
    expect(await store.markSeen("gumtree", "a/b", NOW)).toBe(true);
    expect(await store.markSeen("gumtree", "a/b", NOW + 1)).toBe(false);
    expect(client.strings.get("test:seen:gumtree:a%2Fb")).toBe(String(NOW));
    expect(await store.hasSeen("gumtree", "a/b")).toBe(true);
  });

  test("two stores sharing one server admit an identity once", async () => {
    const client = new FakeRedis();
    const first = new RedisExcitationStore({ client, prefix: "shared" });
    const second = new RedisExcitationStore({ client, prefix: "shared" });

    const results = await Promise.all([first.markSeen("fb", "1", NOW), second.markSeen("fb", "1", NOW)]);
    expect(results.filter(Boolean)).toHaveLength(1);
  });

  test("wraps command failures in StoreError", async () => {
    const { client, store } = makeStore();
    client.failing = true;
    await expect(store.readWeight("source:fb")).rejects.toBeInstanceOf(StoreError);
    await expect(store.markSeen("fb", "1", NOW)).rejects.toThrow("Store markSeen failed: ECONNREFUSED");
  });

  test("reports readiness from the client", async () => {
    const { client, store } = makeStore();
    expect(await store.health()).toEqual({ backend: "redis", ready: true });
    client.ready = false;
    expect(await store.health()).toEqual({ backend: "redis", ready: false });
  });
});
