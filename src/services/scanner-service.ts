import { env } from "../config/env.js";
import { logger, errorMessage } from "../utils/logger.js";
import type { Listing, Notification } from "../types/listing.js";
import type { ExcitationEngine } from "./excitation-engine.js";
import type { ExcitationStore } from "./excitation-store.js";
import type { NotificationSink } from "./notifier.js";
import type { ListingSource } from "./sources/index.js";

interface ScannerServiceOptions {
  engine: ExcitationEngine;
  store: ExcitationStore;
  sources: ListingSource[];
  sinks: NotificationSink[];
  pollIntervalSeconds: number;
  enabled?: boolean;
}

export type CycleReason = "startup" | "schedule" | "manual";

export interface CycleSummary {
  reason: CycleReason;
  startedAt: string;
  durationMs: number;
  fetched: number;
  duplicates: number;
  suppressed: number;
  notified: number;
  failed: number;
  failedSources: Array<{ source: string; error: string }>;
}

export interface ScannerStatus {
  enabled: boolean;
  running: boolean;
  sources: string[];
  lastCycle?: CycleSummary;
}

export class ScannerService {
  private readonly engine: ExcitationEngine;
  private readonly store: ExcitationStore;
  private readonly sources: ListingSource[];
  private readonly sinks: NotificationSink[];
  private readonly pollIntervalMs: number;
  private readonly enabled: boolean;

  private timer?: ReturnType<typeof setInterval>;
  private startupTimer?: ReturnType<typeof setTimeout>;
  private running = false;
  private lastCycle?: CycleSummary;

  constructor(options: ScannerServiceOptions) {
    this.engine = options.engine;
    this.store = options.store;
    this.sources = options.sources;
    this.sinks = options.sinks;
    this.pollIntervalMs = Math.max(1, options.pollIntervalSeconds) * 1000;
    this.enabled = options.enabled ?? env.NODE_ENV !== "test";
  }

  start(): void {
    if (!this.enabled || this.timer) return;

    this.timer = setInterval(() => {
      void this.runCycle("schedule");
    }, this.pollIntervalMs);
    if (typeof this.timer.unref === "function") this.timer.unref();

    this.startupTimer = setTimeout(() => {
      this.startupTimer = undefined;
      void this.runCycle("startup");
    }, 0);
    if (typeof this.startupTimer.unref === "function") this.startupTimer.unref();
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    if (this.startupTimer) clearTimeout(this.startupTimer);
    this.timer = undefined;
    this.startupTimer = undefined;
  }

  status(): ScannerStatus {
    return {
      enabled: this.enabled,
      running: this.running,
      sources: this.sources.map((source) => source.id),
      lastCycle: this.lastCycle,
    };
  }

  /** Resolves undefined when a cycle is already in flight, or when it failed and throwOnError is off. */
  async runCycle(
    reason: CycleReason = "manual",
    opts: { throwOnError?: boolean } = {},
  ): Promise<CycleSummary | undefined> {
    if (this.running) return undefined;
    this.running = true;

    const startedMs = Date.now();
    try {
      const summary = await this.runCycleOnce(reason, startedMs);
      this.lastCycle = summary;
      logger.info("scanner_cycle_ok", { ...summary });
      return summary;
    } catch (error) {
      logger.error("scanner_cycle_failed", {
        reason,
        durationMs: Date.now() - startedMs,
        error: errorMessage(error),
      });
      if (opts.throwOnError) {
        throw error;
      }
      return undefined;
    } finally {
      this.running = false;
    }
  }

  private async fetchAll(): Promise<{ listings: Listing[]; failedSources: CycleSummary["failedSources"] }> {
    const settled = await Promise.allSettled(this.sources.map((source) => source.fetchListings()));
    const listings: Listing[] = [];
    const failedSources: CycleSummary["failedSources"] = [];

    settled.forEach((result, index) => {
      const source = this.sources[index];
      if (!source) return;
      if (result.status === "fulfilled") {
        listings.push(...result.value);
        return;
      }
      const error = errorMessage(result.reason);
      failedSources.push({ source: source.id, error });
      logger.warn("scanner_source_failed", { source: source.id, error });
    });

    return { listings, failedSources };
  }

  private async runCycleOnce(reason: CycleReason, startedMs: number): Promise<CycleSummary> {
    const { listings, failedSources } = await this.fetchAll();
    const summary: CycleSummary = {
      reason,
      startedAt: new Date(startedMs).toISOString(),
      durationMs: 0,
      fetched: listings.length,
      duplicates: 0,
      suppressed: 0,
      notified: 0,
      failed: 0,
      failedSources,
    };

    for (const listing of listings) {
      try {
        const outcome = await this.engine.evaluate(listing);
        if (outcome.status === "rejected") {
          summary.duplicates += 1;
          continue;
        }
        if (outcome.status === "suppressed") {
          summary.suppressed += 1;
          logger.debug("listing_suppressed", {
            source: listing.source,
            id: listing.id,
            excitation: outcome.breakdown.excitation,
          });
          continue;
        }
        summary.notified += 1;
        await this.dispatch({
          listing,
          excitation: outcome.breakdown.excitation,
          breakdown: outcome.breakdown,
          notifiedAt: outcome.breakdown.scoredAt,
        });
      } catch (error) {
        summary.failed += 1;
        logger.error("listing_evaluation_failed", {
          source: listing.source,
          id: listing.id,
          error: errorMessage(error),
        });
      }
    }

    await this.store.save();
    summary.durationMs = Date.now() - startedMs;
    return summary;
  }

  private async dispatch(notification: Notification): Promise<void> {
    for (const sink of this.sinks) {
      try {
        await sink.notify(notification);
      } catch (error) {
        logger.warn("notification_sink_failed", {
          sink: sink.name,
          source: notification.listing.source,
          id: notification.listing.id,
          error: errorMessage(error),
        });
      }
    }
  }
}
