import { logger } from "../utils/logger.js";
import type { Notification } from "../types/listing.js";

export interface NotificationSink {
  readonly name: string;
  notify(notification: Notification): Promise<void>;
}

export class LogNotificationSink implements NotificationSink {
  readonly name = "log";

  async notify(notification: Notification): Promise<void> {
    const { listing } = notification;
    logger.info("listing_notified", {
      source: listing.source,
      id: listing.id,
      excitation: Number(notification.excitation.toFixed(2)),
      title: listing.title,
      price: listing.price,
      url: listing.url,
    });
  }
}

/** Bounded, newest-first history backing the notifications API and feed. */
export class RecentNotificationLog implements NotificationSink {
  readonly name = "recent";
  private readonly entries: Notification[] = [];
  private readonly capacity: number;

  constructor(capacity: number) {
    this.capacity = Math.max(1, capacity);
  }

  async notify(notification: Notification): Promise<void> {
    this.entries.unshift(notification);
    if (this.entries.length > this.capacity) {
      this.entries.length = this.capacity;
    }
  }

  list(limit = this.capacity): Notification[] {
    return this.entries.slice(0, Math.max(1, limit));
  }

  get size(): number {
    return this.entries.length;
  }
}
