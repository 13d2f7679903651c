import { Hono } from "hono";
import type { RecentNotificationLog } from "../services/notifier.js";
import { buildRssXml } from "../utils/rss.js";
import { toPositiveInt } from "./request-body.js";

const DEFAULT_LIMIT = 50;

export function createNotificationRouter(log: RecentNotificationLog): Hono {
  const app = new Hono();

  app.get("/", (c) => {
    const limit = toPositiveInt(c.req.query("limit"), DEFAULT_LIMIT);
    return c.json(
      {
        code: 200,
        message: "ok",
        data: {
          total: log.size,
          items: log.list(limit).map((entry) => ({
            ...entry.listing,
            excitation: entry.excitation,
            notifiedAt: new Date(entry.notifiedAt * 1000).toISOString(),
            keys: entry.breakdown.keys,
          })),
        },
      },
      200,
    );
  });

  app.get("/rss", (c) => {
    const limit = toPositiveInt(c.req.query("limit"), DEFAULT_LIMIT);
    const xml = buildRssXml({
      title: "Listing alerts",
      link: c.req.url,
      description: "Listings whose excitation cleared the notification threshold",
      items: log.list(limit).map((entry) => ({
        title: entry.listing.title || `${entry.listing.source} ${entry.listing.id}`,
        link: entry.listing.url || `${c.req.url}#${encodeURIComponent(`${entry.listing.source}:${entry.listing.id}`)}`,
        guid: `${entry.listing.source}:${entry.listing.id}`,
        description: [
          `excitation=${entry.excitation.toFixed(2)}`,
          `source=${entry.listing.source}`,
          entry.listing.price === null ? "" : `price=${entry.listing.price}`,
        ]
          .filter(Boolean)
          .join(" "),
        pubDate: new Date(entry.notifiedAt * 1000).toUTCString(),
      })),
    });
    c.header("content-type", "application/xml; charset=utf-8");
    return c.body(xml, 200);
  });

  return app;
}
