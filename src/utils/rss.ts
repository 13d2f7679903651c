function escapeXml(value: string): string {
  return value
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll("\"", "&quot;")
    .replaceAll("'", "&apos;");
}

export interface RssItemInput {
  title: string;
  link: string;
  guid?: string;
  description?: string;
  pubDate?: string;
}

export interface RssFeedInput {
  title: string;
  link: string;
  description?: string;
  items: RssItemInput[];
}

function renderItem(item: RssItemInput): string {
  const parts = [
    `<title>${escapeXml(item.title)}</title>`,
    `<link>${escapeXml(item.link)}</link>`,
    `<guid isPermaLink="${item.guid ? "false" : "true"}">${escapeXml(item.guid ?? item.link)}</guid>`,
    `<description>${escapeXml(item.description ?? "")}</description>`,
    item.pubDate ? `<pubDate>${escapeXml(item.pubDate)}</pubDate>` : "",
  ];
  return `<item>${parts.join("")}</item>`;
}

export function buildRssXml(feed: RssFeedInput): string {
  return `<?xml version="1.0" encoding="UTF-8"?>` +
    `<rss version="2.0"><channel>` +
    `<title>${escapeXml(feed.title)}</title>` +
    `<link>${escapeXml(feed.link)}</link>` +
    `<description>${escapeXml(feed.description ?? "")}</description>` +
    feed.items.map(renderItem).join("") +
    `</channel></rss>`;
}
