export interface HtmlAnchor {
  href: string;
  attributes: string;
  html: string;
}

const ANCHOR_REGEX = /<a\b([^>]*)>([\s\S]*?)<\/a>/gi;
const HREF_REGEX = /\bhref\s*=\s*(?:"([^"]*)"|'([^']*)')/i;

export function readAnchors(html: string): HtmlAnchor[] {
  const anchors: HtmlAnchor[] = [];
  for (const match of html.matchAll(ANCHOR_REGEX)) {
    const attributes = match[1] ?? "";
    const hrefMatch = attributes.match(HREF_REGEX);
    const href = hrefMatch?.[1] ?? hrefMatch?.[2];
    if (!href) continue;
    anchors.push({ href, attributes, html: match[2] ?? "" });
  }
  return anchors;
}

export function hasAttribute(attributes: string, name: string, value: string): boolean {
  const pattern = new RegExp(`\\b${name}\\s*=\\s*["']${value}["']`, "i");
  return pattern.test(attributes);
}
