export const SOURCE_KINDS = ["gumtree", "facebook-marketplace", "rss"] as const;

export type SourceKind = (typeof SOURCE_KINDS)[number];

export interface SourceDefinition {
  id: string;
  kind: SourceKind;
  url: string;
  enabled: boolean;
}

export const SOURCE_BASE_URLS: Record<Exclude<SourceKind, "rss">, string> = {
  gumtree: "https://www.gumtree.com.au",
  "facebook-marketplace": "https://www.facebook.com",
};
