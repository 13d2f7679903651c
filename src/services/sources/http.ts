import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36";

interface RequestOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
  maxBufferBytes?: number;
  curlFallback?: boolean;
}

async function requestWithCurl(url: string, options: RequestOptions): Promise<string> {
  const args = ["-sL", "--max-time", String(Math.ceil(options.timeoutMs / 1000)), url];
  for (const [key, value] of Object.entries(options.headers ?? {})) {
    args.push("-H", `${key}: ${value}`);
  }
  const { stdout } = await execFileAsync("curl", args, {
    maxBuffer: options.maxBufferBytes ?? 8 * 1024 * 1024,
  });
  if (!stdout.trim()) {
    throw new Error("Empty response");
  }
  return stdout;
}

export async function requestText(url: string, options: RequestOptions): Promise<string> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(url, {
      method: "GET",
      headers: options.headers ?? {},
      signal: controller.signal,
    });
    if (!response.ok) {
      throw new Error(`Request failed: ${response.status}`);
    }
    const text = await response.text();
    if (!text.trim()) {
      throw new Error("Empty response");
    }
    return text;
  } catch (error) {
    if (options.curlFallback === false) throw error;
    return requestWithCurl(url, options);
  } finally {
    clearTimeout(timer);
  }
}

export function toEpochSeconds(value: unknown): number | undefined {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) return undefined;
    return value > 946684800000 ? value / 1000 : value;
  }
  if (typeof value !== "string" || value.trim() === "") {
    return undefined;
  }
  const raw = value.trim();
  if (/^\d+$/.test(raw)) {
    return toEpochSeconds(Number.parseInt(raw, 10));
  }
  const ts = Date.parse(raw);
  return Number.isFinite(ts) ? ts / 1000 : undefined;
}

/** First `$<amount>` in the text, thousands separators allowed. */
export function extractPrice(text: string): number | null {
  const match = text.match(/\$\s?(\d{1,3}(?:,\d{3})+|\d+)(?:\.(\d{1,2}))?/);
  if (!match?.[1]) return null;
  const whole = match[1].replace(/,/g, "");
  const amount = Number.parseFloat(match[2] ? `${whole}.${match[2]}` : whole);
  return Number.isFinite(amount) ? amount : null;
}

export function ensureAbsoluteUrl(url: string | undefined, fallbackBase: string): string | undefined {
  if (!url) {
    return undefined;
  }
  try {
    return new URL(url, fallbackBase).toString();
  } catch {
    return undefined;
  }
}

export function decodeEntities(input: string): string {
  return input
    .replace(/<!\[CDATA\[([\s\S]*?)\]\]>/g, "$1")
    .replace(/&nbsp;/g, " ")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, "&");
}

export function stripHtml(input: string): string {
  return decodeEntities(input.replace(/<[^>]*>/g, " "))
    .replace(/\s+/g, " ")
    .trim();
}

export function lastPathSegment(url: string): string {
  try {
    const segments = new URL(url).pathname.split("/").filter(Boolean);
    return segments[segments.length - 1] ?? "";
  } catch {
    return "";
  }
}
