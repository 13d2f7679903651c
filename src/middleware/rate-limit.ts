import type { MiddlewareHandler } from "hono";

interface RateLimitOptions {
  windowMs: number;
  max: number;
  scope: string;
  nowFn?: () => number;
}

interface Bucket {
  count: number;
  resetAt: number;
}

function getClientIp(headers: Headers): string {
  const forwardedFor = headers.get("x-forwarded-for");
  if (forwardedFor) {
    return forwardedFor.split(",")[0]?.trim() || "unknown";
  }

  const realIp = headers.get("x-real-ip");
  return realIp?.trim() || "unknown";
}

/** Fixed-window limiter; each middleware instance keeps its own buckets. */
export function createRateLimitMiddleware(options: RateLimitOptions): MiddlewareHandler {
  const { windowMs, max, scope } = options;
  const nowFn = options.nowFn ?? (() => Date.now());
  const buckets = new Map<string, Bucket>();

  return async (c, next) => {
    const key = `${scope}:${getClientIp(c.req.raw.headers)}`;
    const now = nowFn();

    for (const [bucketKey, bucket] of buckets) {
      if (bucket.resetAt <= now) buckets.delete(bucketKey);
    }

    const bucket = buckets.get(key) ?? { count: 0, resetAt: now + windowMs };
    c.header("x-ratelimit-limit", String(max));
    c.header("x-ratelimit-reset", String(bucket.resetAt));

    if (bucket.count >= max) {
      c.header("x-ratelimit-remaining", "0");
      return c.json(
        {
          code: 429,
          message: "Too Many Requests",
        },
        429,
      );
    }

    bucket.count += 1;
    buckets.set(key, bucket);
    c.header("x-ratelimit-remaining", String(Math.max(0, max - bucket.count)));
    await next();
  };
}
