import type { MiddlewareHandler } from "hono";

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,64}$/;

function generateRequestId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 10)}`;
}

export const requestIdMiddleware: MiddlewareHandler = async (c, next) => {
  const incomingId = c.req.header("x-request-id")?.trim();
  const requestId = incomingId && REQUEST_ID_PATTERN.test(incomingId) ? incomingId : generateRequestId();
  c.header("x-request-id", requestId);
  await next();
};
