import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ZodError } from "zod";
import { logger } from "../utils/logger.js";

export class AppError extends Error {
  status: ContentfulStatusCode;

  constructor(message: string, status: ContentfulStatusCode = 500) {
    super(message);
    this.name = "AppError";
    this.status = status;
  }
}

export class InvalidListingError extends AppError {
  constructor(message: string) {
    super(message, 400);
    this.name = "InvalidListingError";
  }
}

export class InvalidKeyError extends AppError {
  constructor(key: string) {
    super(`Invalid key: ${key}`, 400);
    this.name = "InvalidKeyError";
  }
}

export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function formatErrorResponse(error: unknown, c: Context): Response {
  const requestId = c.res.headers.get("x-request-id") ?? c.req.header("x-request-id");

  if (error instanceof ZodError) {
    const message = formatZodIssues(error);
    logger.warn("request_invalid", {
      requestId,
      path: c.req.path,
      message,
    });
    return c.json({ code: 400, message }, 400);
  }

  if (error instanceof AppError) {
    logger.warn("request_failed", {
      requestId,
      status: error.status,
      path: c.req.path,
      message: error.message,
    });
    return c.json(
      {
        code: error.status,
        message: error.message,
      },
      error.status,
    );
  }

  const message = error instanceof Error ? error.message : "Internal Server Error";

  logger.error("unhandled_error", {
    requestId,
    path: c.req.path,
    message,
  });

  return c.json(
    {
      code: 500,
      message: "Internal Server Error",
    },
    500,
  );
}
