/** Final error handler: AppError, zod and anything else -> one JSON error shape, logged via winston. */
import type { ErrorRequestHandler } from "express";
import { ZodError } from "zod";

import { env } from "../config/env.js";
import { logger } from "../config/logger.js";
import { AppError } from "../domain/errors.js";

function readStatus(err: unknown): number {
  if (typeof err === "object" && err !== null && "status" in err) {
    const { status } = err;
    if (typeof status === "number" && status >= 400 && status < 600) return status;
  }
  return 500;
}

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  const requestId: unknown = res.locals.requestId;

  if (err instanceof ZodError) {
    const details = err.flatten();
    logger.warn("Validation error", { requestId, path: req.originalUrl, details });
    return res.status(422).json({
      error: {
        code: "UNPROCESSABLE_ENTITY",
        kind: "INVALID_INPUT",
        message: "Invalid request",
        requestId,
        details,
      },
    });
  }

  if (err instanceof AppError) {
    logger.warn(err.message, { requestId, kind: err.kind, code: err.code, status: err.status });
    return res.status(err.status).json({
      error: {
        code: err.code,
        kind: err.kind,
        message: err.message,
        requestId,
        ...(err.details === undefined ? {} : { details: err.details }),
      },
    });
  }

  // body-parser and friends set `status` on client errors (malformed JSON, payload too large)
  const status = readStatus(err);
  const message = err instanceof Error ? err.message : "Internal server error";

  if (status >= 500) {
    logger.error(message, {
      requestId,
      status,
      stack: err instanceof Error ? err.stack : undefined,
    });
    return res.status(status).json({
      error: {
        code: "INTERNAL_ERROR",
        kind: "INTERNAL",
        message: env.NODE_ENV === "production" ? "Internal server error" : message,
        requestId,
      },
    });
  }

  logger.warn(message, { requestId, status });
  res.status(status).json({
    error: { code: "BAD_REQUEST", kind: "INVALID_INPUT", message, requestId },
  });
};
