/** 404 handler for unmatched routes -> uniform error payload. */

import type { RequestHandler } from "express";

export const notFound: RequestHandler = (req, res) => {
  res.status(404).json({
    error: {
      code: "ROUTE_NOT_FOUND",
      kind: "NOT_FOUND",
      message: `Route ${req.method} ${req.originalUrl} not found`,
      requestId: res.locals.requestId,
    },
  });
};
