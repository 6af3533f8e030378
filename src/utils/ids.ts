/** Tags each request with an x-request-id (caller-supplied when well-formed) for log correlation. */

import { randomUUID } from "crypto";

import type { RequestHandler } from "express";

const INCOMING_ID = /^[A-Za-z0-9._-]{8,128}$/;

export const requestId: RequestHandler = (req, res, next) => {
  const incoming = req.get("x-request-id");
  const id = incoming && INCOMING_ID.test(incoming) ? incoming : randomUUID();
  res.locals.requestId = id;
  res.setHeader("x-request-id", id);
  next();
};
