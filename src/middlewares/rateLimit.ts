/** In-memory IP rate limiter (fixed window). Each call gets its own buckets. */

import type { RequestHandler } from "express";

type Bucket = { count: number; resetAt: number };

/** Per-key hit counters; expired buckets are dropped once per window. */
export class WindowCounter {
  private readonly buckets = new Map<string, Bucket>();
  private nextSweepAt = 0;

  constructor(private readonly windowMs: number) {}

  hit(key: string, now = Date.now()): Bucket {
    if (now >= this.nextSweepAt) {
      for (const [k, b] of this.buckets) {
        if (b.resetAt <= now) this.buckets.delete(k);
      }
      this.nextSweepAt = now + this.windowMs;
    }
    let b = this.buckets.get(key);
    if (!b || b.resetAt <= now) {
      b = { count: 0, resetAt: now + this.windowMs };
      this.buckets.set(key, b);
    }
    b.count += 1;
    return b;
  }

  get size(): number {
    return this.buckets.size;
  }
}

export const rateLimit = (opts: { windowMs: number; max: number }): RequestHandler => {
  const { windowMs, max } = opts;
  const counter = new WindowCounter(windowMs);

  return (req, res, next) => {
    const b = counter.hit(req.ip || "unknown");
    res.setHeader("x-ratelimit-limit", String(max));
    res.setHeader("x-ratelimit-remaining", String(Math.max(0, max - b.count)));
    res.setHeader("x-ratelimit-reset", String(Math.floor(b.resetAt / 1000)));
    if (b.count > max) {
      return res.status(429).json({
        error: {
          code: "RATE_LIMITED",
          kind: "RATE_LIMITED",
          message: "Too many requests",
          requestId: res.locals.requestId,
        },
      });
    }
    next();
  };
};
