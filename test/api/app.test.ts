import request from "supertest";
import { describe, expect, it } from "vitest";

import { createApp } from "../../src/app.js";
import { makeContext } from "../helpers/factories.js";

describe("app shell", () => {
  it("reports liveness", async () => {
    const res = await request(createApp(makeContext().ctx)).get("/health").expect(200);
    expect(res.body.status).toBe("ok");
  });

  it("reports dependency health and 503 when one is down", async () => {
    const up = createApp(makeContext().ctx);
    const ok = await request(up).get("/health/deps").expect(200);
    expect(ok.body).toEqual({ mongo: "ok", redis: "ok" });

    const down = createApp(
      makeContext({
        pingDeps: async () => ({
          mongo: { status: "ok" },
          redis: { status: "error", message: "connect ECONNREFUSED" },
        }),
      }).ctx
    );
    const bad = await request(down).get("/health/deps").expect(503);
    expect(bad.body).toEqual({
      mongo: "ok",
      redis: "error",
      details: { redis: "connect ECONNREFUSED" },
    });
  });

  it("answers unknown routes with the uniform 404 body", async () => {
    const res = await request(createApp(makeContext().ctx)).get("/nowhere").expect(404);
    expect(res.body.error).toMatchObject({
      code: "ROUTE_NOT_FOUND",
      kind: "NOT_FOUND",
      message: "Route GET /nowhere not found",
    });
  });

  it("echoes a well-formed caller request id", async () => {
    const res = await request(createApp(makeContext().ctx))
      .get("/health")
      .set("x-request-id", "trace-12345678")
      .expect(200);
    expect(res.headers["x-request-id"]).toBe("trace-12345678");
  });

  it("turns malformed JSON into a 400", async () => {
    const res = await request(createApp(makeContext().ctx))
      .post("/users")
      .set("Content-Type", "application/json")
      .send("{not json")
      .expect(400);
    expect(res.body.error.code).toBe("BAD_REQUEST");
  });

  it("rate limits per client once the window budget is spent", async () => {
    const app = createApp(makeContext({ rateLimit: { windowMs: 60_000, max: 2 } }).ctx);
    await request(app).get("/health").expect(200);
    await request(app).get("/health").expect(200);
    const res = await request(app).get("/health").expect(429);
    expect(res.body.error.code).toBe("RATE_LIMITED");
  });
});
