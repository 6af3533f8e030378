/** API surface: health endpoints plus the feature routers. */
import { Router } from "express";

import type { AppContext } from "./context.js";
import { adminRouter } from "./modules/admin/routes.js";
import { authRouter } from "./modules/auth/routes.js";
import { friendRequestsRouter, friendsRouter } from "./modules/friends/routes.js";
import { messagesRouter } from "./modules/messages/routes.js";
import { usersRouter } from "./modules/users/routes.js";
import { asyncHandler, jsonOk } from "./utils/http.js";

export function buildRouter(ctx: AppContext): Router {
  const router = Router();

  // Feature mounts
  router.use("/auth", authRouter(ctx));
  router.use("/users", usersRouter(ctx));
  router.use("/friend-requests", friendRequestsRouter(ctx));
  router.use("/friends", friendsRouter(ctx));
  router.use("/messages", messagesRouter(ctx));
  router.use("/admin", adminRouter(ctx));

  // Basic health (no deps)
  router.get(
    "/health",
    asyncHandler(async (_req, res) => {
      const uptime = process.uptime();
      const version = process.env.npm_package_version || "0.0.0";
      jsonOk(res, { status: "ok", uptime, version });
    })
  );

  // Dependencies health (actual pings)
  router.get(
    "/health/deps",
    asyncHandler(async (_req, res) => {
      const { mongo, redis } = await ctx.pingDeps();
      const healthy = mongo.status === "ok" && redis.status === "ok";
      jsonOk(
        res,
        {
          mongo: mongo.status,
          redis: redis.status,
          ...(healthy ? {} : { details: { mongo: mongo.message, redis: redis.message } }),
        },
        healthy ? 200 : 503
      );
    })
  );

  return router;
}
