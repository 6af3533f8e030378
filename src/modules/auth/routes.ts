import { Router } from "express";

import { authController } from "./controller.js";
import type { AppContext } from "../../context.js";
import { rateLimit } from "../../middlewares/rateLimit.js";

export function authRouter(ctx: AppContext): Router {
  const c = authController(ctx);
  const router = Router();

  router.post("/register", rateLimit({ windowMs: 60_000, max: 10 }), c.register);

  // Login: light IP rate limit (5/min)
  router.post("/token", rateLimit({ windowMs: 60_000, max: 5 }), c.token);

  // Refresh: rotate token, 10/min per IP
  router.post("/refresh", rateLimit({ windowMs: 60_000, max: 10 }), c.refresh);

  router.post("/logout", rateLimit({ windowMs: 60_000, max: 30 }), c.logout);

  return router;
}
