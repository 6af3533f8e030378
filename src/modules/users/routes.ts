import { Router } from "express";

import { usersController } from "./controller.js";
import type { AppContext } from "../../context.js";
import { requireAuth } from "../../middlewares/auth.js";

export function usersRouter(ctx: AppContext): Router {
  const c = usersController(ctx);
  const router = Router();

  // sign-up
  router.post("/", c.create);

  // current user
  router.get("/me", requireAuth, c.getMe);
  router.patch("/me", requireAuth, c.updateMe);
  router.delete("/me", requireAuth, c.deleteMe);

  router.get("/by-key/:contactKey", requireAuth, c.byContactKey);

  return router;
}
