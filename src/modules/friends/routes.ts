import { Router } from "express";

import { friendRequestsController, friendsController } from "./controller.js";
import type { AppContext } from "../../context.js";
import { requireAuth } from "../../middlewares/auth.js";

export function friendRequestsRouter(ctx: AppContext): Router {
  const c = friendRequestsController(ctx.relationships);
  const router = Router();
  router.use(requireAuth);

  router.post("/", c.create);
  router.get("/", c.list); // ?box=incoming|outgoing&onlyNew=true
  router.get("/:id", c.get);
  router.patch("/:id", c.update); // accept / mark read
  router.delete("/:id", c.remove);

  return router;
}

export function friendsRouter(ctx: AppContext): Router {
  const c = friendsController(ctx.relationships);
  const router = Router();
  router.use(requireAuth);

  router.get("/status/:userId", c.status);
  router.post("/", c.create);
  router.get("/", c.list);
  router.get("/:id", c.get);
  router.patch("/:id", c.update);
  router.delete("/:id", c.remove);

  return router;
}
