import { Router } from "express";

import { messagesController } from "./controller.js";
import type { AppContext } from "../../context.js";
import { requireAuth } from "../../middlewares/auth.js";

export function messagesRouter(ctx: AppContext): Router {
  const c = messagesController(ctx.messaging);
  const router = Router();
  router.use(requireAuth);

  router.post("/", c.send);
  router.get("/", c.conversation); // ?friendId= or ?contactKey=
  router.get("/unread-count", c.unreadCount);
  router.get("/:id", c.get);
  router.patch("/:id", c.update);
  router.delete("/:id", c.remove);

  return router;
}
