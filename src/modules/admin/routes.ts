import { Router } from "express";

import { listUsersQuery, userIdParam } from "./schemas.js";
import type { AppContext } from "../../context.js";
import { requireAuth, requireRole } from "../../middlewares/auth.js";
import { asyncHandler, jsonOk } from "../../utils/http.js";
import { toAdminUser } from "../users/service.js";

export function adminRouter({ users }: AppContext): Router {
  const router = Router();

  // all admin routes require admin role
  router.use(requireAuth, requireRole("admin"));

  router.get(
    "/users",
    asyncHandler(async (req, res) => {
      const q = listUsersQuery.parse(req.query);
      const items = await users.list(q);
      jsonOk(res, { items: items.map(toAdminUser), limit: q.limit, offset: q.offset });
    })
  );

  router.post(
    "/users/:id/promote",
    asyncHandler(async (req, res) => {
      const { id } = userIdParam.parse(req.params);
      const user = await users.promoteToSuperuser(id);
      jsonOk(res, { ok: true, user: toAdminUser(user) });
    })
  );

  return router;
}
