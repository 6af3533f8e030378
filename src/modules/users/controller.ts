import { contactKeyParam, createUserSchema, updateMeSchema } from "./schemas.js";
import { toContactCard, toPublicUser, type UsersService } from "./service.js";
import { getAuth } from "../../middlewares/auth.js";
import { asyncHandler, jsonOk, noContent } from "../../utils/http.js";
import type { SessionStore } from "../auth/sessions.js";

export function usersController({ users, sessions }: { users: UsersService; sessions: SessionStore }) {
  return {
    create: asyncHandler(async (req, res) => {
      const body = createUserSchema.parse(req.body);
      const user = await users.create(body);
      jsonOk(res, { user: toPublicUser(user) }, 201);
    }),

    getMe: asyncHandler(async (req, res) => {
      const { userId } = getAuth(req);
      const user = await users.getById(userId);
      jsonOk(res, { user: toPublicUser(user) });
    }),

    updateMe: asyncHandler(async (req, res) => {
      const { userId } = getAuth(req);
      const body = updateMeSchema.parse(req.body);
      const user = await users.updateProfile(userId, body);
      jsonOk(res, { user: toPublicUser(user) });
    }),

    deleteMe: asyncHandler(async (req, res) => {
      const { userId } = getAuth(req);
      await users.deleteAccount(userId);
      await sessions.revokeAll(userId);
      noContent(res);
    }),

    byContactKey: asyncHandler(async (req, res) => {
      const { contactKey } = contactKeyParam.parse(req.params);
      const user = await users.getByContactKey(contactKey);
      jsonOk(res, { user: toContactCard(user) });
    }),
  };
}
