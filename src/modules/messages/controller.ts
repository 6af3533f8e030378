import { conversationQuery, sendMessageSchema, updateMessageSchema } from "./schemas.js";
import { toPublicMessage, type MessagingService } from "./service.js";
import { getAuth } from "../../middlewares/auth.js";
import { asyncHandler, jsonOk, noContent } from "../../utils/http.js";

export function messagesController(messaging: MessagingService) {
  return {
    send: asyncHandler(async (req, res) => {
      const { userId } = getAuth(req);
      const body = sendMessageSchema.parse(req.body);
      const message = await messaging.send(userId, body);
      jsonOk(res, { message: toPublicMessage(message) }, 201);
    }),

    conversation: asyncHandler(async (req, res) => {
      const { userId } = getAuth(req);
      const q = conversationQuery.parse(req.query);
      const items = await messaging.listConversation(
        userId,
        q.contactKey !== undefined ? { contactKey: q.contactKey } : { friendId: q.friendId ?? "" }
      );
      jsonOk(res, { items: items.map(toPublicMessage) });
    }),

    unreadCount: asyncHandler(async (req, res) => {
      const { userId } = getAuth(req);
      jsonOk(res, { count: await messaging.unreadCount(userId) });
    }),

    get: asyncHandler(async (req, res) => {
      const { userId } = getAuth(req);
      const message = await messaging.getMessage(userId, req.params.id);
      jsonOk(res, { message: toPublicMessage(message) });
    }),

    update: asyncHandler(async (req, res) => {
      const { userId } = getAuth(req);
      const body = updateMessageSchema.parse(req.body);
      const message = await messaging.update(userId, req.params.id, body);
      jsonOk(res, { message: toPublicMessage(message) });
    }),

    remove: asyncHandler(async (req, res) => {
      const { userId } = getAuth(req);
      await messaging.delete(userId, req.params.id);
      noContent(res);
    }),
  };
}
