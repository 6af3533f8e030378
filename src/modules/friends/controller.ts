import {
  createFriendshipSchema,
  listRequestsQuery,
  sendRequestSchema,
  updateFriendshipSchema,
  updateRequestSchema,
} from "./schemas.js";
import {
  toPublicFriendship,
  toPublicRequest,
  type RelationshipService,
} from "./service.js";
import { getAuth } from "../../middlewares/auth.js";
import { asyncHandler, jsonOk, noContent } from "../../utils/http.js";

export function friendRequestsController(relationships: RelationshipService) {
  return {
    create: asyncHandler(async (req, res) => {
      const { userId } = getAuth(req);
      const body = sendRequestSchema.parse(req.body);
      const request =
        body.contactKey !== undefined
          ? await relationships.sendRequestByContactKey(userId, body.contactKey)
          : await relationships.sendRequest(userId, body.toUserId ?? "");
      jsonOk(res, { request: toPublicRequest(request) }, 201);
    }),

    list: asyncHandler(async (req, res) => {
      const { userId } = getAuth(req);
      const q = listRequestsQuery.parse(req.query);
      const items =
        q.box === "outgoing"
          ? await relationships.listOutgoingRequests(userId)
          : await relationships.listIncomingRequests(userId, { onlyNew: q.onlyNew });
      jsonOk(res, { items: items.map(toPublicRequest) });
    }),

    get: asyncHandler(async (req, res) => {
      const { userId } = getAuth(req);
      const request = await relationships.getRequest(userId, req.params.id);
      jsonOk(res, { request: toPublicRequest(request) });
    }),

    update: asyncHandler(async (req, res) => {
      const { userId } = getAuth(req);
      const body = updateRequestSchema.parse(req.body);
      const request = await relationships.updateRequest(userId, req.params.id, body);
      jsonOk(res, { request: toPublicRequest(request) });
    }),

    remove: asyncHandler(async (req, res) => {
      const { userId } = getAuth(req);
      await relationships.deleteRequest(userId, req.params.id);
      noContent(res);
    }),
  };
}

export function friendsController(relationships: RelationshipService) {
  return {
    status: asyncHandler(async (req, res) => {
      const { userId } = getAuth(req);
      const status = await relationships.relationshipStatus(userId, req.params.userId);
      jsonOk(res, status);
    }),

    create: asyncHandler(async (req, res) => {
      const { userId } = getAuth(req);
      const body = createFriendshipSchema.parse(req.body);
      const friendship = await relationships.createFriendship(userId, {
        userId: body.userId,
        friendOfId: body.friendOfId ?? userId,
      });
      jsonOk(res, { friendship: toPublicFriendship(friendship) }, 201);
    }),

    list: asyncHandler(async (req, res) => {
      const { userId } = getAuth(req);
      const items = await relationships.listFriends(userId);
      jsonOk(res, { items: items.map(toPublicFriendship) });
    }),

    get: asyncHandler(async (req, res) => {
      const { userId } = getAuth(req);
      const friendship = await relationships.getFriendship(userId, req.params.id);
      jsonOk(res, { friendship: toPublicFriendship(friendship) });
    }),

    update: asyncHandler(async (req, res) => {
      const { userId } = getAuth(req);
      const body = updateFriendshipSchema.parse(req.body);
      const friendship = await relationships.updateFriendship(userId, req.params.id, body);
      jsonOk(res, { friendship: toPublicFriendship(friendship) });
    }),

    remove: asyncHandler(async (req, res) => {
      const { userId } = getAuth(req);
      await relationships.deleteFriendship(userId, req.params.id);
      noContent(res);
    }),
  };
}
