import { z } from "zod";

const objectId = z.string().regex(/^[0-9a-fA-F]{24}$/, "Must be a valid id");

export const sendRequestSchema = z
  .object({
    contactKey: z.coerce.number().int().optional(),
    toUserId: objectId.optional(),
  })
  .refine((v) => (v.contactKey === undefined) !== (v.toUserId === undefined), {
    message: "Provide exactly one of contactKey or toUserId",
    path: ["contactKey"],
  });

export const listRequestsQuery = z.object({
  box: z.enum(["incoming", "outgoing"]).default("incoming"),
  onlyNew: z
    .enum(["true", "false"])
    .optional()
    .transform((v) => v === "true"),
});

// sender, recipient and creation time are fixed once the request exists
export const updateRequestSchema = z
  .object({
    isNew: z.boolean().optional(),
    isAccepted: z.boolean().optional(),
  })
  .strict();

export const createFriendshipSchema = z.object({
  userId: objectId,
  friendOfId: objectId.optional(),
});

export const updateFriendshipSchema = z
  .object({
    nickname: z.string().trim().max(255).nullable().optional(),
    isBlocked: z.boolean().optional(),
  })
  .strict();
