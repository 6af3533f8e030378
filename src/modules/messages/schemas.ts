import { z } from "zod";

export const MAX_MESSAGE_LENGTH = 5000;

const content = z.string().min(1, "Message content is required").max(MAX_MESSAGE_LENGTH);

export const sendMessageSchema = z.object({
  content,
  toUserId: z.string().min(1, "toUserId is required"),
});

export const conversationQuery = z
  .object({
    friendId: z.string().min(1).optional(),
    contactKey: z.coerce.number().int().optional(),
  })
  .refine((v) => (v.friendId === undefined) !== (v.contactKey === undefined), {
    message: "Provide exactly one of friendId or contactKey",
    path: ["friendId"],
  });

export const updateMessageSchema = z
  .object({
    content: content.optional(),
    isNew: z.boolean().optional(),
  })
  .strict();
