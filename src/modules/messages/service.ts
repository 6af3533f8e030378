/** Messaging gate: direct messages between confirmed friends. */
import type { MessagePatch, MessageRecord } from "./store.js";
import {
  ForbiddenError,
  InvalidInputError,
  NotFoundError,
  PreconditionFailedError,
} from "../../domain/errors.js";
import type { Stores } from "../../domain/stores.js";
import type { RelationshipService } from "../friends/service.js";

/** The other side of a conversation, by id or by shared contact key. */
export type ConversationPeer = { friendId: string } | { contactKey: number };

function requireContent(content: string): string {
  if (!content.trim()) throw new InvalidInputError("Message content is required", "CONTENT_REQUIRED");
  return content;
}

export class MessagingService {
  private readonly clock: () => Date;

  constructor(
    private readonly stores: Stores,
    private readonly relationships: RelationshipService,
    opts?: { clock?: () => Date }
  ) {
    this.clock = opts?.clock ?? (() => new Date());
  }

  /**
   * Send from the principal to `toUserId`. Friendship is read inside the same transaction as
   * the insert. A friendship row the recipient owns with `isBlocked` refuses delivery.
   */
  async send(actorId: string, input: { content: string; toUserId: string }): Promise<MessageRecord> {
    const content = requireContent(input.content);
    const { toUserId } = input;
    if (toUserId === actorId) {
      throw new InvalidInputError("You can't send a message to yourself", "SELF_MESSAGE");
    }

    return this.stores.withTransaction(async () => {
      const recipient = await this.stores.users.findById(toUserId);
      if (!recipient) throw new NotFoundError("User", "USER_NOT_FOUND");

      if (!(await this.relationships.areFriends(actorId, toUserId))) {
        throw new PreconditionFailedError("NOT_FRIENDS", "Messages can only be sent between friends");
      }

      const recipientSide = await this.stores.friendships.findByPair(actorId, toUserId);
      if (recipientSide?.isBlocked) {
        throw new ForbiddenError("This user is not accepting your messages", "BLOCKED");
      }

      return this.stores.messages.insert({
        content,
        fromUserId: actorId,
        toUserId,
        sentOn: this.clock(),
      });
    });
  }

  /** Both directions, newest first. Unknown peer and non-friend peer are both NotFound. */
  async listConversation(currentUserId: string, peer: ConversationPeer): Promise<MessageRecord[]> {
    const other =
      "contactKey" in peer
        ? await this.stores.users.findByContactKey(peer.contactKey)
        : await this.stores.users.findById(peer.friendId);
    if (!other) throw new NotFoundError("User", "USER_NOT_FOUND");

    if (!(await this.relationships.areFriends(currentUserId, other.id))) {
      throw new NotFoundError("Friend", "FRIEND_NOT_FOUND");
    }
    return this.stores.messages.listBetween(currentUserId, other.id);
  }

  async getMessage(actorId: string, messageId: string): Promise<MessageRecord> {
    return this.loadOwned(actorId, messageId);
  }

  async update(actorId: string, messageId: string, patch: MessagePatch): Promise<MessageRecord> {
    await this.loadOwned(actorId, messageId);
    const clean: MessagePatch = { ...patch };
    if (clean.content !== undefined) clean.content = requireContent(clean.content);
    const updated = await this.stores.messages.update(messageId, clean);
    if (!updated) throw new NotFoundError("Message", "MESSAGE_NOT_FOUND");
    return updated;
  }

  async delete(actorId: string, messageId: string): Promise<void> {
    await this.loadOwned(actorId, messageId);
    await this.stores.messages.delete(messageId);
  }

  unreadCount(userId: string): Promise<number> {
    return this.stores.messages.countUnread(userId);
  }

  private async loadOwned(actorId: string, messageId: string): Promise<MessageRecord> {
    const message = await this.stores.messages.findById(messageId);
    if (!message) throw new NotFoundError("Message", "MESSAGE_NOT_FOUND");
    if (message.fromUserId !== actorId && message.toUserId !== actorId) {
      throw new ForbiddenError("You don't have permission to access this message");
    }
    return message;
  }
}

export function toPublicMessage(m: MessageRecord) {
  return {
    id: m.id,
    content: m.content,
    fromUserId: m.fromUserId,
    toUserId: m.toUserId,
    isNew: m.isNew,
    sentOn: m.sentOn,
  };
}
