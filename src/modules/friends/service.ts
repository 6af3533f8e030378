/**
 * Relationship engine: friend requests and friendships.
 *
 * Per unordered pair {A, B}: NoRequest -> Pending (either side asks) -> Accepted (recipient
 * accepts). Deleting the request returns the pair to NoRequest but leaves friendships alone.
 * Friendship rows are one-directional and need an accepted request between the pair.
 */
import type {
  FriendRequestPatch,
  FriendRequestRecord,
  FriendshipPatch,
  FriendshipRecord,
} from "./store.js";
import {
  DuplicateRequestError,
  ForbiddenError,
  InvalidInputError,
  NotFoundError,
  PreconditionFailedError,
} from "../../domain/errors.js";
import type { Stores } from "../../domain/stores.js";
import type { UserRecord } from "../users/store.js";

/**
 * `either`: any accepted request between the pair allows a friendship row in both directions.
 * `matching`: the row's (userId, friendOfId) must equal the request's (fromUserId, toUserId).
 */
export type DirectionPolicy = "either" | "matching";

export type RelationshipStatus = {
  areFriends: boolean;
  request: { id: string; direction: "incoming" | "outgoing"; isAccepted: boolean } | null;
};

function isParty(userId: string, a: string, b: string) {
  return userId === a || userId === b;
}

export class RelationshipService {
  constructor(
    private readonly stores: Stores,
    private readonly opts: { directionPolicy: DirectionPolicy }
  ) {}

  /** Resolve a shared contact key to its user. */
  async lookupByContactKey(contactKey: number): Promise<UserRecord> {
    const user = await this.stores.users.findByContactKey(contactKey);
    if (!user) throw new NotFoundError("User", "USER_NOT_FOUND");
    return user;
  }

  /** The request between a and b in either direction; a -> b is checked first. */
  async findPairRequest(a: string, b: string): Promise<FriendRequestRecord | null> {
    const sent = await this.stores.friendRequests.findByDirection(a, b);
    if (sent) return sent;
    return this.stores.friendRequests.findByDirection(b, a);
  }

  async sendRequest(fromUserId: string, toUserId: string): Promise<FriendRequestRecord> {
    if (fromUserId === toUserId) {
      throw new InvalidInputError("You can't send a friend request to yourself", "SELF_REQUEST");
    }

    return this.stores.withTransaction(async () => {
      await this.requireUser(fromUserId);
      await this.requireUser(toUserId);

      const existing = await this.findPairRequest(fromUserId, toUserId);
      if (existing) {
        throw new DuplicateRequestError(
          existing.fromUserId === fromUserId
            ? "You have already sent a friend request to this user"
            : "This user has already sent you a friend request"
        );
      }
      return this.stores.friendRequests.insert({ fromUserId, toUserId });
    });
  }

  async sendRequestByContactKey(fromUserId: string, contactKey: number): Promise<FriendRequestRecord> {
    const recipient = await this.lookupByContactKey(contactKey);
    return this.sendRequest(fromUserId, recipient.id);
  }

  listIncomingRequests(userId: string, opts?: { onlyNew?: boolean }): Promise<FriendRequestRecord[]> {
    return this.stores.friendRequests.listIncoming(userId, opts);
  }

  listOutgoingRequests(userId: string): Promise<FriendRequestRecord[]> {
    return this.stores.friendRequests.listOutgoing(userId);
  }

  async getRequest(actorId: string, requestId: string): Promise<FriendRequestRecord> {
    const request = await this.loadRequest(requestId);
    if (!isParty(actorId, request.fromUserId, request.toUserId)) {
      throw new ForbiddenError("You don't have permission to view this friend request");
    }
    return request;
  }

  /** Accept / mark read. Recipient only. */
  async updateRequest(
    actorId: string,
    requestId: string,
    patch: FriendRequestPatch
  ): Promise<FriendRequestRecord> {
    const request = await this.loadRequest(requestId);
    if (request.toUserId !== actorId) {
      throw new ForbiddenError("You don't have permission to manage this friend request");
    }
    const updated = await this.stores.friendRequests.update(requestId, patch);
    if (!updated) throw new NotFoundError("Friend request", "REQUEST_NOT_FOUND");
    return updated;
  }

  /** Either party may withdraw or dismiss. Friendships made from it stay. */
  async deleteRequest(actorId: string, requestId: string): Promise<void> {
    const request = await this.loadRequest(requestId);
    if (!isParty(actorId, request.fromUserId, request.toUserId)) {
      throw new ForbiddenError("You don't have permission to manage this friend request");
    }
    await this.stores.friendRequests.delete(requestId);
  }

  async createFriendship(
    actorId: string,
    input: { userId: string; friendOfId: string }
  ): Promise<FriendshipRecord> {
    const { userId, friendOfId } = input;
    if (userId === friendOfId) {
      throw new InvalidInputError("A user can't be their own friend", "SELF_REQUEST");
    }
    if (!isParty(actorId, userId, friendOfId)) {
      throw new ForbiddenError("You can only create friendships you are part of");
    }

    return this.stores.withTransaction(async () => {
      await this.requireUser(userId);
      await this.requireUser(friendOfId);

      const request = await this.findPairRequest(userId, friendOfId);
      if (!request) {
        throw new PreconditionFailedError("NO_REQUEST", "Can't create a friendship without a friend request");
      }
      if (!request.isAccepted) {
        throw new PreconditionFailedError(
          "REQUEST_NOT_ACCEPTED",
          "Friend request must be accepted to create a friendship"
        );
      }
      if (
        this.opts.directionPolicy === "matching" &&
        (request.fromUserId !== userId || request.toUserId !== friendOfId)
      ) {
        throw new PreconditionFailedError(
          "DIRECTION_MISMATCH",
          "Friendship direction must match the accepted friend request"
        );
      }
      return this.stores.friendships.insert({ userId, friendOfId });
    });
  }

  /** Symmetric: a friendship row in either direction counts. */
  areFriends(a: string, b: string): Promise<boolean> {
    return this.stores.friendships.existsEither(a, b);
  }

  /** Friendship rows the user owns. */
  listFriends(userId: string): Promise<FriendshipRecord[]> {
    return this.stores.friendships.listByOwner(userId);
  }

  async getFriendship(actorId: string, friendshipId: string): Promise<FriendshipRecord> {
    const friendship = await this.loadFriendship(friendshipId);
    if (!isParty(actorId, friendship.userId, friendship.friendOfId)) {
      throw new ForbiddenError("You don't have permission to view this friendship");
    }
    return friendship;
  }

  /** Nickname and block flag belong to the owning side. */
  async updateFriendship(
    actorId: string,
    friendshipId: string,
    patch: FriendshipPatch
  ): Promise<FriendshipRecord> {
    const friendship = await this.loadFriendship(friendshipId);
    if (friendship.friendOfId !== actorId) {
      throw new ForbiddenError("Only the owner of this friendship can change it");
    }
    const updated = await this.stores.friendships.update(friendshipId, patch);
    if (!updated) throw new NotFoundError("Friendship", "FRIENDSHIP_NOT_FOUND");
    return updated;
  }

  async deleteFriendship(actorId: string, friendshipId: string): Promise<void> {
    const friendship = await this.loadFriendship(friendshipId);
    if (!isParty(actorId, friendship.userId, friendship.friendOfId)) {
      throw new ForbiddenError("You don't have permission to remove this friendship");
    }
    await this.stores.friendships.delete(friendshipId);
  }

  async relationshipStatus(me: string, other: string): Promise<RelationshipStatus> {
    await this.requireUser(other);
    const friends = await this.areFriends(me, other);
    const request = await this.findPairRequest(me, other);
    return {
      areFriends: friends,
      request: request
        ? {
            id: request.id,
            direction: request.fromUserId === me ? "outgoing" : "incoming",
            isAccepted: request.isAccepted,
          }
        : null,
    };
  }

  private async requireUser(userId: string): Promise<UserRecord> {
    const user = await this.stores.users.findById(userId);
    if (!user) throw new NotFoundError("User", "USER_NOT_FOUND");
    return user;
  }

  private async loadRequest(requestId: string): Promise<FriendRequestRecord> {
    const request = await this.stores.friendRequests.findById(requestId);
    if (!request) throw new NotFoundError("Friend request", "REQUEST_NOT_FOUND");
    return request;
  }

  private async loadFriendship(friendshipId: string): Promise<FriendshipRecord> {
    const friendship = await this.stores.friendships.findById(friendshipId);
    if (!friendship) throw new NotFoundError("Friendship", "FRIENDSHIP_NOT_FOUND");
    return friendship;
  }
}

export function toPublicRequest(r: FriendRequestRecord) {
  return {
    id: r.id,
    fromUserId: r.fromUserId,
    toUserId: r.toUserId,
    isNew: r.isNew,
    isAccepted: r.isAccepted,
    createdOn: r.createdOn,
  };
}

export function toPublicFriendship(f: FriendshipRecord) {
  return {
    id: f.id,
    userId: f.userId,
    friendOfId: f.friendOfId,
    nickname: f.nickname,
    isBlocked: f.isBlocked,
    startDate: f.startDate,
  };
}
