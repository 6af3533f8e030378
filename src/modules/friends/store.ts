/** Friend request / friendship persistence contracts and their Mongoose implementations. */
import type mongoose from "mongoose";

import {
  FriendRequest,
  Friendship,
  pairKey,
  type FriendRequestAttrs,
  type FriendshipAttrs,
} from "./model.js";
import { duplicateKeyFields, toObjectId } from "../../config/db.js";
import { DuplicateRequestError, UniquenessViolationError } from "../../domain/errors.js";

export interface FriendRequestRecord {
  id: string;
  fromUserId: string;
  toUserId: string;
  isNew: boolean;
  isAccepted: boolean;
  createdOn: Date;
}

export type FriendRequestPatch = Partial<Pick<FriendRequestRecord, "isNew" | "isAccepted">>;

export interface FriendRequestStore {
  /** Throws DuplicateRequestError if any request already exists for the unordered pair. */
  insert(input: { fromUserId: string; toUserId: string }): Promise<FriendRequestRecord>;
  findById(id: string): Promise<FriendRequestRecord | null>;
  /** Exact direction only: from -> to. */
  findByDirection(fromUserId: string, toUserId: string): Promise<FriendRequestRecord | null>;
  listIncoming(toUserId: string, opts?: { onlyNew?: boolean }): Promise<FriendRequestRecord[]>;
  listOutgoing(fromUserId: string): Promise<FriendRequestRecord[]>;
  update(id: string, patch: FriendRequestPatch): Promise<FriendRequestRecord | null>;
  delete(id: string): Promise<boolean>;
  deleteForUser(userId: string): Promise<number>;
}

export interface FriendshipRecord {
  id: string;
  userId: string;
  friendOfId: string;
  nickname: string | null;
  isBlocked: boolean;
  startDate: Date;
}

export type FriendshipPatch = Partial<Pick<FriendshipRecord, "nickname" | "isBlocked">>;

export interface FriendshipStore {
  /** Throws UniquenessViolationError if (userId, friendOfId) already exists. */
  insert(input: { userId: string; friendOfId: string }): Promise<FriendshipRecord>;
  findById(id: string): Promise<FriendshipRecord | null>;
  findByPair(userId: string, friendOfId: string): Promise<FriendshipRecord | null>;
  /** True when a row exists in either direction. */
  existsEither(a: string, b: string): Promise<boolean>;
  listByOwner(friendOfId: string): Promise<FriendshipRecord[]>;
  update(id: string, patch: FriendshipPatch): Promise<FriendshipRecord | null>;
  delete(id: string): Promise<boolean>;
  deleteForUser(userId: string): Promise<number>;
}

type RequestShape = FriendRequestAttrs & { _id: unknown };
type FriendshipShape = FriendshipAttrs & { _id: unknown };

function toRequestRecord(doc: RequestShape): FriendRequestRecord {
  return {
    id: String(doc._id),
    fromUserId: String(doc.fromUserId),
    toUserId: String(doc.toUserId),
    isNew: doc.unread,
    isAccepted: doc.isAccepted,
    createdOn: doc.createdOn,
  };
}

function toFriendshipRecord(doc: FriendshipShape): FriendshipRecord {
  return {
    id: String(doc._id),
    userId: String(doc.userId),
    friendOfId: String(doc.friendOfId),
    nickname: doc.nickname ?? null,
    isBlocked: doc.isBlocked,
    startDate: doc.startDate,
  };
}

function objectIds(...ids: string[]): mongoose.Types.ObjectId[] | null {
  const out: mongoose.Types.ObjectId[] = [];
  for (const id of ids) {
    const oid = toObjectId(id);
    if (!oid) return null;
    out.push(oid);
  }
  return out;
}

/** E11000 on a request pairKey means a request already exists for the unordered pair. */
export function requestDuplicateError(err: unknown): DuplicateRequestError | null {
  return duplicateKeyFields(err)?.includes("pairKey") ? new DuplicateRequestError() : null;
}

export function friendshipDuplicateError(err: unknown): UniquenessViolationError | null {
  return duplicateKeyFields(err)
    ? new UniquenessViolationError("Friendship already exists", "friendOfId")
    : null;
}

export class MongoFriendRequestStore implements FriendRequestStore {
  async insert(input: { fromUserId: string; toUserId: string }): Promise<FriendRequestRecord> {
    const ids = objectIds(input.fromUserId, input.toUserId);
    if (!ids) throw new Error("Invalid user id for friend request");
    try {
      const created = await FriendRequest.create({
        fromUserId: ids[0],
        toUserId: ids[1],
        pairKey: pairKey(input.fromUserId, input.toUserId),
      });
      return toRequestRecord(created);
    } catch (err) {
      // lost the race against a concurrent request for the same pair
      throw requestDuplicateError(err) ?? err;
    }
  }

  async findById(id: string): Promise<FriendRequestRecord | null> {
    const _id = toObjectId(id);
    if (!_id) return null;
    const doc = await FriendRequest.findById(_id).lean<RequestShape>();
    return doc ? toRequestRecord(doc) : null;
  }

  async findByDirection(fromUserId: string, toUserId: string): Promise<FriendRequestRecord | null> {
    const ids = objectIds(fromUserId, toUserId);
    if (!ids) return null;
    const doc = await FriendRequest.findOne({ fromUserId: ids[0], toUserId: ids[1] }).lean<RequestShape>();
    return doc ? toRequestRecord(doc) : null;
  }

  async listIncoming(toUserId: string, opts?: { onlyNew?: boolean }): Promise<FriendRequestRecord[]> {
    const to = toObjectId(toUserId);
    if (!to) return [];
    const filter = opts?.onlyNew ? { toUserId: to, unread: true } : { toUserId: to };
    const docs = await FriendRequest.find(filter).sort({ createdOn: -1, _id: -1 }).lean<RequestShape[]>();
    return docs.map(toRequestRecord);
  }

  async listOutgoing(fromUserId: string): Promise<FriendRequestRecord[]> {
    const from = toObjectId(fromUserId);
    if (!from) return [];
    const docs = await FriendRequest.find({ fromUserId: from })
      .sort({ createdOn: -1, _id: -1 })
      .lean<RequestShape[]>();
    return docs.map(toRequestRecord);
  }

  async update(id: string, patch: FriendRequestPatch): Promise<FriendRequestRecord | null> {
    const _id = toObjectId(id);
    if (!_id) return null;
    const $set: Partial<Pick<FriendRequestAttrs, "unread" | "isAccepted">> = {};
    if (patch.isNew !== undefined) $set.unread = patch.isNew;
    if (patch.isAccepted !== undefined) $set.isAccepted = patch.isAccepted;
    const doc = await FriendRequest.findByIdAndUpdate(_id, { $set }, { new: true }).lean<RequestShape>();
    return doc ? toRequestRecord(doc) : null;
  }

  async delete(id: string): Promise<boolean> {
    const _id = toObjectId(id);
    if (!_id) return false;
    const res = await FriendRequest.deleteOne({ _id });
    return res.deletedCount > 0;
  }

  async deleteForUser(userId: string): Promise<number> {
    const uid = toObjectId(userId);
    if (!uid) return 0;
    const res = await FriendRequest.deleteMany({ $or: [{ fromUserId: uid }, { toUserId: uid }] });
    return res.deletedCount;
  }
}

export class MongoFriendshipStore implements FriendshipStore {
  async insert(input: { userId: string; friendOfId: string }): Promise<FriendshipRecord> {
    const ids = objectIds(input.userId, input.friendOfId);
    if (!ids) throw new Error("Invalid user id for friendship");
    try {
      const created = await Friendship.create({ userId: ids[0], friendOfId: ids[1] });
      return toFriendshipRecord(created);
    } catch (err) {
      throw friendshipDuplicateError(err) ?? err;
    }
  }

  async findById(id: string): Promise<FriendshipRecord | null> {
    const _id = toObjectId(id);
    if (!_id) return null;
    const doc = await Friendship.findById(_id).lean<FriendshipShape>();
    return doc ? toFriendshipRecord(doc) : null;
  }

  async findByPair(userId: string, friendOfId: string): Promise<FriendshipRecord | null> {
    const ids = objectIds(userId, friendOfId);
    if (!ids) return null;
    const doc = await Friendship.findOne({ userId: ids[0], friendOfId: ids[1] }).lean<FriendshipShape>();
    return doc ? toFriendshipRecord(doc) : null;
  }

  async existsEither(a: string, b: string): Promise<boolean> {
    const ids = objectIds(a, b);
    if (!ids) return false;
    const [ua, ub] = ids;
    const found = await Friendship.exists({
      $or: [
        { userId: ua, friendOfId: ub },
        { userId: ub, friendOfId: ua },
      ],
    });
    return found !== null;
  }

  async listByOwner(friendOfId: string): Promise<FriendshipRecord[]> {
    const owner = toObjectId(friendOfId);
    if (!owner) return [];
    const docs = await Friendship.find({ friendOfId: owner })
      .sort({ startDate: -1, _id: -1 })
      .lean<FriendshipShape[]>();
    return docs.map(toFriendshipRecord);
  }

  async update(id: string, patch: FriendshipPatch): Promise<FriendshipRecord | null> {
    const _id = toObjectId(id);
    if (!_id) return null;
    const doc = await Friendship.findByIdAndUpdate(_id, { $set: patch }, { new: true, runValidators: true })
      .lean<FriendshipShape>();
    return doc ? toFriendshipRecord(doc) : null;
  }

  async delete(id: string): Promise<boolean> {
    const _id = toObjectId(id);
    if (!_id) return false;
    const res = await Friendship.deleteOne({ _id });
    return res.deletedCount > 0;
  }

  async deleteForUser(userId: string): Promise<number> {
    const uid = toObjectId(userId);
    if (!uid) return 0;
    const res = await Friendship.deleteMany({ $or: [{ userId: uid }, { friendOfId: uid }] });
    return res.deletedCount;
  }
}
