import mongoose, { Schema, type Model } from "mongoose";

/** Utility to sort a pair consistently */
export function sortPair(a: string, b: string): [string, string] {
  return a < b ? [a, b] : [b, a];
}

/** Canonical form of an unordered pair; one friend request per pair key. */
export function pairKey(a: string, b: string): string {
  return sortPair(a, b).join(":");
}

// `isNew` is reserved on Mongoose documents, so the unread marker is stored as `unread`

export interface FriendRequestAttrs {
  fromUserId: mongoose.Types.ObjectId;
  toUserId: mongoose.Types.ObjectId;
  pairKey: string;
  unread: boolean;
  isAccepted: boolean;
  createdOn: Date;
}

export interface FriendRequestDoc extends mongoose.Document, FriendRequestAttrs {}

const FriendRequestSchema = new Schema<FriendRequestDoc>(
  {
    fromUserId: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
    toUserId: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
    pairKey: { type: String, required: true },
    unread: { type: Boolean, default: true },
    isAccepted: { type: Boolean, default: false },
    createdOn: { type: Date, default: () => new Date() },
  },
  { versionKey: false }
);

/** At most one request per unordered pair, whichever side sent it */
FriendRequestSchema.index({ pairKey: 1 }, { unique: true });
FriendRequestSchema.index({ toUserId: 1, createdOn: -1 });

export const FriendRequest: Model<FriendRequestDoc> =
  mongoose.models.FriendRequest ||
  mongoose.model<FriendRequestDoc>("FriendRequest", FriendRequestSchema);

export interface FriendshipAttrs {
  /** The friend */
  userId: mongoose.Types.ObjectId;
  /** The owner of this row; only they may rename or block */
  friendOfId: mongoose.Types.ObjectId;
  nickname: string | null;
  isBlocked: boolean;
  startDate: Date;
}

export interface FriendshipDoc extends mongoose.Document, FriendshipAttrs {}

const FriendshipSchema = new Schema<FriendshipDoc>(
  {
    userId: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
    friendOfId: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
    nickname: { type: String, trim: true, maxlength: 255, default: null },
    isBlocked: { type: Boolean, default: false },
    startDate: { type: Date, default: () => new Date() },
  },
  { versionKey: false }
);

/** One row per direction */
FriendshipSchema.index({ userId: 1, friendOfId: 1 }, { unique: true });

export const Friendship: Model<FriendshipDoc> =
  mongoose.models.Friendship || mongoose.model<FriendshipDoc>("Friendship", FriendshipSchema);
