import mongoose, { Schema, type Model } from "mongoose";

export interface MessageAttrs {
  content: string;
  fromUserId: mongoose.Types.ObjectId;
  toUserId: mongoose.Types.ObjectId;
  /** Unread-by-recipient marker (`isNew` is reserved on documents) */
  unread: boolean;
  sentOn: Date;
}

export interface MessageDoc extends mongoose.Document, MessageAttrs {}

const MessageSchema = new Schema<MessageDoc>(
  {
    content: { type: String, required: true, maxlength: 5000 },
    fromUserId: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
    toUserId: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
    unread: { type: Boolean, default: true },
    sentOn: { type: Date, required: true },
  },
  { versionKey: false }
);

/** Conversation reads: both directions, newest first */
MessageSchema.index({ fromUserId: 1, toUserId: 1, sentOn: -1 });
MessageSchema.index({ toUserId: 1, unread: 1 });

export const Message: Model<MessageDoc> =
  mongoose.models.Message || mongoose.model<MessageDoc>("Message", MessageSchema);
