import { Message, type MessageAttrs } from "./model.js";
import { toObjectId } from "../../config/db.js";

export interface MessageRecord {
  id: string;
  content: string;
  fromUserId: string;
  toUserId: string;
  isNew: boolean;
  sentOn: Date;
}

export type MessagePatch = Partial<Pick<MessageRecord, "content" | "isNew">>;

export interface MessageStore {
  insert(input: { content: string; fromUserId: string; toUserId: string; sentOn: Date }): Promise<MessageRecord>;
  findById(id: string): Promise<MessageRecord | null>;
  /** Both directions between a and b, `sentOn` descending, later inserts first on ties. */
  listBetween(a: string, b: string): Promise<MessageRecord[]>;
  countUnread(toUserId: string): Promise<number>;
  update(id: string, patch: MessagePatch): Promise<MessageRecord | null>;
  delete(id: string): Promise<boolean>;
  deleteForUser(userId: string): Promise<number>;
}

type MessageShape = MessageAttrs & { _id: unknown };

function toRecord(doc: MessageShape): MessageRecord {
  return {
    id: String(doc._id),
    content: doc.content,
    fromUserId: String(doc.fromUserId),
    toUserId: String(doc.toUserId),
    isNew: doc.unread,
    sentOn: doc.sentOn,
  };
}

export class MongoMessageStore implements MessageStore {
  async insert(input: {
    content: string;
    fromUserId: string;
    toUserId: string;
    sentOn: Date;
  }): Promise<MessageRecord> {
    const from = toObjectId(input.fromUserId);
    const to = toObjectId(input.toUserId);
    if (!from || !to) throw new Error("Invalid user id for message");
    const created = await Message.create({
      content: input.content,
      fromUserId: from,
      toUserId: to,
      sentOn: input.sentOn,
    });
    return toRecord(created);
  }

  async findById(id: string): Promise<MessageRecord | null> {
    const _id = toObjectId(id);
    if (!_id) return null;
    const doc = await Message.findById(_id).lean<MessageShape>();
    return doc ? toRecord(doc) : null;
  }

  async listBetween(a: string, b: string): Promise<MessageRecord[]> {
    const ua = toObjectId(a);
    const ub = toObjectId(b);
    if (!ua || !ub) return [];
    // ObjectIds grow with insertion, so _id breaks sentOn ties newest-first
    const docs = await Message.find({
      $or: [
        { fromUserId: ua, toUserId: ub },
        { fromUserId: ub, toUserId: ua },
      ],
    })
      .sort({ sentOn: -1, _id: -1 })
      .lean<MessageShape[]>();
    return docs.map(toRecord);
  }

  async countUnread(toUserId: string): Promise<number> {
    const to = toObjectId(toUserId);
    if (!to) return 0;
    return Message.countDocuments({ toUserId: to, unread: true });
  }

  async update(id: string, patch: MessagePatch): Promise<MessageRecord | null> {
    const _id = toObjectId(id);
    if (!_id) return null;
    const $set: Partial<Pick<MessageAttrs, "content" | "unread">> = {};
    if (patch.content !== undefined) $set.content = patch.content;
    if (patch.isNew !== undefined) $set.unread = patch.isNew;
    const doc = await Message.findByIdAndUpdate(_id, { $set }, { new: true, runValidators: true })
      .lean<MessageShape>();
    return doc ? toRecord(doc) : null;
  }

  async delete(id: string): Promise<boolean> {
    const _id = toObjectId(id);
    if (!_id) return false;
    const res = await Message.deleteOne({ _id });
    return res.deletedCount > 0;
  }

  async deleteForUser(userId: string): Promise<number> {
    const uid = toObjectId(userId);
    if (!uid) return 0;
    const res = await Message.deleteMany({ $or: [{ fromUserId: uid }, { toUserId: uid }] });
    return res.deletedCount;
  }
}
