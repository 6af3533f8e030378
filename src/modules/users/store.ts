/** User persistence: the store contract the services depend on, and its Mongoose implementation. */
import { User, type UserAttrs } from "./model.js";
import { duplicateKeyFields, toObjectId } from "../../config/db.js";
import { UniquenessViolationError } from "../../domain/errors.js";

export interface UserRecord {
  id: string;
  username: string;
  email: string;
  contactKey: number;
  passwordHash: string;
  isActive: boolean;
  isStaff: boolean;
  isSuperuser: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type NewUser = Pick<UserRecord, "username" | "email" | "contactKey" | "passwordHash"> &
  Partial<Pick<UserRecord, "isActive" | "isStaff" | "isSuperuser">>;

export type UserPatch = Partial<
  Pick<UserRecord, "username" | "email" | "passwordHash" | "isActive" | "isStaff" | "isSuperuser">
>;

export interface UserStore {
  /** Throws UniquenessViolationError (with `field`) when username, email or contactKey is taken. */
  insert(input: NewUser): Promise<UserRecord>;
  findById(id: string): Promise<UserRecord | null>;
  findByEmail(email: string): Promise<UserRecord | null>;
  findByUsername(username: string): Promise<UserRecord | null>;
  findByContactKey(contactKey: number): Promise<UserRecord | null>;
  contactKeyExists(contactKey: number): Promise<boolean>;
  list(page: { limit: number; offset: number }): Promise<UserRecord[]>;
  update(id: string, patch: UserPatch): Promise<UserRecord | null>;
  delete(id: string): Promise<boolean>;
}

const FIELD_LABELS: Record<string, string> = {
  username: "username",
  email: "email",
  contactKey: "contact key",
};

/** Map an E11000 on the users collection to a typed uniqueness failure. */
export function userDuplicateError(err: unknown): UniquenessViolationError | null {
  const fields = duplicateKeyFields(err);
  if (!fields) return null;
  const field = fields.find((f) => f in FIELD_LABELS) ?? fields[0];
  const label = (field && FIELD_LABELS[field]) || "value";
  return new UniquenessViolationError(`A user with this ${label} already exists`, field);
}

type UserShape = UserAttrs & { _id: unknown };

function toRecord(doc: UserShape): UserRecord {
  return {
    id: String(doc._id),
    username: doc.username,
    email: doc.email,
    contactKey: doc.contactKey,
    passwordHash: doc.passwordHash,
    isActive: doc.isActive,
    isStaff: doc.isStaff,
    isSuperuser: doc.isSuperuser,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export class MongoUserStore implements UserStore {
  async insert(input: NewUser): Promise<UserRecord> {
    try {
      const created = await User.create(input);
      return toRecord(created);
    } catch (err) {
      throw userDuplicateError(err) ?? err;
    }
  }

  async findById(id: string): Promise<UserRecord | null> {
    const _id = toObjectId(id);
    if (!_id) return null;
    const doc = await User.findById(_id).select("+passwordHash").lean<UserShape>();
    return doc ? toRecord(doc) : null;
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const doc = await User.findOne({ email: email.trim().toLowerCase() })
      .select("+passwordHash")
      .lean<UserShape>();
    return doc ? toRecord(doc) : null;
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    const doc = await User.findOne({ username: username.trim() })
      .select("+passwordHash")
      .lean<UserShape>();
    return doc ? toRecord(doc) : null;
  }

  async findByContactKey(contactKey: number): Promise<UserRecord | null> {
    const doc = await User.findOne({ contactKey }).select("+passwordHash").lean<UserShape>();
    return doc ? toRecord(doc) : null;
  }

  async contactKeyExists(contactKey: number): Promise<boolean> {
    return (await User.exists({ contactKey })) !== null;
  }

  async list(page: { limit: number; offset: number }): Promise<UserRecord[]> {
    const docs = await User.find()
      .sort({ createdAt: 1, _id: 1 })
      .skip(page.offset)
      .limit(page.limit)
      .select("+passwordHash")
      .lean<UserShape[]>();
    return docs.map(toRecord);
  }

  async update(id: string, patch: UserPatch): Promise<UserRecord | null> {
    const _id = toObjectId(id);
    if (!_id) return null;
    try {
      const doc = await User.findByIdAndUpdate(_id, { $set: patch }, { new: true, runValidators: true })
        .select("+passwordHash")
        .lean<UserShape>();
      return doc ? toRecord(doc) : null;
    } catch (err) {
      throw userDuplicateError(err) ?? err;
    }
  }

  async delete(id: string): Promise<boolean> {
    const _id = toObjectId(id);
    if (!_id) return false;
    const res = await User.deleteOne({ _id });
    return res.deletedCount > 0;
  }
}
