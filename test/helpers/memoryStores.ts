/** In-process implementations of the store contracts, with the same unique constraints as the Mongo indexes. */
import { DuplicateRequestError, UniquenessViolationError } from "../../src/domain/errors.js";
import type { Stores } from "../../src/domain/stores.js";
import type { SessionInfo, SessionStore } from "../../src/modules/auth/sessions.js";
import { pairKey } from "../../src/modules/friends/model.js";
import type {
  FriendRequestPatch,
  FriendRequestRecord,
  FriendRequestStore,
  FriendshipPatch,
  FriendshipRecord,
  FriendshipStore,
} from "../../src/modules/friends/store.js";
import type { MessagePatch, MessageRecord, MessageStore } from "../../src/modules/messages/store.js";
import type { NewUser, UserPatch, UserRecord, UserStore } from "../../src/modules/users/store.js";

type Seq = { seq: number };

class IdSource {
  private n = 0;
  next(): { id: string; seq: number } {
    this.n += 1;
    return { id: this.n.toString(16).padStart(24, "0"), seq: this.n };
  }
}

/** date desc, then later insert first */
function newestFirst<T extends Seq>(date: (row: T) => Date) {
  return (a: T, b: T) => date(b).getTime() - date(a).getTime() || b.seq - a.seq;
}

function strip<T extends Seq>(row: T): Omit<T, "seq"> {
  const { seq: _seq, ...rest } = row;
  return rest;
}

export class MemoryUserStore implements UserStore {
  readonly rows = new Map<string, UserRecord & Seq>();
  constructor(private readonly ids: IdSource) {}

  private conflict(candidate: Pick<UserRecord, "username" | "email"> & { contactKey?: number }, selfId?: string) {
    for (const row of this.rows.values()) {
      if (row.id === selfId) continue;
      if (row.username === candidate.username) {
        return new UniquenessViolationError("A user with this username already exists", "username");
      }
      if (row.email === candidate.email) {
        return new UniquenessViolationError("A user with this email already exists", "email");
      }
      if (candidate.contactKey !== undefined && row.contactKey === candidate.contactKey) {
        return new UniquenessViolationError("A user with this contact key already exists", "contactKey");
      }
    }
    return null;
  }

  async insert(input: NewUser): Promise<UserRecord> {
    const clash = this.conflict(input);
    if (clash) throw clash;
    const { id, seq } = this.ids.next();
    const now = new Date();
    const row = {
      id,
      seq,
      username: input.username,
      email: input.email,
      contactKey: input.contactKey,
      passwordHash: input.passwordHash,
      isActive: input.isActive ?? true,
      isStaff: input.isStaff ?? false,
      isSuperuser: input.isSuperuser ?? false,
      createdAt: now,
      updatedAt: now,
    };
    this.rows.set(id, row);
    return strip(row);
  }

  async findById(id: string): Promise<UserRecord | null> {
    const row = this.rows.get(id);
    return row ? strip(row) : null;
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    return this.findWhere((u) => u.email === email);
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    return this.findWhere((u) => u.username === username);
  }

  async findByContactKey(contactKey: number): Promise<UserRecord | null> {
    return this.findWhere((u) => u.contactKey === contactKey);
  }

  async contactKeyExists(contactKey: number): Promise<boolean> {
    return (await this.findByContactKey(contactKey)) !== null;
  }

  async list(page: { limit: number; offset: number }): Promise<UserRecord[]> {
    return [...this.rows.values()]
      .sort((a, b) => a.seq - b.seq)
      .slice(page.offset, page.offset + page.limit)
      .map(strip);
  }

  async update(id: string, patch: UserPatch): Promise<UserRecord | null> {
    const row = this.rows.get(id);
    if (!row) return null;
    const next = { ...row, ...patch, updatedAt: new Date() };
    const clash = this.conflict(next, id);
    if (clash) throw clash;
    this.rows.set(id, next);
    return strip(next);
  }

  async delete(id: string): Promise<boolean> {
    return this.rows.delete(id);
  }

  private findWhere(pred: (u: UserRecord) => boolean): UserRecord | null {
    for (const row of this.rows.values()) if (pred(row)) return strip(row);
    return null;
  }
}

export class MemoryFriendRequestStore implements FriendRequestStore {
  readonly rows = new Map<string, FriendRequestRecord & Seq>();
  constructor(private readonly ids: IdSource) {}

  async insert(input: { fromUserId: string; toUserId: string }): Promise<FriendRequestRecord> {
    const key = pairKey(input.fromUserId, input.toUserId);
    for (const row of this.rows.values()) {
      if (pairKey(row.fromUserId, row.toUserId) === key) throw new DuplicateRequestError();
    }
    const { id, seq } = this.ids.next();
    const row = { id, seq, ...input, isNew: true, isAccepted: false, createdOn: new Date() };
    this.rows.set(id, row);
    return strip(row);
  }

  async findById(id: string): Promise<FriendRequestRecord | null> {
    const row = this.rows.get(id);
    return row ? strip(row) : null;
  }

  async findByDirection(fromUserId: string, toUserId: string): Promise<FriendRequestRecord | null> {
    for (const row of this.rows.values()) {
      if (row.fromUserId === fromUserId && row.toUserId === toUserId) return strip(row);
    }
    return null;
  }

  async listIncoming(toUserId: string, opts?: { onlyNew?: boolean }): Promise<FriendRequestRecord[]> {
    return this.listWhere((r) => r.toUserId === toUserId && (!opts?.onlyNew || r.isNew));
  }

  async listOutgoing(fromUserId: string): Promise<FriendRequestRecord[]> {
    return this.listWhere((r) => r.fromUserId === fromUserId);
  }

  async update(id: string, patch: FriendRequestPatch): Promise<FriendRequestRecord | null> {
    const row = this.rows.get(id);
    if (!row) return null;
    const next = { ...row, ...patch };
    this.rows.set(id, next);
    return strip(next);
  }

  async delete(id: string): Promise<boolean> {
    return this.rows.delete(id);
  }

  async deleteForUser(userId: string): Promise<number> {
    let n = 0;
    for (const row of [...this.rows.values()]) {
      if (row.fromUserId === userId || row.toUserId === userId) {
        this.rows.delete(row.id);
        n += 1;
      }
    }
    return n;
  }

  private listWhere(pred: (r: FriendRequestRecord) => boolean): FriendRequestRecord[] {
    return [...this.rows.values()]
      .filter(pred)
      .sort(newestFirst((r: FriendRequestRecord & Seq) => r.createdOn))
      .map(strip);
  }
}

export class MemoryFriendshipStore implements FriendshipStore {
  readonly rows = new Map<string, FriendshipRecord & Seq>();
  constructor(private readonly ids: IdSource) {}

  async insert(input: { userId: string; friendOfId: string }): Promise<FriendshipRecord> {
    if (await this.findByPair(input.userId, input.friendOfId)) {
      throw new UniquenessViolationError("Friendship already exists", "friendOfId");
    }
    const { id, seq } = this.ids.next();
    const row = { id, seq, ...input, nickname: null, isBlocked: false, startDate: new Date() };
    this.rows.set(id, row);
    return strip(row);
  }

  async findById(id: string): Promise<FriendshipRecord | null> {
    const row = this.rows.get(id);
    return row ? strip(row) : null;
  }

  async findByPair(userId: string, friendOfId: string): Promise<FriendshipRecord | null> {
    for (const row of this.rows.values()) {
      if (row.userId === userId && row.friendOfId === friendOfId) return strip(row);
    }
    return null;
  }

  async existsEither(a: string, b: string): Promise<boolean> {
    return (await this.findByPair(a, b)) !== null || (await this.findByPair(b, a)) !== null;
  }

  async listByOwner(friendOfId: string): Promise<FriendshipRecord[]> {
    return [...this.rows.values()]
      .filter((f) => f.friendOfId === friendOfId)
      .sort(newestFirst((f: FriendshipRecord & Seq) => f.startDate))
      .map(strip);
  }

  async update(id: string, patch: FriendshipPatch): Promise<FriendshipRecord | null> {
    const row = this.rows.get(id);
    if (!row) return null;
    const next = { ...row, ...patch };
    this.rows.set(id, next);
    return strip(next);
  }

  async delete(id: string): Promise<boolean> {
    return this.rows.delete(id);
  }

  async deleteForUser(userId: string): Promise<number> {
    let n = 0;
    for (const row of [...this.rows.values()]) {
      if (row.userId === userId || row.friendOfId === userId) {
        this.rows.delete(row.id);
        n += 1;
      }
    }
    return n;
  }
}

export class MemoryMessageStore implements MessageStore {
  readonly rows = new Map<string, MessageRecord & Seq>();
  constructor(private readonly ids: IdSource) {}

  async insert(input: {
    content: string;
    fromUserId: string;
    toUserId: string;
    sentOn: Date;
  }): Promise<MessageRecord> {
    const { id, seq } = this.ids.next();
    const row = { id, seq, ...input, isNew: true };
    this.rows.set(id, row);
    return strip(row);
  }

  async findById(id: string): Promise<MessageRecord | null> {
    const row = this.rows.get(id);
    return row ? strip(row) : null;
  }

  async listBetween(a: string, b: string): Promise<MessageRecord[]> {
    return [...this.rows.values()]
      .filter(
        (m) => (m.fromUserId === a && m.toUserId === b) || (m.fromUserId === b && m.toUserId === a)
      )
      .sort(newestFirst((m: MessageRecord & Seq) => m.sentOn))
      .map(strip);
  }

  async countUnread(toUserId: string): Promise<number> {
    return [...this.rows.values()].filter((m) => m.toUserId === toUserId && m.isNew).length;
  }

  async update(id: string, patch: MessagePatch): Promise<MessageRecord | null> {
    const row = this.rows.get(id);
    if (!row) return null;
    const next = { ...row, ...patch };
    this.rows.set(id, next);
    return strip(next);
  }

  async delete(id: string): Promise<boolean> {
    return this.rows.delete(id);
  }

  async deleteForUser(userId: string): Promise<number> {
    let n = 0;
    for (const row of [...this.rows.values()]) {
      if (row.fromUserId === userId || row.toUserId === userId) {
        this.rows.delete(row.id);
        n += 1;
      }
    }
    return n;
  }
}

export type MemoryStores = Stores & {
  users: MemoryUserStore;
  friendRequests: MemoryFriendRequestStore;
  friendships: MemoryFriendshipStore;
  messages: MemoryMessageStore;
};

/** Transactions run one at a time, in call order. */
export function memoryStores(): MemoryStores {
  const ids = new IdSource();
  let tail: Promise<unknown> = Promise.resolve();

  return {
    users: new MemoryUserStore(ids),
    friendRequests: new MemoryFriendRequestStore(ids),
    friendships: new MemoryFriendshipStore(ids),
    messages: new MemoryMessageStore(ids),
    withTransaction<T>(fn: () => Promise<T>): Promise<T> {
      const run = tail.then(fn);
      tail = run.then(
        () => undefined,
        () => undefined
      );
      return run;
    },
  };
}

export class MemorySessionStore implements SessionStore {
  readonly sessions = new Map<string, SessionInfo>();

  async persist(session: SessionInfo): Promise<void> {
    this.sessions.set(`${session.userId}:${session.jti}`, session);
  }

  async isActive(userId: string, jti: string): Promise<boolean> {
    return this.sessions.has(`${userId}:${jti}`);
  }

  async revoke(userId: string, jti: string): Promise<void> {
    this.sessions.delete(`${userId}:${jti}`);
  }

  async revokeAll(userId: string): Promise<number> {
    let n = 0;
    for (const [k, s] of [...this.sessions.entries()]) {
      if (s.userId === userId) {
        this.sessions.delete(k);
        n += 1;
      }
    }
    return n;
  }
}
