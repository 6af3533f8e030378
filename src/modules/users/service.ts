/** Users service: account creation with contact keys, credential checks, profile + account lifecycle */
import bcrypt from "bcrypt";

import { generateContactKey, type ContactKeyDraw } from "./contactKey.js";
import type { UserPatch, UserRecord } from "./store.js";
import {
  InvalidInputError,
  NotFoundError,
  UnauthorizedError,
  UniquenessViolationError,
} from "../../domain/errors.js";
import type { Stores } from "../../domain/stores.js";

const EMAIL_RX = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
export const MIN_PASSWORD_LENGTH = 8;

export type CreateUserInput = {
  username: string;
  email: string;
  password: string;
};

export type UpdateProfileInput = Partial<CreateUserInput>;

/** Which field the caller signs in with; usernames may contain "@". */
export type LoginIdentifier = { email: string } | { username: string };

export type UsersServiceOptions = {
  bcryptRounds: number;
  contactKeyMaxAttempts: number;
  drawContactKey?: ContactKeyDraw;
};

/** Normalize emails consistently */
function normEmail(email: string) {
  return email.trim().toLowerCase();
}

function requireEmail(raw: string | undefined | null): string {
  if (!raw || !raw.trim()) throw new InvalidInputError("Users must have an email address", "EMAIL_REQUIRED");
  const email = normEmail(raw);
  if (!EMAIL_RX.test(email)) throw new InvalidInputError("Must use a valid email address", "EMAIL_INVALID");
  return email;
}

function requireUsername(raw: string | undefined | null): string {
  const username = raw?.trim() ?? "";
  if (!username) throw new InvalidInputError("Username is required", "USERNAME_REQUIRED");
  return username;
}

function requirePassword(raw: string | undefined | null): string {
  if (!raw || raw.length < MIN_PASSWORD_LENGTH) {
    throw new InvalidInputError(
      `Password must be at least ${MIN_PASSWORD_LENGTH} characters`,
      "PASSWORD_TOO_SHORT"
    );
  }
  return raw;
}

export class UsersService {
  private dummyHash: Promise<string> | null = null;

  constructor(
    private readonly stores: Stores,
    private readonly opts: UsersServiceOptions
  ) {}

  /**
   * Validate, hash and insert a new user with a fresh contact key. A contact-key collision at
   * insert time (two signups drawing the same key) redraws, within the same attempt bound.
   */
  async create(input: CreateUserInput, draw?: ContactKeyDraw): Promise<UserRecord> {
    const email = requireEmail(input.email);
    const username = requireUsername(input.username);
    const password = requirePassword(input.password);
    const passwordHash = await bcrypt.hash(password, this.opts.bcryptRounds);

    const users = this.stores.users;
    for (let attempt = 1; attempt <= this.opts.contactKeyMaxAttempts; attempt++) {
      const contactKey = await generateContactKey((k) => users.contactKeyExists(k), {
        draw: draw ?? this.opts.drawContactKey,
        maxAttempts: this.opts.contactKeyMaxAttempts,
      });
      try {
        return await users.insert({ username, email, contactKey, passwordHash });
      } catch (err) {
        if (err instanceof UniquenessViolationError && err.field === "contactKey") continue;
        throw err;
      }
    }
    throw new UniquenessViolationError("Could not assign a unique contact key", "contactKey");
  }

  async createSuperuser(input: CreateUserInput): Promise<UserRecord> {
    const user = await this.create(input);
    return this.promoteToSuperuser(user.id);
  }

  async promoteToSuperuser(userId: string): Promise<UserRecord> {
    const updated = await this.stores.users.update(userId, { isStaff: true, isSuperuser: true });
    if (!updated) throw new NotFoundError("User", "USER_NOT_FOUND");
    return updated;
  }

  /**
   * Email or username + password. Every failure (unknown identifier, wrong password, inactive
   * account) is the same UnauthorizedError, and a hash comparison runs on each path.
   */
  async authenticate(identifier: LoginIdentifier, password: string): Promise<UserRecord> {
    const user =
      "email" in identifier
        ? await this.stores.users.findByEmail(normEmail(identifier.email))
        : await this.stores.users.findByUsername(identifier.username.trim());

    const hash = user?.passwordHash ?? (await this.getDummyHash());
    const ok = await bcrypt.compare(password, hash);
    if (!user || !ok || !user.isActive) {
      throw new UnauthorizedError("Invalid credentials", "INVALID_CREDENTIALS");
    }
    return user;
  }

  async getById(userId: string): Promise<UserRecord> {
    const user = await this.stores.users.findById(userId);
    if (!user) throw new NotFoundError("User", "USER_NOT_FOUND");
    return user;
  }

  async getByContactKey(contactKey: number): Promise<UserRecord> {
    const user = await this.stores.users.findByContactKey(contactKey);
    if (!user) throw new NotFoundError("User", "USER_NOT_FOUND");
    return user;
  }

  async list(page: { limit: number; offset: number }): Promise<UserRecord[]> {
    return this.stores.users.list(page);
  }

  async updateProfile(userId: string, input: UpdateProfileInput): Promise<UserRecord> {
    const patch: UserPatch = {};
    if (input.username !== undefined) patch.username = requireUsername(input.username);
    if (input.email !== undefined) patch.email = requireEmail(input.email);
    if (input.password !== undefined) {
      patch.passwordHash = await bcrypt.hash(requirePassword(input.password), this.opts.bcryptRounds);
    }
    const updated = await this.stores.users.update(userId, patch);
    if (!updated) throw new NotFoundError("User", "USER_NOT_FOUND");
    return updated;
  }

  /** Remove the account and everything that references it. */
  async deleteAccount(userId: string): Promise<void> {
    await this.stores.withTransaction(async () => {
      const user = await this.stores.users.findById(userId);
      if (!user) throw new NotFoundError("User", "USER_NOT_FOUND");
      await this.stores.messages.deleteForUser(userId);
      await this.stores.friendships.deleteForUser(userId);
      await this.stores.friendRequests.deleteForUser(userId);
      await this.stores.users.delete(userId);
    });
  }

  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      this.dummyHash = bcrypt.hash("placeholder-password", this.opts.bcryptRounds);
    }
    return this.dummyHash;
  }
}

/** Safe public shape for the account owner */
export function toPublicUser(u: UserRecord) {
  return {
    id: u.id,
    username: u.username,
    email: u.email,
    contactKey: u.contactKey,
    createdAt: u.createdAt,
  };
}

/** What other users see when resolving a contact key */
export function toContactCard(u: UserRecord) {
  return {
    id: u.id,
    username: u.username,
    contactKey: u.contactKey,
  };
}

/** Admin listing shape */
export function toAdminUser(u: UserRecord) {
  return {
    ...toPublicUser(u),
    isActive: u.isActive,
    isStaff: u.isStaff,
    isSuperuser: u.isSuperuser,
    updatedAt: u.updatedAt,
  };
}
