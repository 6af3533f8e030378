/** Composition root: stores, services and session storage the HTTP layer is built from. */
import { pingMongo, withMongoTransaction } from "./config/db.js";
import { env } from "./config/env.js";
import { pingRedis } from "./config/redis.js";
import type { Stores } from "./domain/stores.js";
import { RedisSessionStore, type SessionStore } from "./modules/auth/sessions.js";
import { type DirectionPolicy, RelationshipService } from "./modules/friends/service.js";
import { MongoFriendRequestStore, MongoFriendshipStore } from "./modules/friends/store.js";
import { MessagingService } from "./modules/messages/service.js";
import { MongoMessageStore } from "./modules/messages/store.js";
import type { ContactKeyDraw } from "./modules/users/contactKey.js";
import { UsersService } from "./modules/users/service.js";
import { MongoUserStore } from "./modules/users/store.js";

export type DependencyStatus = { status: "ok" | "error"; message?: string };

export interface AppContext {
  users: UsersService;
  relationships: RelationshipService;
  messaging: MessagingService;
  sessions: SessionStore;
  rateLimit: { windowMs: number; max: number };
  pingDeps(): Promise<{ mongo: DependencyStatus; redis: DependencyStatus }>;
}

export type ContextOptions = {
  bcryptRounds?: number;
  contactKeyMaxAttempts?: number;
  drawContactKey?: ContactKeyDraw;
  directionPolicy?: DirectionPolicy;
  clock?: () => Date;
  rateLimit?: { windowMs: number; max: number };
  pingDeps?: AppContext["pingDeps"];
};

export function mongoStores(): Stores {
  return {
    users: new MongoUserStore(),
    friendRequests: new MongoFriendRequestStore(),
    friendships: new MongoFriendshipStore(),
    messages: new MongoMessageStore(),
    withTransaction: withMongoTransaction,
  };
}

/** Wire services over any `Stores`; options fall back to the environment. */
export function buildContext(
  stores: Stores,
  sessions: SessionStore,
  opts: ContextOptions = {}
): AppContext {
  const users = new UsersService(stores, {
    bcryptRounds: opts.bcryptRounds ?? env.BCRYPT_ROUNDS,
    contactKeyMaxAttempts: opts.contactKeyMaxAttempts ?? env.CONTACT_KEY_MAX_ATTEMPTS,
    drawContactKey: opts.drawContactKey,
  });
  const relationships = new RelationshipService(stores, {
    directionPolicy: opts.directionPolicy ?? env.FRIENDSHIP_DIRECTION_POLICY,
  });
  const messaging = new MessagingService(stores, relationships, { clock: opts.clock });

  return {
    users,
    relationships,
    messaging,
    sessions,
    rateLimit: opts.rateLimit ?? { windowMs: env.RATE_LIMIT_WINDOW_MS, max: env.RATE_LIMIT_MAX },
    pingDeps:
      opts.pingDeps ??
      (async () => {
        const [mongo, redis] = await Promise.all([pingMongo(), pingRedis()]);
        return { mongo, redis };
      }),
  };
}

export function createContext(): AppContext {
  return buildContext(mongoStores(), new RedisSessionStore());
}
