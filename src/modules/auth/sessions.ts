/** Refresh-session storage: persist, check, revoke. Redis in production. */
import { redisClient, key } from "../../config/redis.js";

export type SessionInfo = {
  userId: string;
  jti: string;
  exp: number; // seconds since epoch (from JWT)
  iat: number;
  ip?: string | null;
  ua?: string | null;
};

export interface SessionStore {
  persist(session: SessionInfo): Promise<void>;
  isActive(userId: string, jti: string): Promise<boolean>;
  revoke(userId: string, jti: string): Promise<void>;
  /** Returns how many sessions were dropped. */
  revokeAll(userId: string): Promise<number>;
}

function sessionKey(userId: string, jti: string) {
  return key("sess", userId, jti); // e.g., circle:dev:sess:<uid>:<jti>
}

export function ttlFromExp(exp: number, nowMs = Date.now()): number {
  const now = Math.floor(nowMs / 1000);
  return Math.max(exp - now, 1);
}

export class RedisSessionStore implements SessionStore {
  async persist(session: SessionInfo): Promise<void> {
    const c = await redisClient();
    const v = JSON.stringify({
      uid: session.userId,
      jti: session.jti,
      ip: session.ip || null,
      ua: session.ua || null,
      iat: session.iat,
      exp: session.exp,
    });
    await c.set(sessionKey(session.userId, session.jti), v, { EX: ttlFromExp(session.exp) });
  }

  async isActive(userId: string, jti: string): Promise<boolean> {
    const c = await redisClient();
    return (await c.exists(sessionKey(userId, jti))) === 1;
  }

  async revoke(userId: string, jti: string): Promise<void> {
    const c = await redisClient();
    await c.del(sessionKey(userId, jti));
  }

  async revokeAll(userId: string): Promise<number> {
    const c = await redisClient();
    const prefix = key("sess", userId, "");

    let count = 0;
    for await (const k of c.scanIterator({ MATCH: `${prefix}*`, COUNT: 100 })) {
      count += await c.del(k);
    }
    return count;
  }
}
