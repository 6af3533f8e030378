/** JWT helpers: sign/verify access & refresh tokens, with rotation support. */
import { randomUUID } from "crypto";

import jwt, { type JwtPayload, type SignOptions } from "jsonwebtoken";

import { env } from "../../config/env.js";
import { UnauthorizedError } from "../../domain/errors.js";

/** Superusers are "admin", everybody else "member". */
export type Role = "member" | "admin";

export type AccessClaims = JwtPayload & {
  sub: string; // user id
  role: Role;
  type: "access";
  jti: string;
};

export type RefreshClaims = JwtPayload & {
  sub: string; // user id
  type: "refresh";
  jti: string; // session id, stored in Redis
  exp: number;
  iat: number;
};

export function roleOf(user: { isSuperuser: boolean }): Role {
  return user.isSuperuser ? "admin" : "member";
}

export function newJti(): string {
  return randomUUID();
}

function signOptions(expiresIn: number, jti: string): SignOptions {
  return {
    algorithm: "HS256",
    expiresIn,
    issuer: env.JWT_ISS,
    audience: env.JWT_AUD,
    jwtid: jti,
  };
}

function decode(token: string, secret: string): JwtPayload {
  const decoded = jwt.verify(token, secret, {
    algorithms: ["HS256"],
    issuer: env.JWT_ISS,
    audience: env.JWT_AUD,
  });
  if (typeof decoded === "string") throw new UnauthorizedError("Invalid token", "INVALID_TOKEN");
  return decoded;
}

export function signAccessToken(input: { sub: string; role: Role; jti?: string }): string {
  const payload = { sub: input.sub, role: input.role, type: "access" };
  return jwt.sign(payload, env.JWT_SECRET, signOptions(env.JWT_ACCESS_TTL, input.jti ?? newJti()));
}

export function signRefreshToken(input: { sub: string; jti?: string }): string {
  const payload = { sub: input.sub, type: "refresh" };
  return jwt.sign(
    payload,
    env.JWT_REFRESH_SECRET,
    signOptions(env.JWT_REFRESH_TTL, input.jti ?? newJti())
  );
}

export function verifyAccess(token: string): AccessClaims {
  const d = decode(token, env.JWT_SECRET);
  const role = d.role;
  if (
    d.type !== "access" ||
    typeof d.sub !== "string" ||
    typeof d.jti !== "string" ||
    (role !== "member" && role !== "admin")
  ) {
    throw new UnauthorizedError("Invalid token type", "INVALID_TOKEN");
  }
  return { ...d, sub: d.sub, jti: d.jti, role, type: "access" };
}

export function verifyRefresh(token: string): RefreshClaims {
  const d = decode(token, env.JWT_REFRESH_SECRET);
  if (
    d.type !== "refresh" ||
    typeof d.sub !== "string" ||
    typeof d.jti !== "string" ||
    typeof d.exp !== "number" ||
    typeof d.iat !== "number"
  ) {
    throw new UnauthorizedError("Invalid token type", "INVALID_TOKEN");
  }
  return { ...d, sub: d.sub, jti: d.jti, exp: d.exp, iat: d.iat, type: "refresh" };
}
