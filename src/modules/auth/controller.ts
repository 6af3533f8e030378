import type { Request } from "express";

import { registerSchema, refreshSchema, tokenSchema } from "./schemas.js";
import type { SessionStore } from "./sessions.js";
import {
  roleOf,
  signAccessToken,
  signRefreshToken,
  verifyRefresh,
  type RefreshClaims,
} from "./tokens.js";
import { NotFoundError, UnauthorizedError } from "../../domain/errors.js";
import { asyncHandler, jsonOk } from "../../utils/http.js";
import type { LoginIdentifier, UsersService } from "../users/service.js";
import { toPublicUser } from "../users/service.js";
import type { UserRecord } from "../users/store.js";

type Deps = { users: UsersService; sessions: SessionStore };

function readRefresh(token: string): RefreshClaims {
  try {
    return verifyRefresh(token);
  } catch {
    throw new UnauthorizedError("Invalid refresh token", "INVALID_REFRESH");
  }
}

export function authController({ users, sessions }: Deps) {
  /** Sign a fresh access/refresh pair and persist the refresh session. */
  async function issueTokens(user: UserRecord, req: Request) {
    const accessToken = signAccessToken({ sub: user.id, role: roleOf(user) });
    const refreshToken = signRefreshToken({ sub: user.id });

    const claims = verifyRefresh(refreshToken);
    await sessions.persist({
      userId: claims.sub,
      jti: claims.jti,
      exp: claims.exp,
      iat: claims.iat,
      ip: req.ip,
      ua: req.get("user-agent") || null,
    });
    return { accessToken, refreshToken };
  }

  const register = asyncHandler(async (req, res) => {
    const body = registerSchema.parse(req.body);
    const user = await users.create(body);
    const tokens = await issueTokens(user, req);
    jsonOk(res, { user: toPublicUser(user), tokens }, 201);
  });

  const token = asyncHandler(async (req, res) => {
    const body = tokenSchema.parse(req.body);
    const identifier: LoginIdentifier =
      body.email !== undefined ? { email: body.email } : { username: body.username ?? "" };
    const user = await users.authenticate(identifier, body.password);
    const tokens = await issueTokens(user, req);
    jsonOk(res, { user: toPublicUser(user), tokens });
  });

  const refresh = asyncHandler(async (req, res) => {
    const { refreshToken } = refreshSchema.parse(req.body);
    const claims = readRefresh(refreshToken);

    if (!(await sessions.isActive(claims.sub, claims.jti))) {
      throw new UnauthorizedError("Refresh session not found or expired", "INVALID_REFRESH");
    }

    // rotate: the presented session is spent either way
    await sessions.revoke(claims.sub, claims.jti);

    let user: UserRecord | null = null;
    try {
      user = await users.getById(claims.sub);
    } catch (err) {
      if (!(err instanceof NotFoundError)) throw err;
    }
    if (!user || !user.isActive) {
      throw new UnauthorizedError("User no longer exists", "INVALID_REFRESH");
    }

    const tokens = await issueTokens(user, req);
    jsonOk(res, tokens);
  });

  const logout = asyncHandler(async (req, res) => {
    const { refreshToken } = refreshSchema.parse(req.body);
    const claims = readRefresh(refreshToken);
    await sessions.revoke(claims.sub, claims.jti);
    jsonOk(res, { success: true });
  });

  return { register, token, refresh, logout };
}
