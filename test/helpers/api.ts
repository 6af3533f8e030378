import type { Express } from "express";
import request from "supertest";

import { userInput } from "./factories.js";
import type { CreateUserInput } from "../../src/modules/users/service.js";

export type SignedUp = {
  id: string;
  username: string;
  contactKey: number;
  accessToken: string;
  refreshToken: string;
  input: CreateUserInput;
};

export async function signUp(app: Express, overrides: Partial<CreateUserInput> = {}): Promise<SignedUp> {
  const input = userInput(overrides);
  const res = await request(app).post("/auth/register").send(input).expect(201);
  return {
    id: res.body.user.id,
    username: res.body.user.username,
    contactKey: res.body.user.contactKey,
    accessToken: res.body.tokens.accessToken,
    refreshToken: res.body.tokens.refreshToken,
    input,
  };
}

export function bearer(user: { accessToken: string }) {
  return { Authorization: `Bearer ${user.accessToken}` };
}
