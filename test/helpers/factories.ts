import { buildContext, type ContextOptions } from "../../src/context.js";
import type { CreateUserInput } from "../../src/modules/users/service.js";
import { MemorySessionStore, memoryStores } from "./memoryStores.js";

export const TEST_PASSWORD = "test-password";

export function makeContext(opts: ContextOptions = {}) {
  const stores = memoryStores();
  const sessions = new MemorySessionStore();
  const ctx = buildContext(stores, sessions, {
    bcryptRounds: 4,
    contactKeyMaxAttempts: 1000,
    directionPolicy: "either",
    rateLimit: { windowMs: 60_000, max: 1000 },
    pingDeps: async () => ({ mongo: { status: "ok" }, redis: { status: "ok" } }),
    ...opts,
  });
  return { stores, sessions, ctx };
}

let counter = 0;

export function userInput(overrides: Partial<CreateUserInput> = {}): CreateUserInput {
  counter += 1;
  return {
    username: `user${counter}`,
    email: `user${counter}@example.com`,
    password: TEST_PASSWORD,
    ...overrides,
  };
}
