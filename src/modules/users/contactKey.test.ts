import { describe, expect, it, vi } from "vitest";

import {
  CONTACT_KEY_MAX,
  CONTACT_KEY_MIN,
  drawContactKey,
  generateContactKey,
  isContactKey,
} from "./contactKey.js";
import { UniquenessViolationError } from "../../domain/errors.js";

/** Cycles through `keys` forever. */
function sequence(...keys: number[]) {
  let i = 0;
  return vi.fn(() => keys[i++ % keys.length]);
}

describe("isContactKey", () => {
  it("accepts the 9-digit bounds", () => {
    expect(isContactKey(CONTACT_KEY_MIN)).toBe(true);
    expect(isContactKey(CONTACT_KEY_MAX)).toBe(true);
  });

  it("rejects values outside the range or non-integers", () => {
    expect(isContactKey(99_999_999)).toBe(false);
    expect(isContactKey(1_000_000_000)).toBe(false);
    expect(isContactKey(123_456_789.5)).toBe(false);
  });
});

describe("drawContactKey", () => {
  it("stays inside the 9-digit space", () => {
    for (let i = 0; i < 200; i++) expect(isContactKey(drawContactKey())).toBe(true);
  });
});

describe("generateContactKey", () => {
  it("skips a pre-seeded key in a narrow key space", async () => {
    const taken = new Set([100_000_001]);
    const draw = sequence(100_000_001, 100_000_002);

    const key = await generateContactKey(async (k) => taken.has(k), { draw, maxAttempts: 10 });

    expect(key).toBe(100_000_002);
    expect(draw).toHaveBeenCalledTimes(2);
  });

  it("yields distinct keys as the space fills up", async () => {
    const taken = new Set<number>();
    const draw = sequence(100_000_001, 100_000_002, 100_000_003);

    for (let n = 0; n < 3; n++) {
      taken.add(await generateContactKey(async (k) => taken.has(k), { draw, maxAttempts: 10 }));
    }

    expect([...taken].sort()).toEqual([100_000_001, 100_000_002, 100_000_003]);
  });

  it("ignores draws outside the range", async () => {
    const draw = sequence(42, 123_456_789);
    const key = await generateContactKey(async () => false, { draw, maxAttempts: 5 });
    expect(key).toBe(123_456_789);
  });

  it("gives up after maxAttempts with a uniqueness violation", async () => {
    const draw = sequence(100_000_001);
    const isTaken = vi.fn(async () => true);

    const err = await generateContactKey(isTaken, { draw, maxAttempts: 4 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UniquenessViolationError);
    expect(err).toMatchObject({
      field: "contactKey",
      message: "Could not find a free contact key after 4 attempts",
    });
    expect(isTaken).toHaveBeenCalledTimes(4);
  });
});
