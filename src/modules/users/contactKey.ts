/** Contact keys: random 9-digit numbers users share out of band to receive friend requests. */
import { randomInt } from "crypto";

import { UniquenessViolationError } from "../../domain/errors.js";

export const CONTACT_KEY_MIN = 100_000_000;
export const CONTACT_KEY_MAX = 999_999_999;

/** Draws one candidate key; swapped out in tests to narrow the key space. */
export type ContactKeyDraw = () => number;

export const drawContactKey: ContactKeyDraw = () => randomInt(CONTACT_KEY_MIN, CONTACT_KEY_MAX + 1);

export function isContactKey(value: number): boolean {
  return Number.isInteger(value) && value >= CONTACT_KEY_MIN && value <= CONTACT_KEY_MAX;
}

/** Draw keys until one is not taken, at most `maxAttempts` times. Out-of-range draws count. */
export async function generateContactKey(
  isTaken: (key: number) => Promise<boolean>,
  opts: { draw?: ContactKeyDraw; maxAttempts: number }
): Promise<number> {
  const draw = opts.draw ?? drawContactKey;
  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    const candidate = draw();
    if (!isContactKey(candidate)) continue;
    if (!(await isTaken(candidate))) return candidate;
  }
  throw new UniquenessViolationError(
    `Could not find a free contact key after ${opts.maxAttempts} attempts`,
    "contactKey"
  );
}
