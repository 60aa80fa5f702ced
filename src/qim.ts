import type { Bit } from "./types";
import { posMod } from "./utils";

/* ------------------------- QIM (level parity) ------------------------ */
// The level is only ever incremented on a parity mismatch, so the change to a
// coefficient lies in [0, q) relative to round(c/q)*q.
// Supported range: |c/q| < 2^53. Past that every representable level is even
// and an odd level cannot be written; pixel-derived coefficients stay far below.
export function embedBit(c: number, bit: Bit, q: number): number {
  let level = Math.round(c / q);
  if (posMod(level, 2) !== bit) level += 1;
  return level * q;
}

export function extractBit(c: number, q: number): Bit {
  return posMod(Math.round(c / q), 2) === 1 ? 1 : 0;
}
