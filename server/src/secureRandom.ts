import { randomBytes, randomInt } from "node:crypto";

/** Uniform integer in [0, maxExclusive). */
export type RandomInt = (maxExclusive: number) => number;

export const secureRandomInt: RandomInt = (maxExclusive) => {
  const hi = Math.floor(maxExclusive);
  if (!Number.isFinite(hi) || hi <= 0) {
    throw new Error(`Invalid secureRandomInt bound: ${maxExclusive}`);
  }
  return randomInt(0, hi);
};

export function secureRandomHex(byteLength: number): string {
  const n = Math.max(1, Math.floor(byteLength));
  return randomBytes(n).toString("hex");
}
