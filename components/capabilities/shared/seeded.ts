import { createHash } from "node:crypto";

/** Deterministic integer in `[min, max]` derived from the md5 digest of `seed`. */
export function seededInt(seed: string, min: number, max: number): number {
  const digest = BigInt(`0x${createHash("md5").update(seed).digest("hex")}`);
  return min + Number(digest % BigInt(max - min + 1));
}
