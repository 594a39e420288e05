import type { Rng } from "./prng.ts";

const LOWER_LDH = "abcdefghijklmnopqrstuvwxyz0123456789";
const MIXED_ASCII = "abcXYZ019-_";

// Lower-case letters only, so lower-casing leaves them unchanged.
const LATIN_EXTENDED = [0x00df, 0x00e0, 0x00e9, 0x00f1, 0x00fc, 0x0101, 0x0153];
const GREEK = [0x03b1, 0x03b2, 0x03bb, 0x03bf, 0x03c9];
const CYRILLIC = [0x0430, 0x0436, 0x043e, 0x0444, 0x044f];
const HAN = [0x4e2d, 0x56fd, 0x65e5, 0x672c, 0x8a9e];
const HANGUL = [0xac00, 0xd55c, 0xad6d];
const ASTRAL = [0x1f600, 0x1f680, 0x20000, 0x2a6d6, 0x10fffd];

const EXTENDED_POOLS = [LATIN_EXTENDED, GREEK, CYRILLIC, HAN, HANGUL, ASTRAL];

function pickExtended(rng: Rng): number {
  return rng.choice(rng.choice(EXTENDED_POOLS));
}

/**
 * Arbitrary scalar values, biased towards ASCII and the extended pools.
 */
export function genCodePoints(rng: Rng, size: number): number[] {
  const out: number[] = [];
  const length = rng.int(0, size);
  for (let index = 0; index < length; index += 1) {
    const roll = rng.int(0, 5);
    if (roll <= 1) {
      out.push(rng.int(0, 0x7f));
    } else if (roll <= 3) {
      out.push(pickExtended(rng));
    } else if (roll === 4) {
      out.push(rng.int(0x80, 0xd7ff));
    } else {
      out.push(rng.int(0xe000, 0x10ffff));
    }
  }
  return out;
}

/**
 * A non-empty lower-case label of at most eight code points.
 */
export function genLowerLabel(rng: Rng, size: number): string {
  const length = rng.int(1, Math.min(8, size));
  let label = "";
  for (let index = 0; index < length; index += 1) {
    if (rng.int(0, 2) === 0) {
      label += String.fromCodePoint(pickExtended(rng));
    } else {
      label += rng.choice([...LOWER_LDH]);
    }
  }
  return label;
}

/**
 * A non-empty label mixing cases, punctuation and extended code points.
 */
export function genAnyLabel(rng: Rng, size: number): string {
  const length = rng.int(1, Math.min(12, size));
  let label = rng.int(0, 3) === 0 ? rng.choice(["xn--", "XN--", "Xn--"]) : "";
  for (let index = 0; index < length; index += 1) {
    if (rng.int(0, 2) === 0) {
      label += String.fromCodePoint(pickExtended(rng));
    } else {
      label += rng.choice([...MIXED_ASCII]);
    }
  }
  return label;
}

/**
 * One to four lower-case labels joined by ".".
 */
export function genLowerDomain(rng: Rng, size: number): string {
  const count = rng.int(1, 4);
  return Array.from({ length: count }, () => genLowerLabel(rng, size)).join(".");
}
