export interface Rng {
  nextU32(): number;
  int(min: number, max: number): number;
  choice<T>(items: readonly T[]): T;
}

function fnv1a32Seed(input: string): number {
  let hash = 0x811c9dc5;
  for (let index = 0; index < input.length; index += 1) {
    hash ^= input.charCodeAt(index);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Seeded xorshift32 generator; the same seed always yields the same stream.
 */
export function makeRng(seed: number | string): Rng {
  let state = (typeof seed === "number" ? seed : fnv1a32Seed(seed)) >>> 0;
  if (state === 0) state = 0x9e3779b9;

  const nextU32 = () => {
    state ^= state << 13;
    state >>>= 0;
    state ^= state >>> 17;
    state ^= state << 5;
    state >>>= 0;
    return state;
  };

  const int = (min: number, max: number) => {
    const minBound = Math.min(min, max);
    const maxBound = Math.max(min, max);
    const span = maxBound - minBound + 1;
    if (span <= 1) return minBound;
    return minBound + (nextU32() % span);
  };

  const choice = <T>(items: readonly T[]): T => {
    const item = items[int(0, items.length - 1)];
    if (item === undefined) {
      throw new Error("rng.choice requires a non-empty array");
    }
    return item;
  };

  return { nextU32, int, choice };
}
