// Interview Coach Engine - Random sources
// Feedback ordering and question sampling draw from an injected RandomSource,
// so tests can substitute a fixed sequence.

export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
}

/** Process-wide source backed by Math.random. */
export const defaultRandomSource: RandomSource = {
  next: () => Math.random(),
};

/**
 * Deterministic source seeded with a 32-bit integer (mulberry32).
 * The same seed always yields the same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/** Replays `values` in order, wrapping around. For tests. */
export function createSequenceRandom(values: readonly number[]): RandomSource {
  if (values.length === 0) {
    throw new Error("createSequenceRandom requires at least one value");
  }
  let index = 0;
  return {
    next(): number {
      const value = values[index % values.length];
      index++;
      return value;
    },
  };
}

/** Fisher–Yates shuffle. Returns a new array; the input is not modified. */
export function shuffle<T>(items: readonly T[], rng: RandomSource = defaultRandomSource): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(rng.next() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/**
 * Pick `count` distinct items without replacement.
 * @throws Error if `count` exceeds the number of items
 */
export function sample<T>(items: readonly T[], count: number, rng: RandomSource = defaultRandomSource): T[] {
  if (count > items.length) {
    throw new Error(`Cannot sample ${count} items from a pool of ${items.length}`);
  }
  return shuffle(items, rng).slice(0, Math.max(0, count));
}
