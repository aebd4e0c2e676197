/**
 * Explicit random source threaded through every component that draws random
 * values. A seeded source makes a whole generation run reproducible.
 */
export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
}

/**
 * Seeded random source (mulberry32). Without a seed one is drawn from Math.random.
 */
export function createRandom(seed?: number): RandomSource {
  let state = (seed ?? Math.floor(Math.random() * 0x100000000)) >>> 0;
  return {
    next(): number {
      let t = (state += 0x6d2b79f5);
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/** Fair coin: true with probability 0.5. */
export function coin(random: RandomSource): boolean {
  return random.next() < 0.5;
}

/** Uniform integer in [min, max], both inclusive. */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random.next() * (max - min + 1));
}

export function choice<T>(random: RandomSource, items: readonly T[]): T {
  const item = items[Math.floor(random.next() * items.length)];
  if (item === undefined) {
    throw new Error('choice called with an empty list');
  }
  return item;
}

/**
 * Picks from (value, weight) pairs proportionally to the weights.
 * Weights need not sum to 1; falls back to the last entry on rounding.
 */
export function weightedChoice<T>(random: RandomSource, entries: ReadonlyArray<readonly [T, number]>): T {
  const last = entries[entries.length - 1];
  if (last === undefined) {
    throw new Error('weightedChoice called with no entries');
  }
  const total = entries.reduce((sum, [, weight]) => sum + weight, 0);
  if (!(total > 0)) {
    throw new Error(`weightedChoice called with a non-positive total weight (${total})`);
  }
  let remaining = random.next() * total;
  for (const [value, weight] of entries) {
    if (remaining < weight) {
      return value;
    }
    remaining -= weight;
  }
  return last[0];
}

/** Typed entries of a weight table, skipping absent keys. */
export function weightEntries<K extends string>(table: Readonly<Partial<Record<K, number>>>): Array<[K, number]> {
  const entries: Array<[K, number]> = [];
  for (const key in table) {
    const weight = table[key];
    if (weight !== undefined) {
      entries.push([key, weight]);
    }
  }
  return entries;
}

/** k distinct items in random order (partial Fisher-Yates). */
export function sample<T>(random: RandomSource, items: readonly T[], k: number): T[] {
  const pool = [...items];
  const count = Math.min(Math.max(k, 0), pool.length);
  for (let i = 0; i < count; i++) {
    const j = randomInt(random, i, pool.length - 1);
    const picked = pool[j];
    const current = pool[i];
    if (picked === undefined || current === undefined) {
      break;
    }
    pool[i] = picked;
    pool[j] = current;
  }
  return pool.slice(0, count);
}
