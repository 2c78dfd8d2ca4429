import { randomInt } from 'crypto';

export interface RandomSource {
  readonly seed: number;
  /** Uniform float in [0, 1) */
  next(): number;
}

export const hashSeed = (seed: number | string): number => {
  if (typeof seed === 'number') {
    return (Math.trunc(seed) >>> 0) || 1;
  }
  let hash = 0;
  for (let i = 0; i < seed.length; i++) {
    hash = (hash << 5) - hash + seed.charCodeAt(i);
    hash |= 0;
  }
  return (hash >>> 0) || 1;
};

/**
 * mulberry32. One instance per generation call, so concurrent
 * requests never share generator state.
 */
export class SeededRandom implements RandomSource {
  readonly seed: number;
  private state: number;

  constructor(seed: number | string) {
    this.seed = hashSeed(seed);
    this.state = this.seed;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

export const createRandom = (seed?: number | string): RandomSource =>
  new SeededRandom(seed ?? randomInt(1, 2 ** 31));

export const nextInt = (rng: RandomSource, maxExclusive: number): number =>
  Math.floor(rng.next() * maxExclusive);

export const pickOne = <T>(rng: RandomSource, items: readonly T[]): T => {
  if (items.length === 0) {
    throw new RangeError('Cannot pick from an empty list');
  }
  return items[nextInt(rng, items.length)];
};

/** Entries with weight <= 0 are never picked. Returns undefined when nothing has weight. */
export const pickWeighted = <T>(rng: RandomSource, entries: readonly (readonly [T, number])[]): T | undefined => {
  const total = entries.reduce((sum, [, weight]) => sum + Math.max(weight, 0), 0);
  if (total <= 0) return undefined;

  let roll = rng.next() * total;
  for (const [value, weight] of entries) {
    if (weight <= 0) continue;
    roll -= weight;
    if (roll < 0) return value;
  }
  // float rounding left roll at ~0: take the last weighted entry
  for (let i = entries.length - 1; i >= 0; i--) {
    if (entries[i][1] > 0) return entries[i][0];
  }
  return undefined;
};

/**
 * Picks `count` distinct items, uniform over all subsets of that size.
 * Partial Fisher-Yates over a copy; the source list is left untouched.
 */
export const sampleWithoutReplacement = <T>(rng: RandomSource, items: readonly T[], count: number): T[] => {
  if (count > items.length) {
    throw new RangeError(`Cannot draw ${count} items from ${items.length}`);
  }
  const copy = [...items];
  for (let i = 0; i < count; i++) {
    const j = i + nextInt(rng, copy.length - i);
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy.slice(0, count);
};
