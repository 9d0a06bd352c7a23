/**
 * Sampling Engine
 *
 * Draws distinct experiences uniformly at random from the live window of a
 * RingStore. Cost is O(k) in the batch size regardless of capacity.
 */

import { InsufficientSamplesError } from './errors.js';
import type { RingStore } from './RingStore.js';
import type { Experience, RandomSource, StateVector } from './types.js';

/**
 * Create a random number generator, seeded when a seed is given
 */
export function createRng(seed?: number): RandomSource {
  if (seed === undefined) {
    return Math.random;
  }

  // Simple seeded RNG (Mulberry32)
  let state = seed;
  return () => {
    state |= 0;
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Experiences drawn by one sample, with the logical index each came from
 */
export interface IndexedSample<TState extends StateVector = readonly number[], TAction = number> {
  experiences: Experience<TState, TAction>[];
  indices: number[];
}

export class SamplingEngine<TState extends StateVector = readonly number[], TAction = number> {
  private readonly store: RingStore<TState, TAction>;
  private readonly random: RandomSource;

  /**
   * @param random - expected to return values in [0, 1); a draw of exactly 1
   * is clamped to the last index
   */
  constructor(store: RingStore<TState, TAction>, random: RandomSource = Math.random) {
    this.store = store;
    this.random = random;
  }

  /**
   * Pick k distinct logical indices from [0, size)
   *
   * Partial Fisher-Yates over the conceptual array [0, 1, ..., size - 1].
   * Only positions displaced by a swap are stored, so at most k entries
   * ever live in the map.
   */
  sampleIndices(k: number): number[] {
    const population = this.store.size();
    if (!Number.isInteger(k) || k <= 0 || k > population) {
      throw new InsufficientSamplesError(k, population);
    }

    const displaced = new Map<number, number>();
    const indices = new Array<number>(k);

    for (let i = 0; i < k; i++) {
      const j = Math.min(population - 1, i + Math.floor(this.random() * (population - i)));
      const atI = displaced.get(i) ?? i;
      const atJ = displaced.get(j) ?? j;

      indices[i] = atJ;
      displaced.set(j, atI);
      displaced.delete(i);
    }

    return indices;
  }

  /**
   * Sample k distinct experiences along with their logical indices
   */
  sampleWithIndices(k: number): IndexedSample<TState, TAction> {
    const indices = this.sampleIndices(k);
    const experiences = indices.map(index => this.store.at(index));
    return { experiences, indices };
  }

  /**
   * Sample k distinct experiences
   */
  sample(k: number): Experience<TState, TAction>[] {
    return this.sampleWithIndices(k).experiences;
  }
}
