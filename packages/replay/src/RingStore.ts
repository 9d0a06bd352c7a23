/**
 * Ring Store
 *
 * Fixed-size circular storage for experiences. All slots are allocated up
 * front; once the store is full every append overwrites the oldest entry.
 */

import { ConstructionError, IndexOutOfRangeError } from './errors.js';
import type { BufferState, Experience, StateVector } from './types.js';

/** Largest length a JavaScript array can be allocated with */
export const MAX_CAPACITY = 2 ** 32 - 1;

export class RingStore<TState extends StateVector = readonly number[], TAction = number> {
  private readonly slots: (Experience<TState, TAction> | undefined)[];
  private readonly maxSize: number;
  private writeCursor: number;
  private count: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0 || capacity > MAX_CAPACITY) {
      throw new ConstructionError(capacity);
    }

    this.maxSize = capacity;
    this.slots = new Array<Experience<TState, TAction> | undefined>(capacity).fill(undefined);
    this.writeCursor = 0;
    this.count = 0;
  }

  /**
   * Write an experience at the cursor, evicting the oldest one when full
   */
  append(experience: Experience<TState, TAction>): void {
    this.slots[this.writeCursor] = experience;
    this.writeCursor = (this.writeCursor + 1) % this.maxSize;
    if (this.count < this.maxSize) {
      this.count++;
    }
  }

  /**
   * Read a physical slot. Slots are written in order from 0, so the
   * filled ones are always [0, size).
   */
  get(slot: number): Experience<TState, TAction> {
    const experience =
      Number.isInteger(slot) && slot >= 0 && slot < this.count ? this.slots[slot] : undefined;

    if (experience === undefined) {
      throw new IndexOutOfRangeError(slot, this.count, 'slot');
    }
    return experience;
  }

  /**
   * Read by logical index, 0 being the oldest live experience
   */
  at(logicalIndex: number): Experience<TState, TAction> {
    if (!Number.isInteger(logicalIndex) || logicalIndex < 0 || logicalIndex >= this.count) {
      throw new IndexOutOfRangeError(logicalIndex, this.count, 'logical');
    }
    return this.get(this.toSlot(logicalIndex));
  }

  /**
   * Map a logical index to the physical slot holding it
   */
  toSlot(logicalIndex: number): number {
    // Until the first wrap the oldest entry sits in slot 0; afterwards it is
    // the one the cursor will overwrite next.
    const oldest = this.count < this.maxSize ? 0 : this.writeCursor;
    return (oldest + logicalIndex) % this.maxSize;
  }

  size(): number {
    return this.count;
  }

  capacity(): number {
    return this.maxSize;
  }

  state(): BufferState {
    if (this.count === 0) return 'EMPTY';
    return this.count < this.maxSize ? 'FILLING' : 'FULL';
  }

  /**
   * Live experiences, oldest first
   */
  toArray(): Experience<TState, TAction>[] {
    const result = new Array<Experience<TState, TAction>>(this.count);
    for (let i = 0; i < this.count; i++) {
      result[i] = this.at(i);
    }
    return result;
  }
}
