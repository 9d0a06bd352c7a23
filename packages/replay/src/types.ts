/**
 * Replay Buffer Types
 *
 * Type definitions for the experience replay store.
 */

/**
 * Observation vector produced by the environment
 */
export type StateVector = ArrayLike<number>;

/**
 * Experience tuple for replay buffer
 *
 * Shape of `state` and `action` is fixed per buffer by the producer and is
 * not re-checked on append. Stored experiences are shared with callers, so
 * state vectors default to read-only arrays.
 */
export interface Experience<TState extends StateVector = readonly number[], TAction = number> {
  readonly state: TState;
  readonly action: TAction;
  readonly reward: number;
  readonly nextState: TState;
  readonly done: boolean;
}

/**
 * Training batch (one array per experience field, index-aligned)
 */
export interface TrainingBatch<TState extends StateVector = readonly number[], TAction = number> {
  readonly states: readonly TState[];
  readonly actions: readonly TAction[];
  readonly rewards: readonly number[];
  readonly nextStates: readonly TState[];
  readonly dones: readonly boolean[];
}

/**
 * Occupancy state of the ring store
 */
export type BufferState = 'EMPTY' | 'FILLING' | 'FULL';

/**
 * Source of uniform random numbers in [0, 1)
 */
export type RandomSource = () => number;
