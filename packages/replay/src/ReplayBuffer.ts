/**
 * Experience Replay Buffer
 *
 * Stores the most recent experiences for off-policy training and serves
 * uniform mini-batches without replacement.
 *
 * Every call is synchronous, so a sample always sees a consistent snapshot
 * of the store; no append can run between index selection and slot reads.
 */

import { pino } from 'pino';
import { assembleBatch } from './BatchAssembler.js';
import { DEFAULT_BUFFER_CONFIG, type ReplayBufferConfig } from './config.js';
import { InsufficientSamplesError } from './errors.js';
import { RingStore } from './RingStore.js';
import { SamplingEngine, createRng, type IndexedSample } from './SamplingEngine.js';
import type { BufferState, Experience, RandomSource, StateVector, TrainingBatch } from './types.js';

const logger = pino({ name: 'ReplayBuffer', level: process.env.LOG_LEVEL || 'info' });

/**
 * Sampled batch together with the logical indices it was drawn from
 */
export interface IndexedBatch<TState extends StateVector = readonly number[], TAction = number> {
  batch: TrainingBatch<TState, TAction>;
  indices: number[];
}

export class ReplayBuffer<TState extends StateVector = readonly number[], TAction = number> {
  private config: ReplayBufferConfig;
  private store: RingStore<TState, TAction>;
  private sampler: SamplingEngine<TState, TAction>;
  private readonly random: RandomSource;

  constructor(config: Partial<ReplayBufferConfig> = {}) {
    this.config = { ...DEFAULT_BUFFER_CONFIG, ...config };
    this.random = createRng(this.config.randomSeed);
    this.store = new RingStore<TState, TAction>(this.config.capacity);
    this.sampler = new SamplingEngine(this.store, this.random);

    logger.info(
      { capacity: this.config.capacity, seeded: this.config.randomSeed !== undefined },
      'Replay buffer created'
    );
  }

  /**
   * Record one environment step
   */
  append(state: TState, action: TAction, reward: number, nextState: TState, done: boolean): void {
    this.add({ state, action, reward, nextState, done });
  }

  /**
   * Add experience to buffer, evicting the oldest one when full
   */
  add(experience: Experience<TState, TAction>): void {
    const wasFull = this.store.size() === this.store.capacity();
    this.store.append(experience);

    if (!wasFull && this.store.size() === this.store.capacity()) {
      logger.info({ capacity: this.store.capacity() }, 'Replay buffer full, evicting oldest from now on');
    }
  }

  /**
   * Sample batch of experiences
   */
  sample(batchSize: number): TrainingBatch<TState, TAction> {
    return this.sampleWithIndices(batchSize).batch;
  }

  /**
   * Sample batch of experiences along with their logical indices
   */
  sampleWithIndices(batchSize: number): IndexedBatch<TState, TAction> {
    let sampled: IndexedSample<TState, TAction>;
    try {
      sampled = this.sampler.sampleWithIndices(batchSize);
    } catch (error) {
      if (error instanceof InsufficientSamplesError) {
        logger.warn({ requested: batchSize, available: this.store.size() }, 'Rejected sample request');
      }
      throw error;
    }

    logger.debug({ batchSize, size: this.store.size() }, 'Sampled batch');

    return { batch: assembleBatch(sampled.experiences), indices: sampled.indices };
  }

  /**
   * Check if buffer has enough samples
   */
  canSample(batchSize: number): boolean {
    return Number.isInteger(batchSize) && batchSize > 0 && batchSize <= this.store.size();
  }

  size(): number {
    return this.store.size();
  }

  capacity(): number {
    return this.store.capacity();
  }

  state(): BufferState {
    return this.store.state();
  }

  /**
   * Get all live experiences, oldest first
   */
  getAll(): Experience<TState, TAction>[] {
    return this.store.toArray();
  }

  /**
   * Rebuild the buffer with fresh storage of the same capacity
   */
  clear(): void {
    this.store = new RingStore<TState, TAction>(this.config.capacity);
    this.sampler = new SamplingEngine(this.store, this.random);
    logger.info({ capacity: this.config.capacity }, 'Replay buffer cleared');
  }
}

/**
 * Construct a replay buffer with the given capacity
 */
export function createReplayBuffer<TState extends StateVector = readonly number[], TAction = number>(
  capacity: number,
  randomSeed?: number
): ReplayBuffer<TState, TAction> {
  return new ReplayBuffer<TState, TAction>({ capacity, randomSeed });
}
