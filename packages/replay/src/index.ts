/**
 * Experience Replay Package
 *
 * Fixed-capacity replay store for off-policy reinforcement learning:
 * - O(1) append with oldest-first eviction
 * - O(k) uniform sampling without replacement
 *
 * @example
 * ```typescript
 * import { ReplayBuffer } from '@experience-replay/replay';
 *
 * const buffer = new ReplayBuffer({ capacity: 50000 });
 * buffer.append(state, action, reward, nextState, done);
 *
 * if (buffer.canSample(32)) {
 *   const { states, actions, rewards, nextStates, dones } = buffer.sample(32);
 * }
 * ```
 */

// Types
export * from './types.js';

// Errors
export * from './errors.js';

// Configuration
export {
  type ReplayBufferConfig,
  DEFAULT_BUFFER_CONFIG,
  loadBufferConfigFromEnv,
} from './config.js';

// Core components
export { RingStore } from './RingStore.js';
export { SamplingEngine, createRng, type IndexedSample } from './SamplingEngine.js';
export { assembleBatch } from './BatchAssembler.js';

// Main interface
export { ReplayBuffer, createReplayBuffer, type IndexedBatch } from './ReplayBuffer.js';
