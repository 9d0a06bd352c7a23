/**
 * Replay buffer configuration
 */
export interface ReplayBufferConfig {
  /** Maximum number of live experiences */
  capacity: number;
  /** Random seed for reproducible sampling */
  randomSeed?: number;
}

/** Default buffer configuration */
export const DEFAULT_BUFFER_CONFIG: ReplayBufferConfig = {
  capacity: 100000,
};

/**
 * Read buffer configuration from environment variables
 *
 *   REPLAY_CAPACITY - maximum live experiences (default: 100000)
 *   REPLAY_SEED     - seed for the sampling RNG (default: unseeded)
 */
export function loadBufferConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ReplayBufferConfig {
  const config: ReplayBufferConfig = {
    capacity: parseInt(env.REPLAY_CAPACITY || String(DEFAULT_BUFFER_CONFIG.capacity), 10),
  };

  if (env.REPLAY_SEED) {
    const seed = parseInt(env.REPLAY_SEED, 10);
    if (!Number.isNaN(seed)) {
      config.randomSeed = seed;
    }
  }

  return config;
}
