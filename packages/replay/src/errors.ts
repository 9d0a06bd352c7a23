/**
 * Error classes for the replay buffer
 */

export type ReplayBufferErrorCode =
  | 'CONSTRUCTION_ERROR'
  | 'INSUFFICIENT_SAMPLES'
  | 'INDEX_OUT_OF_RANGE'
  | 'EMPTY_BATCH';

/**
 * Base error class for all replay buffer errors
 */
export class ReplayBufferError extends Error {
  public readonly code: ReplayBufferErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: ReplayBufferErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ReplayBufferError';
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

/**
 * Capacity is not a positive integer an array can be allocated with
 */
export class ConstructionError extends ReplayBufferError {
  constructor(capacity: number) {
    super(`Capacity must be a positive integer no larger than 2^32 - 1, got ${capacity}`, 'CONSTRUCTION_ERROR', {
      capacity,
    });
    this.name = 'ConstructionError';
  }
}

/**
 * Requested batch size is outside (0, size]
 */
export class InsufficientSamplesError extends ReplayBufferError {
  constructor(requested: number, available: number) {
    super(
      `Cannot sample ${requested} experiences from a buffer holding ${available}`,
      'INSUFFICIENT_SAMPLES',
      { requested, available }
    );
    this.name = 'InsufficientSamplesError';
  }
}

/**
 * Slot or logical index is outside the written range
 */
export class IndexOutOfRangeError extends ReplayBufferError {
  constructor(index: number, limit: number, kind: 'slot' | 'logical') {
    super(`${kind === 'slot' ? 'Slot' : 'Logical index'} ${index} is outside [0, ${limit})`, 'INDEX_OUT_OF_RANGE', {
      index,
      limit,
      kind,
    });
    this.name = 'IndexOutOfRangeError';
  }
}

/**
 * Batch assembly was given no experiences
 */
export class EmptyBatchError extends ReplayBufferError {
  constructor() {
    super('Cannot assemble a batch from zero experiences', 'EMPTY_BATCH');
    this.name = 'EmptyBatchError';
  }
}

/**
 * Check if an error is a replay buffer error
 */
export function isReplayBufferError(error: unknown): error is ReplayBufferError {
  return error instanceof ReplayBufferError;
}
