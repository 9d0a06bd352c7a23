/**
 * Batch Assembler
 *
 * Transposes sampled experiences into one array per field.
 */

import { EmptyBatchError } from './errors.js';
import type { Experience, StateVector, TrainingBatch } from './types.js';

export function assembleBatch<TState extends StateVector, TAction>(
  experiences: readonly Experience<TState, TAction>[]
): TrainingBatch<TState, TAction> {
  const k = experiences.length;
  if (k === 0) {
    throw new EmptyBatchError();
  }

  const states = new Array<TState>(k);
  const actions = new Array<TAction>(k);
  const rewards = new Array<number>(k);
  const nextStates = new Array<TState>(k);
  const dones = new Array<boolean>(k);

  for (let i = 0; i < k; i++) {
    const experience = experiences[i];
    states[i] = experience.state;
    actions[i] = experience.action;
    rewards[i] = experience.reward;
    nextStates[i] = experience.nextState;
    dones[i] = experience.done;
  }

  return { states, actions, rewards, nextStates, dones };
}
