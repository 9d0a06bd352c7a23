/**
 * Replay Buffer Tests
 */

import { describe, it, expect, expectTypeOf, beforeEach } from 'vitest';
import { ReplayBuffer, createReplayBuffer } from './ReplayBuffer.js';
import { ConstructionError, InsufficientSamplesError } from './errors.js';
import type { Experience } from './types.js';

describe('ReplayBuffer', () => {
  let buffer: ReplayBuffer;

  const createMockState = (position: number = 0): number[] => [0.5, 100, 0.51, 100, position];

  const createExperience = (idx: number): Experience => ({
    state: createMockState(idx),
    action: idx % 5,
    reward: idx * 0.1,
    nextState: createMockState(idx + 1),
    done: false,
  });

  beforeEach(() => {
    buffer = new ReplayBuffer({ capacity: 100, randomSeed: 17 });
  });

  describe('construction', () => {
    it('should use the default capacity', () => {
      expect(new ReplayBuffer().capacity()).toBe(100000);
    });

    it.each([0, -5, 3.5, 2 ** 32])('should reject capacity %s', capacity => {
      expect(() => createReplayBuffer(capacity)).toThrow(ConstructionError);
    });
  });

  describe('append and size', () => {
    it('should start empty', () => {
      expect(buffer.size()).toBe(0);
      expect(buffer.state()).toBe('EMPTY');
    });

    it('should increase size when appending experiences', () => {
      buffer.append(createMockState(0), 1, 0.5, createMockState(1), false);
      expect(buffer.size()).toBe(1);
      expect(buffer.state()).toBe('FILLING');

      buffer.add(createExperience(1));
      expect(buffer.size()).toBe(2);
    });

    it('should store appended fields unchanged', () => {
      const state = createMockState(3);
      const nextState = createMockState(4);
      buffer.append(state, 2, -1.5, nextState, true);

      expect(buffer.getAll()).toEqual([{ state, action: 2, reward: -1.5, nextState, done: true }]);
    });

    it('should not exceed capacity', () => {
      const smallBuffer = createReplayBuffer(5);

      for (let i = 0; i < 10; i++) {
        smallBuffer.add(createExperience(i));
      }

      expect(smallBuffer.size()).toBe(5);
      expect(smallBuffer.state()).toBe('FULL');
    });
  });

  describe('canSample', () => {
    it('should return false when buffer is too small', () => {
      buffer.add(createExperience(0));
      expect(buffer.canSample(5)).toBe(false);
    });

    it('should return true when buffer has enough samples', () => {
      for (let i = 0; i < 10; i++) {
        buffer.add(createExperience(i));
      }
      expect(buffer.canSample(5)).toBe(true);
      expect(buffer.canSample(10)).toBe(true);
    });

    it('should return false for non-positive batch sizes', () => {
      buffer.add(createExperience(0));
      expect(buffer.canSample(0)).toBe(false);
      expect(buffer.canSample(-1)).toBe(false);
    });
  });

  describe('sample', () => {
    beforeEach(() => {
      for (let i = 0; i < 20; i++) {
        buffer.add(createExperience(i));
      }
    });

    it('should return batch of correct size', () => {
      const batch = buffer.sample(5);

      expect(batch.states).toHaveLength(5);
      expect(batch.actions).toHaveLength(5);
      expect(batch.rewards).toHaveLength(5);
      expect(batch.nextStates).toHaveLength(5);
      expect(batch.dones).toHaveLength(5);
    });

    it('should return distinct stored experiences', () => {
      const { batch, indices } = buffer.sampleWithIndices(8);
      const all = buffer.getAll();

      expect(new Set(indices).size).toBe(8);
      indices.forEach((idx, i) => {
        expect(batch.states[i]).toBe(all[idx].state);
        expect(batch.actions[i]).toBe(all[idx].action);
        expect(batch.rewards[i]).toBe(all[idx].reward);
        expect(batch.nextStates[i]).toBe(all[idx].nextState);
        expect(batch.dones[i]).toBe(all[idx].done);
      });
    });

    it('should hand out stored state vectors as read-only views', () => {
      const { batch, indices } = buffer.sampleWithIndices(1);
      const stored = buffer.getAll()[indices[0]];

      expect(batch.states[0]).toBe(stored.state);
      expect(batch.nextStates[0]).toBe(stored.nextState);
      expectTypeOf(batch.states).toEqualTypeOf<readonly (readonly number[])[]>();
      expectTypeOf(batch.states[0]).toEqualTypeOf<readonly number[]>();
      expectTypeOf(batch.rewards).toEqualTypeOf<readonly number[]>();
      expectTypeOf(stored.state).toEqualTypeOf<readonly number[]>();
    });

    it('should reject batches larger than the buffer and leave it unchanged', () => {
      const before = buffer.getAll();

      expect(() => buffer.sample(21)).toThrow(InsufficientSamplesError);
      expect(() => buffer.sample(0)).toThrow(InsufficientSamplesError);
      expect(buffer.size()).toBe(20);
      expect(buffer.getAll()).toEqual(before);
    });

    it('should be reproducible with the same seed', () => {
      const other = new ReplayBuffer({ capacity: 100, randomSeed: 17 });
      for (let i = 0; i < 20; i++) {
        other.add(createExperience(i));
      }

      for (let trial = 0; trial < 10; trial++) {
        expect(other.sampleWithIndices(6).indices).toEqual(buffer.sampleWithIndices(6).indices);
      }
    });
  });

  describe('clear', () => {
    it('should empty the buffer', () => {
      for (let i = 0; i < 10; i++) {
        buffer.add(createExperience(i));
      }

      expect(buffer.size()).toBe(10);
      buffer.clear();
      expect(buffer.size()).toBe(0);
      expect(buffer.state()).toBe('EMPTY');
      expect(buffer.capacity()).toBe(100);
      expect(() => buffer.sample(1)).toThrow(InsufficientSamplesError);
    });

    it('should accept new experiences after clearing', () => {
      buffer.add(createExperience(0));
      buffer.clear();
      buffer.add(createExperience(7));

      expect(buffer.getAll().map(e => e.action)).toEqual([2]);
    });
  });

  describe('getAll', () => {
    it('should return all experiences in insertion order', () => {
      for (let i = 0; i < 5; i++) {
        buffer.add(createExperience(i));
      }

      expect(buffer.getAll().map(e => e.action)).toEqual([0, 1, 2, 3, 4]);
    });
  });

  describe('circular buffer behavior', () => {
    it('should overwrite oldest experiences when full', () => {
      const smallBuffer = createReplayBuffer(3);

      // Add 5 experiences to a buffer of size 3
      for (let i = 0; i < 5; i++) {
        smallBuffer.add(createExperience(i));
      }

      const all = smallBuffer.getAll();
      expect(all).toHaveLength(3);
      expect(all.map(e => e.state[4])).toEqual([2, 3, 4]);
    });

    it('should serve exactly the live window after eviction', () => {
      const smallBuffer = createReplayBuffer<number[], string>(3, 1);
      const labels = ['A', 'B', 'C', 'D'];

      labels.forEach((label, i) => {
        smallBuffer.append([i], label, 0, [i + 1], false);
      });

      expect(smallBuffer.size()).toBe(3);
      expect(smallBuffer.getAll().map(e => e.action)).toEqual(['B', 'C', 'D']);

      for (let trial = 0; trial < 20; trial++) {
        const { actions } = smallBuffer.sample(3);
        expect([...actions].sort()).toEqual(['B', 'C', 'D']);
      }

      expect(() => smallBuffer.sample(4)).toThrow(InsufficientSamplesError);
    });
  });
});
