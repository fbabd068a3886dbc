// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { clampScore, nextScore, roundScore, tierOf } from '../src/trust/score.js';
import { TrustScoreEngine } from '../src/trust/engine.js';
import { MemoryHistoryStore } from '../src/storage/memory.js';
import { AccessLevel } from '../src/types.js';
import { InvalidConfigError } from '../src/errors.js';

const AT = new Date('2026-03-01T12:00:00.000Z');

describe('score helpers', () => {
  describe('clampScore', () => {
    it('clamps to [0, 100]', () => {
      expect(clampScore(-5)).toBe(0);
      expect(clampScore(105)).toBe(100);
      expect(clampScore(42.5)).toBe(42.5);
    });
  });

  describe('tierOf', () => {
    it('maps exact boundaries to the higher tier', () => {
      expect(tierOf(70)).toBe(AccessLevel.Full);
      expect(tierOf(40)).toBe(AccessLevel.ReadOnly);
    });

    it('maps values just below a boundary to the lower tier', () => {
      expect(tierOf(69.9)).toBe(AccessLevel.ReadOnly);
      expect(tierOf(39.9)).toBe(AccessLevel.Quarantine);
    });

    it('covers the extremes', () => {
      expect(tierOf(100)).toBe(AccessLevel.Full);
      expect(tierOf(0)).toBe(AccessLevel.Quarantine);
    });
  });

  describe('nextScore', () => {
    it('subtracts the penalty for an anomalous reading', () => {
      expect(nextScore(50, true)).toBe(35);
    });

    it('adds the reward for a clean reading', () => {
      expect(nextScore(50, false)).toBe(52);
    });

    it('never leaves [0, 100]', () => {
      for (let score = 0; score <= 100; score += 0.5) {
        for (const anomaly of [true, false]) {
          const next = nextScore(score, anomaly);
          expect(next).toBeGreaterThanOrEqual(0);
          expect(next).toBeLessThanOrEqual(100);
        }
      }
      expect(nextScore(10, true)).toBe(0);
      expect(nextScore(99, false)).toBe(100);
    });
  });

  describe('roundScore', () => {
    it('rounds to one decimal place', () => {
      expect(roundScore(35.04)).toBe(35);
      expect(roundScore(35.06)).toBe(35.1);
    });
  });
});

describe('TrustScoreEngine', () => {
  it('reports the initial full-access state for an unseen device', async () => {
    const engine = new TrustScoreEngine(new MemoryHistoryStore());
    await expect(engine.current('sensor-1')).resolves.toEqual({
      score: 100,
      accessLevel: AccessLevel.Full,
    });
  });

  it('appends one record per transition and reads the latest back', async () => {
    const store = new MemoryHistoryStore();
    const engine = new TrustScoreEngine(store);

    const first = await engine.apply('sensor-1', true, AT);
    expect(first.score).toBe(85);
    expect(first.accessLevel).toBe(AccessLevel.Full);
    expect(first.computedAt).toBe('2026-03-01T12:00:00.000Z');

    const second = await engine.apply('sensor-1', true, AT);
    expect(second.score).toBe(70);
    expect(second.accessLevel).toBe(AccessLevel.Full);

    const third = await engine.apply('sensor-1', true, AT);
    expect(third.score).toBe(55);
    expect(third.accessLevel).toBe(AccessLevel.ReadOnly);

    await expect(engine.current('sensor-1')).resolves.toEqual({
      score: 55,
      accessLevel: AccessLevel.ReadOnly,
      computedAt: '2026-03-01T12:00:00.000Z',
    });

    const history = await store.trustHistory('sensor-1', 10);
    expect(history.map((record) => record.score)).toEqual([55, 70, 85]);
  });

  it('moves straight back across tiers without hysteresis', async () => {
    const store = new MemoryHistoryStore();
    const engine = new TrustScoreEngine(store);
    await store.appendTrustRecord({
      id: 'seed',
      deviceId: 'sensor-1',
      score: 39,
      accessLevel: AccessLevel.Quarantine,
      computedAt: AT.toISOString(),
    });

    const record = await engine.apply('sensor-1', false, AT);
    expect(record.score).toBe(41);
    expect(record.accessLevel).toBe(AccessLevel.ReadOnly);
  });

  it('loses no update when transitions for one device race', async () => {
    const store = new MemoryHistoryStore();
    const engine = new TrustScoreEngine(store);

    await Promise.all(Array.from({ length: 5 }, () => engine.apply('sensor-1', true, AT)));

    const current = await engine.current('sensor-1');
    expect(current.score).toBe(25);
    expect(current.accessLevel).toBe(AccessLevel.Quarantine);
  });

  it('honours custom deltas and thresholds', async () => {
    const engine = new TrustScoreEngine(new MemoryHistoryStore(), {
      initialScore: 60,
      fullAccessThreshold: 80,
      readOnlyThreshold: 50,
      normalReward: 5,
    });
    await expect(engine.current('sensor-1')).resolves.toEqual({
      score: 60,
      accessLevel: AccessLevel.ReadOnly,
    });
    const record = await engine.apply('sensor-1', false, AT);
    expect(record.score).toBe(65);
  });

  it('rejects a read-only threshold above the full-access threshold', () => {
    expect(
      () => new TrustScoreEngine(new MemoryHistoryStore(), { readOnlyThreshold: 80, fullAccessThreshold: 70 }),
    ).toThrow(InvalidConfigError);
  });
});
