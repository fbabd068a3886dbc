// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { RateLimiter } from '../src/rate-limit/limiter.js';
import type { BlockEvent } from '../src/rate-limit/limiter.js';
import { InvalidConfigError } from '../src/errors.js';

const T0 = 1_700_000_000_000;

function makeLimiter(score: number, blocks: BlockEvent[] = [], config: unknown = {}): RateLimiter {
  return new RateLimiter(
    {
      scoreOf: async () => score,
      onBlock: (event) => {
        blocks.push(event);
      },
    },
    config,
  );
}

describe('RateLimiter', () => {
  describe('admit: low-trust device', () => {
    it('blocks the sixth request inside the window and reports already_blocked afterwards', async () => {
      const blocks: BlockEvent[] = [];
      const limiter = makeLimiter(35, blocks);

      for (let i = 0; i < 5; i++) {
        const admission = await limiter.admit('sensor-1', T0 + i * 1_000);
        expect(admission).toEqual({ admitted: true, requestCount: i + 1 });
      }

      const sixth = await limiter.admit('sensor-1', T0 + 5_000);
      expect(sixth).toEqual({ admitted: false, reason: 'rate_limit_exceeded', requestCount: 6 });

      const seventh = await limiter.admit('sensor-1', T0 + 60_000);
      expect(seventh).toEqual({ admitted: false, reason: 'already_blocked', requestCount: 6 });

      expect(limiter.isBlocked('sensor-1')).toBe(true);
      expect(limiter.blockedDevices()).toEqual(['sensor-1']);
      expect(blocks).toEqual([
        {
          deviceId: 'sensor-1',
          requestCount: 6,
          windowMs: 10_000,
          trustScore: 35,
          blockedAt: T0 + 5_000,
        },
      ]);
    });

    it('does not block when old requests have slid out of the window', async () => {
      const limiter = makeLimiter(10);
      for (let i = 0; i < 5; i++) {
        await limiter.admit('sensor-1', T0 + i * 1_000);
      }

      // The first request (T0) is exactly windowMs old and no longer counts.
      const admission = await limiter.admit('sensor-1', T0 + 10_000);
      expect(admission).toEqual({ admitted: true, requestCount: 5 });
      expect(limiter.isBlocked('sensor-1')).toBe(false);
    });
  });

  describe('admit: trusted device', () => {
    it('never blocks a device at or above the quarantine threshold', async () => {
      const blocks: BlockEvent[] = [];
      const limiter = makeLimiter(40, blocks);

      for (let i = 0; i < 20; i++) {
        const admission = await limiter.admit('sensor-1', T0 + i * 100);
        expect(admission.admitted).toBe(true);
      }

      expect(blocks).toEqual([]);
      expect(limiter.windowSize('sensor-1', T0 + 1_900)).toBe(20);
    });
  });

  describe('per-device isolation', () => {
    it('keeps separate windows and block state per device', async () => {
      const limiter = makeLimiter(0);
      for (let i = 0; i < 6; i++) {
        await limiter.admit('sensor-1', T0 + i);
      }

      const other = await limiter.admit('sensor-2', T0 + 6);
      expect(other).toEqual({ admitted: true, requestCount: 1 });
      expect(limiter.blockedDevices()).toEqual(['sensor-1']);
    });
  });

  describe('windowSize', () => {
    it('counts only requests younger than the window without pruning', async () => {
      const limiter = makeLimiter(100);
      await limiter.admit('sensor-1', T0);
      await limiter.admit('sensor-1', T0 + 5_000);

      expect(limiter.windowSize('sensor-1', T0 + 9_999)).toBe(2);
      expect(limiter.windowSize('sensor-1', T0 + 10_000)).toBe(1);
      expect(limiter.windowSize('sensor-1', T0 + 9_999)).toBe(2);
      expect(limiter.windowSize('unknown', T0)).toBe(0);
    });
  });

  describe('config', () => {
    it('honours a custom window and request cap', async () => {
      const limiter = makeLimiter(0, [], { windowMs: 1_000, maxRequests: 2 });
      await limiter.admit('sensor-1', T0);
      await limiter.admit('sensor-1', T0 + 100);
      const third = await limiter.admit('sensor-1', T0 + 200);
      expect(third).toEqual({ admitted: false, reason: 'rate_limit_exceeded', requestCount: 3 });
    });

    it('blocks below a raised quarantine threshold', async () => {
      const limiter = makeLimiter(50, [], { maxRequests: 1, quarantineThreshold: 60 });
      await limiter.admit('sensor-1', T0);
      const second = await limiter.admit('sensor-1', T0 + 100);
      expect(second).toEqual({ admitted: false, reason: 'rate_limit_exceeded', requestCount: 2 });
    });

    it('rejects a non-positive window', () => {
      expect(() => makeLimiter(0, [], { windowMs: 0 })).toThrow(InvalidConfigError);
    });
  });
});
