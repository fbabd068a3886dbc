// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { StatisticalDetector } from '../src/anomaly/statistical.js';

/** Ten values with mean 15 and population standard deviation 5. */
const SPLIT_HISTORY = [10, 10, 10, 10, 10, 20, 20, 20, 20, 20];

describe('StatisticalDetector', () => {
  describe('check: abstaining', () => {
    it('abstains below ten values of history', () => {
      const detector = new StatisticalDetector();
      const result = detector.check(1_000, [1, 2, 3, 4, 5, 6, 7, 8, 9]);
      expect(result).toEqual({ anomaly: false, confidence: 0, reason: 'insufficient_history' });
    });

    it('abstains with an empty history', () => {
      const detector = new StatisticalDetector();
      expect(detector.check(0, []).reason).toBe('insufficient_history');
    });
  });

  describe('check: zero variance', () => {
    it('treats any departure from a constant history as a certain anomaly', () => {
      const detector = new StatisticalDetector();
      const constant = new Array<number>(10).fill(5);
      expect(detector.check(6, constant)).toEqual({
        anomaly: true,
        confidence: 1,
        reason: 'zero_variance',
      });
    });

    it('accepts the constant value itself', () => {
      const detector = new StatisticalDetector();
      const constant = new Array<number>(10).fill(5);
      expect(detector.check(5, constant)).toEqual({
        anomaly: false,
        confidence: 0,
        reason: 'zero_variance',
      });
    });

    it('treats a history whose variance underflows to zero as zero variance', () => {
      const detector = new StatisticalDetector();
      const tiny = [1e-300, 3e-300, 1e-300, 3e-300, 1e-300, 3e-300, 1e-300, 3e-300, 1e-300, 3e-300];
      const mean = tiny.reduce((sum, v) => sum + v, 0) / tiny.length;

      expect(detector.check(5, tiny)).toEqual({ anomaly: true, confidence: 1, reason: 'zero_variance' });
      expect(detector.check(mean, tiny)).toEqual({ anomaly: false, confidence: 0, reason: 'zero_variance' });
    });
  });

  describe('check: z-score', () => {
    it('flags a reading three standard deviations out', () => {
      const detector = new StatisticalDetector();
      const result = detector.check(30, SPLIT_HISTORY);
      expect(result.anomaly).toBe(true);
      expect(result.confidence).toBeCloseTo(0.6, 10);
      expect(result.reason).toBe('z_score=3.00 (mean=15.0, std=5.0)');
      expect(result.diagnostics).toEqual({ zScore: 3, mean: 15, stddev: 5 });
    });

    it('accepts a reading one standard deviation out', () => {
      const detector = new StatisticalDetector();
      const result = detector.check(20, SPLIT_HISTORY);
      expect(result.anomaly).toBe(false);
      expect(result.confidence).toBeCloseTo(0.2, 10);
      expect(result.reason).toBe('z_score=1.00 (mean=15.0, std=5.0)');
    });

    it('does not flag a z-score exactly at the threshold', () => {
      const detector = new StatisticalDetector();
      const result = detector.check(27.5, SPLIT_HISTORY);
      expect(result.anomaly).toBe(false);
      expect(result.confidence).toBe(0.5);
    });

    it('caps confidence at 1', () => {
      const detector = new StatisticalDetector();
      const result = detector.check(1_000, SPLIT_HISTORY);
      expect(result.anomaly).toBe(true);
      expect(result.confidence).toBe(1);
    });
  });

  describe('history window', () => {
    it('uses only the most recent hundred values', () => {
      const detector = new StatisticalDetector();
      const recent = Array.from({ length: 100 }, (_, i) => (i % 2 === 0 ? 10 : 20));
      const stale = new Array<number>(50).fill(1_000);

      const result = detector.check(15, [...recent, ...stale]);
      expect(result.reason).toBe('z_score=0.00 (mean=15.0, std=5.0)');
      expect(result.anomaly).toBe(false);
    });

    it('honours custom thresholds', () => {
      const detector = new StatisticalDetector({ minHistory: 3, zThreshold: 0.5 });
      const result = detector.check(20, [10, 20, 10, 20]);
      expect(result.anomaly).toBe(true);
      expect(result.confidence).toBe(1);
      expect(detector.historySize).toBe(100);
    });
  });
});
