// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { StatisticalResult } from '../types.js';
import type { StatisticalConfig } from '../config.js';
import { parseStatisticalConfig } from '../config.js';

/**
 * Fast z-score check of a reading against the device's recent history.
 *
 * Always available: it abstains (`insufficient_history`) below
 * `minHistory` values instead of failing.  A pure function of the supplied
 * window; no state is kept between calls.
 */
export class StatisticalDetector {
  readonly #config: StatisticalConfig;

  constructor(config: unknown = {}) {
    this.#config = parseStatisticalConfig(config);
  }

  /** Most recent values the detector looks at. */
  get historySize(): number {
    return this.#config.historySize;
  }

  /**
   * @param value   - The reading under test.
   * @param history - Recent values for the device, newest first.  Only the
   *                  first `historySize` entries are used.
   */
  check(value: number, history: readonly number[]): StatisticalResult {
    const window = history.slice(0, this.#config.historySize);
    if (window.length < this.#config.minHistory) {
      return { anomaly: false, confidence: 0, reason: 'insufficient_history' };
    }

    const first = window[0];
    const constant = window.every((v) => v === first);
    const mean = window.reduce((sum, v) => sum + v, 0) / window.length;
    const variance = window.reduce((sum, v) => sum + (v - mean) ** 2, 0) / window.length;
    const stddev = constant ? 0 : Math.sqrt(variance);

    // A constant window can still yield a non-zero variance through rounding,
    // and distinct tiny values can underflow to zero.
    if (stddev === 0) {
      const anomaly = constant ? value !== first : value !== mean;
      return { anomaly, confidence: anomaly ? 1 : 0, reason: 'zero_variance' };
    }

    const zScore = Math.abs(value - mean) / stddev;
    const anomaly = zScore > this.#config.zThreshold;
    const confidence = Math.min(1, zScore / (this.#config.zThreshold * 2));

    return {
      anomaly,
      confidence,
      reason: `z_score=${zScore.toFixed(2)} (mean=${mean.toFixed(1)}, std=${stddev.toFixed(1)})`,
      diagnostics: { zScore, mean, stddev },
    };
  }
}
