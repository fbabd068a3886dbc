// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { AdaptiveResult } from '../types.js';
import type { AdaptiveConfig } from '../config.js';
import { parseAdaptiveConfig } from '../config.js';
import { KeyedMutex } from '../concurrency/keyed-mutex.js';
import type { OutlierScorer } from './scorer.js';

/** Details handed to the `onTrained` hook after a (re)train. */
export interface ModelTrainedEvent {
  readonly deviceId: string;
  readonly sampleCount: number;
  /** False for the first model of a device. */
  readonly retrain: boolean;
}

export interface AdaptiveDetectorOptions<TState> {
  scorer: OutlierScorer<TState>;
  /** Raw config slice, parsed with AdaptiveConfigSchema. */
  config?: unknown;
  onTrained?: (event: ModelTrainedEvent) => void;
}

/**
 * Per-device learned outlier layer.
 *
 * Inactive until a device has `warmupSize` readings.  The device's model
 * is trained when none is cached, and retrained whenever the supplied
 * window length is a multiple of `retrainInterval`.  Once the window is
 * saturated at `historySize` (a multiple of the interval by default) every
 * check retrains.  The cadence keys on the window, not on a lifetime
 * counter.
 *
 * Models are replaced wholesale, never patched.  Train and score for one
 * device run under that device's lock, so a reading waits for an ongoing
 * retrain of its own device only.
 */
export class AdaptiveDetector<TState> {
  readonly #config: AdaptiveConfig;
  readonly #scorer: OutlierScorer<TState>;
  readonly #onTrained: ((event: ModelTrainedEvent) => void) | undefined;
  readonly #models = new Map<string, TState>();
  readonly #locks = new KeyedMutex();

  constructor(options: AdaptiveDetectorOptions<TState>) {
    this.#scorer = options.scorer;
    this.#config = parseAdaptiveConfig(options.config ?? {});
    this.#onTrained = options.onTrained;
  }

  /** Most recent values the detector trains on. */
  get historySize(): number {
    return this.#config.historySize;
  }

  /**
   * @param deviceId - Owner of the model.
   * @param value    - The reading under test.
   * @param history  - Recent values for the device, newest first.
   */
  async check(deviceId: string, value: number, history: readonly number[]): Promise<AdaptiveResult> {
    const window = history.slice(0, this.#config.historySize);
    if (window.length < this.#config.warmupSize) {
      return { anomaly: false, confidence: 0, active: false };
    }

    return this.#locks.runExclusive(deviceId, async (): Promise<AdaptiveResult> => {
      const hadModel = this.#models.has(deviceId);
      if (!hadModel || window.length % this.#config.retrainInterval === 0) {
        const trained = await this.#scorer.train(window);
        this.#models.set(deviceId, trained);
        this.#onTrained?.({ deviceId, sampleCount: window.length, retrain: hadModel });
      }

      const model = this.#models.get(deviceId);
      if (model === undefined) {
        return { anomaly: false, confidence: 0, active: false };
      }

      const { isOutlier, rawScore } = this.#scorer.score(model, value);
      const confidence = Math.max(0, Math.min(1, Math.abs(rawScore) / this.#config.confidenceScale));
      return { anomaly: isOutlier, confidence, active: true, rawScore };
    });
  }

  /** True when a model is cached for the device. */
  hasModel(deviceId: string): boolean {
    return this.#models.has(deviceId);
  }
}
