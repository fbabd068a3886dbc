// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { AdaptiveDetector } from '../src/anomaly/adaptive.js';
import type { ModelTrainedEvent } from '../src/anomaly/adaptive.js';
import { IsolationForestScorer, averagePathLength } from '../src/anomaly/isolation-forest.js';
import type { OutlierScore, OutlierScorer } from '../src/anomaly/scorer.js';

/** 99 evenly spaced values in [20, 21) plus one far-away value. */
function clusterWithOutlier(): number[] {
  const cluster = Array.from({ length: 99 }, (_, i) => 20 + i / 99);
  return [...cluster, 50];
}

/**
 * Records training calls; its "model" is the training window itself and
 * values above 100 are outliers.
 */
class RecordingScorer implements OutlierScorer<readonly number[]> {
  readonly trainings: number[][] = [];

  train(values: readonly number[]): readonly number[] {
    this.trainings.push([...values]);
    return values;
  }

  score(_state: readonly number[], value: number): OutlierScore {
    return value > 100 ? { isOutlier: true, rawScore: -0.8 } : { isOutlier: false, rawScore: -0.3 };
  }
}

function historyOf(length: number): number[] {
  return Array.from({ length }, (_, i) => 20 + (i % 5));
}

describe('averagePathLength', () => {
  it('is 0 for one item and 1 for two', () => {
    expect(averagePathLength(1)).toBe(0);
    expect(averagePathLength(2)).toBe(1);
  });

  it('approximates the harmonic-number formula for larger samples', () => {
    expect(averagePathLength(256)).toBeCloseTo(10.2448, 3);
  });
});

describe('IsolationForestScorer', () => {
  it('produces identical models for identical training data', async () => {
    const scorer = new IsolationForestScorer();
    const first = await scorer.train(clusterWithOutlier());
    const second = await scorer.train(clusterWithOutlier());
    expect(second).toEqual(first);
  });

  it('scores a far-away value as an outlier and a central value as an inlier', async () => {
    const scorer = new IsolationForestScorer();
    const model = await scorer.train(clusterWithOutlier());

    const far = scorer.score(model, 500);
    const central = scorer.score(model, 20.5);

    expect(far.isOutlier).toBe(true);
    expect(central.isOutlier).toBe(false);
    expect(far.rawScore).toBeLessThan(central.rawScore);
  });

  it('keeps raw scores inside (-1, 0)', async () => {
    const scorer = new IsolationForestScorer();
    const model = await scorer.train(clusterWithOutlier());
    for (const value of [-1_000, 0, 20, 20.5, 50, 1_000]) {
      const { rawScore } = scorer.score(model, value);
      expect(rawScore).toBeGreaterThan(-1);
      expect(rawScore).toBeLessThan(0);
    }
  });

  it('uses every tree configured', async () => {
    const scorer = new IsolationForestScorer({ estimators: 7 });
    const model = await scorer.train(clusterWithOutlier());
    expect(model.trees).toHaveLength(7);
    expect(model.sampleSize).toBe(100);
  });

  it('gives a neutral, non-outlier score for a single-sample model', async () => {
    const scorer = new IsolationForestScorer();
    const model = await scorer.train([5]);
    expect(scorer.score(model, 1_000)).toEqual({ isOutlier: false, rawScore: -0.5 });
  });

  it('refuses to train on an empty sample', async () => {
    const scorer = new IsolationForestScorer();
    await expect(scorer.train([])).rejects.toThrow(RangeError);
  });
});

describe('AdaptiveDetector', () => {
  it('stays inactive below the warm-up size', async () => {
    const scorer = new RecordingScorer();
    const detector = new AdaptiveDetector({ scorer });

    const result = await detector.check('sensor-1', 500, historyOf(49));

    expect(result).toEqual({ anomaly: false, confidence: 0, active: false });
    expect(scorer.trainings).toHaveLength(0);
    expect(detector.hasModel('sensor-1')).toBe(false);
  });

  it('trains on first use and retrains when the window length hits the interval', async () => {
    const scorer = new RecordingScorer();
    const events: ModelTrainedEvent[] = [];
    const detector = new AdaptiveDetector({ scorer, onTrained: (event) => events.push(event) });

    await detector.check('sensor-1', 20, historyOf(50));
    await detector.check('sensor-1', 20, historyOf(51));
    await detector.check('sensor-1', 20, historyOf(99));
    await detector.check('sensor-1', 20, historyOf(100));

    expect(scorer.trainings.map((values) => values.length)).toEqual([50, 100]);
    expect(events).toEqual([
      { deviceId: 'sensor-1', sampleCount: 50, retrain: false },
      { deviceId: 'sensor-1', sampleCount: 100, retrain: true },
    ]);
  });

  it('trains a model when none is cached even off the interval', async () => {
    const scorer = new RecordingScorer();
    const detector = new AdaptiveDetector({ scorer });

    await detector.check('sensor-1', 20, historyOf(73));

    expect(scorer.trainings.map((values) => values.length)).toEqual([73]);
    expect(detector.hasModel('sensor-1')).toBe(true);
  });

  it('trains on at most the two hundred most recent values', async () => {
    const scorer = new RecordingScorer();
    const detector = new AdaptiveDetector({ scorer });
    const history = historyOf(250);

    await detector.check('sensor-1', 20, history);

    expect(scorer.trainings).toHaveLength(1);
    expect(scorer.trainings[0]).toEqual(history.slice(0, 200));
  });

  it('derives confidence from the raw score and clamps it to 1', async () => {
    const scorer = new RecordingScorer();
    const detector = new AdaptiveDetector({ scorer });

    const inlier = await detector.check('sensor-1', 20, historyOf(60));
    const outlier = await detector.check('sensor-1', 500, historyOf(61));

    expect(inlier).toEqual({ anomaly: false, confidence: 0.6, active: true, rawScore: -0.3 });
    expect(outlier).toEqual({ anomaly: true, confidence: 1, active: true, rawScore: -0.8 });
  });

  it('keeps one model per device', async () => {
    const scorer = new RecordingScorer();
    const detector = new AdaptiveDetector({ scorer });

    await detector.check('sensor-1', 20, historyOf(60));
    await detector.check('sensor-2', 20, historyOf(55));

    expect(detector.hasModel('sensor-1')).toBe(true);
    expect(detector.hasModel('sensor-2')).toBe(true);
    expect(scorer.trainings.map((values) => values.length)).toEqual([60, 55]);
  });
});
