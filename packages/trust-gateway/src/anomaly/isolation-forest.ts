// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { mulberry32, sampleWithoutReplacement } from './random.js';
import type { RandomSource } from './random.js';
import type { OutlierScore, OutlierScorer } from './scorer.js';

/** Euler–Mascheroni constant, used to approximate harmonic numbers. */
const EULER_GAMMA = 0.5772156649015329;

/** Trees built between two yields to the event loop while training. */
const TREES_PER_YIELD = 10;

type IsolationNode =
  | { readonly kind: 'leaf'; readonly size: number }
  | {
      readonly kind: 'split';
      readonly threshold: number;
      readonly left: IsolationNode;
      readonly right: IsolationNode;
    };

/** A trained isolation forest over one-dimensional samples. */
export interface IsolationForestModel {
  readonly trees: readonly IsolationNode[];
  /** Number of samples each tree was grown from. */
  readonly sampleSize: number;
  /**
   * Decision offset: the contamination quantile of the training samples'
   * raw scores.  Values scoring below it are outliers.
   */
  readonly offset: number;
}

export interface IsolationForestOptions {
  /** Number of trees.  Defaults to 100. */
  estimators?: number;
  /** Upper bound on the per-tree sub-sample size.  Defaults to 256. */
  maxSamples?: number;
  /** Expected outlier fraction in the training data.  Defaults to 0.1. */
  contamination?: number;
  /** PRNG seed, re-applied on every train() call.  Defaults to 42. */
  seed?: number;
}

/**
 * Average path length of an unsuccessful search in a binary search tree of
 * `n` items; normalises isolation depths.
 */
export function averagePathLength(n: number): number {
  if (n <= 1) return 0;
  if (n === 2) return 1;
  return 2 * (Math.log(n - 1) + EULER_GAMMA) - (2 * (n - 1)) / n;
}

/** Linear-interpolated quantile of an ascending-sorted array. */
function quantile(sorted: readonly number[], q: number): number {
  const position = q * (sorted.length - 1);
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

function growTree(
  samples: readonly number[],
  depth: number,
  maxDepth: number,
  random: RandomSource,
): IsolationNode {
  if (depth >= maxDepth || samples.length <= 1) {
    return { kind: 'leaf', size: samples.length };
  }

  const min = Math.min(...samples);
  const max = Math.max(...samples);
  if (min === max) {
    return { kind: 'leaf', size: samples.length };
  }

  const threshold = min + random() * (max - min);
  const left = samples.filter((v) => v <= threshold);
  const right = samples.filter((v) => v > threshold);

  return {
    kind: 'split',
    threshold,
    left: growTree(left, depth + 1, maxDepth, random),
    right: growTree(right, depth + 1, maxDepth, random),
  };
}

function pathLength(node: IsolationNode, value: number, depth = 0): number {
  if (node.kind === 'leaf') {
    return depth + averagePathLength(node.size);
  }
  return pathLength(value <= node.threshold ? node.left : node.right, value, depth + 1);
}

/**
 * Isolation forest outlier scorer for scalar readings.
 *
 * Each tree isolates points by recursive random splits; anomalous values are
 * isolated in fewer splits.  Raw scores are `-2^(-E[h(x)] / c(ψ))` and lie in
 * (-1, 0): the more negative, the more anomalous.  The decision offset is
 * the `contamination` quantile of the training scores.
 *
 * Training is seeded on every call, so two trainings over the same values
 * produce identical models.
 */
export class IsolationForestScorer implements OutlierScorer<IsolationForestModel> {
  readonly #estimators: number;
  readonly #maxSamples: number;
  readonly #contamination: number;
  readonly #seed: number;

  constructor(options: IsolationForestOptions = {}) {
    this.#estimators = options.estimators ?? 100;
    this.#maxSamples = options.maxSamples ?? 256;
    this.#contamination = options.contamination ?? 0.1;
    this.#seed = options.seed ?? 42;
  }

  async train(values: readonly number[]): Promise<IsolationForestModel> {
    if (values.length === 0) {
      throw new RangeError('Cannot train an isolation forest on an empty sample.');
    }

    const random = mulberry32(this.#seed);
    const sampleSize = Math.min(this.#maxSamples, values.length);
    const maxDepth = Math.ceil(Math.log2(Math.max(sampleSize, 2)));

    const trees: IsolationNode[] = [];
    for (let i = 0; i < this.#estimators; i++) {
      const sample = sampleWithoutReplacement(values, sampleSize, random);
      trees.push(growTree(sample, 0, maxDepth, random));
      if ((i + 1) % TREES_PER_YIELD === 0) {
        await yieldToEventLoop();
      }
    }

    const partial = { trees, sampleSize, offset: 0 };
    const trainingScores = values.map((v) => this.#rawScore(partial, v)).sort((a, b) => a - b);

    return { trees, sampleSize, offset: quantile(trainingScores, this.#contamination) };
  }

  score(model: IsolationForestModel, value: number): OutlierScore {
    const rawScore = this.#rawScore(model, value);
    return { isOutlier: rawScore < model.offset, rawScore };
  }

  #rawScore(model: IsolationForestModel, value: number): number {
    let total = 0;
    for (const tree of model.trees) {
      total += pathLength(tree, value);
    }
    const meanDepth = total / model.trees.length;
    const normaliser = averagePathLength(model.sampleSize);
    // A single-sample forest carries no isolation information.
    if (normaliser === 0) return -0.5;
    return -Math.pow(2, -meanDepth / normaliser);
  }
}
