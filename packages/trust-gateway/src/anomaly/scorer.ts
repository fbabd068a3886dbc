// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/** Classification of one value against a trained outlier model. */
export interface OutlierScore {
  readonly isOutlier: boolean;
  /** Backend-specific anomaly strength; more negative means more anomalous. */
  readonly rawScore: number;
}

/**
 * Capability interface for the learned outlier layer.
 *
 * `TState` is opaque to the detector: it is produced by train(), cached per
 * device, replaced wholesale on retrain and handed back to score().  Any
 * numerical backend satisfying this contract can replace the default
 * isolation forest.  Implementations must be deterministic for a given
 * training input so tests can rely on stable verdicts.
 */
export interface OutlierScorer<TState> {
  train(values: readonly number[]): TState | Promise<TState>;
  score(state: TState, value: number): OutlierScore;
}
