// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { AccessLevel } from '../types.js';

/** Lowest possible trust score. */
export const SCORE_MIN = 0;

/** Highest possible trust score and the score of an unseen device. */
export const SCORE_MAX = 100;

/** Score boundaries separating the three access tiers. */
export interface TierThresholds {
  readonly fullAccessThreshold: number;
  readonly readOnlyThreshold: number;
}

/** Score deltas applied per reading. */
export interface ScoreDeltas {
  readonly anomalyPenalty: number;
  readonly normalReward: number;
}

export const DEFAULT_TIER_THRESHOLDS: TierThresholds = {
  fullAccessThreshold: 70,
  readOnlyThreshold: 40,
};

export const DEFAULT_SCORE_DELTAS: ScoreDeltas = {
  anomalyPenalty: 15,
  normalReward: 2,
};

/** Clamps a raw score to [0, 100]. */
export function clampScore(score: number): number {
  return Math.max(SCORE_MIN, Math.min(SCORE_MAX, score));
}

/**
 * Maps a score to its access tier.  Stateless: the same score always
 * yields the same tier regardless of the device's history.
 */
export function tierOf(
  score: number,
  thresholds: TierThresholds = DEFAULT_TIER_THRESHOLDS,
): AccessLevel {
  if (score >= thresholds.fullAccessThreshold) return AccessLevel.Full;
  if (score >= thresholds.readOnlyThreshold) return AccessLevel.ReadOnly;
  return AccessLevel.Quarantine;
}

/**
 * Computes the score after one reading: a fixed penalty for an anomalous
 * reading, a fixed reward otherwise, clamped to [0, 100].
 */
export function nextScore(
  score: number,
  anomaly: boolean,
  deltas: ScoreDeltas = DEFAULT_SCORE_DELTAS,
): number {
  return clampScore(anomaly ? score - deltas.anomalyPenalty : score + deltas.normalReward);
}

/** Rounds to one decimal place, the precision scores are reported with. */
export function roundScore(score: number): number {
  return Math.round(score * 10) / 10;
}
