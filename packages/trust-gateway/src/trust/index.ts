// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { TrustScoreEngine } from './engine.js';
export {
  clampScore,
  tierOf,
  nextScore,
  roundScore,
  SCORE_MIN,
  SCORE_MAX,
  DEFAULT_TIER_THRESHOLDS,
  DEFAULT_SCORE_DELTAS,
} from './score.js';
export type { TierThresholds, ScoreDeltas } from './score.js';
