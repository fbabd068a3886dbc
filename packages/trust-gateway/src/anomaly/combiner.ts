// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { AdaptiveResult, AnomalyVerdict, DetectionMethod, StatisticalResult } from '../types.js';

export interface CombinerWeights {
  readonly statisticalWeight: number;
  readonly adaptiveWeight: number;
  readonly penaltyScale: number;
}

export const DEFAULT_COMBINER_WEIGHTS: CombinerWeights = {
  statisticalWeight: 0.4,
  adaptiveWeight: 0.6,
  penaltyScale: 20,
};

function methodOf(statistical: boolean, adaptive: boolean): DetectionMethod {
  if (statistical && adaptive) return 'both';
  if (statistical) return 'statistical';
  if (adaptive) return 'adaptive';
  return 'none';
}

/**
 * Merges both layers into one verdict.
 *
 * A reading is anomalous when either layer flags it.  Confidence is the
 * fixed-weight blend of the two layer confidences, so it stays in [0, 1]
 * whenever both inputs do.  The reason always comes from the statistical
 * layer, the only one with a human-readable diagnostic.
 */
export function combineVerdicts(
  statistical: StatisticalResult,
  adaptive: AdaptiveResult,
  weights: CombinerWeights = DEFAULT_COMBINER_WEIGHTS,
): AnomalyVerdict {
  const isAnomaly = statistical.anomaly || adaptive.anomaly;
  const confidence =
    weights.statisticalWeight * statistical.confidence + weights.adaptiveWeight * adaptive.confidence;

  return {
    isAnomaly,
    confidence: Math.round(confidence * 1000) / 1000,
    method: methodOf(statistical.anomaly, adaptive.anomaly),
    reason: statistical.reason,
    trustPenalty: isAnomaly ? Math.round(confidence * weights.penaltyScale * 10) / 10 : 0,
  };
}
