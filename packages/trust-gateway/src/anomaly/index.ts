// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { StatisticalDetector } from './statistical.js';
export { AdaptiveDetector } from './adaptive.js';
export type { AdaptiveDetectorOptions, ModelTrainedEvent } from './adaptive.js';
export { IsolationForestScorer, averagePathLength } from './isolation-forest.js';
export type { IsolationForestModel, IsolationForestOptions } from './isolation-forest.js';
export type { OutlierScorer, OutlierScore } from './scorer.js';
export { combineVerdicts, DEFAULT_COMBINER_WEIGHTS } from './combiner.js';
export type { CombinerWeights } from './combiner.js';
export { mulberry32 } from './random.js';
export type { RandomSource } from './random.js';
