// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { RateLimiter } from './limiter.js';
export type { Admission, BlockEvent, RateLimiterDeps } from './limiter.js';
