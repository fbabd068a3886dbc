// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export type { HistoryStore } from './adapter.js';
export { MemoryHistoryStore } from './memory.js';
