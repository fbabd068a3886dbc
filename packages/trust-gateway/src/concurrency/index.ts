// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { KeyedMutex } from './keyed-mutex.js';
export { withDeadline, callCollaborator } from './deadline.js';
export type { CollaboratorCallOptions } from './deadline.js';
