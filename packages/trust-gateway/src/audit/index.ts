// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { createAccessLogEntry, createAlert } from './record.js';
