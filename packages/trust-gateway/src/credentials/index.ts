// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export type { CredentialService, CredentialCheck } from './service.js';
export { JwtCredentialService } from './jwt.js';
export type { JwtCredentialServiceOptions } from './jwt.js';
