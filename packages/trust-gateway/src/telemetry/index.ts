// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { GatewayTracer } from './otel.js';
export type { OTelSpanLike, OTelTracerLike, GatewayOTelConfig } from './otel.js';
