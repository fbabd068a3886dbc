// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { ValidationError } from './errors.js';

// ---------------------------------------------------------------------------
// Register
// ---------------------------------------------------------------------------

export const RegisterRequestSchema = z.object({
  deviceId: z.string().trim().min(1),
  deviceType: z.string().trim().min(1),
  location: z.string().trim().min(1),
});

export type RegisterRequest = z.infer<typeof RegisterRequestSchema>;

// ---------------------------------------------------------------------------
// Ingest
// ---------------------------------------------------------------------------

export const IngestRequestSchema = z.object({
  /** Identity the sender asserts; must match the credential's subject. */
  deviceId: z.string().trim().min(1),
  value: z.number().finite(),
  unit: z.string().default(''),
  /** Anomaly flag asserted by the sender; OR-ed with the detector verdict. */
  isAnomaly: z.boolean().default(false),
  credential: z.string().optional(),
});

/** Ingest payload as accepted by TrustGateway.ingest(), before defaults apply. */
export type IngestRequestInput = z.input<typeof IngestRequestSchema>;
export type IngestRequest = z.output<typeof IngestRequestSchema>;

// ---------------------------------------------------------------------------
// Parsing helpers
// ---------------------------------------------------------------------------

function parseRequest<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return result.data;
}

/** Validates a registration payload, throwing ValidationError on failure. */
export function parseRegisterRequest(raw: unknown): RegisterRequest {
  return parseRequest(RegisterRequestSchema, raw);
}

/** Validates a reading payload and fills in defaults, throwing ValidationError on failure. */
export function parseIngestRequest(raw: unknown): IngestRequest {
  return parseRequest(IngestRequestSchema, raw);
}
