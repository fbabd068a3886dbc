// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { InvalidConfigError } from './errors.js';

// ---------------------------------------------------------------------------
// Rate limit config
// ---------------------------------------------------------------------------

/**
 * Zod schema for the sliding-window flood control.
 *
 * Blocking only engages for devices whose trust score is below
 * `quarantineThreshold`; see RateLimiter.  Inside GatewayConfigSchema an
 * omitted threshold follows `trust.readOnlyThreshold`.
 */
export const RateLimitConfigSchema = z.object({
  /** Width of the sliding window in milliseconds. */
  windowMs: z.number().int().positive().default(10_000),
  /** Requests allowed inside one window before a low-trust device is blocked. */
  maxRequests: z.number().int().positive().default(5),
  /** Score below which flooding leads to a block.  RateLimiter falls back to 40. */
  quarantineThreshold: z.number().min(0).max(100).optional(),
});

export type RateLimitConfig = z.infer<typeof RateLimitConfigSchema>;

// ---------------------------------------------------------------------------
// Trust config
// ---------------------------------------------------------------------------

export const TrustConfigSchema = z
  .object({
    /** Score of a device that has no trust record yet. */
    initialScore: z.number().min(0).max(100).default(100),
    /** Scores at or above this value map to full access. */
    fullAccessThreshold: z.number().min(0).max(100).default(70),
    /** Scores at or above this value (and below full) map to read-only. */
    readOnlyThreshold: z.number().min(0).max(100).default(40),
    /** Points subtracted for an anomalous reading. */
    anomalyPenalty: z.number().nonnegative().default(15),
    /** Points added for a clean reading. */
    normalReward: z.number().nonnegative().default(2),
  })
  .refine((cfg) => cfg.readOnlyThreshold <= cfg.fullAccessThreshold, {
    message: 'readOnlyThreshold must not exceed fullAccessThreshold',
    path: ['readOnlyThreshold'],
  });

export type TrustConfig = z.infer<typeof TrustConfigSchema>;

// ---------------------------------------------------------------------------
// Detector config
// ---------------------------------------------------------------------------

export const StatisticalConfigSchema = z.object({
  /** Most recent readings considered. */
  historySize: z.number().int().positive().default(100),
  /** Below this many readings the layer abstains. */
  minHistory: z.number().int().positive().default(10),
  /** |z| above this value is an anomaly. */
  zThreshold: z.number().positive().default(2.5),
});

export type StatisticalConfig = z.infer<typeof StatisticalConfigSchema>;

export const AdaptiveConfigSchema = z.object({
  /** Most recent readings used for training. */
  historySize: z.number().int().positive().default(200),
  /** Warm-up size: the model stays inactive below this many readings. */
  warmupSize: z.number().int().positive().default(50),
  /** Retrain whenever the window length is a multiple of this value. */
  retrainInterval: z.number().int().positive().default(50),
  /** Expected fraction of outliers in the training sample. */
  contamination: z.number().gt(0).max(0.5).default(0.1),
  /** Number of isolation trees. */
  estimators: z.number().int().positive().default(100),
  /** Upper bound on the per-tree sub-sample size. */
  maxSamples: z.number().int().positive().default(256),
  /** PRNG seed; fixed so that equal histories train equal models. */
  seed: z.number().int().default(42),
  /** |rawScore| / confidenceScale gives the layer's confidence. */
  confidenceScale: z.number().positive().default(0.5),
});

export type AdaptiveConfig = z.infer<typeof AdaptiveConfigSchema>;

export const CombinerConfigSchema = z
  .object({
    statisticalWeight: z.number().min(0).max(1).default(0.4),
    adaptiveWeight: z.number().min(0).max(1).default(0.6),
    /** trustPenalty = confidence * penaltyScale for anomalous verdicts. */
    penaltyScale: z.number().nonnegative().default(20),
  })
  .refine((cfg) => Math.abs(cfg.statisticalWeight + cfg.adaptiveWeight - 1) < 1e-9, {
    message: 'statisticalWeight and adaptiveWeight must sum to 1',
  });

export type CombinerConfig = z.infer<typeof CombinerConfigSchema>;

// ---------------------------------------------------------------------------
// Timeouts and projections
// ---------------------------------------------------------------------------

export const TimeoutConfigSchema = z.object({
  /** Deadline for each collaborator call and the adaptive check. */
  requestMs: z.number().int().positive().default(5_000),
});

export type TimeoutConfig = z.infer<typeof TimeoutConfigSchema>;

export const ProjectionConfigSchema = z.object({
  alertLimit: z.number().int().positive().default(50),
  auditLimit: z.number().int().positive().default(100),
  trustHistoryLimit: z.number().int().positive().default(50),
});

export type ProjectionConfig = z.infer<typeof ProjectionConfigSchema>;

// ---------------------------------------------------------------------------
// Credential config
// ---------------------------------------------------------------------------

export const CredentialConfigSchema = z.object({
  /** HMAC secret used to sign device credentials. */
  secret: z.string().min(8),
  /** Credential lifetime in seconds. */
  expirySeconds: z.number().int().positive().default(3_600),
  /** `iss` claim written on issue and required on verify. */
  issuer: z.string().min(1).default('trust-gateway'),
});

export type CredentialConfig = z.infer<typeof CredentialConfigSchema>;

// ---------------------------------------------------------------------------
// Root gateway config
// ---------------------------------------------------------------------------

/**
 * Zod schema for the top-level config passed to TrustGateway.
 * Every section is optional and falls back to its defaults.  The rate
 * limiter's quarantine threshold, when omitted, is the trust section's
 * read-only threshold, so flood blocking covers exactly the quarantine tier.
 */
export const GatewayConfigSchema = z
  .object({
    rateLimit: RateLimitConfigSchema.default({}),
    trust: TrustConfigSchema.default({}),
    statistical: StatisticalConfigSchema.default({}),
    adaptive: AdaptiveConfigSchema.default({}),
    combiner: CombinerConfigSchema.default({}),
    timeouts: TimeoutConfigSchema.default({}),
    projections: ProjectionConfigSchema.default({}),
  })
  .transform((cfg) => ({
    ...cfg,
    rateLimit: {
      ...cfg.rateLimit,
      quarantineThreshold: cfg.rateLimit.quarantineThreshold ?? cfg.trust.readOnlyThreshold,
    },
  }));

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

// ---------------------------------------------------------------------------
// Parsing helpers
// ---------------------------------------------------------------------------

/**
 * Parses `raw` with `schema`, throwing InvalidConfigError with one
 * `path: message` entry per issue on failure.
 */
function parseWith<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const messages = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new InvalidConfigError(messages);
  }
  return result.data;
}

export function parseGatewayConfig(raw: unknown): GatewayConfig {
  return parseWith(GatewayConfigSchema, raw);
}

export function parseRateLimitConfig(raw: unknown): RateLimitConfig {
  return parseWith(RateLimitConfigSchema, raw);
}

export function parseTrustConfig(raw: unknown): TrustConfig {
  return parseWith(TrustConfigSchema, raw);
}

export function parseStatisticalConfig(raw: unknown): StatisticalConfig {
  return parseWith(StatisticalConfigSchema, raw);
}

export function parseAdaptiveConfig(raw: unknown): AdaptiveConfig {
  return parseWith(AdaptiveConfigSchema, raw);
}

export function parseCredentialConfig(raw: unknown): CredentialConfig {
  return parseWith(CredentialConfigSchema, raw);
}
