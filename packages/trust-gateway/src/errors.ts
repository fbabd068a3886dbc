// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { AuthFailureReason, RateLimitReason } from './types.js';

/**
 * Base class for all trust gateway errors.
 *
 * Every error includes a machine-readable `code` that calling code can
 * switch on without parsing human-readable messages.
 */
export class GatewayError extends Error {
  /** Machine-readable error code. Always a SCREAMING_SNAKE_CASE string. */
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'GatewayError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when a registration or reading payload is missing fields or carries
 * malformed values.  Raised before the request enters the pipeline.
 */
export class ValidationError extends GatewayError {
  /** One `path: message` entry per failed field. */
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super('VALIDATION_FAILED', `Request is invalid: ${details.join('; ')}`);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Raised inside the pipeline when the presented credential is missing,
 * invalid, expired or bound to a different device.
 *
 * TrustGateway.ingest() converts it into a `denied` decision; it never
 * reaches the caller and never mutates trust state.
 */
export class AuthError extends GatewayError {
  readonly deviceId: string;
  readonly reason: AuthFailureReason;

  constructor(deviceId: string, reason: AuthFailureReason) {
    super('AUTH_FAILED', `Device "${deviceId}" failed authentication: ${reason}.`);
    this.name = 'AuthError';
    this.deviceId = deviceId;
    this.reason = reason;
  }
}

/**
 * Raised inside the pipeline when the rate limiter rejects a reading.
 * TrustGateway.ingest() converts it into a `rate_limited` decision.
 */
export class RateLimitError extends GatewayError {
  readonly deviceId: string;
  readonly reason: RateLimitReason;

  constructor(deviceId: string, reason: RateLimitReason) {
    super('RATE_LIMITED', `Device "${deviceId}" was rate limited: ${reason}.`);
    this.name = 'RateLimitError';
    this.deviceId = deviceId;
    this.reason = reason;
  }
}

/**
 * Thrown when the history store (or another collaborator) fails.
 *
 * `transient` is true when the failure happened before the reading's trust
 * transition was committed, so resubmitting the reading is safe.  Failures
 * while writing the alerts and access-log entry that follow the transition
 * are not transient: resubmitting would apply a second transition.  The
 * pipeline does not retry on its own.
 */
export class PersistenceError extends GatewayError {
  /** The collaborator operation that failed, e.g. "appendReading". */
  readonly operation: string;
  readonly transient: boolean;

  constructor(
    operation: string,
    message: string,
    options: { cause?: unknown; code?: string; transient?: boolean } = {},
  ) {
    super(options.code ?? 'PERSISTENCE_FAILED', message);
    this.name = 'PersistenceError';
    this.operation = operation;
    this.transient = options.transient ?? true;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Thrown when a collaborator call outlives the request deadline.
 */
export class DeadlineExceededError extends PersistenceError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number, options: { transient?: boolean } = {}) {
    super(operation, `Operation "${operation}" exceeded the ${timeoutMs}ms request deadline.`, {
      code: 'DEADLINE_EXCEEDED',
      transient: options.transient,
    });
    this.name = 'DeadlineExceededError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Thrown when gateway configuration is structurally or semantically invalid.
 *
 * The `details` array carries one entry per validation error, matching the
 * format produced by Zod's `ZodError.issues`.
 */
export class InvalidConfigError extends GatewayError {
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super('INVALID_CONFIG', `Gateway configuration is invalid: ${details.join('; ')}`);
    this.name = 'InvalidConfigError';
    this.details = details;
  }
}
