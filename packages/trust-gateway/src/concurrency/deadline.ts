// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { DeadlineExceededError, GatewayError, PersistenceError } from '../errors.js';

export interface CollaboratorCallOptions {
  /** Marks the resulting PersistenceError as safe to retry.  Defaults to true. */
  transient?: boolean;
}

/**
 * Awaits `work`, rejecting with DeadlineExceededError if it has not settled
 * within `timeoutMs`.  The timer is always cleared so nothing is left
 * running once the race is decided.
 */
export async function withDeadline<T>(
  operation: string,
  timeoutMs: number,
  work: () => Promise<T>,
  options: CollaboratorCallOptions = {},
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new DeadlineExceededError(operation, timeoutMs, options)),
      timeoutMs,
    );
  });

  try {
    return await Promise.race([work(), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs a history-store call under the request deadline and maps any
 * failure that is not already a GatewayError to a PersistenceError.
 */
export async function callCollaborator<T>(
  operation: string,
  timeoutMs: number,
  work: () => Promise<T>,
  options: CollaboratorCallOptions = {},
): Promise<T> {
  try {
    return await withDeadline(operation, timeoutMs, work, options);
  } catch (error: unknown) {
    if (error instanceof GatewayError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new PersistenceError(operation, `Operation "${operation}" failed: ${message}`, {
      cause: error,
      transient: options.transient,
    });
  }
}
