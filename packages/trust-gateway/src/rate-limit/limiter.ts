// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { RateLimitReason } from '../types.js';
import type { RateLimitConfig } from '../config.js';
import { parseRateLimitConfig } from '../config.js';
import { KeyedMutex } from '../concurrency/keyed-mutex.js';

/** Quarantine threshold used when the config leaves it out. */
const DEFAULT_QUARANTINE_THRESHOLD = 40;

/** Result of RateLimiter.admit(). */
export type Admission =
  | { readonly admitted: true; readonly requestCount: number }
  | { readonly admitted: false; readonly reason: RateLimitReason; readonly requestCount: number };

/** Details handed to the `onBlock` hook when a device is blocked. */
export interface BlockEvent {
  readonly deviceId: string;
  readonly requestCount: number;
  readonly windowMs: number;
  readonly trustScore: number;
  readonly blockedAt: number;
}

/** Collaborators the limiter needs from its host. */
export interface RateLimiterDeps {
  /** Current trust score of a device; blocking only engages below the threshold. */
  scoreOf(deviceId: string): Promise<number>;
  /**
   * Invoked once, inside the device's critical section, when a device is
   * added to the blocked set.  A rejection propagates out of admit().
   */
  onBlock?(event: BlockEvent): Promise<void> | void;
}

/**
 * RateLimiter is the first gate of the pipeline: a per-device sliding
 * window of request timestamps plus a sticky blocked set.
 *
 * Blocking is trust-gated.  A device is blocked only when it
 * exceeds `maxRequests` inside `windowMs` AND its trust score is already
 * below `quarantineThreshold`; a trusted device may send bursts without
 * being blocked.
 *
 * Blocks never expire and there is no unblock call.  The intended policy
 * for releasing a device is undecided, so none is implemented.
 *
 * Window updates for one device are serialised; devices never wait on each
 * other.
 */
export class RateLimiter {
  readonly #config: RateLimitConfig;
  readonly #quarantineThreshold: number;
  readonly #deps: RateLimiterDeps;
  readonly #windows = new Map<string, number[]>();
  readonly #blocked = new Set<string>();
  readonly #locks = new KeyedMutex();

  constructor(deps: RateLimiterDeps, config: unknown = {}) {
    this.#deps = deps;
    this.#config = parseRateLimitConfig(config);
    this.#quarantineThreshold = this.#config.quarantineThreshold ?? DEFAULT_QUARANTINE_THRESHOLD;
  }

  /**
   * Counts a request from `deviceId` at `nowMs` and decides whether it may
   * proceed.
   *
   * @param deviceId - Device identity asserted by the request.
   * @param nowMs    - Arrival time in epoch milliseconds.
   */
  async admit(deviceId: string, nowMs: number): Promise<Admission> {
    return this.#locks.runExclusive(deviceId, async (): Promise<Admission> => {
      if (this.#blocked.has(deviceId)) {
        return {
          admitted: false,
          reason: 'already_blocked',
          requestCount: this.#windows.get(deviceId)?.length ?? 0,
        };
      }

      const window = this.#prune(deviceId, nowMs);
      window.push(nowMs);

      const requestCount = window.length;
      if (requestCount <= this.#config.maxRequests) {
        return { admitted: true, requestCount };
      }

      const trustScore = await this.#deps.scoreOf(deviceId);
      if (trustScore >= this.#quarantineThreshold) {
        return { admitted: true, requestCount };
      }

      this.#blocked.add(deviceId);
      await this.#deps.onBlock?.({
        deviceId,
        requestCount,
        windowMs: this.#config.windowMs,
        trustScore,
        blockedAt: nowMs,
      });
      return { admitted: false, reason: 'rate_limit_exceeded', requestCount };
    });
  }

  /** True when the device is in the blocked set. */
  isBlocked(deviceId: string): boolean {
    return this.#blocked.has(deviceId);
  }

  /** Snapshot of all blocked device ids. */
  blockedDevices(): readonly string[] {
    return Array.from(this.#blocked);
  }

  /**
   * Number of requests recorded for the device inside the window ending at
   * `nowMs`.  Read-only: does not prune the stored window.
   */
  windowSize(deviceId: string, nowMs: number): number {
    const window = this.#windows.get(deviceId) ?? [];
    return window.filter((t) => nowMs - t < this.#config.windowMs).length;
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  /** Drops timestamps that fell out of the window and returns the live array. */
  #prune(deviceId: string, nowMs: number): number[] {
    const existing = this.#windows.get(deviceId) ?? [];
    const window = existing.filter((t) => nowMs - t < this.#config.windowMs);
    this.#windows.set(deviceId, window);
    return window;
  }
}
