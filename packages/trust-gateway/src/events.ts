// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { AccessLevel, AccessLogEntry, AlertRecord, DetectionMethod, IngestStatus } from './types.js';

/**
 * Gateway Event Emitter
 *
 * `GatewayEventEmitter` is a typed publish-subscribe bus for the gateway's
 * structured events.  Decisions, alerts and access-log entries are
 * published here after they have been committed to the history store.
 *
 * Usage:
 * ```ts
 * const gateway = new TrustGateway({ store, credentials });
 *
 * gateway.events.on(EVENT_ALERT, (alert) => {
 *   shipToSiem(alert.severity, alert.message);
 * });
 * ```
 */

// ---------------------------------------------------------------------------
// Event type constants
// ---------------------------------------------------------------------------

/** Emitted after every ingest outcome, accepted or rejected. */
export const EVENT_DECISION = 'gateway:decision' as const;

/** Emitted after an alert has been persisted. */
export const EVENT_ALERT = 'gateway:alert' as const;

/** Emitted after an access-log entry has been persisted. */
export const EVENT_AUDIT_LOGGED = 'gateway:audit:logged' as const;

/** Emitted after register(), for new and already-known devices alike. */
export const EVENT_DEVICE_REGISTERED = 'gateway:device:registered' as const;

/** Emitted when the rate limiter adds a device to the blocked set. */
export const EVENT_DEVICE_BLOCKED = 'gateway:device:blocked' as const;

/** Emitted after a device's outlier model has been (re)trained. */
export const EVENT_MODEL_TRAINED = 'gateway:model:trained' as const;

/** Union of all supported event name constants. */
export type GatewayEventName =
  | typeof EVENT_DECISION
  | typeof EVENT_ALERT
  | typeof EVENT_AUDIT_LOGGED
  | typeof EVENT_DEVICE_REGISTERED
  | typeof EVENT_DEVICE_BLOCKED
  | typeof EVENT_MODEL_TRAINED;

// ---------------------------------------------------------------------------
// Event payload interfaces
// ---------------------------------------------------------------------------

export interface DecisionEventPayload {
  readonly deviceId: string;
  readonly status: IngestStatus;
  readonly trustScore: number;
  readonly accessLevel: AccessLevel;
  /** Rejection reason code; absent for accepted readings. */
  readonly reason?: string;
  /** Detection layers that fired; absent for rejected readings. */
  readonly method?: DetectionMethod;
  readonly confidence?: number;
  readonly timestamp: string;
}

export interface DeviceRegisteredEventPayload {
  readonly deviceId: string;
  readonly deviceType: string;
  readonly location: string;
  /** False when the id was already registered. */
  readonly created: boolean;
  readonly timestamp: string;
}

export interface DeviceBlockedEventPayload {
  readonly deviceId: string;
  readonly requestCount: number;
  readonly windowMs: number;
  readonly trustScore: number;
  readonly timestamp: string;
}

export interface ModelTrainedEventPayload {
  readonly deviceId: string;
  readonly sampleCount: number;
  readonly retrain: boolean;
  readonly timestamp: string;
}

// ---------------------------------------------------------------------------
// Event payload map: links event names to their payload types
// ---------------------------------------------------------------------------

export interface GatewayEventPayloadMap {
  [EVENT_DECISION]: DecisionEventPayload;
  [EVENT_ALERT]: AlertRecord;
  [EVENT_AUDIT_LOGGED]: AccessLogEntry;
  [EVENT_DEVICE_REGISTERED]: DeviceRegisteredEventPayload;
  [EVENT_DEVICE_BLOCKED]: DeviceBlockedEventPayload;
  [EVENT_MODEL_TRAINED]: ModelTrainedEventPayload;
}

/**
 * Typed event listener for a specific gateway event.
 *
 * @template E - The event name; constrains the payload type automatically.
 */
export type GatewayEventListener<E extends GatewayEventName> = (
  payload: GatewayEventPayloadMap[E],
) => void;

/** Receives errors thrown by listeners. */
export type ListenerErrorHandler = (error: unknown, event: GatewayEventName) => void;

function warnListenerError(error: unknown, event: GatewayEventName): void {
  const message = error instanceof Error ? error.message : String(error);
  process.emitWarning(`Listener for "${event}" threw: ${message}`, 'GatewayListenerWarning');
}

// ---------------------------------------------------------------------------
// GatewayEventEmitter
// ---------------------------------------------------------------------------

/**
 * Typed publish-subscribe event emitter for gateway events.
 *
 * Supports multiple listeners per event, ordered registration, and
 * once-only listeners.  All operations are synchronous.
 *
 * A listener that throws does not stop the other listeners and never
 * propagates out of emit(): the error goes to `onListenerError`, by default
 * a process warning.
 */
export class GatewayEventEmitter {
  readonly #listeners: Map<
    GatewayEventName,
    Array<{ listener: (payload: unknown) => void; once: boolean }>
  > = new Map();
  readonly #onListenerError: ListenerErrorHandler;

  constructor(options: { onListenerError?: ListenerErrorHandler } = {}) {
    this.#onListenerError = options.onListenerError ?? warnListenerError;
  }

  // -------------------------------------------------------------------------
  // Public API
  // -------------------------------------------------------------------------

  /**
   * Registers a persistent listener for the specified event.
   *
   * @returns `this` for fluent chaining.
   */
  on<E extends GatewayEventName>(event: E, listener: GatewayEventListener<E>): this {
    this.#addListener(event, listener as (payload: unknown) => void, false);
    return this;
  }

  /**
   * Registers a one-shot listener, removed after its first invocation.
   *
   * @returns `this` for fluent chaining.
   */
  once<E extends GatewayEventName>(event: E, listener: GatewayEventListener<E>): this {
    this.#addListener(event, listener as (payload: unknown) => void, true);
    return this;
  }

  /**
   * Removes a previously registered listener.  If the listener was
   * registered multiple times, only the first matching entry is removed.
   *
   * @returns `this` for fluent chaining.
   */
  off<E extends GatewayEventName>(event: E, listener: GatewayEventListener<E>): this {
    const entries = this.#listeners.get(event);
    if (entries === undefined) return this;

    const index = entries.findIndex(
      (entry) => entry.listener === (listener as (payload: unknown) => void),
    );
    if (index !== -1) {
      entries.splice(index, 1);
    }
    if (entries.length === 0) {
      this.#listeners.delete(event);
    }
    return this;
  }

  /**
   * Emits an event, invoking all registered listeners synchronously in the
   * order they were registered.
   *
   * One-shot listeners are removed before invocation to prevent re-entrant
   * double-fire if the listener itself emits the same event.
   *
   * @returns `true` if at least one listener was invoked; `false` otherwise.
   */
  emit<E extends GatewayEventName>(event: E, payload: GatewayEventPayloadMap[E]): boolean {
    const entries = this.#listeners.get(event);
    if (entries === undefined || entries.length === 0) return false;

    const snapshot = [...entries];

    const remaining = entries.filter((entry) => !entry.once);
    if (remaining.length !== entries.length) {
      if (remaining.length === 0) {
        this.#listeners.delete(event);
      } else {
        this.#listeners.set(event, remaining);
      }
    }

    for (const { listener } of snapshot) {
      try {
        listener(payload);
      } catch (error: unknown) {
        this.#onListenerError(error, event);
      }
    }

    return true;
  }

  /**
   * Removes all listeners for the specified event, or for all events if no
   * event is specified.
   */
  removeAllListeners(event?: GatewayEventName): this {
    if (event !== undefined) {
      this.#listeners.delete(event);
    } else {
      this.#listeners.clear();
    }
    return this;
  }

  /** Number of listeners currently registered for the event. */
  listenerCount(event: GatewayEventName): number {
    return this.#listeners.get(event)?.length ?? 0;
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  #addListener(
    event: GatewayEventName,
    listener: (payload: unknown) => void,
    once: boolean,
  ): void {
    const existing = this.#listeners.get(event);
    if (existing !== undefined) {
      existing.push({ listener, once });
    } else {
      this.#listeners.set(event, [{ listener, once }]);
    }
  }
}
