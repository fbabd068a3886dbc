// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Shared type definitions for the trust gateway.
 */

// ---------------------------------------------------------------------------
// Primitive aliases
// ---------------------------------------------------------------------------

/** ISO 8601 timestamp string, e.g. "2026-01-01T00:00:00.000Z". */
export type Timestamp = string;

/** Stable identifier for a telemetry source. */
export type DeviceId = string;

// ---------------------------------------------------------------------------
// Access tiers
// ---------------------------------------------------------------------------

/**
 * Access tier derived from a device's trust score.
 * Values match the labels stored in trust records and access logs.
 */
export enum AccessLevel {
  /** Score at or above the full-access threshold (70). */
  Full = 'full',
  /** Score between the read-only threshold (40) and full access. */
  ReadOnly = 'read_only',
  /** Score below the read-only threshold.  Readings are scored, not trusted. */
  Quarantine = 'quarantine',
}

// ---------------------------------------------------------------------------
// Devices and readings
// ---------------------------------------------------------------------------

/** A registered telemetry source.  Created once, never deleted. */
export interface DeviceRecord {
  readonly deviceId: DeviceId;
  readonly deviceType: string;
  readonly location: string;
  readonly registeredAt: Timestamp;
  readonly active: boolean;
}

/** A reading as handed to the history store for persistence. */
export interface NewReading {
  readonly deviceId: DeviceId;
  readonly value: number;
  readonly unit: string;
  /** Anomaly flag asserted by the sender itself. */
  readonly callerFlaggedAnomaly: boolean;
  readonly receivedAt: Timestamp;
}

/** A persisted, immutable reading. */
export interface ReadingRecord extends NewReading {
  readonly id: string;
}

// ---------------------------------------------------------------------------
// Trust
// ---------------------------------------------------------------------------

/**
 * One point in a device's trust time series.  Records are append-only; the
 * latest one is the device's current trust state.
 */
export interface TrustScoreRecord {
  readonly id: string;
  readonly deviceId: DeviceId;
  readonly score: number;
  readonly accessLevel: AccessLevel;
  readonly computedAt: Timestamp;
}

/** The trust state of a device: its latest record or the initial default. */
export interface TrustState {
  readonly score: number;
  readonly accessLevel: AccessLevel;
  /** Absent when the device has no trust record yet. */
  readonly computedAt?: Timestamp;
}

// ---------------------------------------------------------------------------
// Anomaly detection
// ---------------------------------------------------------------------------

/** Which detection layer(s) flagged a reading. */
export type DetectionMethod = 'none' | 'statistical' | 'adaptive' | 'both';

/** Output of the z-score layer. */
export interface StatisticalResult {
  readonly anomaly: boolean;
  readonly confidence: number;
  /** Human-readable diagnostic, e.g. "insufficient_history". */
  readonly reason: string;
  readonly diagnostics?: {
    readonly zScore: number;
    readonly mean: number;
    readonly stddev: number;
  };
}

/** Output of the learned-model layer. */
export interface AdaptiveResult {
  readonly anomaly: boolean;
  readonly confidence: number;
  /** False while the device's history is below the warm-up size. */
  readonly active: boolean;
  readonly rawScore?: number;
}

/** Combined verdict of both layers for a single reading. */
export interface AnomalyVerdict {
  readonly isAnomaly: boolean;
  readonly confidence: number;
  readonly method: DetectionMethod;
  readonly reason: string;
  readonly trustPenalty: number;
}

// ---------------------------------------------------------------------------
// Audit and alerts
// ---------------------------------------------------------------------------

export type AccessAction = 'allowed' | 'quarantined' | 'denied';

/** One line of the access log. */
export interface AccessLogEntry {
  readonly id: string;
  readonly deviceId: DeviceId;
  readonly action: AccessAction;
  readonly reason: string;
  readonly trustScore: number;
  readonly loggedAt: Timestamp;
}

export type AlertType = 'rate_limit' | 'quarantine' | 'anomaly';
export type AlertSeverity = 'low' | 'medium' | 'high';

/** A persisted security alert. */
export interface AlertRecord {
  readonly id: string;
  readonly deviceId: DeviceId;
  readonly alertType: AlertType;
  readonly message: string;
  readonly severity: AlertSeverity;
  readonly createdAt: Timestamp;
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export type RateLimitReason = 'already_blocked' | 'rate_limit_exceeded';

export type AuthFailureReason =
  | 'missing_credential'
  | 'invalid_credential'
  | 'expired_credential'
  | 'identity_mismatch';

export type IngestStatus = 'allowed' | 'read_only' | 'quarantined' | 'denied' | 'rate_limited';

/** Reading accepted and scored. */
export interface AcceptedDecision {
  readonly status: 'allowed' | 'read_only' | 'quarantined';
  readonly deviceId: DeviceId;
  readonly trustScore: number;
  readonly accessLevel: AccessLevel;
  readonly verdict: AnomalyVerdict;
}

/** Reading turned away before it could affect trust. */
export interface RejectedDecision {
  readonly status: 'denied' | 'rate_limited';
  readonly deviceId: DeviceId;
  readonly trustScore: number;
  readonly accessLevel: AccessLevel;
  readonly reason: RateLimitReason | AuthFailureReason;
}

/** Result of TrustGateway.ingest(). */
export type IngestDecision = AcceptedDecision | RejectedDecision;

/** Result of TrustGateway.register(). */
export interface Registration {
  readonly device: DeviceRecord;
  readonly credential: string;
  /** False when the device id was already registered. */
  readonly created: boolean;
}

/** Device row returned by TrustGateway.listDevices(). */
export interface DeviceOverview {
  readonly deviceId: DeviceId;
  readonly deviceType: string;
  readonly location: string;
  readonly trustScore: number;
  readonly accessLevel: AccessLevel;
  readonly lastSeen?: Timestamp;
}

/** Aggregate counters returned by TrustGateway.summary(). */
export interface GatewaySummary {
  readonly totalDevices: number;
  readonly totalReadings: number;
  readonly totalAlerts: number;
  readonly quarantinedDevices: number;
}
