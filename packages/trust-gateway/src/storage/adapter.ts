// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type {
  AccessLogEntry,
  AlertRecord,
  DeviceRecord,
  NewReading,
  ReadingRecord,
  TrustScoreRecord,
} from '../types.js';

/**
 * HistoryStore defines the persistence contract the gateway consumes.
 *
 * The gateway keeps rate windows, the blocked set and outlier models in
 * memory; everything that forms the audit history (devices, readings, trust
 * records, access log, alerts) goes through this interface.  The default
 * implementation is in-memory (`MemoryHistoryStore`); a database-backed
 * store implements the same interface.
 *
 * Design principles:
 *   1. All methods are async to support network-backed stores.
 *   2. Time series are append-only.  No method updates or deletes a reading,
 *      trust record, log entry or alert.
 *   3. "Recent" and "list" queries return newest first.
 *   4. The store does no locking.  Per-device ordering is the gateway's job.
 */
export interface HistoryStore {
  // -------------------------------------------------------------------------
  // Devices
  // -------------------------------------------------------------------------

  /**
   * Inserts the device unless its id already exists.
   * Returns the stored record and whether it was created by this call.
   */
  upsertDevice(device: DeviceRecord): Promise<{ device: DeviceRecord; created: boolean }>;

  /** Return all registered devices in registration order. */
  listDevices(): Promise<readonly DeviceRecord[]>;

  // -------------------------------------------------------------------------
  // Readings
  // -------------------------------------------------------------------------

  /** Append a reading and return it with its assigned id. */
  appendReading(reading: NewReading): Promise<ReadingRecord>;

  /** Most recent readings for a device, newest first, at most `limit`. */
  recentReadings(deviceId: string, limit: number): Promise<readonly ReadingRecord[]>;

  /** Total number of stored readings across all devices. */
  countReadings(): Promise<number>;

  // -------------------------------------------------------------------------
  // Trust records
  // -------------------------------------------------------------------------

  appendTrustRecord(record: TrustScoreRecord): Promise<void>;

  /** The device's most recent trust record, or undefined if it has none. */
  latestTrustRecord(deviceId: string): Promise<TrustScoreRecord | undefined>;

  /** Trust records for a device, newest first, at most `limit`. */
  trustHistory(deviceId: string, limit: number): Promise<readonly TrustScoreRecord[]>;

  // -------------------------------------------------------------------------
  // Access log and alerts
  // -------------------------------------------------------------------------

  appendAuditLog(entry: AccessLogEntry): Promise<void>;

  /** Access-log entries, newest first, at most `limit`. */
  listAuditLog(limit: number): Promise<readonly AccessLogEntry[]>;

  appendAlert(alert: AlertRecord): Promise<void>;

  /** Alerts, newest first, at most `limit`. */
  listAlerts(limit: number): Promise<readonly AlertRecord[]>;

  countAlerts(): Promise<number>;

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /** Called once when the store is first used. Use for connection setup. */
  connect?(): Promise<void>;

  /** Called by TrustGateway.disconnect(). Use for connection teardown. */
  disconnect?(): Promise<void>;

  /** Health check. Returns true if the backend is reachable. */
  isHealthy?(): Promise<boolean>;
}
