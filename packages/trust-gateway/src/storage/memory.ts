// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { randomUUID } from 'node:crypto';
import type {
  AccessLogEntry,
  AlertRecord,
  DeviceRecord,
  NewReading,
  ReadingRecord,
  TrustScoreRecord,
} from '../types.js';
import type { HistoryStore } from './adapter.js';

/** Returns the last `limit` items of `items`, newest (last) first. */
function newestFirst<T>(items: readonly T[], limit: number): T[] {
  if (limit <= 0) return [];
  return items.slice(-limit).reverse();
}

/**
 * In-memory implementation of HistoryStore.
 *
 * The default backend.  All data is lost when the process exits.  Suitable
 * for development, testing, and single-process deployments where the
 * history only feeds live views.
 */
export class MemoryHistoryStore implements HistoryStore {
  readonly #devices = new Map<string, DeviceRecord>();
  readonly #readings = new Map<string, ReadingRecord[]>();
  readonly #trustRecords = new Map<string, TrustScoreRecord[]>();
  readonly #auditLog: AccessLogEntry[] = [];
  readonly #alerts: AlertRecord[] = [];
  #readingCount = 0;

  // -------------------------------------------------------------------------
  // Devices
  // -------------------------------------------------------------------------

  async upsertDevice(device: DeviceRecord): Promise<{ device: DeviceRecord; created: boolean }> {
    const existing = this.#devices.get(device.deviceId);
    if (existing !== undefined) {
      return { device: existing, created: false };
    }
    this.#devices.set(device.deviceId, device);
    return { device, created: true };
  }

  async listDevices(): Promise<readonly DeviceRecord[]> {
    return Array.from(this.#devices.values());
  }

  // -------------------------------------------------------------------------
  // Readings
  // -------------------------------------------------------------------------

  async appendReading(reading: NewReading): Promise<ReadingRecord> {
    const record: ReadingRecord = { ...reading, id: randomUUID() };
    const existing = this.#readings.get(reading.deviceId);
    if (existing !== undefined) {
      existing.push(record);
    } else {
      this.#readings.set(reading.deviceId, [record]);
    }
    this.#readingCount++;
    return record;
  }

  async recentReadings(deviceId: string, limit: number): Promise<readonly ReadingRecord[]> {
    return newestFirst(this.#readings.get(deviceId) ?? [], limit);
  }

  async countReadings(): Promise<number> {
    return this.#readingCount;
  }

  // -------------------------------------------------------------------------
  // Trust records
  // -------------------------------------------------------------------------

  async appendTrustRecord(record: TrustScoreRecord): Promise<void> {
    const existing = this.#trustRecords.get(record.deviceId);
    if (existing !== undefined) {
      existing.push(record);
    } else {
      this.#trustRecords.set(record.deviceId, [record]);
    }
  }

  async latestTrustRecord(deviceId: string): Promise<TrustScoreRecord | undefined> {
    const records = this.#trustRecords.get(deviceId);
    return records?.[records.length - 1];
  }

  async trustHistory(deviceId: string, limit: number): Promise<readonly TrustScoreRecord[]> {
    return newestFirst(this.#trustRecords.get(deviceId) ?? [], limit);
  }

  // -------------------------------------------------------------------------
  // Access log and alerts
  // -------------------------------------------------------------------------

  async appendAuditLog(entry: AccessLogEntry): Promise<void> {
    this.#auditLog.push(entry);
  }

  async listAuditLog(limit: number): Promise<readonly AccessLogEntry[]> {
    return newestFirst(this.#auditLog, limit);
  }

  async appendAlert(alert: AlertRecord): Promise<void> {
    this.#alerts.push(alert);
  }

  async listAlerts(limit: number): Promise<readonly AlertRecord[]> {
    return newestFirst(this.#alerts, limit);
  }

  async countAlerts(): Promise<number> {
    return this.#alerts.length;
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async connect(): Promise<void> {
    // No-op for in-memory storage.
  }

  async disconnect(): Promise<void> {
    // No-op for in-memory storage.
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }
}
