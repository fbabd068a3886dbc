// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { randomUUID } from 'node:crypto';
import type { TrustScoreRecord, TrustState } from '../types.js';
import type { TrustConfig } from '../config.js';
import { parseTrustConfig } from '../config.js';
import type { HistoryStore } from '../storage/adapter.js';
import { KeyedMutex } from '../concurrency/keyed-mutex.js';
import { clampScore, nextScore, tierOf } from './score.js';

/**
 * TrustScoreEngine is the per-device trust state machine.
 *
 * State lives in the history store as an append-only series of
 * TrustScoreRecords; the latest record is the current state.  A device
 * with no record starts at `initialScore` (100, full access).
 *
 * Each reading moves the score by a fixed amount (−15 anomalous, +2 clean),
 * clamped to [0, 100], and the tier is re-derived from the new score.  There
 * is no hysteresis: a device can cross tiers on consecutive readings in
 * either direction.
 *
 * The read-latest-then-append sequence in apply() runs under a per-device
 * lock, so concurrent readings for one device cannot lose an update.
 */
export class TrustScoreEngine {
  readonly #config: TrustConfig;
  readonly #store: HistoryStore;
  readonly #locks = new KeyedMutex();

  constructor(store: HistoryStore, config: unknown = {}) {
    this.#store = store;
    this.#config = parseTrustConfig(config);
  }

  /**
   * Returns the device's current trust state, or the initial state when
   * the device has never been scored.
   */
  async current(deviceId: string): Promise<TrustState> {
    const latest = await this.#store.latestTrustRecord(deviceId);
    if (latest === undefined) {
      const score = clampScore(this.#config.initialScore);
      return { score, accessLevel: tierOf(score, this.#config) };
    }
    return {
      score: latest.score,
      accessLevel: latest.accessLevel,
      computedAt: latest.computedAt,
    };
  }

  /**
   * Applies one transition and appends the resulting record.
   *
   * @param deviceId - The device whose reading was scored.
   * @param anomaly  - Combined anomaly flag for the reading.
   * @param at       - Computation time written on the record.
   * @returns The newly appended TrustScoreRecord.
   */
  async apply(deviceId: string, anomaly: boolean, at: Date = new Date()): Promise<TrustScoreRecord> {
    return this.#locks.runExclusive(deviceId, async () => {
      const { score } = await this.current(deviceId);
      const updated = nextScore(score, anomaly, this.#config);

      const record: TrustScoreRecord = {
        id: randomUUID(),
        deviceId,
        score: updated,
        accessLevel: tierOf(updated, this.#config),
        computedAt: at.toISOString(),
      };

      await this.#store.appendTrustRecord(record);
      return record;
    });
  }
}
