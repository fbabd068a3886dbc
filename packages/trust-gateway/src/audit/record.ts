// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { randomUUID } from 'node:crypto';
import type {
  AccessAction,
  AccessLogEntry,
  AlertRecord,
  AlertSeverity,
  AlertType,
} from '../types.js';

/**
 * Creates an AccessLogEntry for one pipeline outcome.
 *
 * Pure apart from id generation: the caller supplies the timestamp so that
 * entries written during one request share its clock.
 */
export function createAccessLogEntry(
  deviceId: string,
  action: AccessAction,
  reason: string,
  trustScore: number,
  at: Date,
): AccessLogEntry {
  return {
    id: randomUUID(),
    deviceId,
    action,
    reason,
    trustScore,
    loggedAt: at.toISOString(),
  };
}

/** Creates an AlertRecord ready for the history store. */
export function createAlert(
  deviceId: string,
  alertType: AlertType,
  message: string,
  severity: AlertSeverity,
  at: Date,
): AlertRecord {
  return {
    id: randomUUID(),
    deviceId,
    alertType,
    message,
    severity,
    createdAt: at.toISOString(),
  };
}
