// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type {
  AcceptedDecision,
  AccessAction,
  AccessLogEntry,
  AlertRecord,
  AlertSeverity,
  AlertType,
  AuthFailureReason,
  DeviceOverview,
  GatewaySummary,
  IngestDecision,
  Registration,
  RejectedDecision,
  TrustScoreRecord,
  TrustState,
} from './types.js';
import { AccessLevel } from './types.js';
import type { GatewayConfig } from './config.js';
import { parseGatewayConfig } from './config.js';
import { AuthError, RateLimitError } from './errors.js';
import type { IngestRequest } from './requests.js';
import { parseIngestRequest, parseRegisterRequest } from './requests.js';
import type { HistoryStore } from './storage/adapter.js';
import type { CredentialService } from './credentials/service.js';
import { KeyedMutex } from './concurrency/keyed-mutex.js';
import { callCollaborator, withDeadline } from './concurrency/deadline.js';
import type { CollaboratorCallOptions } from './concurrency/deadline.js';
import { RateLimiter } from './rate-limit/limiter.js';
import type { BlockEvent } from './rate-limit/limiter.js';
import { StatisticalDetector } from './anomaly/statistical.js';
import { AdaptiveDetector } from './anomaly/adaptive.js';
import type { ModelTrainedEvent } from './anomaly/adaptive.js';
import { IsolationForestScorer } from './anomaly/isolation-forest.js';
import type { OutlierScorer } from './anomaly/scorer.js';
import { combineVerdicts } from './anomaly/combiner.js';
import { TrustScoreEngine } from './trust/engine.js';
import { roundScore } from './trust/score.js';
import { createAccessLogEntry, createAlert } from './audit/record.js';
import {
  EVENT_ALERT,
  EVENT_AUDIT_LOGGED,
  EVENT_DECISION,
  EVENT_DEVICE_BLOCKED,
  EVENT_DEVICE_REGISTERED,
  EVENT_MODEL_TRAINED,
  GatewayEventEmitter,
} from './events.js';
import type { GatewayTracer } from './telemetry/otel.js';

/** Writes made after a trust transition is committed must not be resubmitted. */
const AFTER_COMMIT: CollaboratorCallOptions = { transient: false };

/** Access-log reason written for each credential failure. */
const DENIAL_REASONS: Record<AuthFailureReason, string> = {
  missing_credential: 'Missing credential',
  invalid_credential: 'Invalid credential',
  expired_credential: 'Expired credential',
  identity_mismatch: 'Token/device ID mismatch',
};

export interface TrustGatewayOptions {
  store: HistoryStore;
  credentials: CredentialService;
  /** Raw config, parsed with GatewayConfigSchema.  Every section is optional. */
  config?: unknown;
  /** Bus for structured events.  A fresh emitter is created when omitted. */
  events?: GatewayEventEmitter;
  /** When set, every ingest call and pipeline step is recorded as a span. */
  tracer?: GatewayTracer;
  /** Clock for arrival times and record timestamps.  Defaults to the system clock. */
  now?: () => Date;
  /** Backend of the adaptive layer.  Defaults to a seeded isolation forest. */
  outlierScorer?: OutlierScorer<unknown>;
}

/** Result of TrustGateway.status(). */
export interface GatewayStatus {
  readonly status: 'running';
  readonly blockedDevices: readonly string[];
  /** Result of the store's health check; true when the store has none. */
  readonly storeHealthy: boolean;
}

/**
 * TrustGateway composes the rate limiter, credential check, both detection
 * layers, the combiner and the trust engine into one decision pipeline for
 * incoming readings.
 *
 * Evaluation order is fixed:
 *   1. Rate limit: sliding window per device, trust-gated blocking.
 *   2. Credential: must verify and be bound to the asserted device id.
 *   3. Persist: the reading is stored before detection, so the history
 *      the detectors see includes it.
 *   4. Detect: statistical and adaptive layers run concurrently and are
 *      combined into one verdict.
 *   5. Trust: one transition per accepted reading.
 *   6. Record: alerts and an access-log entry for the new tier.
 *
 * A rejection at step 1 or 2 returns a `rate_limited` or `denied` decision
 * and leaves the trust state untouched.  Validation errors are thrown before
 * step 1; collaborator failures surface as PersistenceError.
 *
 * All readings of one device are processed one at a time in arrival order;
 * different devices never wait on each other.
 *
 * The store is connected on first use, once; disconnect() tears it down and
 * the next call connects again.
 *
 * Public API:
 *   connect(): open the store ahead of the first call
 *   disconnect(): close the store
 *   register(): create or look up a device and issue a credential
 *   ingest(): run one reading through the pipeline
 *   listDevices(): devices with their current trust state
 *   listAlerts(): newest alerts
 *   listAuditLog(): newest access-log entries
 *   trustHistory(): a device's trust records, newest first
 *   summary(): aggregate counters
 *   status(): liveness and blocked devices
 *   readonly events: the GatewayEventEmitter instance
 */
export class TrustGateway {
  readonly events: GatewayEventEmitter;

  readonly #config: GatewayConfig;
  readonly #store: HistoryStore;
  readonly #credentials: CredentialService;
  readonly #tracer: GatewayTracer | undefined;
  readonly #now: () => Date;
  readonly #locks = new KeyedMutex();
  readonly #rateLimiter: RateLimiter;
  readonly #statistical: StatisticalDetector;
  readonly #adaptive: AdaptiveDetector<unknown>;
  readonly #trust: TrustScoreEngine;
  #connection: Promise<void> | undefined;

  constructor(options: TrustGatewayOptions) {
    this.#config = parseGatewayConfig(options.config ?? {});
    this.#store = options.store;
    this.#credentials = options.credentials;
    this.#tracer = options.tracer;
    this.#now = options.now ?? (() => new Date());
    this.events = options.events ?? new GatewayEventEmitter();

    this.#trust = new TrustScoreEngine(this.#store, this.#config.trust);
    this.#rateLimiter = new RateLimiter(
      {
        scoreOf: async (deviceId) => (await this.#currentTrust(deviceId)).score,
        onBlock: (event) => this.#recordBlock(event),
      },
      this.#config.rateLimit,
    );
    this.#statistical = new StatisticalDetector(this.#config.statistical);

    const adaptive = this.#config.adaptive;
    this.#adaptive = new AdaptiveDetector<unknown>({
      scorer:
        options.outlierScorer ??
        new IsolationForestScorer({
          estimators: adaptive.estimators,
          maxSamples: adaptive.maxSamples,
          contamination: adaptive.contamination,
          seed: adaptive.seed,
        }),
      config: adaptive,
      onTrained: (event) => this.#announceTraining(event),
    });
  }

  // ---------------------------------------------------------------------------
  // Store lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Connects the history store.  register(), ingest() and the projections
   * call this on their own.  Concurrent callers share one connection
   * attempt; a failed attempt is retried by the next call.
   */
  connect(): Promise<void> {
    if (this.#connection === undefined) {
      this.#connection = this.#openStore();
    }
    return this.#connection;
  }

  /** Disconnects the history store.  A no-op when it was never connected. */
  async disconnect(): Promise<void> {
    const connection = this.#connection;
    if (connection === undefined) return;
    this.#connection = undefined;

    await connection;
    const disconnect = this.#store.disconnect?.bind(this.#store);
    if (disconnect !== undefined) {
      await this.#call('disconnect', disconnect);
    }
  }

  async #openStore(): Promise<void> {
    const connect = this.#store.connect?.bind(this.#store);
    if (connect === undefined) return;
    try {
      await this.#call('connect', connect);
    } catch (error: unknown) {
      this.#connection = undefined;
      throw error;
    }
  }

  // ---------------------------------------------------------------------------
  // Registration
  // ---------------------------------------------------------------------------

  /**
   * Registers a device and issues it a credential.
   *
   * Idempotent on `deviceId`: re-registering keeps the first record (type,
   * location and registration time) and reports `created: false`, but
   * always issues a fresh credential.
   *
   * @throws ValidationError when a field is missing or empty.
   */
  async register(input: unknown): Promise<Registration> {
    const request = parseRegisterRequest(input);
    await this.connect();
    const at = this.#now();

    return this.#locks.runExclusive(request.deviceId, async () => {
      const { device, created } = await this.#call('upsertDevice', () =>
        this.#store.upsertDevice({
          deviceId: request.deviceId,
          deviceType: request.deviceType,
          location: request.location,
          registeredAt: at.toISOString(),
          active: true,
        }),
      );
      const credential = await this.#call('issueCredential', () =>
        this.#credentials.issue(device.deviceId),
      );

      this.events.emit(EVENT_DEVICE_REGISTERED, {
        deviceId: device.deviceId,
        deviceType: device.deviceType,
        location: device.location,
        created,
        timestamp: at.toISOString(),
      });

      return { device, credential, created };
    });
  }

  // ---------------------------------------------------------------------------
  // Core evaluation pipeline
  // ---------------------------------------------------------------------------

  /**
   * Runs one reading through the pipeline and returns the decision.
   *
   * @throws ValidationError   when the payload is malformed.
   * @throws PersistenceError  when a store or credential call fails or
   *                           outlives `timeouts.requestMs`.
   */
  async ingest(input: unknown): Promise<IngestDecision> {
    const request = parseIngestRequest(input);
    await this.connect();
    const run = (): Promise<IngestDecision> =>
      this.#locks.runExclusive(request.deviceId, () => this.#evaluate(request));

    return this.#tracer !== undefined ? this.#tracer.traceIngest(request.deviceId, run) : run();
  }

  async #evaluate(request: IngestRequest): Promise<IngestDecision> {
    const at = this.#now();
    const { deviceId } = request;

    try {
      // ------------------------------------------------------------------
      // Step 1: Rate limit
      // ------------------------------------------------------------------
      const admission = await this.#step('rate_limit', deviceId, () =>
        this.#rateLimiter.admit(deviceId, at.getTime()),
      );
      if (!admission.admitted) {
        throw new RateLimitError(deviceId, admission.reason);
      }

      // ------------------------------------------------------------------
      // Step 2: Credential
      // ------------------------------------------------------------------
      await this.#step('authenticate', deviceId, () => this.#authenticate(request));
    } catch (error: unknown) {
      if (error instanceof RateLimitError) {
        return this.#rejectRateLimited(error, at);
      }
      if (error instanceof AuthError) {
        return this.#rejectDenied(error, at);
      }
      throw error;
    }

    // ------------------------------------------------------------------
    // Step 3: Persist the reading
    // ------------------------------------------------------------------
    await this.#call('appendReading', () =>
      this.#store.appendReading({
        deviceId,
        value: request.value,
        unit: request.unit,
        callerFlaggedAnomaly: request.isAnomaly,
        receivedAt: at.toISOString(),
      }),
    );

    // ------------------------------------------------------------------
    // Step 4: Detect
    // ------------------------------------------------------------------
    const verdict = await this.#step('detect', deviceId, async () => {
      const limit = Math.max(this.#statistical.historySize, this.#adaptive.historySize);
      const recent = await this.#call('recentReadings', () =>
        this.#store.recentReadings(deviceId, limit),
      );
      const history = recent.map((reading) => reading.value);

      const [statistical, adaptive] = await Promise.all([
        this.#statistical.check(request.value, history),
        withDeadline('adaptiveCheck', this.#config.timeouts.requestMs, () =>
          this.#adaptive.check(deviceId, request.value, history),
        ),
      ]);
      return combineVerdicts(statistical, adaptive, this.#config.combiner);
    });

    // ------------------------------------------------------------------
    // Step 5: Trust transition
    // ------------------------------------------------------------------
    const finalAnomaly = request.isAnomaly || verdict.isAnomaly;
    const record = await this.#step('trust', deviceId, () =>
      this.#call('applyTrust', () => this.#trust.apply(deviceId, finalAnomaly, at)),
    );

    // ------------------------------------------------------------------
    // Step 6: Alerts and access log for the new tier
    // ------------------------------------------------------------------
    const decision = await this.#recordOutcome(request, record, finalAnomaly, at);
    const accepted: AcceptedDecision = { ...decision, verdict };

    this.events.emit(EVENT_DECISION, {
      deviceId,
      status: accepted.status,
      trustScore: accepted.trustScore,
      accessLevel: accepted.accessLevel,
      method: verdict.method,
      confidence: verdict.confidence,
      timestamp: at.toISOString(),
    });
    return accepted;
  }

  // ---------------------------------------------------------------------------
  // Read-only projections
  // ---------------------------------------------------------------------------

  /**
   * Every registered device with its current trust state and the arrival
   * time of its latest reading.  Devices never scored report the initial
   * score and tier.
   */
  async listDevices(): Promise<readonly DeviceOverview[]> {
    await this.connect();
    const devices = await this.#call('listDevices', () => this.#store.listDevices());

    return Promise.all(
      devices.map(async (device): Promise<DeviceOverview> => {
        const [trust, latest] = await Promise.all([
          this.#currentTrust(device.deviceId),
          this.#call('recentReadings', () => this.#store.recentReadings(device.deviceId, 1)),
        ]);
        const lastSeen = latest[0]?.receivedAt;
        return {
          deviceId: device.deviceId,
          deviceType: device.deviceType,
          location: device.location,
          trustScore: roundScore(trust.score),
          accessLevel: trust.accessLevel,
          ...(lastSeen !== undefined && { lastSeen }),
        };
      }),
    );
  }

  /** Newest alerts first. */
  async listAlerts(limit: number = this.#config.projections.alertLimit): Promise<readonly AlertRecord[]> {
    await this.connect();
    return this.#call('listAlerts', () => this.#store.listAlerts(limit));
  }

  /** Newest access-log entries first. */
  async listAuditLog(
    limit: number = this.#config.projections.auditLimit,
  ): Promise<readonly AccessLogEntry[]> {
    await this.connect();
    return this.#call('listAuditLog', () => this.#store.listAuditLog(limit));
  }

  /** The device's trust records, newest first. */
  async trustHistory(
    deviceId: string,
    limit: number = this.#config.projections.trustHistoryLimit,
  ): Promise<readonly TrustScoreRecord[]> {
    await this.connect();
    return this.#call('trustHistory', () => this.#store.trustHistory(deviceId, limit));
  }

  /** Aggregate counters over all devices. */
  async summary(): Promise<GatewaySummary> {
    await this.connect();
    const [devices, totalReadings, totalAlerts] = await Promise.all([
      this.#call('listDevices', () => this.#store.listDevices()),
      this.#call('countReadings', () => this.#store.countReadings()),
      this.#call('countAlerts', () => this.#store.countAlerts()),
    ]);

    const states = await Promise.all(devices.map((device) => this.#currentTrust(device.deviceId)));
    const quarantinedDevices = states.filter(
      (state) => state.accessLevel === AccessLevel.Quarantine,
    ).length;

    return { totalDevices: devices.length, totalReadings, totalAlerts, quarantinedDevices };
  }

  /** Liveness, the blocked set and the store's health. */
  async status(): Promise<GatewayStatus> {
    const healthCheck = this.#store.isHealthy?.bind(this.#store);
    const storeHealthy =
      healthCheck !== undefined ? await this.#call('isHealthy', healthCheck) : true;

    return {
      status: 'running',
      blockedDevices: this.#rateLimiter.blockedDevices(),
      storeHealthy,
    };
  }

  // ---------------------------------------------------------------------------
  // Private helpers: pipeline steps
  // ---------------------------------------------------------------------------

  async #authenticate(request: IngestRequest): Promise<void> {
    const { deviceId, credential } = request;
    if (credential === undefined || credential.length === 0) {
      throw new AuthError(deviceId, 'missing_credential');
    }

    const check = await this.#call('verifyCredential', () => this.#credentials.verify(credential));
    if (!check.valid) {
      throw new AuthError(deviceId, check.reason);
    }
    if (check.deviceId !== deviceId) {
      throw new AuthError(deviceId, 'identity_mismatch');
    }
  }

  async #rejectRateLimited(error: RateLimitError, at: Date): Promise<RejectedDecision> {
    const trust = await this.#currentTrust(error.deviceId);
    const decision: RejectedDecision = {
      status: 'rate_limited',
      deviceId: error.deviceId,
      trustScore: roundScore(trust.score),
      accessLevel: trust.accessLevel,
      reason: error.reason,
    };
    this.#emitRejection(decision, at);
    return decision;
  }

  async #rejectDenied(error: AuthError, at: Date): Promise<RejectedDecision> {
    await this.#log(error.deviceId, 'denied', DENIAL_REASONS[error.reason], 0, at);
    const decision: RejectedDecision = {
      status: 'denied',
      deviceId: error.deviceId,
      trustScore: 0,
      accessLevel: AccessLevel.Quarantine,
      reason: error.reason,
    };
    this.#emitRejection(decision, at);
    return decision;
  }

  #emitRejection(decision: RejectedDecision, at: Date): void {
    this.events.emit(EVENT_DECISION, {
      deviceId: decision.deviceId,
      status: decision.status,
      trustScore: decision.trustScore,
      accessLevel: decision.accessLevel,
      reason: decision.reason,
      timestamp: at.toISOString(),
    });
  }

  /**
   * Writes the alerts and access-log entry for the tier the reading left the
   * device in, and returns the decision without its verdict.
   */
  async #recordOutcome(
    request: IngestRequest,
    record: TrustScoreRecord,
    anomaly: boolean,
    at: Date,
  ): Promise<Omit<AcceptedDecision, 'verdict'>> {
    const { deviceId } = request;
    const score = roundScore(record.score);
    const shown = score.toFixed(1);
    const anomalyMessage = `Anomalous reading from ${deviceId}: ${request.value}${request.unit}`;

    switch (record.accessLevel) {
      case AccessLevel.Quarantine:
        await this.#alert(
          deviceId,
          'quarantine',
          `${deviceId} quarantined. Trust score: ${shown}`,
          'high',
          at,
          AFTER_COMMIT,
        );
        await this.#log(deviceId, 'quarantined', `Trust score: ${shown}`, score, at, AFTER_COMMIT);
        return { status: 'quarantined', deviceId, trustScore: score, accessLevel: record.accessLevel };

      case AccessLevel.ReadOnly:
        if (anomaly) {
          await this.#alert(deviceId, 'anomaly', anomalyMessage, 'medium', at, AFTER_COMMIT);
        }
        await this.#log(deviceId, 'allowed', `Read-only. Trust: ${shown}`, score, at, AFTER_COMMIT);
        return { status: 'read_only', deviceId, trustScore: score, accessLevel: record.accessLevel };

      case AccessLevel.Full:
        if (anomaly) {
          await this.#alert(deviceId, 'anomaly', anomalyMessage, 'low', at, AFTER_COMMIT);
        }
        await this.#log(deviceId, 'allowed', `Full access. Trust: ${shown}`, score, at, AFTER_COMMIT);
        return { status: 'allowed', deviceId, trustScore: score, accessLevel: record.accessLevel };
    }
  }

  // ---------------------------------------------------------------------------
  // Private helpers: hooks
  // ---------------------------------------------------------------------------

  async #recordBlock(event: BlockEvent): Promise<void> {
    const at = new Date(event.blockedAt);
    const windowSeconds = event.windowMs / 1000;
    await this.#alert(
      event.deviceId,
      'rate_limit',
      `${event.deviceId} blocked for flooding. ${event.requestCount} requests in ${windowSeconds}s`,
      'high',
      at,
    );
    this.events.emit(EVENT_DEVICE_BLOCKED, {
      deviceId: event.deviceId,
      requestCount: event.requestCount,
      windowMs: event.windowMs,
      trustScore: roundScore(event.trustScore),
      timestamp: at.toISOString(),
    });
  }

  #announceTraining(event: ModelTrainedEvent): void {
    this.events.emit(EVENT_MODEL_TRAINED, {
      deviceId: event.deviceId,
      sampleCount: event.sampleCount,
      retrain: event.retrain,
      timestamp: this.#now().toISOString(),
    });
  }

  // ---------------------------------------------------------------------------
  // Private helpers: persistence
  // ---------------------------------------------------------------------------

  async #alert(
    deviceId: string,
    alertType: AlertType,
    message: string,
    severity: AlertSeverity,
    at: Date,
    callOptions: CollaboratorCallOptions = {},
  ): Promise<void> {
    const alert = createAlert(deviceId, alertType, message, severity, at);
    await this.#call('appendAlert', () => this.#store.appendAlert(alert), callOptions);
    this.events.emit(EVENT_ALERT, alert);
  }

  async #log(
    deviceId: string,
    action: AccessAction,
    reason: string,
    trustScore: number,
    at: Date,
    callOptions: CollaboratorCallOptions = {},
  ): Promise<void> {
    const entry = createAccessLogEntry(deviceId, action, reason, trustScore, at);
    await this.#call('appendAuditLog', () => this.#store.appendAuditLog(entry), callOptions);
    this.events.emit(EVENT_AUDIT_LOGGED, entry);
  }

  #currentTrust(deviceId: string): Promise<TrustState> {
    return this.#call('latestTrustRecord', () => this.#trust.current(deviceId));
  }

  #call<T>(
    operation: string,
    work: () => Promise<T>,
    options: CollaboratorCallOptions = {},
  ): Promise<T> {
    return callCollaborator(operation, this.#config.timeouts.requestMs, work, options);
  }

  #step<T>(name: string, deviceId: string, work: () => Promise<T>): Promise<T> {
    return this.#tracer !== undefined ? this.#tracer.traceStep(name, deviceId, work) : work();
  }
}
