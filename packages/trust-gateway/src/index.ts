// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * @trustgate/gateway: adaptive trust gateway for IoT telemetry.
 *
 * Public API surface:
 *
 * Gateway
 *   TrustGateway: rate limit, authenticate, detect, score and record readings
 *
 * Components (usable standalone or via TrustGateway)
 *   RateLimiter: sliding-window flood control with trust-gated blocking
 *   StatisticalDetector: z-score outlier check against recent history
 *   AdaptiveDetector: per-device learned outlier model
 *   IsolationForestScorer: default backend of the adaptive layer
 *   combineVerdicts: merge both layers into one AnomalyVerdict
 *   TrustScoreEngine: per-device trust state machine
 *
 * Collaborators
 *   HistoryStore, MemoryHistoryStore
 *   CredentialService, JwtCredentialService
 *
 * Config (Zod schemas + parsed types)
 *   GatewayConfig and one schema per section
 *
 * Errors
 *   GatewayError, ValidationError, AuthError, RateLimitError,
 *   PersistenceError, DeadlineExceededError, InvalidConfigError
 *
 * Events and tracing
 *   GatewayEventEmitter, EVENT_* constants
 *   GatewayTracer
 */

// ---------------------------------------------------------------------------
// Gateway
// ---------------------------------------------------------------------------
export { TrustGateway } from './gateway.js';
export type { TrustGatewayOptions, GatewayStatus } from './gateway.js';
export {
  RegisterRequestSchema,
  IngestRequestSchema,
  parseRegisterRequest,
  parseIngestRequest,
} from './requests.js';
export type { RegisterRequest, IngestRequest, IngestRequestInput } from './requests.js';

// ---------------------------------------------------------------------------
// Rate limiting
// ---------------------------------------------------------------------------
export { RateLimiter } from './rate-limit/index.js';
export type { Admission, BlockEvent, RateLimiterDeps } from './rate-limit/index.js';

// ---------------------------------------------------------------------------
// Anomaly detection
// ---------------------------------------------------------------------------
export {
  StatisticalDetector,
  AdaptiveDetector,
  IsolationForestScorer,
  averagePathLength,
  combineVerdicts,
  DEFAULT_COMBINER_WEIGHTS,
  mulberry32,
} from './anomaly/index.js';
export type {
  AdaptiveDetectorOptions,
  ModelTrainedEvent,
  IsolationForestModel,
  IsolationForestOptions,
  OutlierScorer,
  OutlierScore,
  CombinerWeights,
  RandomSource,
} from './anomaly/index.js';

// ---------------------------------------------------------------------------
// Trust
// ---------------------------------------------------------------------------
export {
  TrustScoreEngine,
  clampScore,
  tierOf,
  nextScore,
  roundScore,
  SCORE_MIN,
  SCORE_MAX,
  DEFAULT_TIER_THRESHOLDS,
  DEFAULT_SCORE_DELTAS,
} from './trust/index.js';
export type { TierThresholds, ScoreDeltas } from './trust/index.js';

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------
export { MemoryHistoryStore } from './storage/index.js';
export type { HistoryStore } from './storage/index.js';
export { JwtCredentialService } from './credentials/index.js';
export type {
  CredentialService,
  CredentialCheck,
  JwtCredentialServiceOptions,
} from './credentials/index.js';

// ---------------------------------------------------------------------------
// Audit records and concurrency helpers
// ---------------------------------------------------------------------------
export { createAccessLogEntry, createAlert } from './audit/index.js';
export { KeyedMutex, withDeadline, callCollaborator } from './concurrency/index.js';
export type { CollaboratorCallOptions } from './concurrency/index.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------
export { AccessLevel } from './types.js';
export type {
  Timestamp,
  DeviceId,
  DeviceRecord,
  NewReading,
  ReadingRecord,
  TrustScoreRecord,
  TrustState,
  DetectionMethod,
  StatisticalResult,
  AdaptiveResult,
  AnomalyVerdict,
  AccessAction,
  AccessLogEntry,
  AlertType,
  AlertSeverity,
  AlertRecord,
  RateLimitReason,
  AuthFailureReason,
  IngestStatus,
  AcceptedDecision,
  RejectedDecision,
  IngestDecision,
  Registration,
  DeviceOverview,
  GatewaySummary,
} from './types.js';

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------
export {
  GatewayConfigSchema,
  RateLimitConfigSchema,
  TrustConfigSchema,
  StatisticalConfigSchema,
  AdaptiveConfigSchema,
  CombinerConfigSchema,
  TimeoutConfigSchema,
  ProjectionConfigSchema,
  CredentialConfigSchema,
  parseGatewayConfig,
  parseRateLimitConfig,
  parseTrustConfig,
  parseStatisticalConfig,
  parseAdaptiveConfig,
  parseCredentialConfig,
} from './config.js';
export type {
  GatewayConfig,
  RateLimitConfig,
  TrustConfig,
  StatisticalConfig,
  AdaptiveConfig,
  CombinerConfig,
  TimeoutConfig,
  ProjectionConfig,
  CredentialConfig,
} from './config.js';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------
export {
  GatewayError,
  ValidationError,
  AuthError,
  RateLimitError,
  PersistenceError,
  DeadlineExceededError,
  InvalidConfigError,
} from './errors.js';

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------
export {
  GatewayEventEmitter,
  EVENT_DECISION,
  EVENT_ALERT,
  EVENT_AUDIT_LOGGED,
  EVENT_DEVICE_REGISTERED,
  EVENT_DEVICE_BLOCKED,
  EVENT_MODEL_TRAINED,
} from './events.js';
export type {
  GatewayEventName,
  GatewayEventPayloadMap,
  GatewayEventListener,
  ListenerErrorHandler,
  DecisionEventPayload,
  DeviceRegisteredEventPayload,
  DeviceBlockedEventPayload,
  ModelTrainedEventPayload,
} from './events.js';

// ---------------------------------------------------------------------------
// Telemetry
// ---------------------------------------------------------------------------
export { GatewayTracer } from './telemetry/index.js';
export type { OTelSpanLike, OTelTracerLike, GatewayOTelConfig } from './telemetry/index.js';
