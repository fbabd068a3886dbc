// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { IngestDecision } from '../types.js';

/**
 * Minimal OpenTelemetry Span interface.
 *
 * This avoids a hard dependency on @opentelemetry/api.  Any OTel-compatible
 * tracer that produces spans with these methods can be used.
 */
export interface OTelSpanLike {
  setAttribute(key: string, value: string | number | boolean): this;
  setStatus(status: { code: number; message?: string }): this;
  addEvent(name: string, attributes?: Record<string, string | number | boolean>): this;
  end(): void;
}

/** Minimal OpenTelemetry Tracer interface. */
export interface OTelTracerLike {
  startSpan(name: string, options?: { attributes?: Record<string, string | number | boolean> }): OTelSpanLike;
}

export interface GatewayOTelConfig {
  /** The OTel tracer instance to use for span creation. */
  tracer: OTelTracerLike;
  /** Service name attribute added to all spans. Defaults to "trust-gateway". */
  serviceName?: string;
}

/** OTel span status codes (matching OpenTelemetry SpanStatusCode). */
const SPAN_STATUS_OK = 1;
const SPAN_STATUS_ERROR = 2;

/**
 * GatewayTracer instruments ingest calls with OpenTelemetry spans.
 *
 * Usage:
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const tracer = new GatewayTracer({ tracer: trace.getTracer('trust-gateway') });
 * const decision = await tracer.traceIngest(reading.deviceId, () => gateway.ingest(reading));
 * ```
 */
export class GatewayTracer {
  readonly #tracer: OTelTracerLike;
  readonly #serviceName: string;

  constructor(config: GatewayOTelConfig) {
    this.#tracer = config.tracer;
    this.#serviceName = config.serviceName ?? 'trust-gateway';
  }

  /**
   * Traces one ingest call.  The span records the device, the final status,
   * trust score and access level, plus the detection method for accepted
   * readings or the reason code for rejected ones.  Rejections are not span
   * errors; thrown validation or persistence failures are.
   */
  async traceIngest(
    deviceId: string,
    ingestFn: () => Promise<IngestDecision>,
  ): Promise<IngestDecision> {
    const span = this.#tracer.startSpan('gateway.ingest', {
      attributes: {
        'service.name': this.#serviceName,
        'gateway.device_id': deviceId,
      },
    });

    try {
      const decision = await ingestFn();

      span.setAttribute('gateway.status', decision.status);
      span.setAttribute('gateway.trust_score', decision.trustScore);
      span.setAttribute('gateway.access_level', decision.accessLevel);

      if (decision.status === 'denied' || decision.status === 'rate_limited') {
        span.setAttribute('gateway.reason', decision.reason);
        span.addEvent('gateway.reject', { 'gateway.reason': decision.reason });
      } else {
        span.setAttribute('gateway.anomaly_method', decision.verdict.method);
        span.setAttribute('gateway.anomaly_confidence', decision.verdict.confidence);
        span.addEvent('gateway.accept', { 'gateway.status': decision.status });
      }

      span.setStatus({ code: SPAN_STATUS_OK });
      return decision;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      span.setStatus({ code: SPAN_STATUS_ERROR, message });
      span.addEvent('gateway.error', { 'error.message': message });
      throw error;
    } finally {
      span.end();
    }
  }

  /**
   * Creates a span for an individual step, e.g. a detector run or a store call.
   */
  async traceStep<T>(stepName: string, deviceId: string, executeFn: () => Promise<T>): Promise<T> {
    const span = this.#tracer.startSpan(`gateway.${stepName}`, {
      attributes: {
        'service.name': this.#serviceName,
        'gateway.device_id': deviceId,
        'gateway.step': stepName,
      },
    });

    try {
      const result = await executeFn();
      span.setStatus({ code: SPAN_STATUS_OK });
      return result;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      span.setStatus({ code: SPAN_STATUS_ERROR, message });
      throw error;
    } finally {
      span.end();
    }
  }
}
