// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { parseCredentialConfig, parseGatewayConfig } from '../src/config.js';
import { InvalidConfigError } from '../src/errors.js';

describe('parseGatewayConfig', () => {
  it('fills every section with its defaults', () => {
    const config = parseGatewayConfig({});
    expect(config.rateLimit).toEqual({ windowMs: 10_000, maxRequests: 5, quarantineThreshold: 40 });
    expect(config.trust).toEqual({
      initialScore: 100,
      fullAccessThreshold: 70,
      readOnlyThreshold: 40,
      anomalyPenalty: 15,
      normalReward: 2,
    });
    expect(config.statistical).toEqual({ historySize: 100, minHistory: 10, zThreshold: 2.5 });
    expect(config.adaptive).toMatchObject({
      historySize: 200,
      warmupSize: 50,
      retrainInterval: 50,
      contamination: 0.1,
      estimators: 100,
      seed: 42,
    });
    expect(config.combiner).toEqual({ statisticalWeight: 0.4, adaptiveWeight: 0.6, penaltyScale: 20 });
    expect(config.timeouts).toEqual({ requestMs: 5_000 });
    expect(config.projections).toEqual({ alertLimit: 50, auditLimit: 100, trustHistoryLimit: 50 });
  });

  it('keeps overrides and defaults side by side', () => {
    const config = parseGatewayConfig({ rateLimit: { maxRequests: 20 } });
    expect(config.rateLimit).toEqual({ windowMs: 10_000, maxRequests: 20, quarantineThreshold: 40 });
  });

  it('reports each failing path', () => {
    try {
      parseGatewayConfig({ rateLimit: { maxRequests: -1 } });
      expect.unreachable('parseGatewayConfig should have thrown');
    } catch (error: unknown) {
      expect(error).toBeInstanceOf(InvalidConfigError);
      if (error instanceof InvalidConfigError) {
        expect(error.code).toBe('INVALID_CONFIG');
        expect(error.details).toHaveLength(1);
        expect(error.details[0]).toMatch(/^rateLimit\.maxRequests: /);
      }
    }
  });

  it('ties the flood-block threshold to the read-only threshold when omitted', () => {
    const config = parseGatewayConfig({ trust: { readOnlyThreshold: 60 } });
    expect(config.rateLimit.quarantineThreshold).toBe(60);
  });

  it('keeps an explicit flood-block threshold', () => {
    const config = parseGatewayConfig({
      rateLimit: { quarantineThreshold: 30 },
      trust: { readOnlyThreshold: 60 },
    });
    expect(config.rateLimit.quarantineThreshold).toBe(30);
  });

  it('requires the combiner weights to sum to one', () => {
    expect(() => parseGatewayConfig({ combiner: { statisticalWeight: 0.3 } })).toThrow(InvalidConfigError);
  });
});

describe('parseCredentialConfig', () => {
  it('applies the default lifetime and issuer', () => {
    expect(parseCredentialConfig({ secret: 'test-secret-value' })).toEqual({
      secret: 'test-secret-value',
      expirySeconds: 3_600,
      issuer: 'trust-gateway',
    });
  });
});
