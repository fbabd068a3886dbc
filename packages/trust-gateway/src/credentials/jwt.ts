// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { randomUUID } from 'node:crypto';
import { SignJWT, errors, jwtVerify } from 'jose';
import type { CredentialConfig } from '../config.js';
import { parseCredentialConfig } from '../config.js';
import type { CredentialCheck, CredentialService } from './service.js';

const ALGORITHM = 'HS256';

export interface JwtCredentialServiceOptions {
  /** Raw config slice, parsed with CredentialConfigSchema.  `secret` is required. */
  config: unknown;
  /** Clock used for `iat`/`exp` and for expiry checks.  Defaults to the system clock. */
  now?: () => Date;
}

/**
 * HS256 JSON Web Token credentials.
 *
 * The device id travels in the `sub` claim.  Tokens carry `iat`, `exp`
 * (`expirySeconds` after issue) and `iss`; verify() rejects tokens with a
 * bad signature, wrong issuer, missing subject or elapsed expiry.
 */
export class JwtCredentialService implements CredentialService {
  readonly #config: CredentialConfig;
  readonly #key: Uint8Array;
  readonly #now: () => Date;

  constructor(options: JwtCredentialServiceOptions) {
    this.#config = parseCredentialConfig(options.config);
    this.#key = new TextEncoder().encode(this.#config.secret);
    this.#now = options.now ?? (() => new Date());
  }

  async issue(deviceId: string): Promise<string> {
    const issuedAt = Math.floor(this.#now().getTime() / 1000);
    return new SignJWT({})
      .setProtectedHeader({ alg: ALGORITHM })
      .setSubject(deviceId)
      .setIssuer(this.#config.issuer)
      .setIssuedAt(issuedAt)
      .setExpirationTime(issuedAt + this.#config.expirySeconds)
      .setJti(randomUUID())
      .sign(this.#key);
  }

  async verify(token: string): Promise<CredentialCheck> {
    try {
      const { payload } = await jwtVerify(token, this.#key, {
        algorithms: [ALGORITHM],
        issuer: this.#config.issuer,
        currentDate: this.#now(),
      });
      if (typeof payload.sub !== 'string' || payload.sub.length === 0) {
        return { valid: false, reason: 'invalid_credential' };
      }
      return { valid: true, deviceId: payload.sub };
    } catch (error: unknown) {
      if (error instanceof errors.JWTExpired) {
        return { valid: false, reason: 'expired_credential' };
      }
      if (error instanceof errors.JOSEError) {
        return { valid: false, reason: 'invalid_credential' };
      }
      throw error;
    }
  }
}
