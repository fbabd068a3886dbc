// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/** Outcome of CredentialService.verify(). */
export type CredentialCheck =
  | { readonly valid: true; readonly deviceId: string }
  | { readonly valid: false; readonly reason: 'invalid_credential' | 'expired_credential' };

/**
 * Issues and verifies the bearer credentials devices present on ingest.
 *
 * The gateway only needs the identity a credential is bound to; how that
 * binding is encoded and signed belongs to the implementation.
 */
export interface CredentialService {
  /** Issues a fresh credential bound to `deviceId`. */
  issue(deviceId: string): Promise<string>;
  /** Resolves the bound device id, or why the credential was rejected.  Never throws for bad tokens. */
  verify(token: string): Promise<CredentialCheck>;
}
