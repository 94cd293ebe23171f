/**
 * Source attestation check.
 *
 * Certificate parsing happens elsewhere; the marketplace only needs to know
 * whether a provider currently holds a valid attestation.
 *
 * @module
 */

import type { PublicKey } from '@solana/web3.js';
import { accountKey } from '../utils/encoding.js';

export interface SourceAttestation {
  isSourceVerified(source: PublicKey, now: number): boolean;
}

/** Period during which an attestation is valid, inclusive on both ends. */
export interface AttestationValidity {
  notBefore: number;
  notAfter: number;
}

interface AttestationEntry extends AttestationValidity {
  revoked: boolean;
}

/** Attestations recorded in memory. */
export class InMemoryAttestationRegistry implements SourceAttestation {
  private readonly entries = new Map<string, AttestationEntry>();

  /** Record or replace the attestation of `source`. */
  attest(source: PublicKey, validity: AttestationValidity): void {
    if (validity.notAfter < validity.notBefore) {
      throw new RangeError('Attestation validity ends before it begins');
    }
    this.entries.set(accountKey(source), { ...validity, revoked: false });
  }

  revoke(source: PublicKey): void {
    const entry = this.entries.get(accountKey(source));
    if (entry) {
      this.entries.set(accountKey(source), { ...entry, revoked: true });
    }
  }

  isSourceVerified(source: PublicKey, now: number): boolean {
    const entry = this.entries.get(accountKey(source));
    if (!entry || entry.revoked) return false;
    return now >= entry.notBefore && now <= entry.notAfter;
  }
}
