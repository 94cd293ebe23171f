/**
 * Encoding utilities for @cronmarket/runtime
 * Account and job map keys, and script URL checks.
 * @module
 */

import type { PublicKey } from '@solana/web3.js';

/** Scripts are content-addressed IPFS URLs. */
export const SCRIPT_PREFIX = 'ipfs://';

/** `ipfs://` followed by a 46-character CIDv0. */
export const SCRIPT_LENGTH = 53;

/** Length of an execution's operation hash in bytes. */
export const OPERATION_HASH_LENGTH = 32;

/** Map key for an account. */
export function accountKey(account: PublicKey): string {
  return account.toBase58();
}

/**
 * Map key for a job: consumer and script joined by `/`.
 * Base58 never contains `/`, so the key is unambiguous.
 */
export function jobKey(jobId: { consumer: PublicKey; script: string }): string {
  return `${jobId.consumer.toBase58()}/${jobId.script}`;
}

/** Shorten a base58 key for log lines: `7xKX…9fQa`. */
export function shortKey(key: string, chars = 4): string {
  if (key.length <= chars * 2 + 1) return key;
  return `${key.slice(0, chars)}…${key.slice(-chars)}`;
}

/** Whether `script` is an `ipfs://` URL of the expected length. */
export function isValidScript(script: string): boolean {
  return script.length === SCRIPT_LENGTH && script.startsWith(SCRIPT_PREFIX);
}
