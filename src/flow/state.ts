/**
 * CSRF state generation and verification
 */

import { timingSafeEqual } from 'node:crypto';
import * as openidClient from 'openid-client';
import type { CsrfState } from '../types.js';

const { randomState } = openidClient;

export interface StateGenerator {
  /** Produce a fresh, URL-safe state value */
  generate(): CsrfState;
  /** Exact comparison of a stored state against the received one */
  verify(expected: CsrfState, received: string): boolean;
}

/**
 * Draws 32 bytes from the platform CSPRNG, base64url-encoded (43 characters).
 */
export class RandomStateGenerator implements StateGenerator {
  generate(): CsrfState {
    return randomState();
  }

  verify(expected: CsrfState, received: string): boolean {
    if (expected.length === 0) return false;

    const a = Buffer.from(expected, 'utf8');
    const b = Buffer.from(received, 'utf8');
    return a.length === b.length && timingSafeEqual(a, b);
  }
}
