/**
 * Common test utilities and helpers
 * Reduces duplication across test files
 */

import { expect } from 'chai';
import { OAUTH_REDACTION_PATHS } from '../base-adapter.js';
import { DefaultLogger, LogLevel } from '../logging/logger.js';
import type { OAuthError, OAuthErrorKind } from '../types.js';
import { isOAuthError } from '../utils/error-normalizer.js';
import { MockTransport } from './logTransports.js';

/**
 * Helper for testing OAuth error patterns. Works for sync and async throws.
 * @returns The error, for further assertions
 */
export async function expectOAuthError(
  fn: () => unknown,
  expectedKind: OAuthErrorKind,
  expectedError?: string
): Promise<OAuthError> {
  let thrown: unknown;
  let threw = false;
  try {
    await fn();
  } catch (err) {
    threw = true;
    thrown = err;
  }

  if (!threw) {
    return expect.fail(`Expected ${expectedKind} to be thrown`);
  }
  if (!isOAuthError(thrown)) {
    return expect.fail(`Expected an OAuthError, got ${String(thrown)}`);
  }

  expect(thrown.kind).to.equal(expectedKind);
  if (expectedError !== undefined) {
    expect(thrown.error).to.equal(expectedError);
  }
  return thrown;
}

/**
 * Logger writing every level to a {@link MockTransport}, with the library's
 * redaction paths
 */
export function createTestLogger(): {
  logger: DefaultLogger;
  transport: MockTransport;
} {
  const transport = new MockTransport();
  const logger = new DefaultLogger(
    {},
    { level: LogLevel.Trace, redactPaths: OAUTH_REDACTION_PATHS },
    transport
  );
  return { logger, transport };
}
