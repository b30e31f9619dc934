/**
 * Consolidated test fixtures
 * Simple, focused test data for all test files
 */

import type { OAuthConfigInput } from '../config/oauth-config.js';

// ============================================================================
// CONFIG DATA
// ============================================================================

export const endpoints = {
  authUri: 'https://auth.example.com/oauth/authorize',
  tokenUri: 'https://auth.example.com/oauth/token',
};

export const testConfigs = {
  valid: {
    name: 'example',
    clientId: 'test-client-id',
    clientSecret: 'test-client-secret',
    redirectUri: 'https://app.example.com/callback',
    provider: endpoints,
  } satisfies OAuthConfigInput,

  withoutRedirect: {
    name: 'example',
    clientId: 'test-client-id',
    clientSecret: 'test-client-secret',
    provider: endpoints,
  } satisfies OAuthConfigInput,
};

// ============================================================================
// TOKEN RESPONSE DATA
// ============================================================================

export const tokenData = {
  minimal: { access_token: 'abc', token_type: 'bearer' },

  full: {
    access_token: 'test-access-token',
    token_type: 'Bearer',
    refresh_token: 'test-refresh-token',
    expires_in: 3600,
    scope: 'read write',
  },

  // GitHub-style comma-delimited scopes and string expiry
  loose: {
    access_token: 'test-access-token',
    token_type: 'bearer',
    expires_in: '7200',
    scope: 'repo,user:email',
  },
};

// ============================================================================
// ERROR TEST DATA
// ============================================================================

export const errorData = {
  invalidGrant: {
    error: 'invalid_grant',
    error_description: 'The authorization code has already been used',
  },

  invalidClient: {
    error: 'invalid_client',
    error_description: 'Client authentication failed',
  },

  networkFailure: new TypeError('fetch failed', {
    cause: new Error('connect ECONNREFUSED 127.0.0.1:443'),
  }),
};

// ============================================================================
// MODULE DATA
// ============================================================================

export const moduleData = {
  expectedVersion: '0.1.0',
  expectedExports: [
    'version',
    'OAuth2Flow',
    'OAuthConfig',
    'fromEnvironment',
    'PROVIDER_PRESETS',
    'RandomStateGenerator',
    'InMemoryStateStore',
    'HttpAdapter',
    'FetchTransport',
    'BaseOAuthAdapter',
    'ErrorNormalizer',
    'isOAuthError',
    'DefaultLogger',
    'LogLevel',
  ],
};
