/**
 * Test adapters for the BaseOAuthAdapter class and the flow engine
 */

import { BaseOAuthAdapter, type Adapter } from '../base-adapter.js';
import type { OAuthConfig } from '../config/oauth-config.js';
import type {
  AuthorizationParam,
  CsrfState,
  ExchangeOptions,
  OAuthError,
  OAuthErrorKind,
  TokenRequest,
  TokenResponse,
} from '../types.js';
import type { ErrorContext } from '../utils/error-normalizer.js';

export const defaultTestToken: TokenResponse = {
  accessToken: 'test-access-token',
  tokenType: 'bearer',
  raw: { access_token: 'test-access-token', token_type: 'bearer' },
};

/**
 * Minimal subclass exposing the base class's protected helpers
 */
export class TestAdapter extends BaseOAuthAdapter {
  public exchangeResult: TokenResponse = defaultTestToken;

  async exchangeCode(): Promise<TokenResponse> {
    return this.exchangeResult;
  }

  public testBuildAuthorizeUrl(
    endpoint: string,
    params: readonly AuthorizationParam[],
    context: ErrorContext = {}
  ): string {
    return this.buildAuthorizeUrl(endpoint, params, context);
  }

  public testNormalizeError(
    e: unknown,
    kind: OAuthErrorKind,
    context: ErrorContext = {}
  ): OAuthError {
    return this.normalizeError(e, kind, context);
  }

  public testCreateStandardError(
    kind: OAuthErrorKind,
    error: string,
    description: string,
    context: ErrorContext = {}
  ): OAuthError {
    return this.createStandardError(kind, error, description, context);
  }
}

export interface RecordingAdapterOptions {
  /** URI returned from authorizationUri */
  location?: string;
  /** Thrown from authorizationUri */
  authorizationError?: unknown;
  /** Returned from exchangeCode */
  token?: TokenResponse;
  /** Thrown from exchangeCode */
  exchangeError?: unknown;
}

/**
 * Adapter double that records what the engine asks of it
 */
export class RecordingAdapter implements Adapter {
  public readonly authorizationCalls: {
    state: CsrfState;
    scopes: readonly string[];
    extras: readonly AuthorizationParam[];
  }[] = [];
  public readonly exchangeCalls: {
    request: TokenRequest;
    options: ExchangeOptions | undefined;
  }[] = [];

  constructor(private readonly options: RecordingAdapterOptions = {}) {}

  authorizationUri(
    _config: OAuthConfig,
    state: CsrfState,
    scopes: readonly string[],
    extras: readonly AuthorizationParam[] = []
  ): string {
    this.authorizationCalls.push({ state, scopes, extras });
    if (this.options.authorizationError !== undefined) {
      throw this.options.authorizationError;
    }
    return (
      this.options.location ??
      `https://auth.example.com/oauth/authorize?state=${encodeURIComponent(state)}`
    );
  }

  async exchangeCode(
    _config: OAuthConfig,
    request: TokenRequest,
    options?: ExchangeOptions
  ): Promise<TokenResponse> {
    this.exchangeCalls.push({ request, options });
    if (this.options.exchangeError !== undefined) {
      throw this.options.exchangeError;
    }
    return this.options.token ?? defaultTestToken;
  }
}
