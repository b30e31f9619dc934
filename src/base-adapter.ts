import type {
  AuthorizationParam,
  CsrfState,
  ExchangeOptions,
  OAuthError,
  OAuthErrorKind,
  TokenRequest,
  TokenResponse,
} from './types.js';
import type { OAuthConfig } from './config/oauth-config.js';
import { ErrorNormalizer, type ErrorContext } from './utils/error-normalizer.js';
import type { Logger } from './logging/types.js';
import { DefaultLogger } from './logging/logger.js';

export const OAUTH_REDACTION_PATHS = [
  // Direct fields
  'clientSecret',
  'accessToken',
  'refreshToken',
  'code',

  // Token endpoint responses
  'raw.access_token',
  'raw.refresh_token',
  'raw.id_token',

  // Token request bodies
  'body.client_secret',
  'body.code',
  'body.refresh_token',
];

/**
 * Authorization request parameters the builder always owns
 */
export const RESERVED_AUTH_PARAMS = new Set([
  'response_type',
  'client_id',
  'state',
  'redirect_uri',
  'scope',
]);

/**
 * The capability the flow engine depends on: building the provider's
 * authorization URI and exchanging a grant for a token. Implementations hold
 * no per-exchange state and may be shared across concurrent requests.
 */
export interface Adapter {
  authorizationUri(
    config: OAuthConfig,
    state: CsrfState,
    scopes: readonly string[],
    extras?: readonly AuthorizationParam[]
  ): string;

  exchangeCode(
    config: OAuthConfig,
    request: TokenRequest,
    options?: ExchangeOptions
  ): Promise<TokenResponse>;
}

/**
 * Shared base for adapters. Provides the RFC 6749 §4.1.1 authorization URI
 * builder, error normalization and a lazily created logger; subclasses supply
 * the token exchange.
 */
export abstract class BaseOAuthAdapter implements Adapter {
  /**
   * Stores our lazily instantiated implementation of Logger.
   */
  private loggerImpl?: Logger;

  /**
   * @param logger - Optional logger instance to use instead of default logger
   */
  public constructor(logger?: Logger) {
    if (logger) {
      this.loggerImpl = logger;
    }
  }

  public get logger(): Logger {
    if (this.loggerImpl === undefined) {
      this.loggerImpl = DefaultLogger.fromEnvironment(
        { component: this.constructor.name },
        { redactPaths: OAUTH_REDACTION_PATHS }
      );
    }
    return this.loggerImpl;
  }

  /**
   * Set a custom logger instance for this adapter
   * @param logger - The logger instance to use
   */
  public setLogger(logger: Logger): void {
    this.loggerImpl = logger;
  }

  /**
   * Build the URI the user's browser is redirected to.
   *
   * Parameters are appended in a fixed order: `response_type`, `client_id`,
   * `state`, `redirect_uri` (when configured), `scope` (when any scopes are
   * requested, space-joined), then `extras`. Extras naming one of those
   * parameters are dropped.
   *
   * @throws {OAuthError} of kind `InvalidUri` if the authorization endpoint
   * or the result is not an absolute URI
   */
  public authorizationUri(
    config: OAuthConfig,
    state: CsrfState,
    scopes: readonly string[],
    extras: readonly AuthorizationParam[] = []
  ): string {
    const params: AuthorizationParam[] = [
      ['response_type', 'code'],
      ['client_id', config.clientId],
      ['state', state],
    ];

    if (config.redirectUri) {
      params.push(['redirect_uri', config.redirectUri]);
    }

    const requested = scopes.filter((scope) => scope.length > 0);
    if (requested.length > 0) {
      params.push(['scope', requested.join(' ')]);
    }

    for (const [name, value] of extras) {
      if (RESERVED_AUTH_PARAMS.has(name)) {
        this.logger.warn('Ignoring extra authorization parameter', {
          stage: 'authorizationUri',
          provider: config.name,
          parameter: name,
        });
        continue;
      }
      params.push([name, value]);
    }

    return this.buildAuthorizeUrl(config.provider.authUri, params, {
      endpoint: 'authorization_endpoint',
      provider: config.name,
    });
  }

  /**
   * Build a complete authorization URL with query parameters.
   * Existing query parameters on the endpoint are kept.
   *
   * @param endpoint - The authorization endpoint URL
   * @param params - Query parameters to append, in order
   * @returns Complete authorization URL
   */
  protected buildAuthorizeUrl(
    endpoint: string,
    params: readonly AuthorizationParam[],
    context: ErrorContext
  ): string {
    let url: URL;
    try {
      url = new URL(endpoint);
    } catch {
      throw this.createStandardError(
        'InvalidUri',
        'invalid_uri',
        `Authorization endpoint is not an absolute URI: ${endpoint}`,
        context
      );
    }

    for (const [key, value] of params) {
      url.searchParams.append(key, value);
    }

    const result = url.toString();
    try {
      new URL(result);
    } catch {
      throw this.createStandardError(
        'InvalidUri',
        'invalid_uri',
        `Authorization URI did not parse back as an absolute URI: ${result}`,
        context
      );
    }
    return result;
  }

  /**
   * Exchange an authorization code or refresh token for a token response.
   * Implementations must not retry: authorization codes are single-use.
   *
   * @throws {OAuthError} of kind `ExchangeError` for a non-2xx token endpoint
   * response, `ExchangeFailure` for transport or parse failures
   */
  public abstract exchangeCode(
    config: OAuthConfig,
    request: TokenRequest,
    options?: ExchangeOptions
  ): Promise<TokenResponse>;

  /**
   * Normalize heterogeneous error shapes from transports and native errors
   * into an OAuthError of the given kind. Errors that are already normalized
   * keep their own kind.
   */
  protected normalizeError(
    e: unknown,
    kind: OAuthErrorKind,
    context: ErrorContext
  ): OAuthError {
    return ErrorNormalizer.normalizeError(e, kind, context);
  }

  /**
   * Create a standardized OAuth error with consistent structure.
   */
  protected createStandardError(
    kind: OAuthErrorKind,
    error: string,
    description: string,
    context: ErrorContext
  ): OAuthError {
    return ErrorNormalizer.create(kind, error, description, context);
  }
}
