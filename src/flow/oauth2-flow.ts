/**
 * Authorization-code flow engine
 */

import { OAUTH_REDACTION_PATHS, type Adapter } from '../base-adapter.js';
import { HttpAdapter } from '../adapters/http-adapter/http-adapter.js';
import type { OAuthConfig } from '../config/oauth-config.js';
import { DefaultLogger } from '../logging/logger.js';
import { redactUrlParams } from '../logging/redaction.js';
import type { Logger } from '../logging/types.js';
import type {
  AuthorizationParam,
  CallbackQuery,
  ExchangeOptions,
  FlowResult,
  OAuthError,
  Redirect,
  StateStore,
  TokenRequest,
  TokenResponse,
} from '../types.js';
import {
  ErrorNormalizer,
  isOAuthError,
} from '../utils/error-normalizer.js';
import { RandomStateGenerator, type StateGenerator } from './state.js';

export interface OAuth2FlowOptions {
  /** Token exchange capability (default: {@link HttpAdapter}) */
  adapter?: Adapter;
  /** CSRF state source (default: {@link RandomStateGenerator}) */
  stateGenerator?: StateGenerator;
  logger?: Logger;
}

/**
 * Read a single-valued query parameter. Repeated parameters are treated as
 * absent.
 */
export function readCallbackParam(
  query: CallbackQuery,
  name: string
): string | undefined {
  if (query instanceof URLSearchParams) {
    const values = query.getAll(name);
    return values.length === 1 ? values[0] : undefined;
  }
  const value = query[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Attach the provider marker `M` to an adapter result
 */
function tagToken<M>(token: TokenResponse): TokenResponse<M> {
  const { accessToken, tokenType, refreshToken, expiresIn, scope, raw } =
    token;
  return {
    accessToken,
    tokenType,
    ...(refreshToken !== undefined && { refreshToken }),
    ...(expiresIn !== undefined && { expiresIn }),
    ...(scope !== undefined && { scope }),
    raw,
  };
}

/**
 * Drives one provider's three-legged login: issue the redirect, validate the
 * callback, exchange the code.
 *
 * Holds only immutable configuration; per-attempt state lives in the
 * {@link StateStore} passed to each call, so one instance serves concurrent
 * requests. `M` marks the tokens it produces so tokens of different providers
 * cannot be confused at compile time.
 *
 * @example
 * ```ts
 * const github = new OAuth2Flow<GitHubUser>(
 *   OAuthConfig.fromPreset('GitHub', { clientId, clientSecret, redirectUri })
 * );
 * const { location } = await github.getRedirect(store, ['read:user']);
 * // ...later, in the callback route
 * const token = await github.handleCallback(store, req.query);
 * ```
 */
export class OAuth2Flow<M = unknown> {
  public readonly config: OAuthConfig;

  private readonly adapter: Adapter;
  private readonly stateGenerator: StateGenerator;
  private loggerImpl?: Logger;

  public constructor(config: OAuthConfig, options: OAuth2FlowOptions = {}) {
    this.config = config;
    this.adapter =
      options.adapter ??
      new HttpAdapter(options.logger ? { logger: options.logger } : {});
    this.stateGenerator = options.stateGenerator ?? new RandomStateGenerator();
    if (options.logger) {
      this.loggerImpl = options.logger;
    }
  }

  public get logger(): Logger {
    if (this.loggerImpl === undefined) {
      this.loggerImpl = DefaultLogger.fromEnvironment(
        { component: 'OAuth2Flow', provider: this.config.name },
        { redactPaths: OAUTH_REDACTION_PATHS }
      );
    }
    return this.loggerImpl;
  }

  public setLogger(logger: Logger): void {
    this.loggerImpl = logger;
  }

  /**
   * Start a login attempt: generate a fresh state, persist it and build the
   * provider redirect.
   *
   * @param scopes - Requested scopes; empty omits `scope`
   * @param extras - Additional authorization parameters, appended in order
   * @throws {OAuthError} of kind `InvalidUri` if the authorization URI cannot
   * be built
   */
  public async getRedirect(
    store: StateStore,
    scopes: readonly string[] = [],
    extras: readonly AuthorizationParam[] = []
  ): Promise<Redirect> {
    const state = this.stateGenerator.generate();
    this.logger.info('Login initiated', {
      stage: 'Initiated',
      scopes: [...scopes],
    });

    let location: string;
    try {
      location = this.adapter.authorizationUri(
        this.config,
        state,
        scopes,
        extras
      );
    } catch (error) {
      throw this.fail(error, 'InvalidUri', 'authorization_endpoint');
    }

    // Only persisted once there is a redirect to follow
    await store.store(state);

    this.logger.debug('Authorization URI built', {
      stage: 'AwaitingCallback',
      location: redactUrlParams(location, ['state']),
    });
    this.logger.info('Redirect issued', { stage: 'AwaitingCallback' });

    return { status: 303, location };
  }

  /**
   * Validate the provider's callback and exchange its code.
   *
   * The pending state is cleared before anything else is checked, so a
   * callback can be validated at most once whatever its outcome. Provider
   * errors are only reported for callbacks whose state matches.
   *
   * @throws {OAuthError} `StateMismatch` when no state is pending or it
   * differs, `ProviderDenied` when the callback carries `error`, `MissingCode`
   * when there is no `code`, `ExchangeError` / `ExchangeFailure` from the
   * adapter
   */
  public async handleCallback(
    store: StateStore,
    query: CallbackQuery,
    options: ExchangeOptions = {}
  ): Promise<TokenResponse<M>> {
    const pending = await store.loadAndClear();

    const received = readCallbackParam(query, 'state');
    if (
      pending === undefined ||
      received === undefined ||
      !this.stateGenerator.verify(pending, received)
    ) {
      this.logger.warn('State mismatch on callback, possible CSRF attempt', {
        stage: 'Failed',
        pendingState: pending !== undefined,
        receivedState: received !== undefined,
      });
      throw ErrorNormalizer.create(
        'StateMismatch',
        'invalid_state',
        pending === undefined
          ? 'No login attempt is pending for this session'
          : 'State parameter does not match the pending login attempt',
        { provider: this.config.name }
      );
    }

    const providerError = readCallbackParam(query, 'error');
    if (providerError) {
      const description = readCallbackParam(query, 'error_description');
      const error = ErrorNormalizer.create(
        'ProviderDenied',
        providerError,
        description ?? `Authorization was denied: ${providerError}`,
        { endpoint: 'authorization_endpoint', provider: this.config.name }
      );
      this.logger.info('Provider denied authorization', {
        stage: 'Failed',
        error: error.error,
        error_description: error.error_description,
      });
      throw error;
    }

    const code = readCallbackParam(query, 'code');
    if (!code) {
      this.logger.warn('Callback carries neither code nor error', {
        stage: 'Failed',
      });
      throw ErrorNormalizer.create(
        'MissingCode',
        'invalid_request',
        'Callback is missing the authorization code',
        { provider: this.config.name }
      );
    }

    this.logger.info('Callback validated', { stage: 'Validated' });

    return this.exchange({ type: 'authorization_code', code }, options);
  }

  /**
   * {@link handleCallback} returning a result object instead of throwing
   */
  public async safeHandleCallback(
    store: StateStore,
    query: CallbackQuery,
    options: ExchangeOptions = {}
  ): Promise<FlowResult<M>> {
    try {
      return {
        success: true,
        data: await this.handleCallback(store, query, options),
      };
    } catch (error) {
      return {
        success: false,
        error: isOAuthError(error)
          ? error
          : ErrorNormalizer.normalizeError(error, 'ExchangeFailure', {
              provider: this.config.name,
            }),
      };
    }
  }

  /**
   * Exchange a refresh token for a new token response
   *
   * @throws {OAuthError} `ExchangeError` / `ExchangeFailure` from the adapter
   */
  public async refresh(
    refreshToken: string,
    options: ExchangeOptions = {}
  ): Promise<TokenResponse<M>> {
    return this.exchange({ type: 'refresh_token', refreshToken }, options);
  }

  private async exchange(
    request: TokenRequest,
    options: ExchangeOptions
  ): Promise<TokenResponse<M>> {
    let token: TokenResponse;
    try {
      token = await this.adapter.exchangeCode(this.config, request, options);
    } catch (error) {
      throw this.fail(error, 'ExchangeFailure', 'token_endpoint');
    }

    this.logger.info('Token exchanged', {
      stage: 'Exchanged',
      grantType: request.type,
      tokenType: token.tokenType,
      hasRefreshToken: token.refreshToken !== undefined,
      expiresIn: token.expiresIn,
    });

    return tagToken<M>(token);
  }

  private fail(
    error: unknown,
    kind: 'InvalidUri' | 'ExchangeFailure',
    endpoint: string
  ): OAuthError {
    const normalized = ErrorNormalizer.normalizeError(error, kind, {
      endpoint,
      provider: this.config.name,
    });
    this.logger.error('Login attempt failed', {
      stage: 'Failed',
      kind: normalized.kind,
      statusCode: normalized.statusCode,
      error: normalized.error,
      error_description: normalized.error_description,
    });
    return normalized;
  }
}
