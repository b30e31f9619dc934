/**
 * Default Adapter: form-encoded POST to the provider's token endpoint
 */

import { BaseOAuthAdapter } from '../../base-adapter.js';
import type { OAuthConfig } from '../../config/oauth-config.js';
import type { Logger } from '../../logging/types.js';
import type {
  ExchangeOptions,
  TokenRequest,
  TokenResponse,
} from '../../types.js';
import { isOAuthError } from '../../utils/error-normalizer.js';
import { buildTokenRequestBody, TOKEN_REQUEST_HEADERS } from './token-request.js';
import { parseTokenResponse } from './token-response.js';
import {
  FetchTransport,
  type HttpTransport,
  type TransportResponse,
} from './transport.js';

export interface HttpAdapterOptions {
  /** Transport for token requests (default: {@link FetchTransport}) */
  transport?: HttpTransport;
  /** Timeout for the default transport; ignored when `transport` is given */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Stateless adapter. Each exchange is an independent request; nothing is
 * cached and nothing is retried.
 */
export class HttpAdapter extends BaseOAuthAdapter {
  private readonly transport: HttpTransport;

  public constructor(options: HttpAdapterOptions = {}) {
    super(options.logger);
    this.transport =
      options.transport ??
      new FetchTransport(
        options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {}
      );
  }

  public async exchangeCode(
    config: OAuthConfig,
    request: TokenRequest,
    options: ExchangeOptions = {}
  ): Promise<TokenResponse> {
    const stage = 'exchangeCode';
    const endpoint = config.provider.tokenUri;
    const context = { endpoint: 'token_endpoint', provider: config.name };

    try {
      this.logger.info('Requesting token', {
        stage,
        provider: config.name,
        endpoint,
        grantType: request.type,
      });

      const response: TransportResponse = await this.transport.post(
        endpoint,
        { ...TOKEN_REQUEST_HEADERS },
        buildTokenRequestBody(config, request),
        options.signal ? { signal: options.signal } : {}
      );

      if (response.status < 200 || response.status >= 300) {
        throw this.normalizeError(response, 'ExchangeError', context);
      }

      const tokenResponse = parseTokenResponse(response.body, context);

      this.logger.info('Token request completed successfully', {
        stage,
        provider: config.name,
        endpoint,
        tokenType: tokenResponse.tokenType,
        hasRefreshToken: Boolean(tokenResponse.refreshToken),
        expiresIn: tokenResponse.expiresIn,
      });

      return tokenResponse;
    } catch (error) {
      const normalized = isOAuthError(error)
        ? error
        : this.normalizeError(error, 'ExchangeFailure', context);

      this.logger.error('Token request failed', {
        stage,
        provider: config.name,
        endpoint,
        kind: normalized.kind,
        statusCode: normalized.statusCode,
        error: normalized.error,
        error_description: normalized.error_description,
      });

      throw normalized;
    }
  }
}
