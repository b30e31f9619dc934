/**
 * Parsing of token endpoint responses into TokenResponse values
 */

import { z } from 'zod';
import type { TokenResponse } from '../../types.js';
import {
  ErrorNormalizer,
  type ErrorContext,
} from '../../utils/error-normalizer.js';
import { isRecord, normalizeScope } from './utils.js';

/**
 * RFC 6749 §5.1 successful response. Unknown fields are kept.
 */
export const RawTokenResponseSchema = z
  .object({
    access_token: z
      .string({
        required_error: 'missing access_token',
        invalid_type_error: 'access_token must be a string',
      })
      .min(1, 'access_token is empty'),
    token_type: z
      .string({
        required_error: 'missing token_type',
        invalid_type_error: 'token_type must be a string',
      })
      .min(1, 'token_type is empty'),
    refresh_token: z.string().nullish(),
    expires_in: z
      .union([
        z.number().nonnegative(),
        z
          .string()
          .regex(/^\d+$/)
          .transform((value) => Number(value)),
      ])
      .nullish(),
    scope: z.string().nullish(),
  })
  .passthrough();

/**
 * Parse a 2xx token endpoint body
 *
 * @throws {OAuthError} of kind `ExchangeFailure` if the body is not a JSON
 * object or lacks a usable `access_token` / `token_type`
 */
export function parseTokenResponse(
  body: string,
  context: ErrorContext = {}
): TokenResponse {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    throw ErrorNormalizer.create(
      'ExchangeFailure',
      'invalid_response',
      'Token endpoint returned a body that is not valid JSON',
      context
    );
  }

  if (!isRecord(data)) {
    throw ErrorNormalizer.create(
      'ExchangeFailure',
      'invalid_response',
      'Token endpoint response is not a JSON object',
      context
    );
  }

  const result = RawTokenResponseSchema.safeParse(data);
  if (!result.success) {
    // Some providers answer 200 with an error object instead of a 4xx
    const providerError =
      typeof data.error === 'string' && data.error ? data.error : undefined;
    const providerDescription =
      typeof data.error_description === 'string'
        ? data.error_description
        : undefined;

    throw ErrorNormalizer.create(
      'ExchangeFailure',
      providerError ?? 'invalid_response',
      providerDescription ??
        result.error.issues.map((issue) => issue.message).join('; '),
      context
    );
  }

  const { access_token, token_type, refresh_token, expires_in, scope } =
    result.data;
  const normalizedScope = normalizeScope(scope);

  return {
    accessToken: access_token,
    tokenType: token_type,
    ...(refresh_token && { refreshToken: refresh_token }),
    ...(typeof expires_in === 'number' && { expiresIn: expires_in }),
    ...(normalizedScope !== undefined && { scope: normalizedScope }),
    raw: data,
  };
}
