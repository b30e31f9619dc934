/**
 * Per-provider client configuration and its Zod-based validation
 */

import { z } from 'zod';
import type { ProviderConfig } from '../types.js';
import { ErrorNormalizer } from '../utils/error-normalizer.js';
import { findPreset, PRESET_NAMES, type StaticProvider } from './providers.js';

/**
 * Input accepted by {@link OAuthConfig}
 */
export interface OAuthConfigInput {
  /** Label used in logs and errors; defaults to the lower-cased preset name */
  name?: string;
  /** OAuth client identifier */
  clientId: string;
  /** OAuth client secret */
  clientSecret: string;
  /** Callback URL registered with the provider */
  redirectUri?: string;
  /** Preset name (case-insensitive) or explicit endpoints */
  provider: StaticProvider | (string & {}) | ProviderConfig;
}

export interface OAuthConfigOptions {
  /**
   * Accept `http:` provider endpoints. Defaults to true unless
   * `NODE_ENV` is `production`.
   */
  allowInsecureHttp?: boolean;
}

function isAbsoluteUri(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check that `value` is an absolute URI with an accepted scheme
 * @returns A description of the problem, or null when valid
 */
export function checkEndpointUri(
  value: string,
  allowInsecureHttp: boolean
): string | null {
  if (!isAbsoluteUri(value)) return 'must be an absolute URI';

  const url = new URL(value);
  if (url.protocol === 'https:') return null;
  if (url.protocol === 'http:' && allowInsecureHttp) return null;
  return allowInsecureHttp ? 'must use http or https' : 'must use https';
}

const EndpointSchema = z.object({
  authUri: z.string(),
  tokenUri: z.string(),
});

/**
 * Build the validation schema. Scheme rules depend on `allowInsecureHttp`,
 * so the schema is created per call.
 */
export function createOAuthConfigSchema(allowInsecureHttp: boolean) {
  return z
    .object({
      name: z.string().min(1, 'must not be empty').optional(),
      clientId: z
        .string({ required_error: 'is required' })
        .min(1, 'is required'),
      clientSecret: z
        .string({ required_error: 'is required' })
        .min(1, 'is required'),
      // http stays allowed here for loopback callbacks
      redirectUri: z
        .string()
        .superRefine((value, ctx) => {
          const problem = checkEndpointUri(value, true);
          if (problem) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
          }
        })
        .optional(),
      provider: z.union([z.string(), EndpointSchema], {
        errorMap: () => ({
          message: 'must be a preset name or { authUri, tokenUri }',
        }),
      }),
    })
    .transform((input, ctx) => {
      let provider: ProviderConfig;
      let defaultName = 'custom';

      if (typeof input.provider === 'string') {
        const preset = findPreset(input.provider);
        if (!preset) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['provider'],
            message: `unknown preset "${input.provider}"; expected one of ${PRESET_NAMES.join(', ')}`,
          });
          return z.NEVER;
        }
        provider = preset.provider;
        defaultName = preset.name.toLowerCase();
      } else {
        const { authUri, tokenUri } = input.provider;
        const authProblem = checkEndpointUri(authUri, allowInsecureHttp);
        const tokenProblem = checkEndpointUri(tokenUri, allowInsecureHttp);
        if (authProblem) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['provider', 'authUri'],
            message: authProblem,
          });
        }
        if (tokenProblem) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['provider', 'tokenUri'],
            message: tokenProblem,
          });
        }
        if (authProblem || tokenProblem) return z.NEVER;
        provider = { authUri, tokenUri };
      }

      return {
        name: input.name ?? defaultName,
        clientId: input.clientId,
        clientSecret: input.clientSecret,
        redirectUri: input.redirectUri,
        provider: Object.freeze({ ...provider }),
      };
    });
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message
    )
    .join('; ');
}

/**
 * OAuth client configuration for one provider. Immutable once constructed and
 * safe to share across concurrent requests.
 *
 * @throws {OAuthError} of kind `ConfigError` when a field is missing or empty,
 * the preset is unknown, or an endpoint is not an accepted absolute URI
 */
export class OAuthConfig {
  public readonly name: string;
  public readonly clientId: string;
  public readonly clientSecret: string;
  public readonly redirectUri: string | undefined;
  public readonly provider: ProviderConfig;

  public constructor(input: OAuthConfigInput, options: OAuthConfigOptions = {}) {
    const allowInsecureHttp =
      options.allowInsecureHttp ?? process.env.NODE_ENV !== 'production';
    const result = createOAuthConfigSchema(allowInsecureHttp).safeParse(input);

    if (!result.success) {
      throw ErrorNormalizer.create(
        'ConfigError',
        'invalid_configuration',
        formatIssues(result.error),
        typeof input?.name === 'string' ? { provider: input.name } : {}
      );
    }

    this.name = result.data.name;
    this.clientId = result.data.clientId;
    this.clientSecret = result.data.clientSecret;
    this.redirectUri = result.data.redirectUri;
    this.provider = result.data.provider;
    Object.freeze(this);
  }

  /**
   * Shorthand for a preset provider
   */
  public static fromPreset(
    preset: StaticProvider,
    credentials: Omit<OAuthConfigInput, 'provider'>,
    options?: OAuthConfigOptions
  ): OAuthConfig {
    return new OAuthConfig({ ...credentials, provider: preset }, options);
  }
}
