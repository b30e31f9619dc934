/**
 * Environment variable helper for OAuthConfig
 */

import type { ProviderConfig } from '../types.js';
import { OAuthConfig, type OAuthConfigOptions } from './oauth-config.js';

export interface FromEnvironmentOptions extends OAuthConfigOptions {
  /** Variables to read; defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

/**
 * Variable prefix for a config name: `github` → `OAUTH_GITHUB_`
 */
export function environmentPrefix(name: string): string {
  const key = name
    .trim()
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return `OAUTH_${key}_`;
}

/**
 * Create an OAuthConfig from environment variables
 *
 * For `name = "github"`:
 * - OAUTH_GITHUB_CLIENT_ID -> clientId
 * - OAUTH_GITHUB_CLIENT_SECRET -> clientSecret
 * - OAUTH_GITHUB_REDIRECT_URI -> redirectUri
 * - OAUTH_GITHUB_PROVIDER -> preset name
 * - OAUTH_GITHUB_AUTH_URI + OAUTH_GITHUB_TOKEN_URI -> custom provider
 *
 * With no provider variables set, `name` itself is tried as a preset.
 *
 * @throws {OAuthError} of kind `ConfigError` if required variables are missing
 */
export function fromEnvironment(
  name: string,
  options: FromEnvironmentOptions = {}
): OAuthConfig {
  const { env = process.env, ...configOptions } = options;
  const prefix = environmentPrefix(name);
  const read = (key: string): string | undefined => {
    const value = env[prefix + key]?.trim();
    return value ? value : undefined;
  };

  const authUri = read('AUTH_URI');
  const tokenUri = read('TOKEN_URI');
  const preset = read('PROVIDER');

  let provider: string | ProviderConfig;
  if (preset) {
    provider = preset;
  } else if (authUri || tokenUri) {
    provider = { authUri: authUri ?? '', tokenUri: tokenUri ?? '' };
  } else {
    provider = name;
  }

  return new OAuthConfig(
    {
      name,
      clientId: read('CLIENT_ID') ?? '',
      clientSecret: read('CLIENT_SECRET') ?? '',
      redirectUri: read('REDIRECT_URI'),
      provider,
    },
    configOptions
  );
}
