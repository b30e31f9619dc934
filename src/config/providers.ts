/**
 * Well-known provider endpoints
 */

import type { ProviderConfig } from '../types.js';

export const PROVIDER_PRESETS = {
  Bitbucket: {
    authUri: 'https://bitbucket.org/site/oauth2/authorize',
    tokenUri: 'https://bitbucket.org/site/oauth2/access_token',
  },
  Discord: {
    authUri: 'https://discord.com/api/oauth2/authorize',
    tokenUri: 'https://discord.com/api/oauth2/token',
  },
  Facebook: {
    authUri: 'https://www.facebook.com/v3.1/dialog/oauth',
    tokenUri: 'https://graph.facebook.com/v3.1/oauth/access_token',
  },
  GitHub: {
    authUri: 'https://github.com/login/oauth/authorize',
    tokenUri: 'https://github.com/login/oauth/access_token',
  },
  GitLab: {
    authUri: 'https://gitlab.com/oauth/authorize',
    tokenUri: 'https://gitlab.com/oauth/token',
  },
  Google: {
    authUri: 'https://accounts.google.com/o/oauth2/v2/auth',
    tokenUri: 'https://www.googleapis.com/oauth2/v4/token',
  },
  LinkedIn: {
    authUri: 'https://www.linkedin.com/oauth/v2/authorization',
    tokenUri: 'https://www.linkedin.com/oauth/v2/accessToken',
  },
  Microsoft: {
    authUri: 'https://login.microsoftonline.com/common/oauth2/v2.0/authorize',
    tokenUri: 'https://login.microsoftonline.com/common/oauth2/v2.0/token',
  },
  Reddit: {
    authUri: 'https://www.reddit.com/api/v1/authorize',
    tokenUri: 'https://www.reddit.com/api/v1/access_token',
  },
  Yahoo: {
    authUri: 'https://api.login.yahoo.com/oauth2/request_auth',
    tokenUri: 'https://api.login.yahoo.com/oauth2/get_token',
  },
} as const satisfies Record<string, ProviderConfig>;

export type StaticProvider = keyof typeof PROVIDER_PRESETS;

export const PRESET_NAMES: readonly string[] = Object.keys(PROVIDER_PRESETS);

/**
 * Look up a preset by name, ignoring case
 * @returns The preset's canonical name and endpoints, or undefined
 */
export function findPreset(
  name: string
): { name: string; provider: ProviderConfig } | undefined {
  const wanted = name.trim().toLowerCase();
  for (const [presetName, provider] of Object.entries(PROVIDER_PRESETS)) {
    if (presetName.toLowerCase() === wanted) {
      return { name: presetName, provider };
    }
  }
  return undefined;
}
