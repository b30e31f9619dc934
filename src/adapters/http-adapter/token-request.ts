import type { OAuthConfig } from '../../config/oauth-config.js';
import type { TokenRequest } from '../../types.js';

export const TOKEN_REQUEST_HEADERS: Readonly<Record<string, string>> = {
  Accept: 'application/json',
  'Content-Type': 'application/x-www-form-urlencoded',
};

/**
 * Serialize a grant as an `application/x-www-form-urlencoded` body.
 * Client credentials are sent in the body (`client_secret_post`).
 */
export function buildTokenRequestBody(
  config: OAuthConfig,
  request: TokenRequest
): string {
  const params = new URLSearchParams();

  switch (request.type) {
    case 'authorization_code':
      params.append('grant_type', 'authorization_code');
      params.append('code', request.code);
      if (config.redirectUri) {
        params.append('redirect_uri', config.redirectUri);
      }
      break;
    case 'refresh_token':
      params.append('grant_type', 'refresh_token');
      params.append('refresh_token', request.refreshToken);
      break;
  }

  params.append('client_id', config.clientId);
  params.append('client_secret', config.clientSecret);

  return params.toString();
}
