/**
 * Static description of one OAuth2 provider's endpoints
 */
export type ProviderConfig = {
  /** Authorization endpoint the user's browser is sent to */
  readonly authUri: string;
  /** Token endpoint used for code and refresh-token exchange */
  readonly tokenUri: string;
};

/**
 * Opaque, single-use CSRF state value bound to one login attempt
 */
export type CsrfState = string;

/**
 * Grant being exchanged at the token endpoint
 */
export type TokenRequest =
  | { type: 'authorization_code'; code: string }
  | { type: 'refresh_token'; refreshToken: string };

export declare const providerMarker: unique symbol;

/**
 * Normalized result of a successful token exchange.
 *
 * `M` is a compile-time marker only: it keeps tokens obtained for different
 * providers from being mixed up by calling code. Nothing is stored under it.
 */
export type TokenResponse<M = unknown> = {
  /** OAuth access token */
  accessToken: string;
  /** Token type, usually "bearer" */
  tokenType: string;
  /** OAuth refresh token (if issued by provider) */
  refreshToken?: string;
  /** Token lifetime in seconds */
  expiresIn?: number;
  /** Granted scopes, space-delimited */
  scope?: string;
  /** The provider's full JSON response */
  raw: Record<string, unknown>;
  readonly [providerMarker]?: M;
};

export type OAuthErrorKind =
  | 'ConfigError'
  | 'InvalidUri'
  | 'StateMismatch'
  | 'ProviderDenied'
  | 'MissingCode'
  | 'ExchangeError'
  | 'ExchangeFailure';

/**
 * Standardized OAuth error shape for consistent error handling
 */
export type OAuthError = {
  /** Failure category */
  kind: OAuthErrorKind;
  /**
   * HTTP status code. For `ExchangeError` this is the token endpoint's own
   * response status.
   */
  statusCode: number;
  /** OAuth error code */
  error: string;
  /** Human-readable error description */
  error_description?: string;
  /** Whether the description may be shown to the end user */
  expose: boolean;
  /** Endpoint that generated the error */
  endpoint?: string;
  /** Provider (config) name */
  provider?: string;
  /** Underlying failure, kept for logging */
  cause?: unknown;
};

/**
 * Redirect to be sent by the host as the HTTP response
 */
export type Redirect = {
  status: 303;
  location: string;
};

/**
 * Query of an inbound callback request. Accepts a parsed query object as
 * produced by most routers, or URLSearchParams.
 */
export type CallbackQuery =
  | URLSearchParams
  | Record<string, string | string[] | undefined>;

/**
 * Session-scoped persistence of the pending CSRF state for one login attempt.
 * Implementations are expected to be backed by a signed or encrypted
 * SameSite=Lax cookie, or a server-side session, with a TTL of minutes.
 */
export interface StateStore {
  store(state: CsrfState): Promise<void>;
  /** Returns the pending state, if any, and removes it */
  loadAndClear(): Promise<CsrfState | undefined>;
}

/**
 * Stage of a login attempt
 */
export type FlowStage =
  | 'Initiated'
  | 'AwaitingCallback'
  | 'Validated'
  | 'Exchanged'
  | 'Failed';

export type FlowResult<M> =
  | { success: true; data: TokenResponse<M> }
  | { success: false; error: OAuthError };

export type AuthorizationParam = readonly [name: string, value: string];

export type ExchangeOptions = {
  /** Aborts the in-flight token request */
  signal?: AbortSignal;
};
