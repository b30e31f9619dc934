/**
 * OAuth2 Authorization-Code Flow Engine
 * Main entry point
 */

export const version = '0.1.0';

// Flow engine
export * from './flow/index.js';

// Configuration
export * from './config/index.js';

// Adapters
export * from './adapters/index.js';
export { OAUTH_REDACTION_PATHS, RESERVED_AUTH_PARAMS } from './base-adapter.js';

// Types
export type {
  AuthorizationParam,
  CallbackQuery,
  CsrfState,
  ExchangeOptions,
  FlowResult,
  FlowStage,
  OAuthError,
  OAuthErrorKind,
  ProviderConfig,
  Redirect,
  StateStore,
  TokenRequest,
  TokenResponse,
} from './types.js';

// Errors
export { ErrorNormalizer, isOAuthError } from './utils/error-normalizer.js';
export type { ErrorContext } from './utils/error-normalizer.js';

// Logging
export type {
  Logger,
  LogMeta,
  LogTransport,
  LoggerOptions,
} from './logging/types.js';
export { DefaultLogger, LogLevel, LogDestination } from './logging/logger.js';
export { parseLogLevel, LOG_LEVEL_ENV } from './logging/types.js';
export { redact, redactUrlParams, REDACTION } from './logging/redaction.js';

export default {
  version,
};
