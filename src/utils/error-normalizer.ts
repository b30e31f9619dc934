import type { OAuthError, OAuthErrorKind } from '../types.js';
import createError from 'http-errors';
import { StatusCodes, ReasonPhrases } from 'http-status-codes';

export type ErrorContext = {
  endpoint?: string;
  provider?: string;
};

/**
 * Error creation using http-errors for standardized error objects
 */
class ErrorBuilder {
  constructor(
    private readonly httpError: createError.HttpError,
    private readonly statusCode: number,
    private readonly error: string,
    private readonly description?: string,
    private readonly cause?: unknown
  ) {}

  withContext(kind: OAuthErrorKind, context: ErrorContext): OAuthError {
    const result: OAuthError = {
      kind,
      statusCode: this.statusCode,
      error: this.error,
      expose: this.httpError.expose,
    };

    if (this.description !== undefined) {
      result.error_description = this.description;
    }
    if (context.endpoint !== undefined) {
      result.endpoint = context.endpoint;
    }
    if (context.provider !== undefined) {
      result.provider = context.provider;
    }
    if (this.cause !== undefined) {
      result.cause = this.cause;
    }

    return result;
  }
}

/**
 * Build an error using http-errors
 */
function buildError(
  statusCode: number,
  error: string,
  description?: string,
  cause?: unknown
): ErrorBuilder {
  // http-errors deprecates non-4xx/5xx status codes; coerce to 500 in those cases
  const statusForHttpError =
    statusCode >= 400 && statusCode < 600
      ? statusCode
      : StatusCodes.INTERNAL_SERVER_ERROR;
  const httpError = createError(statusForHttpError, description ?? error);
  return new ErrorBuilder(httpError, statusCode, error, description, cause);
}

const DEFAULT_STATUS: Record<OAuthErrorKind, number> = {
  ConfigError: StatusCodes.INTERNAL_SERVER_ERROR,
  InvalidUri: StatusCodes.INTERNAL_SERVER_ERROR,
  StateMismatch: StatusCodes.BAD_REQUEST,
  ProviderDenied: StatusCodes.FORBIDDEN,
  MissingCode: StatusCodes.BAD_REQUEST,
  ExchangeError: StatusCodes.BAD_GATEWAY,
  ExchangeFailure: StatusCodes.BAD_GATEWAY,
};

/**
 * Type guard for errors that have already been normalized
 */
export function isOAuthError(e: unknown): e is OAuthError {
  if (e === null || typeof e !== 'object') return false;
  return (
    'kind' in e &&
    typeof e.kind === 'string' &&
    e.kind in DEFAULT_STATUS &&
    'error' in e &&
    typeof e.error === 'string' &&
    'statusCode' in e &&
    typeof e.statusCode === 'number'
  );
}

/**
 * Utility class for turning thrown values, transport responses and plain
 * descriptions into {@link OAuthError} values of a given kind.
 */
export class ErrorNormalizer {
  /**
   * Create an error of the given kind with an explicit OAuth error code
   */
  static create(
    kind: OAuthErrorKind,
    error: string,
    description: string,
    context: ErrorContext = {},
    statusCode: number = DEFAULT_STATUS[kind]
  ): OAuthError {
    return buildError(statusCode, error, description).withContext(
      kind,
      context
    );
  }

  /**
   * Normalize unknown error into standardized OAuthError structure.
   * Values that are already an {@link OAuthError} keep their kind.
   */
  static normalizeError(
    e: unknown,
    kind: OAuthErrorKind,
    context: ErrorContext = {}
  ): OAuthError {
    if (isOAuthError(e)) {
      return {
        ...e,
        ...(context.endpoint !== undefined &&
          e.endpoint === undefined && { endpoint: context.endpoint }),
        ...(context.provider !== undefined &&
          e.provider === undefined && { provider: context.provider }),
      };
    }

    // Try each error format in order of specificity
    return (
      this.tryOAuthErrorShape(e, kind) ??
      this.tryTransportResponseShape(e) ??
      this.tryNativeErrorShape(e, kind) ??
      this.tryStringErrorShape(e, kind) ??
      this.createFallbackError(e, kind)
    ).withContext(kind, context);
  }

  /**
   * Try parsing as an OAuth error payload, e.g. `{ error, error_description }`
   * with a status
   */
  private static tryOAuthErrorShape(
    e: unknown,
    kind: OAuthErrorKind
  ): ErrorBuilder | null {
    const obj = this.asObject(e);
    if (!obj) return null;

    const error = this.readString(obj, 'error');
    if (!error) return null;

    const statusCode =
      this.readNumber(obj, 'statusCode') ??
      this.readNumber(obj, 'status') ??
      DEFAULT_STATUS[kind];
    const description =
      this.readString(obj, 'error_description') ??
      this.readString(obj, 'message');
    return buildError(statusCode, error, description);
  }

  /**
   * Try parsing as a transport response `{ status, body }` from the token
   * endpoint. The body may carry an RFC 6749 §5.2 error object.
   */
  private static tryTransportResponseShape(e: unknown): ErrorBuilder | null {
    const obj = this.asObject(e);
    if (!obj) return null;

    const statusCode = this.readNumber(obj, 'status');
    if (typeof statusCode !== 'number') return null;

    const payload = this.parseErrorBody(this.readString(obj, 'body'));
    const error =
      (payload && this.readString(payload, 'error')) ??
      this.mapStatusToOAuthError(statusCode);
    const description =
      (payload && this.readString(payload, 'error_description')) ??
      this.readString(obj, 'statusText') ??
      this.getReasonPhrase(statusCode);

    return buildError(statusCode, error, description);
  }

  /**
   * Try parsing as native Error instance (fetch failures, aborts, timeouts)
   */
  private static tryNativeErrorShape(
    e: unknown,
    kind: OAuthErrorKind
  ): ErrorBuilder | null {
    if (!(e instanceof Error)) return null;

    let statusCode = DEFAULT_STATUS[kind];
    let error = 'server_error';
    const detail =
      e.cause instanceof Error ? `${e.message}: ${e.cause.message}` : e.message;

    if (e.name === 'TimeoutError' || /timeout|timed out/i.test(detail)) {
      error = 'temporarily_unavailable';
      statusCode = StatusCodes.GATEWAY_TIMEOUT;
    } else if (e.name === 'AbortError') {
      error = 'request_aborted';
      statusCode = StatusCodes.SERVICE_UNAVAILABLE;
    } else if (
      /network|fetch|ECONNREFUSED|ECONNRESET|ENOTFOUND|certificate|TLS/i.test(
        detail
      )
    ) {
      error = 'server_error';
      statusCode = StatusCodes.SERVICE_UNAVAILABLE;
    }

    return buildError(statusCode, error, detail, e);
  }

  /**
   * Try parsing as string primitive
   */
  private static tryStringErrorShape(
    e: unknown,
    kind: OAuthErrorKind
  ): ErrorBuilder | null {
    return typeof e === 'string'
      ? buildError(DEFAULT_STATUS[kind], 'server_error', e)
      : null;
  }

  /**
   * Create fallback error for unrecognized shapes
   */
  private static createFallbackError(
    e: unknown,
    kind: OAuthErrorKind
  ): ErrorBuilder {
    return buildError(
      DEFAULT_STATUS[kind],
      'server_error',
      ReasonPhrases.INTERNAL_SERVER_ERROR,
      e
    );
  }

  /**
   * Map HTTP status codes to OAuth error codes
   */
  private static mapStatusToOAuthError(statusCode: number): string {
    switch (statusCode) {
      case StatusCodes.BAD_REQUEST:
      case StatusCodes.NOT_FOUND:
        return 'invalid_request';
      case StatusCodes.UNAUTHORIZED:
        return 'invalid_client';
      case StatusCodes.FORBIDDEN:
        return 'access_denied';
      case StatusCodes.TOO_MANY_REQUESTS:
      case StatusCodes.SERVICE_UNAVAILABLE:
        return 'temporarily_unavailable';
      default:
        return statusCode >= 400 && statusCode < 500
          ? 'invalid_request'
          : 'server_error';
    }
  }

  /**
   * Safely get reason phrase for HTTP status code
   */
  private static getReasonPhrase(statusCode: number): string {
    const reasonPhrases: Record<number, string> = {
      [StatusCodes.BAD_REQUEST]: ReasonPhrases.BAD_REQUEST,
      [StatusCodes.UNAUTHORIZED]: ReasonPhrases.UNAUTHORIZED,
      [StatusCodes.FORBIDDEN]: ReasonPhrases.FORBIDDEN,
      [StatusCodes.NOT_FOUND]: ReasonPhrases.NOT_FOUND,
      [StatusCodes.TOO_MANY_REQUESTS]: ReasonPhrases.TOO_MANY_REQUESTS,
      [StatusCodes.INTERNAL_SERVER_ERROR]: ReasonPhrases.INTERNAL_SERVER_ERROR,
      [StatusCodes.BAD_GATEWAY]: ReasonPhrases.BAD_GATEWAY,
      [StatusCodes.SERVICE_UNAVAILABLE]: ReasonPhrases.SERVICE_UNAVAILABLE,
      [StatusCodes.GATEWAY_TIMEOUT]: ReasonPhrases.GATEWAY_TIMEOUT,
    };

    return reasonPhrases[statusCode] || `HTTP ${statusCode}`;
  }

  private static parseErrorBody(
    body: string | undefined
  ): Record<string, unknown> | null {
    if (!body) return null;
    try {
      return this.asObject(JSON.parse(body));
    } catch {
      // not JSON; the status alone describes the failure
      return null;
    }
  }

  /**
   * Safe object casting utility
   */
  private static asObject(v: unknown): Record<string, unknown> | null {
    if (v === null || typeof v !== 'object' || Array.isArray(v)) return null;
    return Object.fromEntries(Object.entries(v));
  }

  /**
   * Safe number property reader
   */
  private static readNumber(
    obj: Record<string, unknown> | null,
    key: string
  ): number | undefined {
    if (!obj) return undefined;
    const value = obj[key];
    return typeof value === 'number' ? value : undefined;
  }

  /**
   * Safe string property reader
   */
  private static readString(
    obj: Record<string, unknown> | null,
    key: string
  ): string | undefined {
    if (!obj) return undefined;
    const value = obj[key];
    return typeof value === 'string' && value.length > 0 ? value : undefined;
  }
}
