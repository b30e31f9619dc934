/**
 * In-process stand-ins for the token endpoint
 */

import type {
  HttpTransport,
  TransportRequestOptions,
  TransportResponse,
} from '../adapters/http-adapter/transport.js';

export interface RecordedRequest {
  uri: string;
  headers: Record<string, string>;
  body: string;
  /** `body` decoded as a form */
  params: URLSearchParams;
  signal?: AbortSignal;
}

export type FakeHandler = (
  request: RecordedRequest
) => TransportResponse | Promise<TransportResponse>;

export function jsonResponse(status: number, body: unknown): TransportResponse {
  return { status, body: JSON.stringify(body) };
}

/**
 * Records every POST and answers through a handler
 */
export class FakeTransport implements HttpTransport {
  public readonly requests: RecordedRequest[] = [];

  constructor(private readonly handler: FakeHandler) {}

  /** Always answer with the given status and body */
  static respondWith(status: number, body: unknown): FakeTransport {
    const response =
      typeof body === 'string' ? { status, body } : jsonResponse(status, body);
    return new FakeTransport(() => response);
  }

  /** Always reject with `error` */
  static failWith(error: unknown): FakeTransport {
    return new FakeTransport(() => Promise.reject(error));
  }

  /**
   * Behaves like a provider that redeems each authorization code once.
   * A second use of the same code is answered 400 `invalid_grant`.
   */
  static singleUseCodes(): FakeTransport {
    const redeemed = new Set<string>();

    return new FakeTransport(({ params }) => {
      if (params.get('grant_type') === 'refresh_token') {
        return jsonResponse(200, {
          access_token: `access-for-${params.get('refresh_token') ?? ''}`,
          token_type: 'bearer',
        });
      }

      const code = params.get('code') ?? '';
      if (redeemed.has(code)) {
        return jsonResponse(400, {
          error: 'invalid_grant',
          error_description: 'The authorization code has already been used',
        });
      }
      redeemed.add(code);
      return jsonResponse(200, {
        access_token: `access-for-${code}`,
        token_type: 'bearer',
        refresh_token: `refresh-for-${code}`,
        expires_in: 3600,
      });
    });
  }

  async post(
    uri: string,
    headers: Record<string, string>,
    body: string,
    options: TransportRequestOptions = {}
  ): Promise<TransportResponse> {
    const request: RecordedRequest = {
      uri,
      headers,
      body,
      params: new URLSearchParams(body),
    };
    if (options.signal) {
      request.signal = options.signal;
    }
    this.requests.push(request);
    return this.handler(request);
  }

  get lastRequest(): RecordedRequest | undefined {
    return this.requests[this.requests.length - 1];
  }
}
