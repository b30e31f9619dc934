/**
 * HTTP transport used for token endpoint requests
 */

export type TransportResponse = {
  status: number;
  body: string;
};

export type TransportRequestOptions = {
  signal?: AbortSignal;
};

/**
 * Performs a single POST. Implementations must verify TLS certificates and
 * bound the request with a timeout.
 */
export interface HttpTransport {
  post(
    uri: string,
    headers: Record<string, string>,
    body: string,
    options?: TransportRequestOptions
  ): Promise<TransportResponse>;
}

export interface FetchTransportOptions {
  /** Request timeout in milliseconds (default: 8000) */
  timeoutMs?: number;
}

type CombinedSignal = {
  signal: AbortSignal;
  /** Detach the listeners added to the source signals */
  release: () => void;
};

/**
 * Combine the caller's signal with the timeout signal
 */
function anySignal(signals: AbortSignal[]): CombinedSignal {
  const controller = new AbortController();
  const listeners: Array<[AbortSignal, () => void]> = [];
  const release = (): void => {
    for (const [signal, listener] of listeners) {
      signal.removeEventListener('abort', listener);
    }
    listeners.length = 0;
  };

  for (const signal of signals) {
    if (signal.aborted) {
      controller.abort(signal.reason);
      return { signal: controller.signal, release };
    }
  }
  for (const signal of signals) {
    const listener = (): void => {
      release();
      controller.abort(signal.reason);
    };
    signal.addEventListener('abort', listener, { once: true });
    listeners.push([signal, listener]);
  }
  return { signal: controller.signal, release };
}

/**
 * Transport backed by the global fetch (undici). TLS verification is always
 * on; redirects are not followed.
 */
export class FetchTransport implements HttpTransport {
  public static readonly DEFAULT_TIMEOUT_MS = 8_000;

  private readonly timeoutMs: number;

  public constructor(options: FetchTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? FetchTransport.DEFAULT_TIMEOUT_MS;
  }

  public async post(
    uri: string,
    headers: Record<string, string>,
    body: string,
    options: TransportRequestOptions = {}
  ): Promise<TransportResponse> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const combined = options.signal
      ? anySignal([options.signal, timeout])
      : { signal: timeout, release: () => undefined };

    try {
      const response = await fetch(uri, {
        method: 'POST',
        headers,
        body,
        redirect: 'manual',
        signal: combined.signal,
      });

      return { status: response.status, body: await response.text() };
    } finally {
      combined.release();
    }
  }
}
