export interface HttpRequest {
  url: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface HttpResponse {
  /** Null when the transport produced no HTTP response object. */
  status: number | null;
  body: string;
}

/**
 * Minimal GET transport the lookup runs on. Implementations reject on
 * transport failures (DNS, connection, timeout) and resolve for every HTTP
 * status.
 */
export interface HttpClient {
  get(request: HttpRequest): Promise<HttpResponse>;
}

/** Longest delay a Node timer honours; larger values fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export class HttpTimeoutError extends Error {
  constructor(url: string, timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'HttpTimeoutError';
  }
}

export const fetchHttpClient: HttpClient = {
  async get({ url, timeoutMs, signal }) {
    signal?.throwIfAborted();

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, Math.min(timeoutMs, MAX_TIMER_DELAY_MS));
    const forwardAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });
      return { status: response.status, body: await response.text() };
    } catch (error) {
      if (timedOut) throw new HttpTimeoutError(url, timeoutMs);
      throw error;
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', forwardAbort);
    }
  },
};
