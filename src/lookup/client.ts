import { compareVersions, toLookupResult } from '../compare.js';
import {
  BadServerResponseError,
  NetworkError,
  NO_RESPONSE_STATUS,
  type LookupFailure,
} from '../errors.js';
import {
  appStoreUrlFor,
  failure,
  success,
  type LookupOutcome,
  type UpdateInfo,
} from '../types.js';
import {
  fetchHttpClient,
  type HttpClient,
  type HttpResponse,
} from './http.js';
import { buildLookupUrl, LOOKUP_ENDPOINT, type LookupQuery } from './query.js';
import { decodeLookupResponse, type LookupResponse } from './schema.js';

export interface RetryEvent {
  /** Number of the attempt about to start, counting from 1. */
  attempt: number;
  maxAttempts: number;
  error: LookupFailure;
}

export interface LookupClientOptions {
  http?: HttpClient;
  endpoint?: string;
  /** Pause between attempts. */
  retryDelayMs?: number;
  /** Treat a missing HTTP response (status -1) as retry-eligible. */
  retryMissingResponse?: boolean;
  onRetry?: (event: RetryEvent) => void;
}

export class LookupClient {
  private readonly http: HttpClient;
  private readonly endpoint: string;
  private readonly retryDelayMs: number;
  private readonly retryMissingResponse: boolean;
  private readonly onRetry: ((event: RetryEvent) => void) | null;

  constructor(options: LookupClientOptions = {}) {
    this.http = options.http ?? fetchHttpClient;
    this.endpoint = options.endpoint ?? LOOKUP_ENDPOINT;
    this.retryDelayMs = Math.max(0, options.retryDelayMs ?? 0);
    this.retryMissingResponse = options.retryMissingResponse ?? false;
    this.onRetry = options.onRetry ?? null;
  }

  /**
   * Runs the lookup with up to `query.retryCount` sequential retries.
   * Failures come back as an outcome; only caller cancellation rejects.
   */
  async lookup(
    query: LookupQuery,
    signal?: AbortSignal,
  ): Promise<LookupOutcome<UpdateInfo>> {
    const url = buildLookupUrl(query, this.endpoint);
    const maxAttempts = 1 + query.retryCount;

    for (let attempt = 1; ; attempt++) {
      signal?.throwIfAborted();
      const outcome = await this.attempt(url, query, signal);
      if (outcome.ok) return outcome;

      if (attempt >= maxAttempts || !this.isRetryable(outcome.error)) {
        return outcome;
      }
      this.onRetry?.({ attempt: attempt + 1, maxAttempts, error: outcome.error });
      if (this.retryDelayMs > 0) {
        await sleep(this.retryDelayMs, signal);
      }
    }
  }

  isRetryable(error: LookupFailure): boolean {
    switch (error.kind) {
      case 'network':
        return true;
      case 'badServerResponse':
        if (error.statusCode === NO_RESPONSE_STATUS) {
          return this.retryMissingResponse;
        }
        return error.statusCode >= 500;
      case 'decoding':
        return false;
    }
  }

  private async attempt(
    url: string,
    query: LookupQuery,
    signal: AbortSignal | undefined,
  ): Promise<LookupOutcome<UpdateInfo>> {
    let response: HttpResponse;
    try {
      response = await this.http.get({
        url,
        timeoutMs: query.timeout * 1000,
        signal,
      });
    } catch (error) {
      signal?.throwIfAborted();
      return failure(new NetworkError(error));
    }

    if (response.status === null) {
      return failure(new BadServerResponseError(NO_RESPONSE_STATUS));
    }
    if (response.status < 200 || response.status >= 300) {
      return failure(new BadServerResponseError(response.status));
    }

    const decoded = decodeLookupResponse(response.body);
    if (!decoded.ok) return decoded;
    return success(buildUpdateInfo(decoded.value, query));
  }
}

export function buildUpdateInfo(
  response: LookupResponse,
  query: LookupQuery,
): UpdateInfo {
  const first = response.results[0];
  if (!first) return noResultsInfo(query);

  return {
    result: toLookupResult(compareVersions(first.version, query.installedVersion)),
    installedVersion: query.installedVersion,
    storeVersion: first.version,
    appId: first.appId,
    appStoreUrl: appStoreUrlFor(first.appId),
    bundleId: query.bundleId,
    country: query.country,
  };
}

export function noResultsInfo(
  query: Pick<LookupQuery, 'bundleId' | 'installedVersion' | 'country'>,
): UpdateInfo {
  return {
    result: 'noResults',
    installedVersion: query.installedVersion,
    storeVersion: null,
    appId: null,
    appStoreUrl: null,
    bundleId: query.bundleId,
    country: query.country,
  };
}

function sleep(ms: number, signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
