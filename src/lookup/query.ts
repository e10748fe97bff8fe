export const LOOKUP_ENDPOINT = 'https://itunes.apple.com/lookup';
export const DEFAULT_TIMEOUT_SECONDS = 15;
export const MIN_TIMEOUT_SECONDS = 1;
/** Keeps `timeout * 1000` within what a Node timer accepts. */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

export interface LookupQuery {
  bundleId: string;
  installedVersion: string;
  country: string | null;
  /** Per-attempt timeout in seconds. */
  timeout: number;
  retryCount: number;
}

export interface LookupQueryInput {
  bundleId: string;
  installedVersion: string;
  country?: string | null;
  timeout?: number;
  retryCount?: number;
}

export function createLookupQuery(input: LookupQueryInput): LookupQuery {
  return {
    bundleId: input.bundleId,
    installedVersion: input.installedVersion,
    country: normalizeCountryCode(input.country),
    timeout: normalizeTimeout(input.timeout),
    retryCount: normalizeRetryCount(input.retryCount),
  };
}

export function normalizeCountryCode(
  country: string | null | undefined,
): string | null {
  const trimmed = country?.trim();
  return trimmed ? trimmed.toUpperCase() : null;
}

export function normalizeTimeout(timeout: number | undefined): number {
  if (timeout === undefined || Number.isNaN(timeout)) {
    return DEFAULT_TIMEOUT_SECONDS;
  }
  return Math.min(MAX_TIMEOUT_SECONDS, Math.max(MIN_TIMEOUT_SECONDS, timeout));
}

export function normalizeRetryCount(retryCount: number | undefined): number {
  if (retryCount === undefined || !Number.isFinite(retryCount)) return 0;
  return Math.max(0, Math.trunc(retryCount));
}

export function buildLookupUrl(
  query: Pick<LookupQuery, 'bundleId' | 'country'>,
  endpoint = LOOKUP_ENDPOINT,
): string {
  const url = new URL(endpoint);
  url.searchParams.set('bundleId', query.bundleId);
  if (query.country) {
    url.searchParams.set('country', query.country);
  }
  return url.toString();
}

/**
 * Storefront for the process locale (`en-US` -> `US`), or null when the
 * locale carries no region.
 */
export function defaultCountryCode(
  locale = Intl.DateTimeFormat().resolvedOptions().locale,
): string | null {
  try {
    return normalizeCountryCode(new Intl.Locale(locale).region);
  } catch {
    return null;
  }
}
