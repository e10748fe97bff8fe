import type { LookupFailure } from './errors.js';

export const LOOKUP_RESULTS = [
  'updated',
  'outdated',
  'developmentOrBeta',
  'noResults',
] as const;
export type LookupResult = (typeof LOOKUP_RESULTS)[number];

const DESCRIPTIONS: Record<LookupResult, string> = {
  updated: 'The app is currently the latest version',
  outdated: 'The app has an update available',
  developmentOrBeta:
    'The app version is either from a development or beta build',
  noResults:
    'The query produced no results, check that the bundle id is correct',
};

export function describeLookupResult(result: LookupResult): string {
  return DESCRIPTIONS[result];
}

export interface UpdateInfo {
  result: LookupResult;
  installedVersion: string;
  storeVersion: string | null;
  appId: string | null;
  appStoreUrl: string | null;
  bundleId: string;
  country: string | null;
}

export function isUpdateAvailable(info: UpdateInfo): boolean {
  return info.result === 'outdated';
}

export type LookupOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: LookupFailure };

export function success<T>(value: T): LookupOutcome<T> {
  return { ok: true, value };
}

export function failure<T>(error: LookupFailure): LookupOutcome<T> {
  return { ok: false, error };
}

export function mapOutcome<T, U>(
  outcome: LookupOutcome<T>,
  fn: (value: T) => U,
): LookupOutcome<U> {
  return outcome.ok ? success(fn(outcome.value)) : outcome;
}

const APP_STORE_URL_PREFIX = 'itms-apps://apple.com/app/id';

/** Deep link to the store page, or null while the store id is unknown. */
export function appStoreUrlFor(appId: string | null | undefined): string | null {
  if (!appId) return null;
  return `${APP_STORE_URL_PREFIX}${appId}`;
}

export interface CheckOptions {
  signal?: AbortSignal;
}
