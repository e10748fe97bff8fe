import type { LookupResult } from './types.js';

/**
 * Where the store version sits relative to the installed one:
 * `after` means the store is ahead, `before` means the local build is.
 */
export type VersionOrder = 'before' | 'same' | 'after';

const DELIMITER = '.';
const RUN_PATTERN = /\d+|\D+/g;
const DIGITS = /^\d+$/;

/**
 * Compares dotted version strings after right-padding the shorter one with
 * `0` components, so `1.2` and `1.2.0` are the same version.
 *
 * Components compare in natural order: digit runs by numeric value (leading
 * zeros ignored, no size limit) and any other run by code unit, with a
 * component that is a strict prefix of another ordering first. That makes
 * `1.9` < `1.10` and `1.0.0-beta` < `1.0.0-rc`.
 */
export function compareVersions(
  storeVersion: string,
  installedVersion: string,
): VersionOrder {
  const store = storeVersion.split(DELIMITER);
  const installed = installedVersion.split(DELIMITER);
  const length = Math.max(store.length, installed.length);

  for (let i = 0; i < length; i++) {
    const order = compareComponents(store[i] ?? '0', installed[i] ?? '0');
    if (order !== 0) return order > 0 ? 'after' : 'before';
  }
  return 'same';
}

export function toLookupResult(order: VersionOrder): LookupResult {
  switch (order) {
    case 'same':
      return 'updated';
    case 'after':
      return 'outdated';
    case 'before':
      return 'developmentOrBeta';
  }
}

function compareComponents(a: string, b: string): number {
  const runsA = a.match(RUN_PATTERN) ?? [];
  const runsB = b.match(RUN_PATTERN) ?? [];
  const length = Math.min(runsA.length, runsB.length);

  for (let i = 0; i < length; i++) {
    const order = compareRuns(runsA[i] ?? '', runsB[i] ?? '');
    if (order !== 0) return order;
  }
  return runsA.length - runsB.length;
}

function compareRuns(a: string, b: string): number {
  if (DIGITS.test(a) && DIGITS.test(b)) {
    return compareNumeric(a, b);
  }
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function compareNumeric(a: string, b: string): number {
  const x = a.replace(/^0+(?=\d)/, '');
  const y = b.replace(/^0+(?=\d)/, '');
  if (x.length !== y.length) return x.length - y.length;
  if (x === y) return 0;
  return x < y ? -1 : 1;
}
