import { compareVersions, toLookupResult, type VersionOrder } from '../../compare.js';
import type { LookupResult } from '../../types.js';

export interface CompareResult {
  storeVersion: string;
  installedVersion: string;
  order: VersionOrder;
  result: LookupResult;
}

export function runCompare(
  storeVersion: string,
  installedVersion: string,
): CompareResult {
  if (!storeVersion.trim() || !installedVersion.trim()) {
    throw new Error('Both versions must be non-empty');
  }
  const order = compareVersions(storeVersion, installedVersion);
  return { storeVersion, installedVersion, order, result: toLookupResult(order) };
}
