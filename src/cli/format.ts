import { describeLookupResult, type LookupResult, type UpdateInfo } from '../types.js';

export function formatTsvKeyValue(pairs: [string, string][]): string {
  return pairs.map(([k, v]) => `${k}\t${v}`).join('\n');
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

export function updateInfoToTsv(info: UpdateInfo): string {
  return formatTsvKeyValue([
    ['result', info.result],
    ['bundle_id', info.bundleId],
    ['installed_version', info.installedVersion],
    ['store_version', info.storeVersion ?? ''],
    ['app_id', info.appId ?? ''],
    ['app_store_url', info.appStoreUrl ?? ''],
    ['country', info.country ?? ''],
    ['message', describeLookupResult(info.result)],
  ]);
}

export function lookupResultToTsv(result: LookupResult): string {
  return formatTsvKeyValue([
    ['result', result],
    ['message', describeLookupResult(result)],
  ]);
}
