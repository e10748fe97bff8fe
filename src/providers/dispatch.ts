import { noResultsInfo } from '../lookup/client.js';
import { toLookupFailure } from '../errors.js';
import {
  appStoreUrlFor,
  failure,
  mapOutcome,
  success,
  type CheckOptions,
  type LookupOutcome,
  type LookupResult,
  type UpdateInfo,
} from '../types.js';
import type { UpdateProvider } from './types.js';

/*
 * Each operation is derived from whatever tier the provider implements.
 * Simple operations never reject; detailed ones never reject either and
 * report failures in the outcome. Only an aborted signal escapes.
 */

export async function resolveStatus(
  provider: UpdateProvider,
  options: CheckOptions = {},
): Promise<LookupResult> {
  const outcome = await settle(() => provider.checkStatus(options), options);
  return outcome.ok ? outcome.value : 'noResults';
}

export async function resolveStatusDetailed(
  provider: UpdateProvider,
  options: CheckOptions = {},
): Promise<LookupOutcome<LookupResult>> {
  switch (provider.kind) {
    case 'base':
      return settle(() => provider.checkStatus(options), options);
    case 'infoProviding': {
      const outcome = await settle(() => provider.checkInfo(options), options);
      return mapOutcome(outcome, (info) => info.result);
    }
    case 'errorAware':
    case 'errorAwareInfo':
      return flatten(
        await settle(() => provider.checkStatusDetailed(options), options),
      );
  }
}

export async function resolveInfo(
  provider: UpdateProvider,
  options: CheckOptions = {},
): Promise<UpdateInfo> {
  switch (provider.kind) {
    case 'infoProviding':
    case 'errorAwareInfo': {
      const outcome = await settle(() => provider.checkInfo(options), options);
      return outcome.ok ? outcome.value : noResultsFor(provider);
    }
    case 'base':
    case 'errorAware': {
      const outcome = await resolveInfoDetailed(provider, options);
      return outcome.ok ? outcome.value : noResultsFor(provider);
    }
  }
}

export async function resolveInfoDetailed(
  provider: UpdateProvider,
  options: CheckOptions = {},
): Promise<LookupOutcome<UpdateInfo>> {
  switch (provider.kind) {
    case 'errorAwareInfo':
      return flatten(
        await settle(() => provider.checkInfoDetailed(options), options),
      );
    case 'infoProviding':
      return settle(() => provider.checkInfo(options), options);
    case 'base':
    case 'errorAware': {
      const outcome = await resolveStatusDetailed(provider, options);
      return mapOutcome(outcome, (result) => synthesizeInfo(provider, result));
    }
  }
}

/**
 * Wraps a bare result from a provider that cannot produce envelopes. The
 * store version is unknown; the store id is whatever the provider knows.
 */
export function synthesizeInfo(
  provider: UpdateProvider,
  result: LookupResult,
): UpdateInfo {
  if (result === 'noResults') return noResultsFor(provider);
  const appId = provider.appId || null;
  return {
    result,
    installedVersion: provider.installedVersion,
    storeVersion: null,
    appId,
    appStoreUrl: appStoreUrlFor(appId),
    bundleId: provider.bundleId,
    country: provider.country ?? null,
  };
}

function noResultsFor(provider: UpdateProvider): UpdateInfo {
  return noResultsInfo({
    bundleId: provider.bundleId,
    installedVersion: provider.installedVersion,
    country: provider.country ?? null,
  });
}

async function settle<T>(
  run: () => Promise<T>,
  options: CheckOptions,
): Promise<LookupOutcome<T>> {
  try {
    return success(await run());
  } catch (error) {
    options.signal?.throwIfAborted();
    return failure(toLookupFailure(error));
  }
}

function flatten<T>(
  outcome: LookupOutcome<LookupOutcome<T>>,
): LookupOutcome<T> {
  return outcome.ok ? outcome.value : outcome;
}
