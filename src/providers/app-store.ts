import { LookupClient, noResultsInfo } from '../lookup/client.js';
import {
  createLookupQuery,
  normalizeCountryCode,
  normalizeRetryCount,
  normalizeTimeout,
  type LookupQuery,
} from '../lookup/query.js';
import {
  appStoreUrlFor,
  mapOutcome,
  type CheckOptions,
  type LookupOutcome,
  type LookupResult,
  type UpdateInfo,
} from '../types.js';
import type { ErrorAwareInfoUpdateProvider } from './types.js';

export interface AppStoreProviderOptions {
  bundleId: string;
  installedVersion: string;
  country?: string | null;
  /** Seconds per attempt. */
  requestTimeout?: number;
  retryCount?: number;
  appId?: string;
  client?: LookupClient;
}

/** Checks the App Store catalog through the iTunes lookup endpoint. */
export class AppStoreProvider implements ErrorAwareInfoUpdateProvider {
  readonly kind = 'errorAwareInfo' as const;

  readonly bundleId: string;
  readonly installedVersion: string;
  appId: string;

  private readonly client: LookupClient;
  private _country: string | null;
  private _requestTimeout: number;
  private _retryCount: number;

  constructor(options: AppStoreProviderOptions) {
    this.bundleId = options.bundleId;
    this.installedVersion = options.installedVersion;
    this.appId = options.appId ?? '';
    this.client = options.client ?? new LookupClient();
    this._country = normalizeCountryCode(options.country);
    this._requestTimeout = normalizeTimeout(options.requestTimeout);
    this._retryCount = normalizeRetryCount(options.retryCount);
  }

  get country(): string | null {
    return this._country;
  }

  set country(value: string | null) {
    this._country = normalizeCountryCode(value);
  }

  get requestTimeout(): number {
    return this._requestTimeout;
  }

  set requestTimeout(value: number) {
    this._requestTimeout = normalizeTimeout(value);
  }

  get retryCount(): number {
    return this._retryCount;
  }

  set retryCount(value: number) {
    this._retryCount = normalizeRetryCount(value);
  }

  get appStoreUrl(): string | null {
    return appStoreUrlFor(this.appId);
  }

  async checkStatus(options?: CheckOptions): Promise<LookupResult> {
    const outcome = await this.checkInfoDetailed(options);
    return outcome.ok ? outcome.value.result : 'noResults';
  }

  async checkStatusDetailed(
    options?: CheckOptions,
  ): Promise<LookupOutcome<LookupResult>> {
    const outcome = await this.checkInfoDetailed(options);
    return mapOutcome(outcome, (info) => info.result);
  }

  async checkInfo(options?: CheckOptions): Promise<UpdateInfo> {
    const outcome = await this.checkInfoDetailed(options);
    return outcome.ok ? outcome.value : noResultsInfo(this.query());
  }

  async checkInfoDetailed(
    options?: CheckOptions,
  ): Promise<LookupOutcome<UpdateInfo>> {
    const outcome = await this.client.lookup(this.query(), options?.signal);
    // Last successful lookup wins when checks overlap.
    if (outcome.ok && outcome.value.appId) {
      this.appId = outcome.value.appId;
    }
    return outcome;
  }

  private query(): LookupQuery {
    return createLookupQuery({
      bundleId: this.bundleId,
      installedVersion: this.installedVersion,
      country: this._country,
      timeout: this._requestTimeout,
      retryCount: this._retryCount,
    });
  }
}
