import type {
  CheckOptions,
  LookupOutcome,
  LookupResult,
  UpdateInfo,
} from '../types.js';

export const PROVIDER_KINDS = [
  'base',
  'errorAware',
  'infoProviding',
  'errorAwareInfo',
] as const;
export type ProviderKind = (typeof PROVIDER_KINDS)[number];

export interface ProviderCapabilities {
  /** Surfaces the error taxonomy instead of collapsing it into `noResults`. */
  errors: boolean;
  /** Produces full `UpdateInfo` envelopes. */
  info: boolean;
}

export const PROVIDER_CAPABILITIES: Record<ProviderKind, ProviderCapabilities> =
  {
    base: { errors: false, info: false },
    errorAware: { errors: true, info: false },
    infoProviding: { errors: false, info: true },
    errorAwareInfo: { errors: true, info: true },
  };

interface ProviderIdentity {
  readonly bundleId: string;
  readonly installedVersion: string;
  /** Store identifier learned from the last lookup; empty while unknown. */
  appId: string;
  readonly country?: string | null;
}

export interface StatusProvider extends ProviderIdentity {
  checkStatus(options?: CheckOptions): Promise<LookupResult>;
}

export interface DetailedStatusProvider extends StatusProvider {
  checkStatusDetailed(
    options?: CheckOptions,
  ): Promise<LookupOutcome<LookupResult>>;
}

export interface InfoProvider extends StatusProvider {
  checkInfo(options?: CheckOptions): Promise<UpdateInfo>;
}

export interface DetailedInfoProvider
  extends DetailedStatusProvider,
    InfoProvider {
  checkInfoDetailed(options?: CheckOptions): Promise<LookupOutcome<UpdateInfo>>;
}

export type BaseUpdateProvider = StatusProvider & { readonly kind: 'base' };
export type ErrorAwareUpdateProvider = DetailedStatusProvider & {
  readonly kind: 'errorAware';
};
export type InfoUpdateProvider = InfoProvider & {
  readonly kind: 'infoProviding';
};
export type ErrorAwareInfoUpdateProvider = DetailedInfoProvider & {
  readonly kind: 'errorAwareInfo';
};

/**
 * Any backend able to answer "is the app updated". The `kind` tag tells
 * which operations it implements; the facade derives the rest.
 */
export type UpdateProvider =
  | BaseUpdateProvider
  | ErrorAwareUpdateProvider
  | InfoUpdateProvider
  | ErrorAwareInfoUpdateProvider;
