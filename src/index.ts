export { Updeto, type Completion } from './updeto.js';
export {
  compareVersions,
  toLookupResult,
  type VersionOrder,
} from './compare.js';
export {
  UpdetoError,
  NetworkError,
  BadServerResponseError,
  DecodingError,
  NO_RESPONSE_STATUS,
  isLookupFailure,
  type LookupFailure,
  type UpdetoErrorKind,
} from './errors.js';
export {
  LOOKUP_RESULTS,
  appStoreUrlFor,
  describeLookupResult,
  isUpdateAvailable,
  type CheckOptions,
  type LookupOutcome,
  type LookupResult,
  type UpdateInfo,
} from './types.js';
export {
  LookupClient,
  type LookupClientOptions,
  type RetryEvent,
} from './lookup/client.js';
export {
  fetchHttpClient,
  HttpTimeoutError,
  type HttpClient,
  type HttpRequest,
  type HttpResponse,
} from './lookup/http.js';
export {
  LOOKUP_ENDPOINT,
  buildLookupUrl,
  createLookupQuery,
  defaultCountryCode,
  normalizeCountryCode,
  type LookupQuery,
  type LookupQueryInput,
} from './lookup/query.js';
export type { LookupRecord, LookupResponse } from './lookup/schema.js';
export {
  AppStoreProvider,
  type AppStoreProviderOptions,
} from './providers/app-store.js';
export {
  PROVIDER_CAPABILITIES,
  PROVIDER_KINDS,
  type BaseUpdateProvider,
  type ErrorAwareInfoUpdateProvider,
  type ErrorAwareUpdateProvider,
  type InfoUpdateProvider,
  type ProviderCapabilities,
  type ProviderKind,
  type UpdateProvider,
} from './providers/types.js';
export { VERSION } from './version.js';
