import { Observable } from 'rxjs';
import { LookupClient, type LookupClientOptions } from './lookup/client.js';
import {
  AppStoreProvider,
  type AppStoreProviderOptions,
} from './providers/app-store.js';
import {
  resolveInfo,
  resolveInfoDetailed,
  resolveStatus,
  resolveStatusDetailed,
} from './providers/dispatch.js';
import {
  PROVIDER_CAPABILITIES,
  type ProviderCapabilities,
  type UpdateProvider,
} from './providers/types.js';
import {
  appStoreUrlFor,
  type CheckOptions,
  type LookupOutcome,
  type LookupResult,
  type UpdateInfo,
} from './types.js';

export type Completion<T> = (value: T) => void;

/**
 * Single entry point for update checks. Every operation is available as a
 * promise, a callback and a cold single-value Observable, whatever tier the
 * wrapped provider implements.
 */
export class Updeto {
  private readonly provider: UpdateProvider;

  constructor(provider: UpdateProvider) {
    this.provider = provider;
  }

  static appStore(
    options: AppStoreProviderOptions & { lookup?: LookupClientOptions },
  ): Updeto {
    const { lookup, ...providerOptions } = options;
    const client = options.client ?? new LookupClient(lookup);
    return new Updeto(new AppStoreProvider({ ...providerOptions, client }));
  }

  get bundleId(): string {
    return this.provider.bundleId;
  }

  get installedVersion(): string {
    return this.provider.installedVersion;
  }

  get appId(): string {
    return this.provider.appId;
  }

  set appId(value: string) {
    this.provider.appId = value;
  }

  get appStoreUrl(): string | null {
    return appStoreUrlFor(this.provider.appId);
  }

  get capabilities(): ProviderCapabilities {
    return { ...PROVIDER_CAPABILITIES[this.provider.kind] };
  }

  // Promise

  checkStatus(options?: CheckOptions): Promise<LookupResult> {
    return resolveStatus(this.provider, options);
  }

  /** Rejects with the `UpdetoError` describing why the lookup failed. */
  async checkStatusDetailed(options?: CheckOptions): Promise<LookupResult> {
    return unwrap(await resolveStatusDetailed(this.provider, options));
  }

  checkInfo(options?: CheckOptions): Promise<UpdateInfo> {
    return resolveInfo(this.provider, options);
  }

  /** Rejects with the `UpdetoError` describing why the lookup failed. */
  async checkInfoDetailed(options?: CheckOptions): Promise<UpdateInfo> {
    return unwrap(await resolveInfoDetailed(this.provider, options));
  }

  // Callback

  checkStatusCallback(completion: Completion<LookupResult>): void {
    deliver(resolveStatus(this.provider), completion);
  }

  checkStatusDetailedCallback(
    completion: Completion<LookupOutcome<LookupResult>>,
  ): void {
    deliver(resolveStatusDetailed(this.provider), completion);
  }

  checkInfoCallback(completion: Completion<UpdateInfo>): void {
    deliver(resolveInfo(this.provider), completion);
  }

  checkInfoDetailedCallback(
    completion: Completion<LookupOutcome<UpdateInfo>>,
  ): void {
    deliver(resolveInfoDetailed(this.provider), completion);
  }

  // Observable

  status$(): Observable<LookupResult> {
    return single((signal) => this.checkStatus({ signal }));
  }

  statusDetailed$(): Observable<LookupResult> {
    return single((signal) => this.checkStatusDetailed({ signal }));
  }

  info$(): Observable<UpdateInfo> {
    return single((signal) => this.checkInfo({ signal }));
  }

  infoDetailed$(): Observable<UpdateInfo> {
    return single((signal) => this.checkInfoDetailed({ signal }));
  }
}

function unwrap<T>(outcome: LookupOutcome<T>): T {
  if (!outcome.ok) throw outcome.error;
  return outcome.value;
}

/**
 * Hands the value to the completion on a later turn, so a throwing
 * completion surfaces as an uncaught exception instead of a rejection.
 */
function deliver<T>(pending: Promise<T>, completion: Completion<T>): void {
  pending.then(
    (value) => {
      setImmediate(() => completion(value));
    },
    (error: unknown) => {
      // resolve* only reject on abort, and callbacks carry no signal.
      setImmediate(() => {
        throw error;
      });
    },
  );
}

function single<T>(run: (signal: AbortSignal) => Promise<T>): Observable<T> {
  return new Observable<T>((subscriber) => {
    const controller = new AbortController();
    run(controller.signal).then(
      (value) => {
        subscriber.next(value);
        subscriber.complete();
      },
      (error: unknown) => {
        if (!controller.signal.aborted) subscriber.error(error);
      },
    );
    return () => controller.abort();
  });
}
