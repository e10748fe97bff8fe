import { describe, it, expect, vi } from 'vitest';
import { firstValueFrom, lastValueFrom, toArray } from 'rxjs';
import { BadServerResponseError, DecodingError, NetworkError } from './errors.js';
import type { HttpResponse } from './lookup/http.js';
import type {
  BaseUpdateProvider,
  ErrorAwareUpdateProvider,
  InfoUpdateProvider,
} from './providers/types.js';
import { fakeHttp, lookupBody, ok, status } from './testing/fake-http.js';
import type { LookupOutcome, LookupResult, UpdateInfo } from './types.js';
import { Updeto } from './updeto.js';

function baseProvider(result: LookupResult): BaseUpdateProvider {
  return {
    kind: 'base',
    bundleId: 'com.example.custom',
    installedVersion: '3.0',
    appId: '',
    checkStatus: vi.fn(async () => result),
  };
}

function errorAwareProvider(
  outcome: LookupOutcome<LookupResult>,
): ErrorAwareUpdateProvider {
  return {
    kind: 'errorAware',
    bundleId: 'com.example.custom',
    installedVersion: '3.0',
    appId: '77',
    country: 'CA',
    checkStatus: vi.fn(async () => (outcome.ok ? outcome.value : 'noResults')),
    checkStatusDetailed: vi.fn(async () => outcome),
  };
}

function infoProvider(info: UpdateInfo): InfoUpdateProvider {
  return {
    kind: 'infoProviding',
    bundleId: info.bundleId,
    installedVersion: info.installedVersion,
    appId: info.appId ?? '',
    checkStatus: vi.fn(async () => info.result),
    checkInfo: vi.fn(async () => info),
  };
}

function appStore(...replies: Parameters<typeof fakeHttp>) {
  const http = fakeHttp(...replies);
  const updeto = Updeto.appStore({
    bundleId: 'com.example.app',
    installedVersion: '1.0.0',
    country: 'us',
    lookup: { http: http.client },
  });
  return { updeto, get: http.get };
}

const STORE_INFO: UpdateInfo = {
  result: 'outdated',
  installedVersion: '1.0.0',
  storeVersion: '1.1.0',
  appId: '42',
  appStoreUrl: 'itms-apps://apple.com/app/id42',
  bundleId: 'com.example.app',
  country: 'US',
};

describe('Updeto', () => {
  describe('with the App Store provider', () => {
    it('returns the full envelope', async () => {
      const { updeto } = appStore(ok(lookupBody({ version: '1.1.0', trackId: 42 })));
      await expect(updeto.checkInfo()).resolves.toEqual(STORE_INFO);
      expect(updeto.appId).toBe('42');
      expect(updeto.appStoreUrl).toBe('itms-apps://apple.com/app/id42');
    });

    it('exposes the provider identity and capabilities', () => {
      const { updeto } = appStore();
      expect(updeto.bundleId).toBe('com.example.app');
      expect(updeto.installedVersion).toBe('1.0.0');
      expect(updeto.capabilities).toEqual({ errors: true, info: true });
    });

    it('writes the app id through to the provider', () => {
      const { updeto } = appStore();
      updeto.appId = '1001';
      expect(updeto.appStoreUrl).toBe('itms-apps://apple.com/app/id1001');
    });

    it('collapses a malformed body into noResults on the simple path', async () => {
      const { updeto } = appStore(status(200, '{"results": 5'));
      await expect(updeto.checkStatus()).resolves.toBe('noResults');
    });

    it('rejects with a decoding error on the detailed path', async () => {
      const { updeto } = appStore(status(200, '{"results": 5'));
      await expect(updeto.checkStatusDetailed()).rejects.toBeInstanceOf(DecodingError);
    });

    it('rejects with the HTTP status without retrying a 404', async () => {
      const http = fakeHttp(status(404), ok(lookupBody()));
      const updeto = Updeto.appStore({
        bundleId: 'com.example.app',
        installedVersion: '1.0.0',
        retryCount: 1,
        lookup: { http: http.client },
      });

      const error: unknown = await updeto.checkInfoDetailed().catch((e: unknown) => e);
      expect(error).toBeInstanceOf(BadServerResponseError);
      expect(error instanceof BadServerResponseError && error.statusCode).toBe(404);
      expect(http.get).toHaveBeenCalledTimes(1);
    });

    it('has no deep link when the lookup finds nothing', async () => {
      const { updeto } = appStore(ok(lookupBody()));
      const info = await updeto.checkInfoDetailed();
      expect(info.result).toBe('noResults');
      expect(info.appStoreUrl).toBeNull();
      expect(updeto.appStoreUrl).toBeNull();
    });

    it('rejects with the abort reason when the caller cancels', async () => {
      const { updeto, get } = appStore();
      const controller = new AbortController();
      const reason = new Error('gone');
      get.mockImplementationOnce(async () => {
        controller.abort(reason);
        throw reason;
      });
      await expect(updeto.checkStatus({ signal: controller.signal })).rejects.toBe(
        reason,
      );
    });
  });

  describe('callbacks', () => {
    it('delivers the status exactly once', async () => {
      const { updeto } = appStore(ok(lookupBody({ version: '1.0.0' })));
      const completion = vi.fn();
      await new Promise<void>((resolve) => {
        updeto.checkStatusCallback((value) => {
          completion(value);
          resolve();
        });
      });
      await new Promise((resolve) => setImmediate(resolve));
      expect(completion).toHaveBeenCalledTimes(1);
      expect(completion).toHaveBeenCalledWith('updated');
    });

    it('does not call back synchronously', () => {
      const { updeto } = appStore(ok(lookupBody()));
      const completion = vi.fn();
      updeto.checkInfoCallback(completion);
      expect(completion).not.toHaveBeenCalled();
    });

    it('delivers a failure outcome on the detailed variant', async () => {
      const { updeto } = appStore(new Error('offline'));
      const outcome = await new Promise<LookupOutcome<LookupResult>>((resolve) =>
        updeto.checkStatusDetailedCallback(resolve),
      );
      expect(outcome.ok).toBe(false);
      expect(!outcome.ok && outcome.error).toBeInstanceOf(NetworkError);
    });

    it('delivers the envelope on the info variants', async () => {
      const { updeto } = appStore(
        ok(lookupBody({ version: '1.1.0', trackId: 42 })),
        status(500),
      );
      const info = await new Promise<UpdateInfo>((resolve) =>
        updeto.checkInfoCallback(resolve),
      );
      expect(info).toEqual(STORE_INFO);

      const outcome = await new Promise<LookupOutcome<UpdateInfo>>((resolve) =>
        updeto.checkInfoDetailedCallback(resolve),
      );
      expect(!outcome.ok && outcome.error.kind).toBe('badServerResponse');
    });
  });

  describe('streams', () => {
    it('emits one value and completes', async () => {
      const { updeto } = appStore(ok(lookupBody({ version: '0.9.0' })));
      await expect(lastValueFrom(updeto.status$().pipe(toArray()))).resolves.toEqual([
        'developmentOrBeta',
      ]);
    });

    it('is cold: each subscription performs its own lookup', async () => {
      const { updeto, get } = appStore(ok(lookupBody()), ok(lookupBody()));
      const stream = updeto.info$();
      expect(get).not.toHaveBeenCalled();
      await firstValueFrom(stream);
      await firstValueFrom(stream);
      expect(get).toHaveBeenCalledTimes(2);
    });

    it('uses the error channel on the detailed variants', async () => {
      const { updeto } = appStore(status(503));
      const next = vi.fn();
      const error = await new Promise<unknown>((resolve) => {
        updeto.infoDetailed$().subscribe({ next, error: resolve });
      });
      expect(error).toBeInstanceOf(BadServerResponseError);
      expect(next).not.toHaveBeenCalled();
    });

    it('never errors on the simple variants', async () => {
      const { updeto } = appStore(status(503));
      await expect(firstValueFrom(updeto.info$())).resolves.toMatchObject({
        result: 'noResults',
      });
    });

    it('emits the status on the detailed status stream', async () => {
      const { updeto } = appStore(ok(lookupBody({ version: '1.0' })));
      await expect(firstValueFrom(updeto.statusDetailed$())).resolves.toBe('updated');
    });

    it('aborts the lookup when unsubscribed early', async () => {
      const { updeto, get } = appStore();
      const seen: AbortSignal[] = [];
      get.mockImplementationOnce(
        (request) =>
          new Promise<HttpResponse>((_resolve, reject) => {
            if (request.signal) seen.push(request.signal);
            request.signal?.addEventListener('abort', () =>
              reject(request.signal?.reason),
            );
          }),
      );
      const next = vi.fn();
      const error = vi.fn();
      const subscription = updeto.status$().subscribe({ next, error });
      await new Promise((resolve) => setImmediate(resolve));
      subscription.unsubscribe();
      await new Promise((resolve) => setImmediate(resolve));

      expect(seen.map((signal) => signal.aborted)).toEqual([true]);
      expect(next).not.toHaveBeenCalled();
      expect(error).not.toHaveBeenCalled();
    });
  });

  describe('with a base provider', () => {
    it('answers every operation from checkStatus', async () => {
      const provider = baseProvider('outdated');
      const updeto = new Updeto(provider);

      await expect(updeto.checkStatus()).resolves.toBe('outdated');
      await expect(updeto.checkStatusDetailed()).resolves.toBe('outdated');
      await expect(updeto.checkInfo()).resolves.toEqual({
        result: 'outdated',
        installedVersion: '3.0',
        storeVersion: null,
        appId: null,
        appStoreUrl: null,
        bundleId: 'com.example.custom',
        country: null,
      });
      await expect(updeto.checkInfoDetailed()).resolves.toMatchObject({
        result: 'outdated',
      });
      expect(provider.checkStatus).toHaveBeenCalledTimes(4);
      expect(updeto.capabilities).toEqual({ errors: false, info: false });
    });

    it('synthesizes the no-results envelope', async () => {
      const updeto = new Updeto(baseProvider('noResults'));
      await expect(firstValueFrom(updeto.infoDetailed$())).resolves.toMatchObject({
        result: 'noResults',
        appId: null,
        appStoreUrl: null,
      });
    });

    it('keeps the simple shapes total when the provider throws', async () => {
      const provider = baseProvider('updated');
      vi.mocked(provider.checkStatus).mockRejectedValue(new Error('boom'));
      const updeto = new Updeto(provider);

      await expect(updeto.checkStatus()).resolves.toBe('noResults');
      await expect(updeto.checkInfo()).resolves.toMatchObject({ result: 'noResults' });
      await expect(updeto.checkStatusDetailed()).rejects.toBeInstanceOf(NetworkError);
    });
  });

  describe('with an error-aware provider', () => {
    it('uses the detailed status and synthesizes envelopes from it', async () => {
      const updeto = new Updeto(errorAwareProvider({ ok: true, value: 'updated' }));
      await expect(updeto.checkInfoDetailed()).resolves.toEqual({
        result: 'updated',
        installedVersion: '3.0',
        storeVersion: null,
        appId: '77',
        appStoreUrl: 'itms-apps://apple.com/app/id77',
        bundleId: 'com.example.custom',
        country: 'CA',
      });
    });

    it('surfaces its errors on detailed shapes only', async () => {
      const error = new BadServerResponseError(500);
      const provider = errorAwareProvider({ ok: false, error });
      const updeto = new Updeto(provider);

      await expect(updeto.checkStatusDetailed()).rejects.toBe(error);
      await expect(updeto.checkInfoDetailed()).rejects.toBe(error);
      await expect(updeto.checkInfo()).resolves.toEqual({
        result: 'noResults',
        installedVersion: '3.0',
        storeVersion: null,
        appId: null,
        appStoreUrl: null,
        bundleId: 'com.example.custom',
        country: 'CA',
      });
      expect(updeto.capabilities).toEqual({ errors: true, info: false });
    });
  });

  describe('with an info provider', () => {
    it('passes its envelope through and derives the status', async () => {
      const provider = infoProvider(STORE_INFO);
      const updeto = new Updeto(provider);

      await expect(updeto.checkInfoDetailed()).resolves.toBe(STORE_INFO);
      await expect(updeto.checkStatusDetailed()).resolves.toBe('outdated');
      expect(provider.checkInfo).toHaveBeenCalledTimes(2);
      expect(updeto.appStoreUrl).toBe('itms-apps://apple.com/app/id42');
    });
  });
});
