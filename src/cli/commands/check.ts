import { readConfig } from '../../config.js';
import type { HttpClient } from '../../lookup/http.js';
import { defaultCountryCode } from '../../lookup/query.js';
import type { UpdateInfo } from '../../types.js';
import { Updeto } from '../../updeto.js';

export interface CheckOptions {
  installed?: string;
  country?: string;
  timeout?: string;
  retries?: string;
  detailed?: boolean;
  verbose?: boolean;
}

export interface CheckDeps {
  http?: HttpClient;
  log?: (line: string) => void;
}

export async function runCheck(
  root: string,
  bundleIdArg: string | undefined,
  opts: CheckOptions,
  deps: CheckDeps = {},
): Promise<UpdateInfo> {
  const config = await readConfig(root);
  const log = deps.log ?? ((line: string) => console.error(line));

  const bundleId = bundleIdArg ?? config.bundleId;
  if (!bundleId) {
    throw new Error(
      'Missing bundle id. Pass it as an argument or set bundleId in .updeto.yml',
    );
  }
  const installedVersion = opts.installed ?? config.installedVersion;
  if (!installedVersion) {
    throw new Error(
      'Missing installed version. Pass --installed or set installedVersion in .updeto.yml',
    );
  }

  const country =
    opts.country === 'auto' ? defaultCountryCode() : (opts.country ?? config.country);

  const updeto = Updeto.appStore({
    bundleId,
    installedVersion,
    country,
    requestTimeout:
      opts.timeout !== undefined
        ? parseNumber(opts.timeout, '--timeout')
        : config.timeout,
    retryCount:
      opts.retries !== undefined
        ? parseNumber(opts.retries, '--retries')
        : config.retryCount,
    lookup: {
      http: deps.http,
      retryDelayMs: config.retryDelayMs,
      retryMissingResponse: config.retryMissingResponse,
      onRetry: opts.verbose
        ? ({ attempt, maxAttempts, error }) =>
            log(`Retrying lookup (attempt ${attempt}/${maxAttempts}): ${error.message}`)
        : undefined,
    },
  });

  if (opts.verbose) {
    log(`Looking up ${bundleId}${country ? ` in ${country}` : ''}`);
  }
  return opts.detailed ? updeto.checkInfoDetailed() : updeto.checkInfo();
}

function parseNumber(value: string, flag: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n < 0) {
    throw new Error(`Invalid ${flag} value "${value}": expected a non-negative number`);
  }
  return n;
}
