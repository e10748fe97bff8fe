import { Command } from 'commander';
import { isLookupFailure } from '../errors.js';
import { runCheck, type CheckOptions } from './commands/check.js';
import { runCompare } from './commands/compare.js';
import { VERSION } from '../version.js';
import {
  formatJson,
  formatTsvKeyValue,
  lookupResultToTsv,
  updateInfoToTsv,
} from './format.js';

interface GlobalOpts {
  json?: boolean;
  quiet?: boolean;
}

function output(
  data: unknown,
  tsvFn: () => string,
  opts: { json?: boolean; quiet?: boolean },
): void {
  if (opts.quiet) return;
  if (opts.json) {
    console.log(formatJson(data));
  } else {
    console.log(tsvFn());
  }
}

function handleError(err: unknown, json?: boolean): never {
  const message = err instanceof Error ? err.message : String(err);
  if (json) {
    const payload = isLookupFailure(err)
      ? {
          error: message,
          kind: err.kind,
          ...(err.kind === 'badServerResponse'
            ? { statusCode: err.statusCode }
            : {}),
        }
      : { error: message };
    console.error(formatJson(payload));
  } else {
    console.error(`Error: ${message}`);
  }
  process.exit(1);
}

export function createProgram(): Command {
  const program = new Command();
  program
    .name('updeto')
    .version(VERSION)
    .description('Check an installed app version against the App Store')
    .option('--json', 'Print JSON instead of tab-separated output')
    .option('-q, --quiet', 'Print nothing on success');

  // updeto check
  program
    .command('check')
    .description('Look up the published version and compare it')
    .argument('[bundleId]', 'Bundle identifier (defaults to .updeto.yml)')
    .option('-i, --installed <version>', 'Installed version')
    .option('-c, --country <code>', 'Storefront country code, or "auto"')
    .option('-t, --timeout <seconds>', 'Per-attempt timeout in seconds')
    .option('-r, --retries <count>', 'Retries after the first attempt')
    .option('--detailed', 'Fail with the lookup error instead of noResults')
    .option('--verbose', 'Report lookup progress on stderr')
    .action(async (bundleId: string | undefined, opts: CheckOptions) => {
      const parentOpts = program.opts<GlobalOpts>();
      try {
        const info = await runCheck(process.cwd(), bundleId, opts);
        output(info, () => updateInfoToTsv(info), parentOpts);
      } catch (err) {
        handleError(err, parentOpts.json);
      }
    });

  // updeto compare
  program
    .command('compare')
    .description('Compare a store version with an installed version')
    .argument('<storeVersion>')
    .argument('<installedVersion>')
    .action((storeVersion: string, installedVersion: string) => {
      const parentOpts = program.opts<GlobalOpts>();
      try {
        const comparison = runCompare(storeVersion, installedVersion);
        output(
          comparison,
          () =>
            formatTsvKeyValue([
              ['store_version', comparison.storeVersion],
              ['installed_version', comparison.installedVersion],
              ['order', comparison.order],
            ]) +
            '\n' +
            lookupResultToTsv(comparison.result),
          parentOpts,
        );
      } catch (err) {
        handleError(err, parentOpts.json);
      }
    });

  return program;
}

export async function runCli(argv: string[]): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv);
}
