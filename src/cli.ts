import { Command, InvalidArgumentError, Option } from 'commander';
import { loadCatalog, CategorySchema, Selection } from './catalog/index.js';
import { HarnessConfigInput, loadConfig } from './config.js';
import { loadEnvFile } from './env-file.js';
import { HarnessMode, runHarness } from './harness.js';
import { Print } from './runners/base.js';

interface CommonOptions {
  root?: string;
  dotenv?: string;
  catalog?: string;
  report?: string;
}

interface SelectOptions extends CommonOptions {
  only?: string[];
  category?: string;
}

function parseList(value: string): string[] {
  const names = value.split(',').map((s) => s.trim()).filter(Boolean);
  if (names.length === 0) throw new InvalidArgumentError('expected a comma-separated list of example names');
  return names;
}

function toOverrides(opts: CommonOptions, mode: HarnessMode): Partial<HarnessConfigInput> {
  const overrides: Partial<HarnessConfigInput> = {};
  if (opts.root) overrides.rootDir = opts.root;
  if (opts.catalog) overrides.catalogPath = opts.catalog;
  if (opts.report) {
    if (mode === 'compile') overrides.compileReportPath = opts.report;
    else overrides.reportPath = opts.report;
  }
  return overrides;
}

function toSelection(opts: SelectOptions): Selection {
  return {
    ...(opts.only ? { only: opts.only } : {}),
    ...(opts.category ? { category: CategorySchema.parse(opts.category) } : {}),
  };
}

function addCommonOptions(cmd: Command): Command {
  return cmd
    .option('--root <dir>', 'directory the example commands run from (HARNESS_ROOT)')
    // not --env-file: Node 20 claims that flag for itself even after the script path
    .option('--dotenv <path>', 'dotenv file loaded before anything runs (HARNESS_ENV_FILE)')
    .option('--catalog <path>', 'catalog of examples (HARNESS_CATALOG)');
}

function addSelectOptions(cmd: Command): Command {
  return cmd
    .option('--report <path>', 'where the JSON report is written')
    .option('--only <names>', 'comma-separated example names to run; the rest are reported as skipped', parseList)
    .addOption(new Option('--category <category>', 'run only examples of this category').choices(['api', 'http', 'quick', 'deprecated']));
}

/**
 * `exit` receives the process exit code of `run` and `compile`; `print` is
 * where the human-readable report goes.
 */
export function buildProgram(exit: (code: number) => void, print: Print = console.log): Command {
  const program = new Command();
  program
    .name('example-harness')
    .description('Runs every example in the catalog, classifies each outcome and writes a JSON report');

  for (const mode of ['run', 'compile'] as const) {
    const description = mode === 'run'
      ? 'run each example and check its outcome (default)'
      : 'build-check each example without running it';
    const cmd = addSelectOptions(addCommonOptions(program.command(mode, { isDefault: mode === 'run' }).description(description)));
    cmd.action(async (opts: SelectOptions) => {
      exit(await runHarness({
        mode,
        print,
        overrides: toOverrides(opts, mode),
        selection: toSelection(opts),
        ...(opts.dotenv ? { envFile: opts.dotenv } : {}),
      }));
    });
  }

  addCommonOptions(program.command('list').description('print the catalog')).action(async (opts: CommonOptions) => {
    await loadEnvFile(opts.dotenv ?? process.env.HARNESS_ENV_FILE ?? '.env');
    const config = loadConfig(toOverrides(opts, 'run'));
    const descriptors = await loadCatalog(config.catalogPath);
    for (const d of descriptors) {
      print(`${d.name.padEnd(20)} ${d.category.toLowerCase().padEnd(10)} ${d.timeoutSeconds}s`);
    }
  });

  return program;
}
