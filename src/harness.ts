import { isSelected, loadCatalog, Selection, unknownNames } from './catalog/index.js';
import { HarnessConfig, HarnessConfigInput, loadConfig } from './config.js';
import { createRunners, dispatch } from './dispatcher.js';
import { envDiagnostics, loadEnvFile } from './env-file.js';
import { CatalogError } from './errors.js';
import { msg } from './lib/error-messages.js';
import { createLogger, Logger } from './logger.js';
import { exitCodeFor, formatReport, summarize, verdict, writeReport } from './reporter.js';
import { Print, RunnerRegistry } from './runners/base.js';
import { ForegroundRunner } from './runners/foreground.js';
import { TestDescriptor } from './types/descriptor.js';
import { skipped, TestOutcome } from './types/outcome.js';

export type HarnessMode = 'run' | 'compile';

export interface RunDescriptorsOptions {
  config: HarnessConfig;
  mode?: HarnessMode;
  runners?: RunnerRegistry;
  selection?: Selection;
  print?: Print;
  logger?: Logger;
}

/**
 * Runs every descriptor in catalog order, one at a time. Descriptors outside
 * the selection are reported as SKIP so that there is one outcome per entry.
 */
export async function runDescriptors(
  descriptors: readonly TestDescriptor[],
  options: RunDescriptorsOptions
): Promise<TestOutcome[]> {
  const { config, mode = 'run', selection = {}, print = console.log } = options;
  const logger = options.logger ?? createLogger('runner');
  const runners = options.runners ?? createRunners();
  const compiler = new ForegroundRunner('build', 'compile');

  const outcomes: TestOutcome[] = [];
  for (const descriptor of descriptors) {
    if (!isSelected(descriptor, selection)) {
      outcomes.push(skipped(descriptor.name, msg('NOT_SELECTED')));
      continue;
    }
    const context = { descriptor, config, print, logger };
    const outcome = mode === 'compile' ? await compiler.run(context) : await dispatch(context, runners);
    logger.debug({ example: descriptor.name, result: outcome.result, durationSeconds: outcome.durationSeconds }, 'example finished');
    outcomes.push(outcome);
  }
  return outcomes;
}

export interface HarnessOptions {
  mode?: HarnessMode;
  envFile?: string;
  overrides?: Partial<HarnessConfigInput>;
  selection?: Selection;
  runners?: RunnerRegistry;
  print?: Print;
  env?: NodeJS.ProcessEnv;
}

/**
 * The whole run: env file, configuration, catalog, every example, then the
 * printed summary and the JSON report. Returns the process exit code.
 */
export async function runHarness(options: HarnessOptions = {}): Promise<number> {
  const { mode = 'run', selection = {}, print = console.log, env = process.env } = options;
  const logger = createLogger('harness');

  print('='.repeat(60));
  print(mode === 'compile' ? '  Build check of all examples' : '  Runtime check of all examples');
  print('='.repeat(60));
  print();

  const envResult = await loadEnvFile(options.envFile ?? env.HARNESS_ENV_FILE ?? '.env', env);
  const diagnostics = envDiagnostics(envResult, undefined, env);
  for (const line of diagnostics) print(line);
  if (diagnostics.length > 0) print();

  const config = loadConfig(options.overrides, env);
  const descriptors = await loadCatalog(config.catalogPath);
  const unknown = unknownNames(descriptors, selection.only);
  if (unknown.length > 0) {
    throw new CatalogError('Unknown example names passed to --only', unknown);
  }
  logger.info({ mode, examples: descriptors.length, catalog: config.catalogPath }, 'starting run');

  const outcomes = await runDescriptors(descriptors, {
    config,
    mode,
    selection,
    print,
    logger,
    ...(options.runners ? { runners: options.runners } : {}),
  });

  const summary = summarize(outcomes);
  for (const line of formatReport(summary, outcomes)) print(line);

  const reportPath = await writeReport(mode === 'compile' ? config.compileReportPath : config.reportPath, summary);
  print(`✓ Report saved to ${reportPath}`);
  print();
  print(verdict(summary));

  const code = exitCodeFor(summary);
  logger.info({ runId: summary.runId, exitCode: code, failed: summary.failed, timeout: summary.timeout }, 'run finished');
  return code;
}
