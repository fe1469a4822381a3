import { HarnessConfig } from '../config.js';
import { Logger } from '../logger.js';
import { LaunchSpec } from '../process/supervisor.js';
import { Category, TestDescriptor } from '../types/descriptor.js';
import { TestOutcome } from '../types/outcome.js';

export type Print = (line?: string) => void;

export interface RunContext {
  descriptor: TestDescriptor;
  config: HarnessConfig;
  print: Print;
  logger: Logger;
}

/** Runs one descriptor. Implementations never throw; every failure becomes an outcome. */
export interface CategoryRunner {
  run(context: RunContext): Promise<TestOutcome>;
}

export type RunnerRegistry = Map<Category, CategoryRunner>;

export const BANNER = '━'.repeat(28);

export function printBanner(print: Print, title: string): void {
  print(BANNER);
  print(title);
  print(BANNER);
}

/** Expands `{name}` in every argument of `argv` and runs it from the configured root. */
export function launchSpecFor(argv: readonly string[], descriptor: TestDescriptor, config: HarnessConfig): LaunchSpec {
  const [command, ...args] = argv.map((arg) => arg.split('{name}').join(descriptor.name));
  return { command, args, cwd: config.rootDir, env: { ...process.env } };
}

export function preview(output: string, maxChars: number): string {
  return output.length > maxChars ? output.slice(0, maxChars) : output;
}
