import { errorMessage, ProcessTimeoutError } from '../errors.js';
import { fmt } from '../lib/error-messages.js';
import { startStopwatch } from '../lib/stopwatch.js';
import { runToCompletion } from '../process/supervisor.js';
import { failed, passed, timedOut, TestOutcome } from '../types/outcome.js';
import { CategoryRunner, launchSpecFor, preview, printBanner, RunContext } from './base.js';

export type ForegroundMode = 'run' | 'compile';

/**
 * Runs an example to completion under its timeout. Serves the API and QUICK
 * categories, and build-checks every example in compile mode.
 */
export class ForegroundRunner implements CategoryRunner {
  constructor(private readonly label: string, private readonly mode: ForegroundMode = 'run') {}

  async run(context: RunContext): Promise<TestOutcome> {
    const { descriptor, config, print, logger } = context;
    const argv = this.mode === 'compile' ? config.compileCommand : descriptor.command ?? config.runCommand;
    const timeoutSeconds = this.mode === 'compile' ? config.compileTimeoutSeconds : descriptor.timeoutSeconds;
    const spec = launchSpecFor(argv, descriptor, config);

    printBanner(print, `Test: ${descriptor.name} (${this.label})`);
    logger.debug({ example: descriptor.name, command: spec.command, args: spec.args, timeoutSeconds }, 'launching example');

    const elapsed = startStopwatch();
    try {
      const result = await runToCompletion(spec, timeoutSeconds * 1000);
      const duration = elapsed();
      print(preview(result.output, config.outputPreviewChars));
      print();

      if (result.exitCode === 0) {
        return passed(descriptor.name, result.output, duration);
      }
      const error = result.exitCode !== null
        ? fmt('EXIT_CODE', { code: result.exitCode })
        : fmt('TERMINATED_BY_SIGNAL', { signal: result.signal ?? 'unknown' });
      logger.info({ example: descriptor.name, exitCode: result.exitCode, signal: result.signal }, 'example failed');
      return failed(descriptor.name, error, duration, result.output);
    } catch (e) {
      const duration = elapsed();
      if (e instanceof ProcessTimeoutError) {
        print(`⏱️  Timed out (${timeoutSeconds}s)`);
        print();
        logger.info({ example: descriptor.name, timeoutSeconds }, 'example timed out');
        return timedOut(descriptor.name, fmt('TIMED_OUT', { seconds: timeoutSeconds }), duration);
      }
      const message = errorMessage(e);
      print(`❌ Exception: ${message}`);
      print();
      logger.warn({ example: descriptor.name, err: message }, 'example could not be launched');
      return failed(descriptor.name, message, duration);
    }
  }
}
