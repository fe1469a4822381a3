import { fmt, msg } from './lib/error-messages.js';
import { CategoryRunner, printBanner, RunContext, RunnerRegistry } from './runners/base.js';
import { ForegroundRunner } from './runners/foreground.js';
import { HttpRunner } from './runners/http.js';
import { Category } from './types/descriptor.js';
import { deprecated, failed, TestOutcome } from './types/outcome.js';

export function createRunners(): RunnerRegistry {
  const runners = new Map<Category, CategoryRunner>();

  runners.set('API', new ForegroundRunner('API'));
  runners.set('QUICK', new ForegroundRunner('local'));
  runners.set('HTTP', new HttpRunner());

  return runners;
}

/**
 * Routes a descriptor to the runner for its category. Deprecated examples are
 * recorded without launching anything.
 */
export async function dispatch(context: RunContext, runners: RunnerRegistry): Promise<TestOutcome> {
  const { descriptor, print, logger } = context;

  if (descriptor.category === 'DEPRECATED') {
    printBanner(print, `Test: ${descriptor.name} (deprecated, skipped)`);
    print(`⚠️  ${msg('DEPRECATED_NOT_RUN')}.`);
    print();
    return deprecated(descriptor.name, msg('DEPRECATED_NOT_RUN'));
  }

  const runner = runners.get(descriptor.category);
  if (!runner) {
    logger.error({ example: descriptor.name, category: descriptor.category }, 'no runner registered for category');
    return failed(descriptor.name, fmt('UNKNOWN_CATEGORY', { category: descriptor.category }), 0);
  }
  return runner.run(context);
}
