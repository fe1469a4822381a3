#!/usr/bin/env node
import { buildProgram } from './cli.js';
import { describeHarnessError, HarnessError } from './errors.js';
import { logger } from './logger.js';
import { installShutdownHandlers } from './process/signals.js';

async function start() {
  installShutdownHandlers(logger);
  const program = buildProgram((code) => { process.exitCode = code; });
  await program.parseAsync(process.argv);
}

start().catch((error: unknown) => {
  if (error instanceof HarnessError) {
    console.error(describeHarnessError(error));
  } else {
    logger.error({ err: error }, 'harness crashed');
  }
  process.exit(1);
});
