import { Logger } from '../logger.js';
import { killLiveChildren } from './supervisor.js';

export const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM'] as const;
export type ShutdownSignal = (typeof SHUTDOWN_SIGNALS)[number];

// 128 + signal number, the code a shell reports for a process killed by it
export const SIGNAL_EXIT_CODES: Record<ShutdownSignal, number> = { SIGINT: 130, SIGTERM: 143 };

/** Kills every example still running and exits with the signal's code. */
export function onShutdownSignal(signal: ShutdownSignal, logger: Logger, exit: (code: number) => void): void {
  const killed = killLiveChildren();
  logger.warn({ signal, killed }, 'interrupted, running examples killed');
  exit(SIGNAL_EXIT_CODES[signal]);
}

/** Returns a function that removes the handlers again. */
export function installShutdownHandlers(
  logger: Logger,
  exit: (code: number) => void = (code) => process.exit(code)
): () => void {
  const installed = SHUTDOWN_SIGNALS.map((signal) => {
    const handler = () => onShutdownSignal(signal, logger, exit);
    process.once(signal, handler);
    return { signal, handler };
  });
  return () => {
    for (const { signal, handler } of installed) process.off(signal, handler);
  };
}
