import { describe, it, expect } from 'vitest';
import { createLogger } from '../src/logger.js';
import { installShutdownHandlers, onShutdownSignal, SIGNAL_EXIT_CODES } from '../src/process/signals.js';
import { BackgroundProcess } from '../src/process/supervisor.js';
import { nodeScript } from './helpers/fixtures.js';

const silent = createLogger('test', 'silent');

describe('shutdown signals', () => {
  it('uses the shell convention for exit codes', () => {
    expect(SIGNAL_EXIT_CODES).toEqual({ SIGINT: 130, SIGTERM: 143 });
  });

  it('kills running examples before exiting', async () => {
    const [command, ...args] = nodeScript('setInterval(() => {}, 1000)');
    const proc = BackgroundProcess.launch({ command, args, cwd: process.cwd() });
    const codes: number[] = [];

    onShutdownSignal('SIGTERM', silent, (code) => { codes.push(code); });

    expect(codes).toEqual([143]);
    expect(await proc.waitForExit(3000)).toBe(true);
    expect(proc.exit?.signal).toBe('SIGKILL');
  });

  it('installs one handler per signal and removes them again', () => {
    const before = { SIGINT: process.listenerCount('SIGINT'), SIGTERM: process.listenerCount('SIGTERM') };
    const dispose = installShutdownHandlers(silent, () => {});

    expect(process.listenerCount('SIGINT')).toBe(before.SIGINT + 1);
    expect(process.listenerCount('SIGTERM')).toBe(before.SIGTERM + 1);

    dispose();
    expect(process.listenerCount('SIGINT')).toBe(before.SIGINT);
    expect(process.listenerCount('SIGTERM')).toBe(before.SIGTERM);
  });
});
