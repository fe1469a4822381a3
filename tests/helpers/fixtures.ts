import { existsSync, mkdtempSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { HarnessConfigInput, loadConfig } from '../../src/config.js';
import { createLogger } from '../../src/logger.js';
import { RunContext } from '../../src/runners/base.js';
import { Category, TestDescriptor } from '../../src/types/descriptor.js';

export const MISSING_COMMAND = 'example-harness-missing-command';

/** argv running a one-line script with the current node binary. */
export function nodeScript(code: string): string[] {
  return [process.execPath, '-e', code];
}

export function descriptor(
  name: string,
  category: Category,
  command?: string[],
  timeoutSeconds = 10
): TestDescriptor {
  return { name, category, timeoutSeconds, ...(command ? { command } : {}) };
}

export function testConfig(overrides: Partial<HarnessConfigInput> = {}) {
  return loadConfig(overrides, {});
}

export function captureContext(d: TestDescriptor, overrides: Partial<HarnessConfigInput> = {}): RunContext & { lines: string[] } {
  const lines: string[] = [];
  return {
    descriptor: d,
    config: testConfig(overrides),
    print: (line = '') => { lines.push(line); },
    logger: createLogger('test', 'silent'),
    lines,
  };
}

export function tempDir(prefix = 'example-harness-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/** False once the process is gone or only a zombie waiting to be reaped. */
export function isAlive(pid: number): boolean {
  if (process.platform === 'linux') {
    const status = `/proc/${pid}/status`;
    if (!existsSync(status)) return false;
    return !/^State:\s+Z/m.test(readFileSync(status, 'utf8'));
  }
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

/** Polls until `pid` is no longer alive; resolves whether it died in time. */
export async function waitUntilGone(pid: number, timeoutMs = 3000): Promise<boolean> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (!isAlive(pid)) return true;
    await sleep(25);
  }
  return !isAlive(pid);
}

/** Polls for a pid written to `file` by a child process. */
export async function readPidFile(file: string, timeoutMs = 5000): Promise<number> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    const pid = existsSync(file) ? Number(readFileSync(file, 'utf8')) : 0;
    if (pid > 0) return pid;
    await sleep(25);
  }
  throw new Error(`no pid written to ${file}`);
}

/**
 * argv for a child that starts a grandchild in the child's process group, the
 * way `go run` leaves a compiled binary behind. The grandchild writes its pid
 * to `pidFile`; both then idle.
 */
export function spawnsGrandchild(pidFile: string): string[] {
  const grandchild = `require('node:fs').writeFileSync(${JSON.stringify(pidFile)}, String(process.pid)); setInterval(() => {}, 1000)`;
  return nodeScript(
    `require('node:child_process').spawn(process.execPath, ['-e', ${JSON.stringify(grandchild)}], { stdio: 'ignore' }); setInterval(() => {}, 1000)`
  );
}
