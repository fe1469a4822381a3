import { spawn, ChildProcess } from 'node:child_process';
import { ProcessTimeoutError } from '../errors.js';

export interface LaunchSpec {
  command: string;
  args: readonly string[];
  cwd: string;
  env?: NodeJS.ProcessEnv;
}

export interface CompletedProcess {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  output: string; // stdout and stderr interleaved in arrival order
}

// Each child leads its own process group so that whatever it spawns (the
// compiled binary behind `go run`, for one) dies with it.
const GROUP_KILL = process.platform !== 'win32';

// Detached groups do not see signals sent to the harness, so every child that
// is still running is tracked here for killLiveChildren.
const live = new Set<ChildProcess>();

function launch(spec: LaunchSpec): ChildProcess {
  const child = spawn(spec.command, [...spec.args], {
    cwd: spec.cwd,
    env: spec.env ?? process.env,
    stdio: ['ignore', 'pipe', 'pipe'],
    detached: GROUP_KILL,
  });
  if (child.pid === undefined) return child;
  live.add(child);
  child.once('exit', () => { live.delete(child); });
  return child;
}

function collectOutput(child: ChildProcess, chunks: string[]): void {
  for (const stream of [child.stdout, child.stderr]) {
    if (!stream) continue;
    stream.setEncoding('utf8');
    stream.on('data', (d: string) => { chunks.push(d); });
  }
}

function closeStreams(child: ChildProcess): void {
  child.stdout?.destroy();
  child.stderr?.destroy();
}

export function signalTree(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined) return;
  if (GROUP_KILL) {
    try {
      process.kill(-child.pid, signal);
      return;
    } catch {
      // group already gone or not ours; fall through to the direct child
    }
  }
  child.kill(signal);
}

export function liveChildCount(): number {
  return live.size;
}

/**
 * SIGKILLs the process group of every child still running. Synchronous, so it
 * can run from a signal handler right before the harness exits.
 */
export function killLiveChildren(): number {
  const count = live.size;
  for (const child of live) signalTree(child, 'SIGKILL');
  live.clear();
  return count;
}

/**
 * Runs a command to completion. Rejects with ProcessTimeoutError once
 * `timeoutMs` elapses (after SIGKILL-ing the process group), or with the
 * spawn error when the command cannot be launched.
 */
export function runToCompletion(spec: LaunchSpec, timeoutMs: number): Promise<CompletedProcess> {
  return new Promise((resolve, reject) => {
    const child = launch(spec);
    const chunks: string[] = [];
    let settled = false;
    collectOutput(child, chunks);

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      signalTree(child, 'SIGKILL');
      closeStreams(child);
      reject(new ProcessTimeoutError(timeoutMs));
    }, timeoutMs);

    child.once('error', (err) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      closeStreams(child);
      reject(err);
    });

    child.once('close', (code, signal) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({ exitCode: code, signal, output: chunks.join('') });
    });
  });
}

export interface ExitInfo {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

/** A long-running child whose output is buffered and whose exit is tracked. */
export class BackgroundProcess {
  private readonly chunks: string[] = [];
  private exitInfo: ExitInfo | null = null;
  private lastError: Error | null = null;
  private readonly exited: Promise<void>;

  constructor(private readonly child: ChildProcess) {
    collectOutput(child, this.chunks);
    this.exited = new Promise((resolve) => {
      child.once('exit', (exitCode, signal) => {
        this.exitInfo = { exitCode, signal };
        resolve();
      });
      child.on('error', (err) => {
        this.lastError = err;
        // spawn failed: there is no process to wait for
        if (child.pid === undefined && !this.exitInfo) {
          this.exitInfo = { exitCode: null, signal: null };
          resolve();
        }
      });
    });
  }

  static launch(spec: LaunchSpec): BackgroundProcess {
    return new BackgroundProcess(launch(spec));
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get hasExited(): boolean {
    return this.exitInfo !== null;
  }

  get exit(): ExitInfo | null {
    return this.exitInfo;
  }

  get error(): Error | null {
    return this.lastError;
  }

  get output(): string {
    return this.chunks.join('');
  }

  /** Resolves true if the process exited within `ms`. */
  async waitForExit(ms: number): Promise<boolean> {
    if (this.exitInfo) return true;
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), ms);
    });
    try {
      return await Promise.race([this.exited.then(() => true as const), timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  /** SIGTERM, then SIGKILL if the process is still alive after `graceMs`. */
  async terminate(graceMs: number): Promise<void> {
    try {
      if (this.exitInfo) return;
      signalTree(this.child, 'SIGTERM');
      if (await this.waitForExit(graceMs)) return;
      signalTree(this.child, 'SIGKILL');
      await this.waitForExit(graceMs);
    } finally {
      closeStreams(this.child);
    }
  }
}

/**
 * Launches a background process for the duration of `fn` and terminates it on
 * every exit path, including a throw from `fn`.
 */
export async function withBackgroundProcess<T>(
  spec: LaunchSpec,
  terminateGraceMs: number,
  fn: (proc: BackgroundProcess) => Promise<T>
): Promise<T> {
  const proc = BackgroundProcess.launch(spec);
  try {
    return await fn(proc);
  } finally {
    await proc.terminate(terminateGraceMs);
  }
}
