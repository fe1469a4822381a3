import { HarnessConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import { fmt, msg } from '../lib/error-messages.js';
import { startStopwatch } from '../lib/stopwatch.js';
import { BackgroundProcess, withBackgroundProcess } from '../process/supervisor.js';
import { failed, passed, TestOutcome } from '../types/outcome.js';
import { CategoryRunner, launchSpecFor, printBanner, RunContext } from './base.js';

export type ProbeResult = { ok: true } | { ok: false; reason: string };

const POLL_INITIAL_DELAY_MS = 100;
const POLL_MAX_DELAY_MS = 1000;

/** One GET against the health endpoint; any 2xx counts as healthy. */
export async function probeHealth(url: string, timeoutMs: number): Promise<ProbeResult> {
  try {
    const res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    await res.arrayBuffer();
    if (res.ok) return { ok: true };
    return { ok: false, reason: fmt('HEALTH_CHECK_STATUS', { status: res.status }) };
  } catch (e) {
    return { ok: false, reason: fmt('HEALTH_CHECK_ERROR', { reason: describeFetchError(e) }) };
  }
}

// undici hides the socket error (ECONNREFUSED etc.) behind a generic "fetch failed"
function describeFetchError(e: unknown): string {
  if (e instanceof Error && e.cause instanceof Error) return `${e.message} (${e.cause.message})`;
  return errorMessage(e);
}

type Readiness = { kind: 'exited' } | { kind: 'probed'; probe: ProbeResult };

/**
 * `fixed` waits out the whole grace period (returning early only if the
 * process dies) and probes once. `poll` probes with doubling back-off until
 * the first healthy answer or the end of the grace period.
 */
async function awaitReadiness(proc: BackgroundProcess, config: HarnessConfig): Promise<Readiness> {
  if (config.readiness === 'fixed') {
    if (await proc.waitForExit(config.startupGraceMs)) return { kind: 'exited' };
    return { kind: 'probed', probe: await probeHealth(config.healthUrl, config.healthTimeoutMs) };
  }

  const deadline = Date.now() + config.startupGraceMs;
  let delay = POLL_INITIAL_DELAY_MS;
  while (Date.now() < deadline) {
    const probe = await probeHealth(config.healthUrl, config.healthTimeoutMs);
    if (probe.ok) return { kind: 'probed', probe };
    const wait = Math.max(0, Math.min(delay, deadline - Date.now()));
    if (await proc.waitForExit(wait)) return { kind: 'exited' };
    delay = Math.min(delay * 2, POLL_MAX_DELAY_MS);
  }
  if (proc.hasExited) return { kind: 'exited' };
  return { kind: 'probed', probe: await probeHealth(config.healthUrl, config.healthTimeoutMs) };
}

function exitReason(proc: BackgroundProcess): string {
  if (proc.error) return proc.error.message;
  const exit = proc.exit;
  if (exit?.signal) return fmt('TERMINATED_BY_SIGNAL', { signal: exit.signal });
  return fmt('EXITED_BEFORE_HEALTH_CHECK', { code: exit?.exitCode ?? 'unknown' });
}

/**
 * Starts an example that serves HTTP, checks its health endpoint and always
 * stops it again afterwards.
 */
export class HttpRunner implements CategoryRunner {
  async run(context: RunContext): Promise<TestOutcome> {
    const { descriptor, config, print, logger } = context;
    const spec = launchSpecFor(descriptor.command ?? config.runCommand, descriptor, config);

    printBanner(print, `Test: ${descriptor.name} (HTTP)`);
    logger.debug({ example: descriptor.name, command: spec.command, args: spec.args }, 'starting background example');

    const elapsed = startStopwatch();
    try {
      return await withBackgroundProcess(spec, config.terminateGraceMs, async (proc) => {
        const readiness = await awaitReadiness(proc, config);
        const duration = elapsed();

        if (readiness.kind === 'exited') {
          const reason = exitReason(proc);
          print(`✗ ${reason}`);
          print();
          logger.info({ example: descriptor.name, exit: proc.exit }, 'background example exited early');
          return failed(descriptor.name, reason, duration, proc.output);
        }
        if (readiness.probe.ok) {
          print('✓ HTTP service started');
          print();
          return passed(descriptor.name, msg('HTTP_SERVICE_OK'), duration);
        }
        print(`✗ ${readiness.probe.reason}`);
        print();
        logger.info({ example: descriptor.name, url: config.healthUrl, reason: readiness.probe.reason }, 'health check failed');
        return failed(descriptor.name, readiness.probe.reason, duration, proc.output);
      });
    } catch (e) {
      const message = errorMessage(e);
      print(`✗ ${message}`);
      print();
      logger.warn({ example: descriptor.name, err: message }, 'HTTP example could not be run');
      return failed(descriptor.name, message, elapsed());
    }
  }
}
