import { describe, it, expect } from 'vitest';
import { devNull } from 'node:os';
import { loadConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConfigError) return e;
    throw e;
  }
  throw new Error('expected a ConfigError');
}

describe('loadConfig', () => {
  it('falls back to the documented defaults', () => {
    const config = loadConfig({}, {});
    expect(config).toEqual({
      rootDir: process.cwd(),
      catalogPath: 'catalog/examples.yaml',
      reportPath: 'test_report.json',
      compileReportPath: 'compile_report.json',
      healthUrl: 'http://localhost:8080/health',
      healthTimeoutMs: 5000,
      startupGraceMs: 3000,
      readiness: 'fixed',
      terminateGraceMs: 2000,
      outputPreviewChars: 500,
      runCommand: ['go', 'run', './examples/{name}/'],
      compileCommand: ['go', 'build', '-o', devNull, './examples/{name}/'],
      compileTimeoutSeconds: 60,
    });
  });

  it('coerces HARNESS_* variables', () => {
    const config = loadConfig({}, {
      HARNESS_HEALTH_TIMEOUT_MS: '250',
      HARNESS_READINESS: 'poll',
      HARNESS_RUN_COMMAND: '  node   run.js {name} ',
      HARNESS_HEALTH_URL: 'http://127.0.0.1:9000/ready',
    });
    expect(config.healthTimeoutMs).toBe(250);
    expect(config.readiness).toBe('poll');
    expect(config.runCommand).toEqual(['node', 'run.js', '{name}']);
    expect(config.healthUrl).toBe('http://127.0.0.1:9000/ready');
  });

  it('lets overrides win over the environment', () => {
    const config = loadConfig({ reportPath: 'out/report.json' }, { HARNESS_REPORT: 'env.json' });
    expect(config.reportPath).toBe('out/report.json');
  });

  it('treats empty variables as unset', () => {
    expect(loadConfig({}, { HARNESS_STARTUP_GRACE_MS: '' }).startupGraceMs).toBe(3000);
  });

  it('names the offending variables when validation fails', () => {
    const err = configError(() => loadConfig({}, { HARNESS_READINESS: 'sometimes', HARNESS_STARTUP_GRACE_MS: '-5' }));
    expect(err.type).toBe('CONFIG');
    expect(err.details?.some((d) => d.startsWith('HARNESS_READINESS: '))).toBe(true);
    expect(err.details?.some((d) => d.startsWith('HARNESS_STARTUP_GRACE_MS: '))).toBe(true);
  });

  it('rejects a blank command template', () => {
    const err = configError(() => loadConfig({}, { HARNESS_RUN_COMMAND: '   ' }));
    expect(err.details).toEqual(['HARNESS_RUN_COMMAND: command must not be empty']);
  });
});
