import { describe, it, expect, afterEach } from 'vitest';
import { Ajv } from 'ajv';
import { readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { runDescriptors } from '../src/harness.js';
import { createLogger } from '../src/logger.js';
import { summarize, writeReport } from '../src/reporter.js';
import { descriptor, nodeScript, tempDir, testConfig } from './helpers/fixtures.js';

describe('Contracts: report schema', () => {
  const schema = JSON.parse(readFileSync('contracts/report.schema.json', 'utf8'));
  const ajv = new Ajv({ allErrors: true, strict: false });
  const validate = ajv.compile(schema);
  let dir = '';

  afterEach(() => { if (dir) rmSync(dir, { recursive: true, force: true }); });

  it('a written report matches the schema', async () => {
    dir = tempDir();
    const outcomes = await runDescriptors([
      descriptor('quick-ok', 'QUICK', nodeScript('process.exit(0)')),
      descriptor('quick-bad', 'QUICK', nodeScript('process.exit(2)')),
      descriptor('legacy', 'DEPRECATED'),
    ], { config: testConfig(), print: () => {}, logger: createLogger('test', 'silent') });
    const summary = summarize(outcomes);
    const path = await writeReport(join(dir, 'report.json'), summary);

    const json: unknown = JSON.parse(readFileSync(path, 'utf8'));
    expect(validate(json)).toBe(true);
    expect(validate.errors ?? []).toEqual([]);
    expect(json).toEqual(summary);
    expect(summary.tests[1].error).toBe('Exit code: 2');
  });

  it('rejects a report without the test list', () => {
    const { tests, ...withoutTests } = summarize([]);
    expect(tests).toEqual([]);
    expect(validate(withoutTests)).toBe(false);
    expect(validate.errors?.[0]?.params).toEqual({ missingProperty: 'tests' });
  });
});
