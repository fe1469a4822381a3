export type ResultKind = 'PASS' | 'FAIL' | 'TIMEOUT' | 'SKIP' | 'DEPRECATED';

export const RESULT_LABELS: Record<ResultKind, string> = {
  PASS: '✅ PASS',
  FAIL: '❌ FAIL',
  TIMEOUT: '⏱️  TIMEOUT',
  SKIP: '⏭️  SKIP',
  DEPRECATED: '⚠️  DEPRECATED',
};

interface OutcomeBase {
  readonly name: string;
  readonly output: string;
  readonly durationSeconds: number;
}

export type TestOutcome =
  | (OutcomeBase & { readonly result: 'PASS' | 'DEPRECATED'; readonly error: null })
  | (OutcomeBase & { readonly result: 'FAIL' | 'TIMEOUT' | 'SKIP'; readonly error: string });

export function passed(name: string, output: string, durationSeconds: number): TestOutcome {
  const outcome: TestOutcome = { name, result: 'PASS', output, error: null, durationSeconds };
  return Object.freeze(outcome);
}

export function failed(name: string, error: string, durationSeconds: number, output = ''): TestOutcome {
  const outcome: TestOutcome = { name, result: 'FAIL', output, error, durationSeconds };
  return Object.freeze(outcome);
}

// Output is never retained for a timed-out run.
export function timedOut(name: string, error: string, durationSeconds: number): TestOutcome {
  const outcome: TestOutcome = { name, result: 'TIMEOUT', output: '', error, durationSeconds };
  return Object.freeze(outcome);
}

export function skipped(name: string, error: string): TestOutcome {
  const outcome: TestOutcome = { name, result: 'SKIP', output: '', error, durationSeconds: 0 };
  return Object.freeze(outcome);
}

export function deprecated(name: string, output: string): TestOutcome {
  const outcome: TestOutcome = { name, result: 'DEPRECATED', output, error: null, durationSeconds: 0 };
  return Object.freeze(outcome);
}
