import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { ulid } from 'ulid';
import { RESULT_LABELS, ResultKind, TestOutcome } from './types/outcome.js';

export interface ReportEntry {
  name: string;
  result: ResultKind;
  label: string;
  duration: number; // seconds
  error: string | null;
}

export interface ReportSummary {
  runId: string;
  generatedAt: string;
  total: number;
  passed: number;
  failed: number;
  timeout: number;
  skipped: number;
  deprecated: number;
  tests: ReportEntry[];
}

const RULE = '='.repeat(60);

export function partition(outcomes: readonly TestOutcome[]): Record<ResultKind, TestOutcome[]> {
  const groups: Record<ResultKind, TestOutcome[]> = { PASS: [], FAIL: [], TIMEOUT: [], SKIP: [], DEPRECATED: [] };
  for (const o of outcomes) groups[o.result].push(o);
  return groups;
}

export function summarize(outcomes: readonly TestOutcome[], now: Date = new Date()): ReportSummary {
  const groups = partition(outcomes);
  return {
    runId: ulid(now.getTime()),
    generatedAt: now.toISOString(),
    total: outcomes.length,
    passed: groups.PASS.length,
    failed: groups.FAIL.length,
    timeout: groups.TIMEOUT.length,
    skipped: groups.SKIP.length,
    deprecated: groups.DEPRECATED.length,
    tests: outcomes.map((o) => ({
      name: o.name,
      result: o.result,
      label: RESULT_LABELS[o.result],
      duration: o.durationSeconds,
      error: o.error,
    })),
  };
}

/** One line per outcome, sorted by name, each error on an indented line below. */
export function formatResults(outcomes: readonly TestOutcome[]): string[] {
  const lines: string[] = [];
  const sorted = [...outcomes].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const o of sorted) {
    const duration = o.durationSeconds > 0 ? `(${o.durationSeconds.toFixed(2)}s)` : '';
    lines.push(`${RESULT_LABELS[o.result].padEnd(12)} ${o.name.padEnd(20)} ${duration}`.trimEnd());
    if (o.error) lines.push(`             Error: ${o.error}`);
  }
  return lines;
}

export function formatCounts(summary: ReportSummary): string[] {
  return [
    RULE,
    '  Totals',
    RULE,
    `Total: ${summary.total}`,
    `Passed: ${summary.passed}`,
    `Failed: ${summary.failed}`,
    `Timed out: ${summary.timeout}`,
    `Skipped: ${summary.skipped}`,
    `Deprecated: ${summary.deprecated}`,
  ];
}

export function formatReport(summary: ReportSummary, outcomes: readonly TestOutcome[]): string[] {
  return [RULE, '  Test report', RULE, '', ...formatResults(outcomes), '', ...formatCounts(summary), ''];
}

export function exitCodeFor(summary: Pick<ReportSummary, 'failed' | 'timeout'>): 0 | 1 {
  return summary.failed === 0 && summary.timeout === 0 ? 0 : 1;
}

export function verdict(summary: ReportSummary): string {
  const bad = summary.failed + summary.timeout;
  return bad === 0 ? '✅ All tests passed!' : `❌ ${bad} test(s) failed or timed out`;
}

/** Overwrites `path` with the summary as indented JSON; returns the absolute path. */
export async function writeReport(path: string, summary: ReportSummary): Promise<string> {
  const fullPath = resolve(path);
  await mkdir(dirname(fullPath), { recursive: true });
  await writeFile(fullPath, JSON.stringify(summary, null, 2) + '\n', 'utf8');
  return fullPath;
}
