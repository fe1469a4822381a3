export type ErrorType =
  | 'CONFIG'
  | 'CATALOG'
  | 'TIMEOUT';

/**
 * Base for failures that stop the harness before any example runs. Failures
 * of an individual example never surface as exceptions; runners turn them
 * into outcomes.
 */
export class HarnessError extends Error {
  constructor(readonly type: ErrorType, message: string, readonly details?: string[]) {
    super(message);
    this.name = 'HarnessError';
  }
}

export class ConfigError extends HarnessError {
  constructor(message: string, details?: string[]) {
    super('CONFIG', message, details);
    this.name = 'ConfigError';
  }
}

export class CatalogError extends HarnessError {
  constructor(message: string, details?: string[]) {
    super('CATALOG', message, details);
    this.name = 'CatalogError';
  }
}

export class ProcessTimeoutError extends HarnessError {
  constructor(readonly timeoutMs: number) {
    super('TIMEOUT', `process did not finish within ${timeoutMs}ms`);
    this.name = 'ProcessTimeoutError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function describeHarnessError(error: HarnessError): string {
  const lines = [`${error.type}: ${error.message}`];
  for (const d of error.details ?? []) lines.push(`  - ${d}`);
  return lines.join('\n');
}
