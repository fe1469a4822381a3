import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { ConfigError, errorMessage } from './errors.js';
import { describeEnvValue } from './lib/sensitive.js';

export const DEFAULT_DIAGNOSTIC_KEYS = ['ANTHROPIC_API_KEY', 'ANTHROPIC_BASE_URL'] as const;

export interface EnvFileResult {
  path: string;
  found: boolean;
  keys: string[];
}

function stripQuotes(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if ((first === '"' || first === "'") && first === last) return value.slice(1, -1);
  }
  return value;
}

/**
 * Parses dotenv-style content: one KEY=VALUE per line, split on the first `=`.
 * Blank lines, `#` comments and lines without `=` are ignored.
 */
export function parseEnvContent(content: string): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith('#')) continue;
    const eq = line.indexOf('=');
    if (eq === -1) continue;
    const key = line.slice(0, eq).trim();
    if (!key) continue;
    pairs.push([key, stripQuotes(line.slice(eq + 1).trim())]);
  }
  return pairs;
}

export async function loadEnvFile(path: string, env: NodeJS.ProcessEnv = process.env): Promise<EnvFileResult> {
  const fullPath = resolve(path);
  let content: string;
  try {
    content = await readFile(fullPath, 'utf8');
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      return { path: fullPath, found: false, keys: [] };
    }
    throw new ConfigError(`Failed to read env file ${fullPath}`, [errorMessage(e)]);
  }

  const keys: string[] = [];
  for (const [key, value] of parseEnvContent(content)) {
    env[key] = value;
    keys.push(key);
  }
  return { path: fullPath, found: true, keys };
}

export function envDiagnostics(
  result: EnvFileResult,
  diagnosticKeys: readonly string[] = DEFAULT_DIAGNOSTIC_KEYS,
  env: NodeJS.ProcessEnv = process.env
): string[] {
  if (!result.found) return [];
  const lines = [`✓ Loaded ${result.keys.length} variable(s) from ${result.path}`];
  for (const key of diagnosticKeys) {
    const value = env[key];
    if (value) lines.push(`  ${key}: ${describeEnvValue(key, value)}`);
  }
  return lines;
}
