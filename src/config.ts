import { devNull } from 'node:os';
import { z } from 'zod';
import { ConfigError } from './errors.js';

export const DEFAULT_RUN_COMMAND = 'go run ./examples/{name}/';
export const DEFAULT_COMPILE_COMMAND = `go build -o ${devNull} ./examples/{name}/`;

const positiveInt = z.coerce.number().int().positive();

const CommandTemplateSchema = z
  .string()
  .transform((s) => s.trim().split(/\s+/).filter(Boolean))
  .refine((argv) => argv.length > 0, { message: 'command must not be empty' });

export const HarnessConfigSchema = z.object({
  rootDir: z.string().min(1).default(() => process.cwd()),
  catalogPath: z.string().min(1).default('catalog/examples.yaml'),
  reportPath: z.string().min(1).default('test_report.json'),
  compileReportPath: z.string().min(1).default('compile_report.json'),
  healthUrl: z.string().url().default('http://localhost:8080/health'),
  healthTimeoutMs: positiveInt.default(5000),
  startupGraceMs: positiveInt.default(3000),
  readiness: z.enum(['fixed', 'poll']).default('fixed'),
  terminateGraceMs: positiveInt.default(2000),
  outputPreviewChars: positiveInt.default(500),
  runCommand: CommandTemplateSchema.default(DEFAULT_RUN_COMMAND),
  compileCommand: CommandTemplateSchema.default(DEFAULT_COMPILE_COMMAND),
  compileTimeoutSeconds: positiveInt.default(60),
});

export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;
export type HarnessConfigInput = z.input<typeof HarnessConfigSchema>;

const ENV_KEYS: Record<keyof HarnessConfigInput, string> = {
  rootDir: 'HARNESS_ROOT',
  catalogPath: 'HARNESS_CATALOG',
  reportPath: 'HARNESS_REPORT',
  compileReportPath: 'HARNESS_COMPILE_REPORT',
  healthUrl: 'HARNESS_HEALTH_URL',
  healthTimeoutMs: 'HARNESS_HEALTH_TIMEOUT_MS',
  startupGraceMs: 'HARNESS_STARTUP_GRACE_MS',
  readiness: 'HARNESS_READINESS',
  terminateGraceMs: 'HARNESS_TERMINATE_GRACE_MS',
  outputPreviewChars: 'HARNESS_OUTPUT_PREVIEW_CHARS',
  runCommand: 'HARNESS_RUN_COMMAND',
  compileCommand: 'HARNESS_COMPILE_COMMAND',
  compileTimeoutSeconds: 'HARNESS_COMPILE_TIMEOUT_S',
};

function envKeyFor(field: string): string {
  return Object.entries(ENV_KEYS).find(([f]) => f === field)?.[1] ?? field;
}

/**
 * Builds the configuration from `HARNESS_*` environment variables, with
 * `overrides` (CLI flags) taking precedence. Empty variables count as unset.
 */
export function loadConfig(
  overrides: Partial<HarnessConfigInput> = {},
  env: NodeJS.ProcessEnv = process.env
): HarnessConfig {
  const raw: Record<string, unknown> = {};
  for (const [field, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') raw[field] = value;
  }
  for (const [field, value] of Object.entries(overrides)) {
    if (value !== undefined) raw[field] = value;
  }

  const parsed = HarnessConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.errors.map((issue) => {
      const field = String(issue.path[0] ?? '');
      return `${envKeyFor(field)}: ${issue.message}`;
    });
    throw new ConfigError('Invalid harness configuration', details);
  }
  return parsed.data;
}
