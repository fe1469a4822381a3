// src/lib/error-messages.ts
export const ERR_MSG = {
  EXIT_CODE: "Exit code: {code}",
  TERMINATED_BY_SIGNAL: "Terminated by signal {signal}",
  TIMED_OUT: "Timed out after {seconds}s",
  HEALTH_CHECK_STATUS: "Health check failed: HTTP {status}",
  HEALTH_CHECK_ERROR: "Health check failed: {reason}",
  EXITED_BEFORE_HEALTH_CHECK: "Process exited before health check (exit code {code})",
  UNKNOWN_CATEGORY: "Unknown test category: {category}",
  DEPRECATED_NOT_RUN: "Example is deprecated; not executed",
  NOT_SELECTED: "Not selected",
  HTTP_SERVICE_OK: "HTTP service OK",
} as const;

export type ErrKey = keyof typeof ERR_MSG;

export function msg(key: ErrKey): string {
  return ERR_MSG[key];
}

// Tiny templating for codes, signals and limits
export function fmt(key: ErrKey, vars: Record<string, string | number> = {}): string {
  let s: string = ERR_MSG[key];
  for (const [k, v] of Object.entries(vars)) s = s.split(`{${k}}`).join(String(v));
  return s;
}
