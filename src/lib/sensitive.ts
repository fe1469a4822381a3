// Case-insensitive key patterns; broad but deterministic
const TOKENS: RegExp[] = [
  /password/i,
  /passwd/i,
  /api_?key/i,
  /secret/i,
  /token/i,
  /authorization/i,
  /credential/i,
  /private_?key/i,
];

export function isSensitiveKey(key: string): boolean {
  return TOKENS.some((rx) => rx.test(key));
}

/** Shows only the first `visible` characters, so a secret never reaches the terminal whole. */
export function maskValue(value: string, visible = 20): string {
  return `${value.slice(0, visible)}...`;
}

export function describeEnvValue(key: string, value: string): string {
  return isSensitiveKey(key) ? maskValue(value) : value;
}
