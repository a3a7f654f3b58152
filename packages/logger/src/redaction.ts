/**
 * Paths censored from every log line. Wildcards follow pino's redact syntax.
 */
export const DEFAULT_REDACT_PATHS: readonly string[] = [
  "apiKey",
  "*.apiKey",
  "token",
  "*.token",
  "password",
  "*.password",
  "secret",
  "*.secret",
  "authorization",
  "*.authorization",
  "headers.authorization",
];

export function mergeRedactPaths(extra: readonly string[] = []): string[] {
  return [...new Set([...DEFAULT_REDACT_PATHS, ...extra])];
}
