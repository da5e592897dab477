import picomatch from "picomatch";

const MAX_SNIPPET_LENGTH = 120;

export const TEST_PATH_GLOBS: readonly string[] = [
  "**/test/**",
  "**/tests/**",
  "**/__tests__/**",
  "**/fixtures/**",
  "**/*.test.*",
  "**/*.spec.*",
];

const isTestGlob = picomatch([...TEST_PATH_GLOBS], { dot: true });

const PLACEHOLDER_MARKERS =
  /example|sample|dummy|placeholder|changeme|change_me|your[_-]|redacted|xxxx|fake|replace/i;

/**
 * Whether a relative path lies in a test or fixture location.
 */
export function isTestPath(file: string): boolean {
  return isTestGlob(file);
}

/**
 * Whether a matched value is an obvious placeholder rather than a real secret:
 * marker words, template syntax (`<...>`, `${...}`, `{{...}}`) or a single
 * repeated character.
 */
export function isPlaceholderValue(value: string): boolean {
  const trimmed = value.trim();
  if (trimmed.length === 0) return true;
  if (PLACEHOLDER_MARKERS.test(trimmed)) return true;
  if (/^<.*>$/.test(trimmed) || /\$\{[^}]*\}/.test(trimmed) || /\{\{[^}]*\}\}/.test(trimmed)) {
    return true;
  }
  return /^(.)\1*$/.test(trimmed);
}

const ASSIGNED_SECRET =
  /((?:password|passwd|pwd|secret|token|api[_-]?key|apikey|access[_-]?key|private[_-]?key|client[_-]?secret)[\w-]*["']?\s*[:=]\s*["'])([^"']+)(["'])/gi;
const AWS_ACCESS_KEY = /\b(AKIA[0-9A-Z]{4})[0-9A-Z]{12}\b/g;
const BASIC_CREDENTIALS = /(Basic\s+)([A-Za-z0-9+/=]{4})[A-Za-z0-9+/=]*/g;

function maskValue(value: string): string {
  return `${value.slice(0, 4)}****`;
}

/**
 * Replaces credential values in a line with their first four characters
 * followed by `****`.
 */
export function redactSecrets(line: string): string {
  return line
    .replace(
      ASSIGNED_SECRET,
      (_match, prefix: string, value: string, quote: string) => `${prefix}${maskValue(value)}${quote}`
    )
    .replace(AWS_ACCESS_KEY, (_match, head: string) => `${head}****`)
    .replace(BASIC_CREDENTIALS, (_match, prefix: string, head: string) => `${prefix}${head}****`);
}

/**
 * Trims, redacts and truncates a source line for display.
 */
export function toSnippet(line: string): string {
  const snippet = redactSecrets(line.trim());
  if (snippet.length <= MAX_SNIPPET_LENGTH) {
    return snippet;
  }
  return snippet.slice(0, MAX_SNIPPET_LENGTH - 3) + "...";
}
