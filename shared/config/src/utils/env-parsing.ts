/**
 * Environment Variable Parsing Utilities
 *
 * Value-based parsing functions that accept a raw string value and return
 * a parsed value or a safe default. They work with pre-read values so the
 * loader can take any env mapping, not only process.env.
 *
 * Conventions:
 * - Returns `defaultValue` for `undefined`, empty string, or unparsable input
 * - Does NOT throw; range checks belong to the zod schema
 * - Warns with a `[CONFIG]` prefix when a label is given and input is discarded
 */

/**
 * Parse a string value as an integer, returning `defaultValue` if
 * the value is undefined, empty, or not a valid integer.
 *
 * @example
 * ```typescript
 * const port = safeParseInt(process.env.PORT, 8000);
 * ```
 */
export function safeParseInt(value: string | undefined, defaultValue: number, label?: string): number {
  if (!value) return defaultValue;
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    if (label) console.warn(`[CONFIG] Invalid integer value for ${label}: "${value}" - using default`);
    return defaultValue;
  }
  return parseInt(trimmed, 10);
}

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

/**
 * Parse a boolean flag. Accepts true/false, 1/0, yes/no, on/off (any case).
 */
export function parseEnvBoolean(value: string | undefined, defaultValue: boolean, label?: string): boolean {
  if (!value) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  if (label) console.warn(`[CONFIG] Invalid boolean value for ${label}: "${value}" - using default`);
  return defaultValue;
}

/**
 * Read a string, treating empty/whitespace-only values as absent.
 */
export function envString(value: string | undefined, defaultValue: string): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : defaultValue;
}
