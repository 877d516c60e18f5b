/**
 * Is the given string `null`, `undefined` or blank?
 */
export function isNullOrBlank(value: string | null | undefined): value is null | undefined | "" {
  return value === null || value === undefined || value.trim().length === 0;
}

/**
 * Is there something other than whitespace in the string?
 */
export function isNotNullOrBlank(value: string | null | undefined): value is string {
  return !isNullOrBlank(value);
}

/**
 * Are all the given strings non-blank?
 *
 * @returns false when called without arguments
 */
export function areNotNullOrBlank(...values: Array<string | null | undefined>): boolean {
  if (values.length === 0) {
    return false;
  }
  return values.every((value) => isNotNullOrBlank(value));
}

/**
 * Repeat a string `times` times. Non-positive counts give an empty string.
 */
export function repeat(value: string, times: number): string {
  return times > 0 ? value.repeat(times) : "";
}

/**
 * Surround a string with double quotes; `null`/`undefined` become `"null"`.
 */
export function quoted(value: string | null | undefined): string {
  if (value === null || value === undefined) {
    return "null";
  }
  return `"${value}"`;
}

/**
 * First `count` characters of the string, or the whole string when shorter.
 */
export function firstChars(value: string, count: number): string;
export function firstChars(value: string | null | undefined, count: number): string | null | undefined;
export function firstChars(value: string | null | undefined, count: number): string | null | undefined {
  if (value === null || value === undefined) {
    return value;
  }
  return value.length > count ? value.substring(0, count) : value;
}
