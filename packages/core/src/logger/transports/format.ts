import type { LogFields } from "../types.js";

const BARE_VALUE = /^[^\s="]+$/;

function formatValue(value: unknown): string {
  if (value instanceof Error) {
    return JSON.stringify(value.message);
  }
  if (typeof value === "string") {
    return BARE_VALUE.test(value) ? value : JSON.stringify(value);
  }
  if (typeof value === "object" && value !== null) {
    return JSON.stringify(value, jsonReplacer);
  }
  return String(value);
}

/**
 * `key=value` pairs in insertion order. Strings with spaces, quotes or `=`
 * are JSON-quoted; undefined fields are skipped.
 *
 * @example
 * ```typescript
 * formatFields({ component: "weblate", error: "HTTP 503", attempt: 2 });
 * // 'component=weblate error="HTTP 503" attempt=2'
 * ```
 */
export function formatFields(fields: LogFields): string {
  return Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(" ");
}

/** `JSON.stringify` replacer that keeps the name and message of errors. */
export function jsonReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}
