/**
 * String Utilities
 * Shared string manipulation helper functions
 */

/**
 * Escape a string for literal use inside a regular expression
 *
 * @example
 * escapeRegExp("hello.py") // "hello\\.py"
 */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Zero-pad a page number to three digits
 *
 * @example
 * padPageNumber(7) // "007"
 * padPageNumber(1234) // "1234"
 */
export function padPageNumber(num: number): string {
  return String(num).padStart(3, "0");
}

/**
 * Format a date as local "YYYY-MM-DD HH:MM"
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}

/**
 * Format a date as local "YYYYMMDD_HHMMSS" for directory names
 */
export function formatDirectoryStamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
