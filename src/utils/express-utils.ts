/**
 * Utility functions for handling Express request values
 */

/**
 * Converts a string | string[] | undefined to a single string
 */
export function toString(value: string | string[] | undefined): string {
  if (value === undefined) return '';
  return Array.isArray(value) ? (value[0] ?? '') : value;
}
