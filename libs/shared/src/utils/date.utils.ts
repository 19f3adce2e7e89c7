/**
 * Date utility functions for the repair platform
 */

/**
 * Format a date as a UTC ISO-8601 string, the form every stored timestamp takes
 */
export function formatDateToISO(date: Date): string {
  return date.toISOString();
}
