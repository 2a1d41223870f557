/**
 * Time utilities
 */

/**
 * Returns the current timestamp in milliseconds
 */
export function now(): number {
  return Date.now();
}

/**
 * Formats a number of minutes as "45m", "2h" or "4h 30m"
 */
export function formatMinutes(minutes: number): string {
  if (minutes < 60) return `${minutes}m`;
  const hours = Math.floor(minutes / 60);
  const rest = minutes - hours * 60;
  return rest === 0 ? `${hours}h` : `${hours}h ${rest}m`;
}

/**
 * Calculates elapsed time from a start timestamp
 */
export function elapsed(startTime: number): number {
  return now() - startTime;
}
