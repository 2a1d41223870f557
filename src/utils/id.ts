/**
 * ID generation utilities
 */

let sequence = 0;

/**
 * Generates `<prefix>_<time>-<sequence><random>`. The sequence part keeps
 * ids from one process distinct even within the same millisecond.
 */
export function generateId(prefix: string): string {
  const timestamp = Date.now().toString(36);
  const count = (++sequence).toString(36);
  const random = Math.random().toString(36).substring(2, 6);
  return `${prefix}_${timestamp}-${count}${random}`;
}

/**
 * Generates a plan ID
 */
export function generatePlanId(): string {
  return generateId('plan');
}
