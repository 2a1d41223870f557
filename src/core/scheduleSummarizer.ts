/**
 * Flattens batches into the final execution order
 */

import { Batch, Schedule } from '../types';

/**
 * Batches run one after another while members of a batch run side by side,
 * so the total is the sum of each batch's slowest print time.
 */
export function summarizeSchedule(batches: readonly Batch[]): Schedule {
  const printOrder: string[] = [];
  let totalTime = 0;

  for (const batch of batches) {
    for (const job of batch.jobs) {
      printOrder.push(job.id);
    }
    totalTime += batch.representativeTime;
  }

  return { batches, printOrder, totalTime };
}
