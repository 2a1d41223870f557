/**
 * Greedy batch packing
 */

import { Batch, Constraints, Job } from '../types';

interface OpenBatch {
  jobs: Job[];
  accumulatedVolume: number;
  representativeTime: number;
}

function emptyBatch(): OpenBatch {
  return { jobs: [], accumulatedVolume: 0, representativeTime: 0 };
}

/**
 * Partitions priority-ordered jobs into consecutive batches.
 *
 * Single left-to-right pass, first fit in order: a job joins the open batch
 * when the summed volume stays within maxVolume and the batch has fewer than
 * maxItems members, otherwise the open batch is closed and the job starts a
 * new one. This is deliberately not bin-packing optimal. A later job never
 * fills a gap left in an earlier batch, so concatenating the batches always
 * yields the input sequence.
 *
 * Limits are only checked against a non-empty batch. A job whose volume
 * alone exceeds maxVolume is therefore placed in a batch of its own instead
 * of being rejected.
 */
export function buildBatches(jobs: readonly Job[], constraints: Constraints): Batch[] {
  const batches: Batch[] = [];
  let open = emptyBatch();

  const close = (): void => {
    batches.push({
      index: batches.length,
      jobs: open.jobs,
      accumulatedVolume: open.accumulatedVolume,
      representativeTime: open.representativeTime,
    });
    open = emptyBatch();
  };

  for (const job of jobs) {
    const fitsVolume = open.accumulatedVolume + job.volume <= constraints.maxVolume;
    const fitsItems = open.jobs.length < constraints.maxItems;

    if (open.jobs.length > 0 && (!fitsVolume || !fitsItems)) {
      close();
    }

    open.jobs.push(job);
    open.accumulatedVolume += job.volume;
    open.representativeTime = Math.max(open.representativeTime, job.printTime);
  }

  if (open.jobs.length > 0) {
    close();
  }

  return batches;
}

/**
 * True for a single-job batch whose volume exceeds maxVolume
 */
export function isOversized(batch: Batch, constraints: Constraints): boolean {
  return batch.jobs.length === 1 && batch.accumulatedVolume > constraints.maxVolume;
}
