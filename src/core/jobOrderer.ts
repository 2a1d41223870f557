/**
 * Priority ordering of jobs ahead of batching
 */

import { Job } from '../types';
import { ValidationError, ValidationErrorCode } from '../errors';
import { JobQueue } from './jobQueue';

/**
 * Returns the jobs sorted by (priority ascending, input index ascending).
 *
 * Jobs sharing a priority always keep their input order; batch boundaries
 * downstream depend on it. The input array is not modified.
 */
export function orderJobs(jobs: readonly Job[]): Job[] {
  const queue = new JobQueue();

  jobs.forEach((job, index) => {
    if (!Number.isInteger(job.priority) || job.priority <= 0) {
      throw new ValidationError(
        ValidationErrorCode.INVALID_JOB_FIELD,
        `Job "${job.id}" has invalid priority ${job.priority}: expected a positive integer`,
        { path: ['jobs', index, 'priority'], jobId: job.id }
      );
    }
    queue.enqueue(job, index);
  });

  return queue.drain();
}
