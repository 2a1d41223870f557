/**
 * Metrics for computed plans
 */

import { Constraints, PlanMetrics, Schedule } from '../types';
import { findMinMax } from '../utils/minMax';
import { isOversized } from './batchBuilder';

/**
 * Summarizes how well a schedule fills the available capacity
 */
export function computePlanMetrics(schedule: Schedule, constraints: Constraints): PlanMetrics {
  const { batches } = schedule;
  if (batches.length === 0) {
    return {
      batchCount: 0,
      jobCount: 0,
      oversizedBatchCount: 0,
      volumeUtilization: 0,
      itemUtilization: 0,
      shortestBatchTime: 0,
      longestBatchTime: 0,
    };
  }

  let volumeRatioSum = 0;
  let itemRatioSum = 0;
  let oversized = 0;

  for (const batch of batches) {
    volumeRatioSum += batch.accumulatedVolume / constraints.maxVolume;
    itemRatioSum += batch.jobs.length / constraints.maxItems;
    if (isOversized(batch, constraints)) {
      oversized++;
    }
  }

  const times = findMinMax(batches.map(batch => batch.representativeTime));

  return {
    batchCount: batches.length,
    jobCount: schedule.printOrder.length,
    oversizedBatchCount: oversized,
    volumeUtilization: volumeRatioSum / batches.length,
    itemUtilization: itemRatioSum / batches.length,
    shortestBatchTime: times.min,
    longestBatchTime: times.max,
  };
}
