/**
 * Shared fixtures for planner tests
 */

import { Constraints, Job, Logger } from '../../src/types';

export const printerConstraints: Constraints = { maxVolume: 300, maxItems: 2 };

export function job(id: string, volume: number, priority: number, printTime: number): Job {
  return { id, volume, priority, printTime };
}

export function silentLogger(): jest.Mocked<Logger> {
  return {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  };
}

/**
 * Deterministic pseudo-random jobs (Park-Miller generator)
 */
export function seededJobs(seed: number, count: number): Job[] {
  let state = seed;
  const next = (): number => {
    state = (state * 16807) % 2147483647;
    return state / 2147483647;
  };

  const jobs: Job[] = [];
  for (let i = 0; i < count; i++) {
    jobs.push({
      id: `J${i}`,
      volume: 1 + Math.floor(next() * 400),
      priority: 1 + Math.floor(next() * 4),
      printTime: 10 + Math.floor(next() * 200),
    });
  }
  return jobs;
}

/**
 * Reference ordering on the explicit (priority, index) key
 */
export function referenceOrder(jobs: readonly Job[]): Job[] {
  return jobs
    .map((item, index) => ({ item, index }))
    .sort((a, b) => a.item.priority - b.item.priority || a.index - b.index)
    .map(entry => entry.item);
}
