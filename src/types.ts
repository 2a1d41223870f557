/**
 * Core types for the batch planner
 */

import type { ValidationError } from './errors';

/**
 * A single unit of production work
 */
export interface Job {
  readonly id: string;
  readonly volume: number;    // Resource consumption, in the same unit as maxVolume
  readonly priority: number;  // Smaller = more urgent
  readonly printTime: number; // Minutes when run alone or as the slowest batch member
}

/**
 * Per-batch capacity ceilings
 */
export interface Constraints {
  readonly maxVolume: number;
  readonly maxItems: number;
}

/**
 * A scheduling request: one static snapshot of jobs and constraints
 */
export interface PlanRequest {
  jobs: readonly Job[];
  constraints: Constraints;
}

/**
 * A group of jobs that run together and finish with their slowest member.
 * Only a batch holding a single job may exceed the constraints.
 */
export interface Batch {
  index: number;
  jobs: readonly Job[];
  accumulatedVolume: number;
  representativeTime: number;
}

/**
 * Batches plus their flattened execution order and total time
 */
export interface Schedule {
  batches: readonly Batch[];
  printOrder: string[];
  totalTime: number;
}

/**
 * Response shape returned to callers
 */
export interface PrintPlan {
  printOrder: string[];
  totalTime: number;
}

/**
 * Utilization figures for a computed schedule
 */
export interface PlanMetrics {
  batchCount: number;
  jobCount: number;
  oversizedBatchCount: number;
  volumeUtilization: number;  // Mean of accumulatedVolume / maxVolume
  itemUtilization: number;    // Mean of members / maxItems
  shortestBatchTime: number;
  longestBatchTime: number;
}

/**
 * Full result of a BatchPlanner run
 */
export interface PlanResult extends PrintPlan {
  planId: string;
  batches: readonly Batch[];
  metrics?: PlanMetrics;
}

/**
 * Logger interface
 */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Options for creating a planner
 */
export interface PlannerOptions {
  logger?: Logger;
  allowEmpty?: boolean;     // Treat an empty job list as an empty schedule (default: true)
  enableMetrics?: boolean;  // Attach PlanMetrics to every result (default: true)
}

/**
 * Events emitted by the planner
 */
export enum PlannerEvent {
  PLAN_STARTED = 'plan:started',
  JOBS_ORDERED = 'plan:ordered',
  /** Fired for each batch in order once packing has finished, not while packing */
  BATCH_CLOSED = 'batch:closed',
  JOB_OVERSIZED = 'job:oversized',
  PLAN_COMPLETED = 'plan:completed',
  PLAN_REJECTED = 'plan:rejected',
}

/**
 * Event data for different event types
 */
export interface EventData {
  [PlannerEvent.PLAN_STARTED]: { planId: string; jobCount: number };
  [PlannerEvent.JOBS_ORDERED]: { planId: string; order: string[] };
  [PlannerEvent.BATCH_CLOSED]: { planId: string; batch: Batch };
  [PlannerEvent.JOB_OVERSIZED]: { planId: string; jobId: string; volume: number; maxVolume: number };
  [PlannerEvent.PLAN_COMPLETED]: { planId: string; printOrder: string[]; totalTime: number; durationMs: number };
  [PlannerEvent.PLAN_REJECTED]: { planId: string; error: ValidationError };
}

/**
 * Generic event listener type. Listeners run synchronously during planning.
 */
export type EventListener<T = unknown> = (data: T) => void;

/**
 * Priority queue item
 */
export interface QueuedJob {
  job: Job;
  sequence: number;  // Original input index, breaks priority ties
}
