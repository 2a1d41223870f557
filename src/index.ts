/**
 * batch-planner
 *
 * Greedy priority-ordered batch planning for production queues with a
 * volume ceiling and an item ceiling per batch.
 */

// Planner
export { BatchPlanner, optimizePrinting } from './core/batchPlanner';

// Pipeline steps
export { orderJobs } from './core/jobOrderer';
export { buildBatches, isOversized } from './core/batchBuilder';
export { summarizeSchedule } from './core/scheduleSummarizer';
export { validatePlanRequest, jobSchema, constraintsSchema, planRequestSchema } from './core/validation';
export type { ValidationOptions } from './core/validation';

// Core classes
export { JobQueue } from './core/jobQueue';
export { PlannerEventEmitter } from './core/events';

// Metrics and logging
export { computePlanMetrics } from './core/metrics';
export { ConsoleLogger } from './core/logger';

// Errors
export { ValidationError, ValidationErrorCode, isValidationError } from './errors';
export type { ValidationErrorDetails } from './errors';

// Utilities
export { generateId, generatePlanId } from './utils/id';
export { now, formatMinutes, elapsed } from './utils/time';
export { findMinMax } from './utils/minMax';
export type { MinMax } from './utils/minMax';

// Types
export type {
  Job,
  Constraints,
  PlanRequest,
  Batch,
  Schedule,
  PrintPlan,
  PlanMetrics,
  PlanResult,
  Logger,
  PlannerOptions,
  EventData,
  EventListener,
  QueuedJob,
} from './types';

export { PlannerEvent } from './types';
