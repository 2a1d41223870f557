/**
 * Batch planner - validates a request and runs the ordering, packing and
 * summarizing steps, reporting progress through events
 */

import {
  EventData,
  EventListener,
  Logger,
  PlannerEvent,
  PlannerOptions,
  PlanRequest,
  PlanResult,
  PrintPlan,
} from '../types';
import { ValidationError } from '../errors';
import { validatePlanRequest } from './validation';
import { orderJobs } from './jobOrderer';
import { buildBatches, isOversized } from './batchBuilder';
import { summarizeSchedule } from './scheduleSummarizer';
import { computePlanMetrics } from './metrics';
import { ConsoleLogger } from './logger';
import { PlannerEventEmitter } from './events';
import { generatePlanId } from '../utils/id';
import { elapsed, formatMinutes, now } from '../utils/time';

/**
 * Computes one static schedule per call from one snapshot of jobs and
 * constraints. Holds no state between calls besides its listeners, so a
 * single instance can serve any number of callers.
 */
export class BatchPlanner {
  protected logger: Logger;
  protected eventEmitter: PlannerEventEmitter;
  private allowEmpty: boolean;
  private enableMetrics: boolean;

  constructor(options: PlannerOptions = {}) {
    this.logger = options.logger || new ConsoleLogger('BatchPlanner');
    this.eventEmitter = new PlannerEventEmitter(this.logger);
    this.allowEmpty = options.allowEmpty ?? true;
    this.enableMetrics = options.enableMetrics ?? true;
  }

  /**
   * Plan a request. Accepts untyped input; throws ValidationError before
   * any batching if the request is malformed.
   */
  plan(request: unknown): PlanResult {
    const planId = generatePlanId();
    const startTime = now();

    const { jobs, constraints } = this.validate(planId, request);
    this.logger.debug('Planning started', { planId, jobs: jobs.length, ...constraints });
    this.eventEmitter.emit(PlannerEvent.PLAN_STARTED, { planId, jobCount: jobs.length });

    const ordered = orderJobs(jobs);
    this.eventEmitter.emit(PlannerEvent.JOBS_ORDERED, {
      planId,
      order: ordered.map(job => job.id),
    });

    const batches = buildBatches(ordered, constraints);
    for (const batch of batches) {
      if (isOversized(batch, constraints)) {
        const [job] = batch.jobs;
        this.logger.warn('Job exceeds max volume and is placed alone', {
          planId,
          jobId: job.id,
          volume: job.volume,
          maxVolume: constraints.maxVolume,
        });
        this.eventEmitter.emit(PlannerEvent.JOB_OVERSIZED, {
          planId,
          jobId: job.id,
          volume: job.volume,
          maxVolume: constraints.maxVolume,
        });
      }
      this.eventEmitter.emit(PlannerEvent.BATCH_CLOSED, { planId, batch });
    }

    const schedule = summarizeSchedule(batches);
    const durationMs = elapsed(startTime);

    this.logger.debug('Planning completed', {
      planId,
      batches: batches.length,
      totalTime: formatMinutes(schedule.totalTime),
      durationMs,
    });
    this.eventEmitter.emit(PlannerEvent.PLAN_COMPLETED, {
      planId,
      printOrder: schedule.printOrder,
      totalTime: schedule.totalTime,
      durationMs,
    });

    const result: PlanResult = {
      planId,
      printOrder: schedule.printOrder,
      totalTime: schedule.totalTime,
      batches: schedule.batches,
    };
    if (this.enableMetrics) {
      result.metrics = computePlanMetrics(schedule, constraints);
    }
    return result;
  }

  /**
   * Register an event listener
   */
  on<E extends PlannerEvent>(event: E, listener: EventListener<EventData[E]>): void {
    this.eventEmitter.on(event, listener);
  }

  /**
   * Register a one-time event listener
   */
  once<E extends PlannerEvent>(event: E, listener: EventListener<EventData[E]>): void {
    this.eventEmitter.once(event, listener);
  }

  /**
   * Remove an event listener
   */
  off<E extends PlannerEvent>(event: E, listener: EventListener<EventData[E]>): void {
    this.eventEmitter.off(event, listener);
  }

  // Private methods

  private validate(planId: string, request: unknown): PlanRequest {
    try {
      return validatePlanRequest(request, { allowEmpty: this.allowEmpty });
    } catch (error) {
      if (error instanceof ValidationError) {
        this.logger.warn('Plan request rejected', {
          planId,
          code: error.code,
          message: error.message,
        });
        this.eventEmitter.emit(PlannerEvent.PLAN_REJECTED, { planId, error });
      }
      throw error;
    }
  }
}

/**
 * Plans a request and returns only the execution order and total time
 */
export function optimizePrinting(request: unknown, options: PlannerOptions = {}): PrintPlan {
  const { printOrder, totalTime } = new BatchPlanner(options).plan(request);
  return { printOrder, totalTime };
}
