/**
 * Request validation at the planner boundary
 */

import { z } from 'zod';
import { PlanRequest } from '../types';
import { ValidationError, ValidationErrorCode } from '../errors';

const JOB_ALIASES: Record<string, string> = { print_time: 'printTime' };
const CONSTRAINT_ALIASES: Record<string, string> = {
  max_volume: 'maxVolume',
  max_items: 'maxItems',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Copies snake_case fields onto their camelCase names unless already set
 */
function withAliases(aliases: Record<string, string>) {
  return (value: unknown): unknown => {
    if (!isRecord(value)) {
      return value;
    }
    const normalized: Record<string, unknown> = { ...value };
    for (const [alias, key] of Object.entries(aliases)) {
      if (normalized[key] === undefined && value[alias] !== undefined) {
        normalized[key] = value[alias];
      }
    }
    return normalized;
  };
}

export const jobSchema = z.object({
  id: z.string().refine((id) => id.trim().length > 0, 'Job id cannot be empty'),
  volume: z.number().finite().positive(),
  priority: z.number().int().positive(),
  printTime: z.number().int().positive(),
});

export const constraintsSchema = z.object({
  maxVolume: z.number().finite().positive(),
  maxItems: z.number().int().min(1),
});

export const planRequestSchema = z.object({
  jobs: z.array(z.preprocess(withAliases(JOB_ALIASES), jobSchema)),
  constraints: z.preprocess(withAliases(CONSTRAINT_ALIASES), constraintsSchema),
});

export interface ValidationOptions {
  allowEmpty?: boolean;
}

/**
 * Validates an untyped request and returns it as a typed PlanRequest.
 * Throws ValidationError on the first problem found.
 */
export function validatePlanRequest(input: unknown, options: ValidationOptions = {}): PlanRequest {
  const allowEmpty = options.allowEmpty ?? true;

  if (!isRecord(input)) {
    throw new ValidationError(
      ValidationErrorCode.INVALID_REQUEST,
      'Plan request must be an object with jobs and constraints'
    );
  }

  const result = planRequestSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const code = issue.path[0] === 'constraints'
      ? ValidationErrorCode.INVALID_CONSTRAINTS
      : ValidationErrorCode.INVALID_JOB_FIELD;
    throw new ValidationError(code, `${issue.path.join('.')}: ${issue.message}`, {
      path: issue.path,
      jobId: jobIdAt(input, issue.path),
    });
  }

  const { jobs, constraints } = result.data;

  if (jobs.length === 0 && !allowEmpty) {
    throw new ValidationError(ValidationErrorCode.EMPTY_INPUT, 'Plan request has no jobs', {
      path: ['jobs'],
    });
  }

  const seen = new Set<string>();
  jobs.forEach((job, index) => {
    if (seen.has(job.id)) {
      throw new ValidationError(
        ValidationErrorCode.DUPLICATE_JOB_ID,
        `Duplicate job id "${job.id}"`,
        { path: ['jobs', index, 'id'], jobId: job.id }
      );
    }
    seen.add(job.id);
  });

  return { jobs, constraints };
}

function jobIdAt(input: Record<string, unknown>, path: Array<string | number>): string | undefined {
  const [root, index] = path;
  const jobs = input.jobs;
  if (root !== 'jobs' || typeof index !== 'number' || !Array.isArray(jobs)) {
    return undefined;
  }
  const job: unknown = jobs[index];
  return isRecord(job) && typeof job.id === 'string' ? job.id : undefined;
}
