/**
 * Tests for request validation
 */

import { validatePlanRequest } from '../src/core/validation';
import { ValidationError, ValidationErrorCode, isValidationError } from '../src/errors';
import { printerConstraints } from './helpers/fixtures';

function captureError(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a ValidationError');
}

const validJob = { id: 'M1', volume: 100, priority: 1, printTime: 120 };

describe('validatePlanRequest', () => {
  describe('valid requests', () => {
    it('should return the typed request', () => {
      const request = validatePlanRequest({ jobs: [validJob], constraints: printerConstraints });

      expect(request).toEqual({ jobs: [validJob], constraints: printerConstraints });
    });

    it('should accept snake_case field names', () => {
      const request = validatePlanRequest({
        jobs: [{ id: 'M1', volume: 100, priority: 1, print_time: 120 }],
        constraints: { max_volume: 300, max_items: 2 },
      });

      expect(request).toEqual({ jobs: [validJob], constraints: printerConstraints });
    });

    it('should prefer camelCase when both spellings are present', () => {
      const request = validatePlanRequest({
        jobs: [{ ...validJob, print_time: 999 }],
        constraints: { ...printerConstraints, max_items: 9 },
      });

      expect(request.jobs[0].printTime).toBe(120);
      expect(request.constraints.maxItems).toBe(2);
    });

    it('should drop unknown job fields', () => {
      const request = validatePlanRequest({
        jobs: [{ ...validJob, owner: 'lab-3' }],
        constraints: printerConstraints,
      });

      expect(request.jobs[0]).toEqual(validJob);
    });

    it('should accept fractional volumes', () => {
      const request = validatePlanRequest({
        jobs: [{ ...validJob, volume: 12.5 }],
        constraints: { maxVolume: 40.5, maxItems: 1 },
      });

      expect(request.jobs[0].volume).toBe(12.5);
    });

    it('should accept an empty job list by default', () => {
      expect(validatePlanRequest({ jobs: [], constraints: printerConstraints }).jobs).toEqual([]);
    });
  });

  describe('rejections', () => {
    it('should reject an empty job list when allowEmpty is false', () => {
      const error = captureError(() =>
        validatePlanRequest({ jobs: [], constraints: printerConstraints }, { allowEmpty: false })
      );

      expect(error.code).toBe(ValidationErrorCode.EMPTY_INPUT);
      expect(error.message).toBe('Plan request has no jobs');
    });

    it('should reject duplicate job ids', () => {
      const error = captureError(() =>
        validatePlanRequest({
          jobs: [validJob, { ...validJob, priority: 2 }],
          constraints: printerConstraints,
        })
      );

      expect(error.code).toBe(ValidationErrorCode.DUPLICATE_JOB_ID);
      expect(error.message).toBe('Duplicate job id "M1"');
      expect(error.details).toEqual({ path: ['jobs', 1, 'id'], jobId: 'M1' });
    });

    it.each<[string, unknown]>([
      ['volume', 0],
      ['volume', -5],
      ['volume', Number.POSITIVE_INFINITY],
      ['volume', Number.NaN],
      ['priority', 0],
      ['priority', 1.5],
      ['printTime', -1],
      ['printTime', 2.5],
      ['printTime', '120'],
    ])('should reject %s = %p', (field, value) => {
      const error = captureError(() =>
        validatePlanRequest({
          jobs: [validJob, { id: 'M2', volume: 50, priority: 1, printTime: 60, [field]: value }],
          constraints: printerConstraints,
        })
      );

      expect(error.code).toBe(ValidationErrorCode.INVALID_JOB_FIELD);
      expect(error.details).toEqual({ path: ['jobs', 1, field], jobId: 'M2' });
    });

    it('should reject a blank job id', () => {
      const error = captureError(() =>
        validatePlanRequest({ jobs: [{ ...validJob, id: '   ' }], constraints: printerConstraints })
      );

      expect(error.code).toBe(ValidationErrorCode.INVALID_JOB_FIELD);
      expect(error.details.path).toEqual(['jobs', 0, 'id']);
      expect(error.message).toBe('jobs.0.id: Job id cannot be empty');
    });

    it('should reject a job without an id', () => {
      const error = captureError(() =>
        validatePlanRequest({
          jobs: [{ volume: 100, priority: 1, printTime: 120 }],
          constraints: printerConstraints,
        })
      );

      expect(error.code).toBe(ValidationErrorCode.INVALID_JOB_FIELD);
      expect(error.details).toEqual({ path: ['jobs', 0, 'id'], jobId: undefined });
    });

    it('should reject jobs that are not a list', () => {
      const error = captureError(() =>
        validatePlanRequest({ jobs: 'M1', constraints: printerConstraints })
      );

      expect(error.code).toBe(ValidationErrorCode.INVALID_JOB_FIELD);
      expect(error.details.path).toEqual(['jobs']);
    });

    it.each<[string, number]>([
      ['maxItems', 0],
      ['maxItems', 1.5],
      ['maxVolume', 0],
      ['maxVolume', -10],
    ])('should reject constraint %s = %p', (field, value) => {
      const error = captureError(() =>
        validatePlanRequest({
          jobs: [validJob],
          constraints: { ...printerConstraints, [field]: value },
        })
      );

      expect(error.code).toBe(ValidationErrorCode.INVALID_CONSTRAINTS);
      expect(error.details.path).toEqual(['constraints', field]);
    });

    it('should reject missing constraints', () => {
      const error = captureError(() => validatePlanRequest({ jobs: [validJob] }));

      expect(error.code).toBe(ValidationErrorCode.INVALID_CONSTRAINTS);
      expect(error.details.path).toEqual(['constraints']);
    });

    it.each<[unknown]>([[null], [undefined], [42], ['jobs'], [[validJob]]])('should reject request %p', (input) => {
      const error = captureError(() => validatePlanRequest(input));

      expect(error.code).toBe(ValidationErrorCode.INVALID_REQUEST);
    });
  });
});

describe('isValidationError', () => {
  it('should recognize only ValidationError instances', () => {
    expect(isValidationError(new ValidationError(ValidationErrorCode.EMPTY_INPUT, 'empty'))).toBe(true);
    expect(isValidationError(new Error('other'))).toBe(false);
  });
});
