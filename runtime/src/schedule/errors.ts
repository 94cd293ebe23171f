/**
 * Schedule error types.
 *
 * @module
 */

import { RuntimeError, RuntimeErrorCodes } from '../types/errors.js';

/** Two schedules assigned to the same provider have intersecting executions. */
export class ScheduleOverlapError extends RuntimeError {
  /** Start of the execution that began before the previous one ended. */
  public readonly conflictAt: number;

  constructor(conflictAt: number) {
    super(`Schedules overlap at ${conflictAt}`, RuntimeErrorCodes.SCHEDULE_OVERLAP);
    this.name = 'ScheduleOverlapError';
    this.conflictAt = conflictAt;
  }
}
