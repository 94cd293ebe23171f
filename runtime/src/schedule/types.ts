/**
 * Schedule types.
 *
 * @module
 */

/**
 * Recurring execution plan. All values are integer milliseconds.
 *
 * Executions start at `startTime + k * interval` for every `k >= 0` with a
 * start before `endTime`, each lasting `duration`.
 */
export interface Schedule {
  startTime: number;
  endTime: number;
  duration: number;
  interval: number;
}

/** Half-open execution interval `[start, end)`. */
export interface ExecutionInterval {
  start: number;
  end: number;
}

/** Reasons a schedule cannot be registered. */
export type ScheduleViolation =
  | 'JOB_REGISTRATION_ZERO_DURATION'
  | 'JOB_REGISTRATION_SCHEDULE_EXCEEDS_MAXIMUM_EXECUTIONS'
  | 'JOB_REGISTRATION_SCHEDULE_CONTAINS_ZERO_EXECUTIONS'
  | 'JOB_REGISTRATION_DURATION_EXCEEDS_INTERVAL'
  | 'JOB_REGISTRATION_START_IN_PAST'
  | 'JOB_REGISTRATION_END_BEFORE_START';
