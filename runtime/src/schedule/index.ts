/**
 * Schedule engine module.
 *
 * @module
 */

export {
  executionCount,
  iterate,
  executionIntervals,
  overlaps,
  fits,
  checkSchedule,
} from './schedule.js';

export { ScheduleOverlapError } from './errors.js';

export type { Schedule, ExecutionInterval, ScheduleViolation } from './types.js';
