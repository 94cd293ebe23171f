/**
 * Schedule engine: execution enumeration, overlap detection and
 * double-booking checks for recurring schedules.
 *
 * Everything here is pure. Arithmetic goes through the checked helpers, so
 * overflow surfaces as {@link CalculationOverflowError} rather than a wrong
 * answer.
 *
 * @module
 */

import { checkedAdd, checkedMul, checkedSub } from '../utils/numeric.js';
import { ScheduleOverlapError } from './errors.js';
import type { ExecutionInterval, Schedule, ScheduleViolation } from './types.js';

/**
 * Number of executions: the count of `k >= 0` with
 * `startTime + k * interval < endTime`.
 *
 * Zero for an empty period or a non-positive interval.
 */
export function executionCount(schedule: Schedule): number {
  const { startTime, endTime, interval } = schedule;
  if (endTime <= startTime || interval <= 0) {
    return 0;
  }
  const span = checkedSub(endTime, startTime, 'schedule span');
  return Math.floor((span - 1) / interval) + 1;
}

/**
 * Start timestamps of every execution, shifted by `startDelay`.
 *
 * The returned iterable is lazy and can be iterated any number of times.
 *
 * @throws {CalculationOverflowError} if the shifted start cannot be
 * represented (eagerly) or a later start overflows (while iterating)
 */
export function iterate(schedule: Schedule, startDelay: number): Iterable<number> {
  const count = executionCount(schedule);
  const base = checkedAdd(schedule.startTime, startDelay, 'schedule start + delay');
  const { interval } = schedule;

  return {
    *[Symbol.iterator]() {
      for (let k = 0; k < count; k++) {
        yield checkedAdd(base, checkedMul(k, interval, 'execution offset'), 'execution start');
      }
    },
  };
}

/** Execution intervals `[start, start + duration)` in start order. */
export function* executionIntervals(
  schedule: Schedule,
  startDelay: number,
): Generator<ExecutionInterval> {
  for (const start of iterate(schedule, startDelay)) {
    yield { start, end: checkedAdd(start, schedule.duration, 'execution end') };
  }
}

/**
 * Whether any execution intersects the closed window
 * `[windowStart, windowEnd]`.
 */
export function overlaps(
  schedule: Schedule,
  startDelay: number,
  windowStart: number,
  windowEnd: number,
): boolean {
  for (const { start, end } of executionIntervals(schedule, startDelay)) {
    if (start > windowEnd) {
      // starts only grow from here
      return false;
    }
    if (end > windowStart) {
      return true;
    }
  }
  return false;
}

/**
 * Check that two schedules can share a provider.
 *
 * Schedules whose `[startTime, endTime)` periods are disjoint always fit.
 * Otherwise both interval sequences are merged in start order and folded
 * left to right; an interval starting before the previous one ended is a
 * conflict.
 *
 * @throws {ScheduleOverlapError} on the first conflicting interval
 */
export function fits(a: Schedule, delayA: number, b: Schedule, delayB: number): void {
  if (a.startTime >= b.endTime || a.endTime <= b.startTime) {
    return;
  }

  let previousEnd = 0;
  for (const interval of mergeIntervals(executionIntervals(a, delayA), executionIntervals(b, delayB))) {
    if (previousEnd > interval.start) {
      throw new ScheduleOverlapError(interval.start);
    }
    previousEnd = interval.end;
  }
}

/** Two-pointer merge of two start-ordered interval sequences. */
function* mergeIntervals(
  left: Iterator<ExecutionInterval>,
  right: Iterator<ExecutionInterval>,
): Generator<ExecutionInterval> {
  let l = left.next();
  let r = right.next();
  while (!l.done || !r.done) {
    if (r.done || (!l.done && compareIntervals(l.value, r.value) <= 0)) {
      if (!l.done) yield l.value;
      l = left.next();
    } else {
      yield r.value;
      r = right.next();
    }
  }
}

function compareIntervals(x: ExecutionInterval, y: ExecutionInterval): number {
  return x.start - y.start || x.end - y.end;
}

/**
 * Registration-time checks, in order. Returns the first violation or
 * `undefined` for a valid schedule.
 */
export function checkSchedule(
  schedule: Schedule,
  now: number,
  maxExecutions: number,
): ScheduleViolation | undefined {
  if (schedule.duration <= 0) {
    return 'JOB_REGISTRATION_ZERO_DURATION';
  }
  const count = executionCount(schedule);
  if (count > maxExecutions) {
    return 'JOB_REGISTRATION_SCHEDULE_EXCEEDS_MAXIMUM_EXECUTIONS';
  }
  if (count === 0) {
    return 'JOB_REGISTRATION_SCHEDULE_CONTAINS_ZERO_EXECUTIONS';
  }
  if (schedule.duration >= schedule.interval) {
    return 'JOB_REGISTRATION_DURATION_EXCEEDS_INTERVAL';
  }
  if (schedule.startTime < now) {
    return 'JOB_REGISTRATION_START_IN_PAST';
  }
  if (schedule.startTime > schedule.endTime) {
    return 'JOB_REGISTRATION_END_BEFORE_START';
  }
  return undefined;
}
