/**
 * Fee and reward arithmetic.
 *
 * @module
 */

import { executionCount } from '../schedule/schedule.js';
import type { Schedule } from '../schedule/types.js';
import { RuntimeErrorCodes } from '../types/errors.js';
import { checkedAdd, checkedAddAmount, checkedMulAmount, toAmount } from '../utils/numeric.js';
import { MatchAdmissionError } from './errors.js';
import type { JobRegistration, PricingVariant, SchedulingWindow } from './types.js';

/**
 * What a provider charges for one execution:
 * `feePerMillisecond * duration + feePerStorageByte * storage + baseFeePerExecution`.
 */
export function feePerExecution(registration: JobRegistration, pricing: PricingVariant): bigint {
  const op = 'fee per execution';
  const timeFee = checkedMulAmount(pricing.feePerMillisecond, toAmount(registration.schedule.duration, op), op);
  const storageFee = checkedMulAmount(pricing.feePerStorageByte, toAmount(registration.storage, op), op);
  return checkedAddAmount(checkedAddAmount(timeFee, storageFee, op), pricing.baseFeePerExecution, op);
}

/** Total budget of a job: reward per slot execution times slots times executions. */
export function totalRewardAmount(registration: JobRegistration): bigint {
  const op = 'total reward amount';
  const perExecution = checkedMulAmount(
    registration.requirements.reward.amount,
    toAmount(registration.requirements.slots, op),
    op,
  );
  return checkedMulAmount(perExecution, toAmount(executionCount(registration.schedule), op), op);
}

/**
 * Require the provider's window to cover the delayed end of the schedule.
 *
 * @throws {MatchAdmissionError} SCHEDULING_WINDOW_EXCEEDED
 */
export function checkSchedulingWindow(
  window: SchedulingWindow,
  schedule: Schedule,
  startDelay: number,
  now: number,
): void {
  const delayedEnd = checkedAdd(schedule.endTime, startDelay, 'schedule end + delay');
  const deadline = window.kind === 'end' ? window.end : checkedAdd(now, window.delta, 'now + scheduling window');
  if (deadline < delayedEnd) {
    throw new MatchAdmissionError(
      RuntimeErrorCodes.SCHEDULING_WINDOW_EXCEEDED,
      `Scheduling window ends at ${deadline}, job ends at ${delayedEnd}`,
    );
  }
}
