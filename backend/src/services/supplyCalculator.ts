import type { Medication, MedicationWithSupply } from '@pillbox/shared';
import { differenceInCalendarDays } from 'date-fns';

/**
 * Days of supply left on `today` for a box started on `startDate`.
 *
 * Returns 0 when there is no start date or the dose is not positive. The result
 * is negative once the box has run out and larger than the box duration while
 * `startDate` is still in the future; it is never clamped here.
 */
export function computeDaysRemaining(
  startDate: Date | null | undefined,
  boxSize: number,
  dailyDose: number,
  today: Date
): number {
  if (!startDate || dailyDose <= 0) {
    return 0;
  }
  const totalDurationDays = Math.trunc(boxSize / dailyDose);
  const daysElapsed = differenceInCalendarDays(today, startDate);
  return totalDurationDays - daysElapsed;
}

export function withDaysRemaining(medication: Medication, today: Date): MedicationWithSupply {
  return {
    ...medication,
    daysRemaining: computeDaysRemaining(medication.startDate, medication.boxSize, medication.dailyDose, today)
  };
}
