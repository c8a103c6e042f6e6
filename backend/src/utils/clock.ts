import { startOfDay } from 'date-fns';

export type Clock = () => Date;

const systemClock: Clock = () => new Date();

let activeClock: Clock = systemClock;

/** Start of the current calendar day according to the active clock. */
export function currentDate(): Date {
  return startOfDay(activeClock());
}

export function __setClockForTests(clock: Clock | null): void {
  activeClock = clock ?? systemClock;
}
