import { format, isValid, parseISO, startOfDay } from 'date-fns';
import { createLogger } from './logger.js';

const log = createLogger('Dates');

/**
 * Converts a stored or transported date into a local-midnight `Date`.
 * Anything that cannot be read as a calendar date becomes `null`, so callers
 * downstream only ever see a real date or "absent".
 */
export function toCalendarDate(value: Date | string | null | undefined): Date | null {
  if (value == null) {
    return null;
  }

  if (value instanceof Date) {
    if (!isValid(value)) {
      log.warn('Discarding invalid date value');
      return null;
    }
    return new Date(value.getFullYear(), value.getMonth(), value.getDate());
  }

  const trimmed = value.trim();
  const parsed = trimmed.length > 0 ? parseISO(trimmed) : null;
  if (!parsed || !isValid(parsed)) {
    log.warn('Discarding unparseable date', { value });
    return null;
  }
  return startOfDay(parsed);
}

export function formatCalendarDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}
