/**
 * Due date conversion from Canvas UTC timestamps to local wall-clock time.
 */

import { DateTime } from 'luxon';

import { ReconciliationError } from './types';

export const LOCAL_DATETIME_FORMAT = 'yyyy-MM-dd HH:mm:ss';

/**
 * Convert a Canvas `due_at` (ISO 8601, normally UTC) to "YYYY-MM-DD HH:mm:ss"
 * in the given IANA timezone. Daylight saving is applied per date.
 *
 * @returns null when the assignment has no due date
 * @throws ReconciliationError when the timestamp or timezone is invalid
 */
export function convertDueDate(
  dueAt: string | null | undefined,
  timezone: string
): string | null {
  if (!dueAt) {
    return null;
  }

  const parsed = DateTime.fromISO(dueAt, { zone: 'utc' });
  if (!parsed.isValid) {
    throw new ReconciliationError(
      `Invalid due date "${dueAt}": ${parsed.invalidExplanation ?? parsed.invalidReason ?? 'unparseable'}`
    );
  }

  const local = parsed.setZone(timezone);
  if (!local.isValid) {
    throw new ReconciliationError(`Invalid timezone "${timezone}"`);
  }

  return local.toFormat(LOCAL_DATETIME_FORMAT);
}
