/**
 * Formats shared by the resolver, the validators and the persistence layer.
 *
 * NOTE: keep this file free of side-effects.
 */

/** Wall-clock time of day, minute resolution (e.g. `22:00`). */
export const TIME_OF_DAY_FORMAT = 'HH:mm';

/** Calendar date of an allocation (e.g. `2016-01-01`). */
export const CALENDAR_DATE_FORMAT = 'yyyy-MM-dd';

export const MINUTES_PER_DAY = 24 * 60;

/** A shift with equal start and finish times covers a whole day. */
export const FULL_DAY_SHIFT_MINUTES = MINUTES_PER_DAY;
