import type { DateTime } from 'luxon';
import { SCHEDULE_TIMEZONE } from '../config.js';
import { FULL_DAY_SHIFT_MINUTES, TIME_OF_DAY_FORMAT } from '../constants.js';
import { InvalidShiftDefinitionError } from './shift.errors.js';
import type { IntervalBounds, ShiftDefinition, TimeOfDay } from './shift.types.js';
import { parseCalendarDate, parseTimeOfDay, timeOfDayToMinutes } from './shift.validation.js';

function requireTimeOfDay(shift: ShiftDefinition, field: 'start_time' | 'finish_time'): TimeOfDay {
  const time = parseTimeOfDay(shift[field]);
  if (!time) {
    throw new InvalidShiftDefinitionError(
      `Shift ${shift.id} ${field} "${String(shift[field])}" is not an ${TIME_OF_DAY_FORMAT} time`,
      shift.id,
      field,
    );
  }
  return time;
}

function combine(day: DateTime, time: TimeOfDay): DateTime {
  return day.set({ hour: time.hour, minute: time.minute, second: 0, millisecond: 0 });
}

/** True when the shift ends on the calendar day after it starts (equal times included). */
export function isRolloverShift(shift: ShiftDefinition): boolean {
  const start = requireTimeOfDay(shift, 'start_time');
  const finish = requireTimeOfDay(shift, 'finish_time');
  return timeOfDayToMinutes(finish) <= timeOfDayToMinutes(start);
}

/** Wall-clock length of the shift in minutes; 1440 when start and finish are equal. */
export function getShiftDurationMinutes(shift: ShiftDefinition): number {
  const start = timeOfDayToMinutes(requireTimeOfDay(shift, 'start_time'));
  const finish = timeOfDayToMinutes(requireTimeOfDay(shift, 'finish_time'));
  const difference = finish - start;
  return difference > 0 ? difference : difference + FULL_DAY_SHIFT_MINUTES;
}

/**
 * Resolves a shift worked on `date` into its absolute `[start_at, finish_at)` instants.
 *
 * The finish instant moves to the next calendar day whenever `finish_time <= start_time`,
 * so a 22:00-06:00 shift on 2016-01-01 ends at 2016-01-02T06:00 and a 09:00-09:00
 * shift lasts 24 hours.
 */
export function resolveInterval(shift: ShiftDefinition, date: string, zone: string = SCHEDULE_TIMEZONE): IntervalBounds {
  const start = requireTimeOfDay(shift, 'start_time');
  const finish = requireTimeOfDay(shift, 'finish_time');

  const day = parseCalendarDate(date, zone);
  if (!day) {
    throw new InvalidShiftDefinitionError(
      `Cannot resolve shift ${shift.id} on "${String(date)}": not a yyyy-MM-dd date`,
      shift.id,
      'date',
    );
  }

  const rollsOver = timeOfDayToMinutes(finish) <= timeOfDayToMinutes(start);
  const start_at = combine(day, start);
  const finish_at = combine(rollsOver ? day.plus({ days: 1 }) : day, finish);

  // Only reachable when a DST gap swallows the start time in a non-UTC zone
  if (finish_at <= start_at) {
    throw new InvalidShiftDefinitionError(
      `Shift ${shift.id} does not resolve to a positive interval on ${date} in ${zone}`,
      shift.id,
      'finish_time',
    );
  }

  return { start_at, finish_at };
}
