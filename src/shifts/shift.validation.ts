import { DateTime } from 'luxon';
import { CALENDAR_DATE_FORMAT, TIME_OF_DAY_FORMAT } from '../constants.js';
import { InvalidAllocationError, InvalidShiftDefinitionError } from './shift.errors.js';
import type { Allocation, ShiftDefinition, TimeOfDay } from './shift.types.js';

export interface ValidationResult {
  isValid: boolean;
  error?: string;
  field?: string;
}

const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

/** Parses an `HH:mm` wall-clock value. Returns null for anything else, including `HH:mm:ss`. */
export function parseTimeOfDay(value: unknown): TimeOfDay | null {
  if (typeof value !== 'string') {
    return null;
  }

  const match = TIME_OF_DAY_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  return { hour: Number(match[1]), minute: Number(match[2]) };
}

export function timeOfDayToMinutes(time: TimeOfDay): number {
  return time.hour * 60 + time.minute;
}

/** Parses a `yyyy-MM-dd` date as the start of that day in `zone`. */
export function parseCalendarDate(value: unknown, zone: string): DateTime | null {
  if (typeof value !== 'string') {
    return null;
  }

  const date = DateTime.fromFormat(value, CALENDAR_DATE_FORMAT, { zone });
  return date.isValid ? date.startOf('day') : null;
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

export function validateShiftDefinition(shift: ShiftDefinition | null | undefined): ValidationResult {
  if (!shift) {
    return { isValid: false, error: 'Shift definition is required', field: 'shift' };
  }

  if (!isNonEmptyString(shift.id)) {
    return { isValid: false, error: 'Shift id is required', field: 'id' };
  }

  if (!parseTimeOfDay(shift.start_time)) {
    return {
      isValid: false,
      error: `Shift ${shift.id} start_time "${String(shift.start_time)}" is not an ${TIME_OF_DAY_FORMAT} time`,
      field: 'start_time',
    };
  }

  if (!parseTimeOfDay(shift.finish_time)) {
    return {
      isValid: false,
      error: `Shift ${shift.id} finish_time "${String(shift.finish_time)}" is not an ${TIME_OF_DAY_FORMAT} time`,
      field: 'finish_time',
    };
  }

  return { isValid: true };
}

export function validateAllocation(allocation: Allocation | null | undefined, zone: string): ValidationResult {
  if (!allocation) {
    return { isValid: false, error: 'Allocation is required', field: 'allocation' };
  }

  if (!isNonEmptyString(allocation.id)) {
    return { isValid: false, error: 'Allocation id is required', field: 'id' };
  }

  if (!isNonEmptyString(allocation.shift_id)) {
    return { isValid: false, error: `Allocation ${allocation.id} has no shift_id`, field: 'shift_id' };
  }

  if (!parseCalendarDate(allocation.date, zone)) {
    return {
      isValid: false,
      error: `Allocation ${allocation.id} date "${String(allocation.date)}" is not a yyyy-MM-dd date`,
      field: 'date',
    };
  }

  if (!Array.isArray(allocation.assignees) || !allocation.assignees.every(isNonEmptyString)) {
    return {
      isValid: false,
      error: `Allocation ${allocation.id} assignees must be a list of non-empty ids`,
      field: 'assignees',
    };
  }

  return { isValid: true };
}

export function assertValidShiftDefinition(shift: ShiftDefinition): void {
  const result = validateShiftDefinition(shift);
  if (!result.isValid) {
    throw new InvalidShiftDefinitionError(
      result.error ?? 'Invalid shift definition',
      shift?.id,
      result.field ?? 'shift',
    );
  }
}

export function assertValidAllocation(allocation: Allocation, zone: string): void {
  const result = validateAllocation(allocation, zone);
  if (!result.isValid) {
    throw new InvalidAllocationError(result.error ?? 'Invalid allocation', allocation?.id);
  }
}
