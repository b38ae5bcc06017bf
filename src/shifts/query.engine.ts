import { DateTime } from 'luxon';
import { SCHEDULE_TIMEZONE } from '../config.js';
import type { ResolvedIntervalIndex } from './interval.index.js';
import { InvalidRangeError } from './shift.errors.js';
import type { InstantInput, ResolvedInterval } from './shift.types.js';

function describeInstant(input: InstantInput): string {
  return typeof input === 'string' ? input : (input.toISO() ?? String(input.invalidReason));
}

function byStartThenId(a: ResolvedInterval, b: ResolvedInterval): number {
  const difference = a.start_at.toMillis() - b.start_at.toMillis();
  if (difference !== 0) {
    return difference;
  }
  return a.allocation_id < b.allocation_id ? -1 : a.allocation_id > b.allocation_id ? 1 : 0;
}

function toIds(intervals: ResolvedInterval[]): Set<string> {
  return new Set(intervals.map((interval) => interval.allocation_id));
}

/**
 * Read-only point and window queries over a {@link ResolvedIntervalIndex}.
 * All intervals are half-open: an allocation is active from its start up to,
 * but not including, its finish.
 */
export class IntervalQueryEngine {
  constructor(
    private readonly index: ResolvedIntervalIndex,
    private readonly zone: string = SCHEDULE_TIMEZONE,
  ) {}

  /** Allocation ids whose interval contains `instant`. */
  activeAt(instant: InstantInput): Set<string> {
    return toIds(this.activeIntervalsAt(instant));
  }

  /**
   * Allocation ids whose interval intersects `[windowStart, windowFinish)`.
   * @throws InvalidRangeError when `windowStart >= windowFinish`
   */
  overlapping(windowStart: InstantInput, windowFinish: InstantInput): Set<string> {
    return toIds(this.overlappingIntervals(windowStart, windowFinish));
  }

  /** Like {@link activeAt}, returning the intervals ordered by start, then allocation id. */
  activeIntervalsAt(instant: InstantInput): ResolvedInterval[] {
    const at = this.toInstant(instant, instant, instant);
    return this.index.findContaining(at).sort(byStartThenId);
  }

  /** Like {@link overlapping}, returning the intervals ordered by start, then allocation id. */
  overlappingIntervals(windowStart: InstantInput, windowFinish: InstantInput): ResolvedInterval[] {
    const start = this.toInstant(windowStart, windowStart, windowFinish);
    const finish = this.toInstant(windowFinish, windowStart, windowFinish);

    if (start >= finish) {
      throw new InvalidRangeError(
        `Query window start ${describeInstant(windowStart)} must be before its finish ${describeInstant(windowFinish)}`,
        describeInstant(windowStart),
        describeInstant(windowFinish),
      );
    }

    return this.index.findOverlapping(start, finish).sort(byStartThenId);
  }

  private toInstant(input: InstantInput, windowStart: InstantInput, windowFinish: InstantInput): DateTime {
    const instant = typeof input === 'string' ? DateTime.fromISO(input, { zone: this.zone }) : input;
    if (!instant.isValid) {
      throw new InvalidRangeError(
        `"${describeInstant(input)}" is not a valid instant`,
        describeInstant(windowStart),
        describeInstant(windowFinish),
      );
    }
    return instant;
  }
}
