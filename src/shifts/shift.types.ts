import type { DateTime } from 'luxon';

/**
 * Recurring time-of-day template.
 *
 * `finish_time <= start_time` marks a rollover shift that ends on the next
 * calendar day; equal times cover a full 24 hours.
 */
export interface ShiftDefinition {
  readonly id: string;
  /** `HH:mm` wall-clock time */
  readonly start_time: string;
  /** `HH:mm` wall-clock time */
  readonly finish_time: string;
}

/** A shift assigned to one calendar date. */
export interface Allocation {
  readonly id: string;
  readonly shift_id: string;
  /** `yyyy-MM-dd` */
  readonly date: string;
  readonly assignees: readonly string[];
}

export interface TimeOfDay {
  hour: number;
  minute: number;
}

/** Absolute half-open `[start_at, finish_at)` pair produced by the resolver. */
export interface IntervalBounds {
  readonly start_at: DateTime;
  readonly finish_at: DateTime;
}

/** Entries handed out by the index and the service are frozen. */
export interface ResolvedInterval extends IntervalBounds {
  readonly allocation_id: string;
  readonly shift_id: string;
}

/** Full state handed over by the persistence layer when the core starts. */
export interface ScheduleSnapshot {
  shifts: ShiftDefinition[];
  allocations: Allocation[];
}

/** Anything the query engine accepts as an instant: a luxon `DateTime` or an ISO-8601 string. */
export type InstantInput = DateTime | string;

export enum IntervalDiscrepancyKind {
  /** Allocation has no entry in the index */
  Missing = 'missing',
  /** Index entry has no allocation behind it */
  Orphaned = 'orphaned',
  /** Index entry differs from what the resolver produces now */
  Stale = 'stale',
}

export interface IntervalDiscrepancy {
  kind: IntervalDiscrepancyKind;
  allocation_id: string;
  expected?: IntervalBounds;
  actual?: IntervalBounds;
}

export interface VerificationResult {
  consistent: boolean;
  checked: number;
  discrepancies: IntervalDiscrepancy[];
}
