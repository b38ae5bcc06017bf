import type { DateTime } from 'luxon';
import { SCHEDULE_TIMEZONE } from '../config.js';
import { Logger } from '../logger.js';
import { resolveInterval } from './interval.resolver.js';
import { IntervalTree } from './interval.tree.js';
import { InvalidAllocationError } from './shift.errors.js';
import type { Allocation, ResolvedInterval, ShiftDefinition } from './shift.types.js';

const logger = new Logger('interval-index');

export interface AllocationWithShift {
  allocation: Allocation;
  shift: ShiftDefinition;
}

/**
 * Materialized `allocation_id -> ResolvedInterval` map plus an interval tree
 * for overlap queries.
 *
 * Every write resolves all of its intervals before it touches either
 * structure, and then applies them synchronously. A resolver failure
 * therefore leaves the index exactly as it was, and no query can run
 * between the first and last entry of a batch.
 */
export class ResolvedIntervalIndex {
  private readonly intervals = new Map<string, ResolvedInterval>();
  private readonly tree = new IntervalTree();

  constructor(private readonly zone: string = SCHEDULE_TIMEZONE) {}

  get size(): number {
    return this.intervals.size;
  }

  get(allocationId: string): ResolvedInterval | null {
    return this.intervals.get(allocationId) ?? null;
  }

  has(allocationId: string): boolean {
    return this.intervals.has(allocationId);
  }

  /** Resolves the allocation against its shift and replaces any prior entry. */
  upsert(allocation: Allocation, shift: ShiftDefinition): ResolvedInterval {
    const resolved = this.resolve({ allocation, shift });
    this.publish([resolved]);
    logger.debug(`Upserted interval for allocation ${allocation.id}`, {
      start_at: resolved.start_at.toISO(),
      finish_at: resolved.finish_at.toISO(),
    });
    return resolved;
  }

  /** Removing an absent id is a no-op. */
  remove(allocationId: string): boolean {
    const removed = this.detach(allocationId);
    if (removed) {
      logger.debug(`Removed interval for allocation ${allocationId}`);
    }
    return removed;
  }

  /**
   * Re-resolves every allocation on `shift` as a single batch.
   * @param allocations - The allocations currently referencing the shift
   */
  rebuildForShift(shift: ShiftDefinition, allocations: Iterable<Allocation>): ResolvedInterval[] {
    const staged = Array.from(allocations, (allocation) => this.resolve({ allocation, shift }));
    const published = this.publish(staged);
    logger.info(`Rebuilt ${published.length} interval(s) for shift ${shift.id}`);
    return published;
  }

  /** Drops every entry and resolves the given set from scratch. */
  replaceAll(pairs: Iterable<AllocationWithShift>): void {
    const staged = Array.from(pairs, (pair) => this.resolve(pair));
    this.clear();
    this.publish(staged);
  }

  clear(): void {
    this.intervals.clear();
    this.tree.clear();
  }

  /** All entries ordered by `start_at`, then allocation id. */
  entries(): ResolvedInterval[] {
    return this.toIntervals(this.tree.entries());
  }

  /** Entries whose interval contains `instant`. */
  findContaining(instant: DateTime): ResolvedInterval[] {
    return this.toIntervals(this.tree.containing(instant.toMillis()));
  }

  /** Entries intersecting `[windowStart, windowFinish)`. */
  findOverlapping(windowStart: DateTime, windowFinish: DateTime): ResolvedInterval[] {
    return this.toIntervals(this.tree.overlapping(windowStart.toMillis(), windowFinish.toMillis()));
  }

  private resolve({ allocation, shift }: AllocationWithShift): ResolvedInterval {
    if (allocation.shift_id !== shift.id) {
      throw new InvalidAllocationError(
        `Allocation ${allocation.id} references shift ${allocation.shift_id}, not ${shift.id}`,
        allocation.id,
      );
    }

    const { start_at, finish_at } = resolveInterval(shift, allocation.date, this.zone);
    return Object.freeze({ allocation_id: allocation.id, shift_id: shift.id, start_at, finish_at });
  }

  private publish(staged: ResolvedInterval[]): ResolvedInterval[] {
    for (const interval of staged) {
      this.detach(interval.allocation_id);
      this.intervals.set(interval.allocation_id, interval);
      this.tree.insert({
        id: interval.allocation_id,
        start: interval.start_at.toMillis(),
        finish: interval.finish_at.toMillis(),
      });
    }
    return staged;
  }

  private detach(allocationId: string): boolean {
    const existing = this.intervals.get(allocationId);
    if (!existing) {
      return false;
    }
    this.tree.remove({ id: allocationId, start: existing.start_at.toMillis() });
    this.intervals.delete(allocationId);
    return true;
  }

  private toIntervals(entries: { id: string }[]): ResolvedInterval[] {
    const intervals: ResolvedInterval[] = [];
    for (const { id } of entries) {
      const interval = this.intervals.get(id);
      if (interval) {
        intervals.push(interval);
      }
    }
    return intervals;
  }
}
