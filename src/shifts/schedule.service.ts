import { groupBy, uniq } from 'lodash-es';
import { SCHEDULE_TIMEZONE } from '../config.js';
import { Logger } from '../logger.js';
import { ResolvedIntervalIndex } from './interval.index.js';
import { resolveInterval } from './interval.resolver.js';
import { IntervalQueryEngine } from './query.engine.js';
import { AllocationConflictError, DanglingShiftReferenceError, InvalidShiftDefinitionError } from './shift.errors.js';
import {
  IntervalDiscrepancyKind,
  type Allocation,
  type InstantInput,
  type IntervalDiscrepancy,
  type ResolvedInterval,
  type ScheduleSnapshot,
  type ShiftDefinition,
  type VerificationResult,
} from './shift.types.js';
import { assertValidAllocation, assertValidShiftDefinition } from './shift.validation.js';

const logger = new Logger('schedule-service');

export interface ScheduleIntervalServiceOptions {
  /** IANA zone the wall-clock values are combined in (defaults to SCHEDULE_TIMEZONE) */
  zone?: string;
  /** Index to maintain; a fresh one in `zone` when omitted */
  index?: ResolvedIntervalIndex;
}

/**
 * Holds the current shift definitions and allocations and keeps the
 * resolved interval index in step with them.
 *
 * The persistence layer loads a snapshot once and then reports each change
 * through the `on*` notifications; the core never reads storage itself.
 * Every notification validates and resolves before it changes anything, so
 * a rejected change leaves both the stores and the index untouched.
 *
 * Stored records and resolved intervals are frozen copies, so nothing handed
 * out by a getter or a query can change what the index holds.
 */
export class ScheduleIntervalService {
  private shifts = new Map<string, ShiftDefinition>();
  private allocations = new Map<string, Allocation>();
  private allocationIdsByShift = new Map<string, Set<string>>();

  private readonly zone: string;
  private readonly index: ResolvedIntervalIndex;
  private readonly queryEngine: IntervalQueryEngine;

  constructor(options: ScheduleIntervalServiceOptions = {}) {
    this.zone = options.zone ?? SCHEDULE_TIMEZONE;
    this.index = options.index ?? new ResolvedIntervalIndex(this.zone);
    this.queryEngine = new IntervalQueryEngine(this.index, this.zone);
  }

  static fromSnapshot(snapshot: ScheduleSnapshot, options?: ScheduleIntervalServiceOptions): ScheduleIntervalService {
    const service = new ScheduleIntervalService(options);
    service.load(snapshot);
    return service;
  }

  /**
   * Replaces the whole state with `snapshot` and builds the index from scratch.
   * On any error the previous state stays in place.
   */
  load(snapshot: ScheduleSnapshot): void {
    const shifts = new Map<string, ShiftDefinition>();
    for (const shift of snapshot.shifts) {
      assertValidShiftDefinition(shift);
      if (shifts.has(shift.id)) {
        throw new InvalidShiftDefinitionError(`Shift ${shift.id} appears more than once`, shift.id, 'id');
      }
      shifts.set(shift.id, freezeShift(shift));
    }

    const allocations = new Map<string, Allocation>();
    for (const allocation of snapshot.allocations) {
      assertValidAllocation(allocation, this.zone);
      if (allocations.has(allocation.id)) {
        throw new AllocationConflictError(`Allocation ${allocation.id} appears more than once`, allocation.id);
      }
      allocations.set(allocation.id, normalizeAllocation(allocation));
    }

    const allocationsByShift = groupBy([...allocations.values()], (allocation) => allocation.shift_id);
    for (const [shiftId, referencing] of Object.entries(allocationsByShift)) {
      if (!shifts.has(shiftId)) {
        const allocationIds = referencing.map((allocation) => allocation.id);
        logger.warn(`Rejecting snapshot: shift ${shiftId} is missing`, { allocationIds });
        throw new DanglingShiftReferenceError(shiftId, allocationIds);
      }
    }

    this.index.replaceAll(
      [...allocations.values()].map((allocation) => ({
        allocation,
        shift: this.requireShift(shifts, allocation),
      })),
    );

    this.shifts = shifts;
    this.allocations = allocations;
    this.allocationIdsByShift = new Map(
      Object.entries(allocationsByShift).map(([shiftId, referencing]) => [
        shiftId,
        new Set(referencing.map((allocation) => allocation.id)),
      ]),
    );

    logger.info(`Loaded ${shifts.size} shift(s) and ${allocations.size} allocation(s)`);
  }

  onAllocationCreated(allocation: Allocation): ResolvedInterval {
    assertValidAllocation(allocation, this.zone);
    if (this.allocations.has(allocation.id)) {
      throw new AllocationConflictError(`Allocation ${allocation.id} already exists`, allocation.id);
    }
    return this.putAllocation(normalizeAllocation(allocation));
  }

  onAllocationUpdated(allocation: Allocation): ResolvedInterval {
    assertValidAllocation(allocation, this.zone);
    if (!this.allocations.has(allocation.id)) {
      throw new AllocationConflictError(`Allocation ${allocation.id} does not exist`, allocation.id);
    }
    return this.putAllocation(normalizeAllocation(allocation));
  }

  /** Returns false when the allocation was not known. */
  onAllocationDeleted(allocationId: string): boolean {
    const allocation = this.allocations.get(allocationId);
    if (!allocation) {
      return false;
    }

    this.index.remove(allocationId);
    this.allocations.delete(allocationId);
    this.unlinkFromShift(allocation);
    return true;
  }

  onShiftCreated(shift: ShiftDefinition): ResolvedInterval[] {
    return this.putShift(shift);
  }

  /** Stores the new definition and re-resolves every allocation on it. */
  onShiftUpdated(shift: ShiftDefinition): ResolvedInterval[] {
    return this.putShift(shift);
  }

  /**
   * Forgets a shift that no allocation references any more.
   * @throws DanglingShiftReferenceError while allocations still point at it
   */
  onShiftDeleted(shiftId: string): boolean {
    const referencing = this.allocationIdsByShift.get(shiftId);
    if (referencing && referencing.size > 0) {
      throw new DanglingShiftReferenceError(shiftId, [...referencing].sort());
    }
    return this.shifts.delete(shiftId);
  }

  activeAt(instant: InstantInput): Set<string> {
    return this.queryEngine.activeAt(instant);
  }

  overlapping(windowStart: InstantInput, windowFinish: InstantInput): Set<string> {
    return this.queryEngine.overlapping(windowStart, windowFinish);
  }

  activeIntervalsAt(instant: InstantInput): ResolvedInterval[] {
    return this.queryEngine.activeIntervalsAt(instant);
  }

  overlappingIntervals(windowStart: InstantInput, windowFinish: InstantInput): ResolvedInterval[] {
    return this.queryEngine.overlappingIntervals(windowStart, windowFinish);
  }

  getResolvedInterval(allocationId: string): ResolvedInterval | null {
    return this.index.get(allocationId);
  }

  getAllocation(allocationId: string): Allocation | null {
    return this.allocations.get(allocationId) ?? null;
  }

  getShift(shiftId: string): ShiftDefinition | null {
    return this.shifts.get(shiftId) ?? null;
  }

  /** Allocation ids currently referencing the shift, sorted. */
  getAllocationIdsForShift(shiftId: string): string[] {
    return [...(this.allocationIdsByShift.get(shiftId) ?? [])].sort();
  }

  get stats(): { shifts: number; allocations: number; intervals: number } {
    return { shifts: this.shifts.size, allocations: this.allocations.size, intervals: this.index.size };
  }

  /**
   * Re-derives every interval from the stores and compares it with the index.
   * Does not modify anything.
   */
  verify(): VerificationResult {
    const discrepancies: IntervalDiscrepancy[] = [];

    for (const allocation of this.allocations.values()) {
      const actual = this.index.get(allocation.id);
      const shift = this.shifts.get(allocation.shift_id);
      const expected = shift ? resolveInterval(shift, allocation.date, this.zone) : undefined;

      if (!actual) {
        discrepancies.push({ kind: IntervalDiscrepancyKind.Missing, allocation_id: allocation.id, expected });
        continue;
      }

      const bounds = { start_at: actual.start_at, finish_at: actual.finish_at };
      if (
        !expected ||
        expected.start_at.toMillis() !== actual.start_at.toMillis() ||
        expected.finish_at.toMillis() !== actual.finish_at.toMillis()
      ) {
        discrepancies.push({
          kind: IntervalDiscrepancyKind.Stale,
          allocation_id: allocation.id,
          expected,
          actual: bounds,
        });
      }
    }

    for (const interval of this.index.entries()) {
      if (!this.allocations.has(interval.allocation_id)) {
        discrepancies.push({
          kind: IntervalDiscrepancyKind.Orphaned,
          allocation_id: interval.allocation_id,
          actual: { start_at: interval.start_at, finish_at: interval.finish_at },
        });
      }
    }

    if (discrepancies.length > 0) {
      logger.warn(`Index verification found ${discrepancies.length} discrepancy(ies)`, {
        allocationIds: discrepancies.map((discrepancy) => discrepancy.allocation_id),
      });
    }

    return { consistent: discrepancies.length === 0, checked: this.allocations.size, discrepancies };
  }

  /** Rebuilds the whole index from the stores; returns the number of intervals. */
  reindex(): number {
    this.index.replaceAll(
      [...this.allocations.values()].map((allocation) => ({
        allocation,
        shift: this.requireShift(this.shifts, allocation),
      })),
    );
    logger.info(`Reindexed ${this.index.size} interval(s)`);
    return this.index.size;
  }

  private putAllocation(allocation: Allocation): ResolvedInterval {
    const shift = this.shifts.get(allocation.shift_id);
    if (!shift) {
      logger.warn(`Rejecting allocation ${allocation.id}: shift ${allocation.shift_id} is missing`);
      throw new DanglingShiftReferenceError(allocation.shift_id, [allocation.id]);
    }

    const resolved = this.index.upsert(allocation, shift);

    const previous = this.allocations.get(allocation.id);
    if (previous) {
      this.unlinkFromShift(previous);
    }
    this.allocations.set(allocation.id, allocation);
    this.linkToShift(allocation);

    return resolved;
  }

  private putShift(shift: ShiftDefinition): ResolvedInterval[] {
    assertValidShiftDefinition(shift);
    const stored = freezeShift(shift);

    const allocations = this.getAllocationIdsForShift(shift.id).map((allocationId) =>
      this.requireAllocation(allocationId),
    );
    const rebuilt = this.index.rebuildForShift(stored, allocations);

    this.shifts.set(stored.id, stored);
    return rebuilt;
  }

  private linkToShift(allocation: Allocation): void {
    const referencing = this.allocationIdsByShift.get(allocation.shift_id) ?? new Set<string>();
    referencing.add(allocation.id);
    this.allocationIdsByShift.set(allocation.shift_id, referencing);
  }

  private unlinkFromShift(allocation: Allocation): void {
    const referencing = this.allocationIdsByShift.get(allocation.shift_id);
    if (!referencing) {
      return;
    }
    referencing.delete(allocation.id);
    if (referencing.size === 0) {
      this.allocationIdsByShift.delete(allocation.shift_id);
    }
  }

  private requireShift(shifts: Map<string, ShiftDefinition>, allocation: Allocation): ShiftDefinition {
    const shift = shifts.get(allocation.shift_id);
    if (!shift) {
      throw new DanglingShiftReferenceError(allocation.shift_id, [allocation.id]);
    }
    return shift;
  }

  private requireAllocation(allocationId: string): Allocation {
    const allocation = this.allocations.get(allocationId);
    if (!allocation) {
      throw new Error(`Allocation ${allocationId} is linked to a shift but missing from the store`);
    }
    return allocation;
  }
}

function freezeShift(shift: ShiftDefinition): ShiftDefinition {
  return Object.freeze({ id: shift.id, start_time: shift.start_time, finish_time: shift.finish_time });
}

function normalizeAllocation(allocation: Allocation): Allocation {
  return Object.freeze({
    id: allocation.id,
    shift_id: allocation.shift_id,
    date: allocation.date,
    assignees: Object.freeze(uniq(allocation.assignees)),
  });
}
