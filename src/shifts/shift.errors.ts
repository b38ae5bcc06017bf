/**
 * Thrown when a shift's time-of-day values are missing or unparseable, or
 * when the date it is combined with is not a calendar date.
 *
 * A failed resolution never modifies the index; the prior entry, if any, stays.
 */
export class InvalidShiftDefinitionError extends Error {
  public readonly shiftId: string | undefined;
  public readonly field: string;

  constructor(message: string, shiftId: string | undefined, field: string) {
    super(message);
    this.name = 'InvalidShiftDefinitionError';
    this.shiftId = shiftId;
    this.field = field;
  }
}

/** Thrown for a query window whose start is not strictly before its finish, or an unparseable instant. */
export class InvalidRangeError extends Error {
  public readonly windowStart: string;
  public readonly windowFinish: string;

  constructor(message: string, windowStart: string, windowFinish: string) {
    super(message);
    this.name = 'InvalidRangeError';
    this.windowStart = windowStart;
    this.windowFinish = windowFinish;
  }
}

/** Data-integrity error: an allocation points at a shift the core does not know. */
export class DanglingShiftReferenceError extends Error {
  public readonly allocationIds: string[];
  public readonly shiftId: string;

  constructor(shiftId: string, allocationIds: string[]) {
    super(`Shift ${shiftId} is referenced by allocation(s) ${allocationIds.join(', ')} but is not defined`);
    this.name = 'DanglingShiftReferenceError';
    this.shiftId = shiftId;
    this.allocationIds = allocationIds;
  }
}

export class InvalidAllocationError extends Error {
  public readonly allocationId: string | undefined;

  constructor(message: string, allocationId: string | undefined) {
    super(message);
    this.name = 'InvalidAllocationError';
    this.allocationId = allocationId;
  }
}

/** Create for an id that exists, or update for one that does not. */
export class AllocationConflictError extends Error {
  public readonly allocationId: string;

  constructor(message: string, allocationId: string) {
    super(message);
    this.name = 'AllocationConflictError';
    this.allocationId = allocationId;
  }
}
