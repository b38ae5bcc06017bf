import { describe, it, expect, beforeEach } from 'vitest';
import { DateTime } from 'luxon';
import { ResolvedIntervalIndex } from './interval.index.js';
import { InvalidAllocationError, InvalidShiftDefinitionError } from './shift.errors.js';
import type { Allocation, ResolvedInterval } from './shift.types.js';
import { DAY_ALLOCATION, DAY_SHIFT, NIGHT_ALLOCATION, NIGHT_SHIFT } from '../../test/fixtures/test-data.js';

function utc(iso: string): DateTime {
  return DateTime.fromISO(iso, { zone: 'UTC' });
}

function describeEntries(index: ResolvedIntervalIndex): string[] {
  return index
    .entries()
    .map(
      (interval: ResolvedInterval) =>
        `${interval.allocation_id} ${interval.start_at.toISO()} ${interval.finish_at.toISO()}`,
    );
}

describe('ResolvedIntervalIndex', () => {
  let index: ResolvedIntervalIndex;

  beforeEach(() => {
    index = new ResolvedIntervalIndex('UTC');
  });

  describe('upsert', () => {
    it('stores the resolved interval for the allocation', () => {
      const resolved = index.upsert(NIGHT_ALLOCATION, NIGHT_SHIFT);

      expect(resolved.allocation_id).toBe(NIGHT_ALLOCATION.id);
      expect(resolved.shift_id).toBe(NIGHT_SHIFT.id);
      expect(resolved.start_at.toISO()).toBe('2016-01-01T22:00:00.000Z');
      expect(resolved.finish_at.toISO()).toBe('2016-01-02T06:00:00.000Z');
      expect(index.get(NIGHT_ALLOCATION.id)).toBe(resolved);
      expect(index.size).toBe(1);
    });

    it('replaces the prior entry for the same allocation', () => {
      index.upsert(DAY_ALLOCATION, DAY_SHIFT);
      index.upsert({ ...DAY_ALLOCATION, date: '2016-01-05' }, DAY_SHIFT);

      expect(index.size).toBe(1);
      expect(index.findContaining(utc('2016-01-01T10:00'))).toEqual([]);
      expect(index.findContaining(utc('2016-01-05T10:00')).map((interval) => interval.allocation_id)).toEqual([
        DAY_ALLOCATION.id,
      ]);
    });

    it('is idempotent', () => {
      index.upsert(NIGHT_ALLOCATION, NIGHT_SHIFT);
      const once = describeEntries(index);

      index.upsert(NIGHT_ALLOCATION, NIGHT_SHIFT);

      expect(describeEntries(index)).toEqual(once);
      expect(index.size).toBe(1);
    });

    it('leaves the prior entry untouched when resolution fails', () => {
      index.upsert(DAY_ALLOCATION, DAY_SHIFT);
      const before = describeEntries(index);

      expect(() => index.upsert(DAY_ALLOCATION, { ...DAY_SHIFT, finish_time: '16:60' })).toThrow(
        InvalidShiftDefinitionError,
      );
      expect(describeEntries(index)).toEqual(before);
    });

    it('rejects a shift the allocation does not reference', () => {
      expect(() => index.upsert(DAY_ALLOCATION, NIGHT_SHIFT)).toThrow(InvalidAllocationError);
      expect(index.size).toBe(0);
    });
  });

  describe('remove', () => {
    it('removes the entry from lookups and queries', () => {
      index.upsert(NIGHT_ALLOCATION, NIGHT_SHIFT);

      expect(index.remove(NIGHT_ALLOCATION.id)).toBe(true);
      expect(index.get(NIGHT_ALLOCATION.id)).toBeNull();
      expect(index.findContaining(utc('2016-01-02T01:00'))).toEqual([]);
    });

    it('is a no-op for an absent id', () => {
      expect(index.remove('missing')).toBe(false);
      expect(index.size).toBe(0);
    });

    it('restores the same state when the allocation is upserted again', () => {
      index.upsert(DAY_ALLOCATION, DAY_SHIFT);
      index.upsert(NIGHT_ALLOCATION, NIGHT_SHIFT);
      const before = describeEntries(index);

      index.remove(NIGHT_ALLOCATION.id);
      index.upsert(NIGHT_ALLOCATION, NIGHT_SHIFT);

      expect(describeEntries(index)).toEqual(before);
    });
  });

  describe('rebuildForShift', () => {
    const allocations: Allocation[] = [
      { id: 'n-1', shift_id: NIGHT_SHIFT.id, date: '2016-01-01', assignees: [] },
      { id: 'n-2', shift_id: NIGHT_SHIFT.id, date: '2016-01-02', assignees: [] },
    ];

    it('re-resolves every allocation against the new definition', () => {
      for (const allocation of allocations) {
        index.upsert(allocation, NIGHT_SHIFT);
      }

      const rebuilt = index.rebuildForShift({ ...NIGHT_SHIFT, finish_time: '07:30' }, allocations);

      expect(rebuilt).toHaveLength(2);
      expect(describeEntries(index)).toEqual([
        'n-1 2016-01-01T22:00:00.000Z 2016-01-02T07:30:00.000Z',
        'n-2 2016-01-02T22:00:00.000Z 2016-01-03T07:30:00.000Z',
      ]);
    });

    it('publishes nothing when one allocation fails to resolve', () => {
      for (const allocation of allocations) {
        index.upsert(allocation, NIGHT_SHIFT);
      }
      const before = describeEntries(index);
      const broken: Allocation[] = [
        ...allocations,
        { id: 'n-3', shift_id: NIGHT_SHIFT.id, date: 'not-a-date', assignees: [] },
      ];

      expect(() => index.rebuildForShift({ ...NIGHT_SHIFT, start_time: '21:00' }, broken)).toThrow(
        InvalidShiftDefinitionError,
      );
      expect(describeEntries(index)).toEqual(before);
    });
  });

  describe('replaceAll', () => {
    it('drops entries that are not in the new set', () => {
      index.upsert(DAY_ALLOCATION, DAY_SHIFT);

      index.replaceAll([{ allocation: NIGHT_ALLOCATION, shift: NIGHT_SHIFT }]);

      expect(index.has(DAY_ALLOCATION.id)).toBe(false);
      expect(index.has(NIGHT_ALLOCATION.id)).toBe(true);
    });

    it('keeps the previous entries when any pair fails to resolve', () => {
      index.upsert(DAY_ALLOCATION, DAY_SHIFT);

      expect(() =>
        index.replaceAll([
          { allocation: NIGHT_ALLOCATION, shift: NIGHT_SHIFT },
          { allocation: DAY_ALLOCATION, shift: { ...DAY_SHIFT, start_time: 'noon' } },
        ]),
      ).toThrow(InvalidShiftDefinitionError);
      expect(index.has(DAY_ALLOCATION.id)).toBe(true);
      expect(index.has(NIGHT_ALLOCATION.id)).toBe(false);
    });
  });

  it('finds intervals overlapping a window', () => {
    index.upsert(DAY_ALLOCATION, DAY_SHIFT);
    index.upsert(NIGHT_ALLOCATION, NIGHT_SHIFT);

    const found = index.findOverlapping(utc('2016-01-01T23:00'), utc('2016-01-02T02:00'));

    expect(found.map((interval) => interval.allocation_id)).toEqual([NIGHT_ALLOCATION.id]);
  });
});
