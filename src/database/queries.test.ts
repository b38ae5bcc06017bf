import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type Database from 'better-sqlite3';
import {
  cleanupTestDatabase,
  createTestDatabaseWithMigrations,
  seedTestData,
} from '../../test/utils/database.js';
import {
  deleteAllocation,
  getAllAllocations,
  getAllShiftDefinitions,
  getAllocationsByShiftId,
  getShiftDefinitionById,
  loadScheduleSnapshot,
  upsertAllocation,
  upsertShiftDefinition,
} from './queries.js';
import { DAY_SHIFT, NIGHT_SHIFT, SAMPLE_ALLOCATIONS, SAMPLE_SHIFTS } from '../../test/fixtures/test-data.js';

// Store test database reference
let testDb: Database.Database;

// Route the db import to the per-test database
vi.mock('./db.js', async () => {
  const { createDatabaseProxy } = await import('../../test/utils/database.js');
  return { default: createDatabaseProxy(() => testDb) };
});

describe('Schedule Query Functions', () => {
  beforeEach(() => {
    testDb = createTestDatabaseWithMigrations();
  });

  afterEach(() => {
    cleanupTestDatabase(testDb);
  });

  describe('shift definitions', () => {
    it('returns null for an unknown shift', () => {
      expect(getShiftDefinitionById('missing')).toBeNull();
    });

    it('inserts and then updates a shift in place', () => {
      upsertShiftDefinition(NIGHT_SHIFT);
      upsertShiftDefinition({ ...NIGHT_SHIFT, finish_time: '07:00' });

      expect(getShiftDefinitionById(NIGHT_SHIFT.id)).toEqual({
        id: NIGHT_SHIFT.id,
        start_time: '22:00',
        finish_time: '07:00',
      });
      expect(getAllShiftDefinitions()).toHaveLength(1);
    });

    it('lists shifts ordered by id without timestamps', () => {
      seedTestData(testDb, { shifts: SAMPLE_SHIFTS });

      expect(getAllShiftDefinitions()).toEqual([
        { id: 'shift-day', start_time: '08:00', finish_time: '16:00' },
        { id: 'shift-full-day', start_time: '09:00', finish_time: '09:00' },
        { id: 'shift-night', start_time: '22:00', finish_time: '06:00' },
      ]);
    });
  });

  describe('allocations', () => {
    beforeEach(() => {
      seedTestData(testDb, { shifts: SAMPLE_SHIFTS, allocations: SAMPLE_ALLOCATIONS });
    });

    it('returns allocations ordered by date then id, with assignees', () => {
      expect(getAllAllocations().map((allocation) => allocation.id)).toEqual([
        'allocation-day-2016-01-01',
        'allocation-night-2016-01-01',
        'allocation-day-2016-01-02',
        'allocation-night-2016-01-02',
        'allocation-full-day-2016-01-03',
      ]);
      expect(getAllAllocations()[0]).toEqual({
        id: 'allocation-day-2016-01-01',
        shift_id: DAY_SHIFT.id,
        date: '2016-01-01',
        assignees: ['subject-alice', 'subject-bob'],
      });
    });

    it('returns an empty assignee list for an unstaffed allocation', () => {
      expect(getAllocationsByShiftId('shift-full-day')).toEqual([
        { id: 'allocation-full-day-2016-01-03', shift_id: 'shift-full-day', date: '2016-01-03', assignees: [] },
      ]);
    });

    it('filters allocations by shift', () => {
      expect(getAllocationsByShiftId(NIGHT_SHIFT.id).map((allocation) => allocation.assignees)).toEqual([
        ['subject-carol'],
        ['subject-dave'],
      ]);
    });

    it('replaces the assignee set on upsert', () => {
      upsertAllocation({
        id: 'allocation-day-2016-01-01',
        shift_id: NIGHT_SHIFT.id,
        date: '2016-01-04',
        assignees: ['subject-zoe', 'subject-zoe'],
      });

      expect(getAllocationsByShiftId(NIGHT_SHIFT.id).map((allocation) => allocation.id)).toEqual([
        'allocation-night-2016-01-01',
        'allocation-night-2016-01-02',
        'allocation-day-2016-01-01',
      ]);
      expect(getAllAllocations().find((allocation) => allocation.id === 'allocation-day-2016-01-01')?.assignees).toEqual(
        ['subject-zoe'],
      );
    });

    it('rejects an allocation on a shift that does not exist', () => {
      expect(() =>
        upsertAllocation({ id: 'orphan', shift_id: 'shift-missing', date: '2016-01-01', assignees: [] }),
      ).toThrow(/FOREIGN KEY/);
      expect(getAllAllocations()).toHaveLength(5);
    });

    it('deletes an allocation together with its assignees', () => {
      expect(deleteAllocation('allocation-day-2016-01-01')).toBe(true);
      expect(deleteAllocation('allocation-day-2016-01-01')).toBe(false);

      const remainingAssignees = testDb
        .prepare('SELECT COUNT(*) AS count FROM allocation_assignees WHERE allocation_id = ?')
        .get('allocation-day-2016-01-01') as { count: number };
      expect(remainingAssignees.count).toBe(0);
    });

    it('reads a full snapshot', () => {
      const snapshot = loadScheduleSnapshot();

      expect(snapshot.shifts).toHaveLength(3);
      expect(snapshot.allocations).toHaveLength(5);
    });
  });
});
