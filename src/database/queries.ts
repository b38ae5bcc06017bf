import { groupBy } from 'lodash-es';
import db from './db.js';
import type { AllocationAssigneeEntity, AllocationEntity, ShiftDefinitionEntity, Upsertable } from './entities.js';
import type { Allocation, ScheduleSnapshot, ShiftDefinition } from '../shifts/shift.types.js';
import { Logger } from '../logger.js';

const logger = new Logger('queries');

function toShiftDefinition(entity: ShiftDefinitionEntity): ShiftDefinition {
  return { id: entity.id, start_time: entity.start_time, finish_time: entity.finish_time };
}

function toAllocations(entities: AllocationEntity[], assignees: AllocationAssigneeEntity[]): Allocation[] {
  const assigneesByAllocation = groupBy(assignees, (assignee) => assignee.allocation_id);
  return entities.map((entity) => ({
    id: entity.id,
    shift_id: entity.shift_id,
    date: entity.date,
    assignees: (assigneesByAllocation[entity.id] ?? []).map((assignee) => assignee.subject_id),
  }));
}

export function getAllShiftDefinitions(): ShiftDefinition[] {
  const query = db.prepare(`
    SELECT * FROM shift_definitions
    ORDER BY id
  `);

  return (query.all() as ShiftDefinitionEntity[]).map(toShiftDefinition);
}

export function getShiftDefinitionById(id: string): ShiftDefinition | null {
  const query = db.prepare(`
    SELECT * FROM shift_definitions
    WHERE id = ?
  `);

  const result = query.get(id) as ShiftDefinitionEntity | undefined;
  return result ? toShiftDefinition(result) : null;
}

/** Every allocation with its assignees, ordered by date then id. */
export function getAllAllocations(): Allocation[] {
  const allocations = db
    .prepare(
      `
    SELECT * FROM allocations
    ORDER BY date, id
  `,
    )
    .all() as AllocationEntity[];

  const assignees = db
    .prepare(
      `
    SELECT allocation_id, subject_id FROM allocation_assignees
    ORDER BY allocation_id, subject_id
  `,
    )
    .all() as AllocationAssigneeEntity[];

  return toAllocations(allocations, assignees);
}

export function getAllocationsByShiftId(shiftId: string): Allocation[] {
  const allocations = db
    .prepare(
      `
    SELECT * FROM allocations
    WHERE shift_id = ?
    ORDER BY date, id
  `,
    )
    .all(shiftId) as AllocationEntity[];

  const assignees = db
    .prepare(
      `
    SELECT aa.allocation_id, aa.subject_id
    FROM allocation_assignees aa
    JOIN allocations a ON a.id = aa.allocation_id
    WHERE a.shift_id = ?
    ORDER BY aa.allocation_id, aa.subject_id
  `,
    )
    .all(shiftId) as AllocationAssigneeEntity[];

  return toAllocations(allocations, assignees);
}

/** Everything the interval core needs to build its index. */
export function loadScheduleSnapshot(): ScheduleSnapshot {
  const snapshot = db.transaction(
    (): ScheduleSnapshot => ({
      shifts: getAllShiftDefinitions(),
      allocations: getAllAllocations(),
    }),
  )();

  logger.debug(`Read ${snapshot.shifts.length} shift(s) and ${snapshot.allocations.length} allocation(s)`);
  return snapshot;
}

export function upsertShiftDefinition(shift: Upsertable<ShiftDefinitionEntity>): void {
  const query = db.prepare(`
    INSERT INTO shift_definitions (id, start_time, finish_time)
    VALUES (?, ?, ?)
    ON CONFLICT (id) DO UPDATE SET
      start_time = EXCLUDED.start_time,
      finish_time = EXCLUDED.finish_time,
      updated_at = CURRENT_TIMESTAMP
  `);

  query.run(shift.id, shift.start_time, shift.finish_time);
}

/** Inserts or updates an allocation and replaces its assignee set. */
export function upsertAllocation(allocation: Allocation): void {
  const upsert = db.prepare(`
    INSERT INTO allocations (id, shift_id, date)
    VALUES (?, ?, ?)
    ON CONFLICT (id) DO UPDATE SET
      shift_id = EXCLUDED.shift_id,
      date = EXCLUDED.date,
      updated_at = CURRENT_TIMESTAMP
  `);
  const clearAssignees = db.prepare('DELETE FROM allocation_assignees WHERE allocation_id = ?');
  const insertAssignee = db.prepare(`
    INSERT OR IGNORE INTO allocation_assignees (allocation_id, subject_id)
    VALUES (?, ?)
  `);

  db.transaction(() => {
    upsert.run(allocation.id, allocation.shift_id, allocation.date);
    clearAssignees.run(allocation.id);
    for (const subjectId of allocation.assignees) {
      insertAssignee.run(allocation.id, subjectId);
    }
  })();
}

/** Deletes an allocation; its assignee rows go with it. Returns false when nothing matched. */
export function deleteAllocation(id: string): boolean {
  const query = db.prepare(`
    DELETE FROM allocations
    WHERE id = ?
  `);

  return query.run(id).changes > 0;
}
