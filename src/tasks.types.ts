/** The tasks the entry point can run against the persisted schedule. */
export enum ScheduleTask {
  ACTIVE_AT = 'active_at',
  OVERLAPPING = 'overlapping',
  // Re-derive every interval and report drift from the stored data
  VERIFY_INDEX = 'verify_index',
}

/** Lists the allocations running at `instant` (ISO-8601). */
export interface ActiveAtTask {
  task: ScheduleTask.ACTIVE_AT;
  instant: string;
}

/** Lists the allocations intersecting `[window_start, window_finish)` (ISO-8601). */
export interface OverlappingTask {
  task: ScheduleTask.OVERLAPPING;
  window_start: string;
  window_finish: string;
}

export interface VerifyIndexTask {
  task: ScheduleTask.VERIFY_INDEX;
}

export type ScheduleTaskEvent = ActiveAtTask | OverlappingTask | VerifyIndexTask;

export interface ScheduleTaskResponse {
  statusCode: number;
  body: string;
}
