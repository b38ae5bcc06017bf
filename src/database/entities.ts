export interface ShiftDefinitionEntity {
  id: string;
  start_time: string;
  finish_time: string;
  created_at?: string;
  updated_at?: string;
}

export interface AllocationEntity {
  id: string;
  shift_id: string;
  date: string;
  created_at?: string;
  updated_at?: string;
}

export interface AllocationAssigneeEntity {
  allocation_id: string;
  subject_id: string;
}

/** Ids are opaque and supplied by the caller, so only timestamps are left to the database. */
export type Upsertable<T> = Omit<T, 'created_at' | 'updated_at'>;
