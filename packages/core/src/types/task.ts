import type { TaskState } from './task-state.js';

export type TaskId = number;

/** yyyy-MM-dd */
export type CalendarDate = string;

interface TaskFields {
  readonly id: TaskId;
  readonly title: string;
  readonly description: string | null;
  readonly dueDate: CalendarDate | null;
  readonly createdAt: CalendarDate;
}

/** A frozen task always knows when it thaws. */
export interface FrozenTask extends TaskFields {
  readonly state: typeof TaskState.Frozen;
  readonly thawDate: CalendarDate;
}

/**
 * Any other phase. `thawDate` survives the sweep into Thawing and a burn from
 * Frozen; warm and cool clear it.
 */
export interface UnfrozenTask extends TaskFields {
  readonly state: Exclude<TaskState, typeof TaskState.Frozen>;
  readonly thawDate: CalendarDate | null;
}

export type Task = FrozenTask | UnfrozenTask;
