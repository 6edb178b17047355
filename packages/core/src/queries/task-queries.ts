/**
 * Task operations behind each CLI command.
 *
 * Each one loads the whole collection, runs the thaw sweep, applies at most
 * one change and writes the collection back. Inputs are validated before
 * anything is written, so a failed command leaves the file untouched.
 */

import { TaskStore } from '../store/task-store.js';
import type { CalendarDate, Task, TaskId } from '../types/task.js';
import { TaskState } from '../types/task-state.js';
import { resolveDateSpec, addDays } from '../parsers/date-parser.js';
import { sweepThawed } from '../lifecycle/sweep.js';
import { applyTransition } from '../lifecycle/transitions.js';
import type { Transition } from '../lifecycle/transitions.js';
import { InvalidDateSpecError, TaskNotFoundError, ValidationError } from '../errors.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function locate(tasks: readonly Task[], id: TaskId): [index: number, task: Task] {
  const idx = tasks.findIndex(t => t.id === id);
  const task = tasks[idx];
  if (!task) throw new TaskNotFoundError(id);
  return [idx, task];
}

function requireTitle(title: string): string {
  const trimmed = title.trim();
  if (!trimmed) throw new ValidationError('Task title cannot be empty');
  return trimmed;
}

function optionalText(text: string | undefined): string | null {
  const trimmed = text?.trim();
  return trimmed ? trimmed : null;
}

/** Load the collection and bring it up to date as of `today` */
function loadSwept(store: TaskStore, today: CalendarDate): { tasks: Task[]; thawed: number } {
  const tasks = store.load();
  const thawed = sweepThawed(tasks, today);
  return { tasks, thawed };
}

// ---------------------------------------------------------------------------
// Add / edit / show / list
// ---------------------------------------------------------------------------

export interface AddTaskInput {
  title: string;
  description?: string;
  /** Starts the task Frozen until this date */
  thawSpec?: string;
  dueSpec?: string;
}

/** Create a task. Active by default, Frozen when a thaw spec is given. */
export function addTask(store: TaskStore, input: AddTaskInput, today: CalendarDate): Task {
  const title = requireTitle(input.title);
  const thawDate = input.thawSpec !== undefined ? resolveDateSpec(input.thawSpec, today) : null;
  const dueDate = input.dueSpec !== undefined ? resolveDateSpec(input.dueSpec, today) : null;

  const tasks = store.load();
  const fields = {
    id: TaskStore.nextId(tasks),
    title,
    description: optionalText(input.description),
    dueDate,
    createdAt: today,
  };
  const task: Task = thawDate !== null
    ? { ...fields, state: TaskState.Frozen, thawDate }
    : { ...fields, state: TaskState.Active, thawDate: null };

  tasks.push(task);
  store.save(tasks);
  return task;
}

export interface EditTaskInput {
  title?: string;
  description?: string;
  thawSpec?: string;
  dueSpec?: string;
}

/**
 * Update the supplied fields only. A new thaw date is written as given and
 * never changes the task's state.
 */
export function editTask(store: TaskStore, id: TaskId, input: EditTaskInput, today: CalendarDate): Task {
  const title = input.title !== undefined ? requireTitle(input.title) : undefined;
  const thawDate = input.thawSpec !== undefined ? resolveDateSpec(input.thawSpec, today) : undefined;
  const dueDate = input.dueSpec !== undefined ? resolveDateSpec(input.dueSpec, today) : undefined;

  const { tasks } = loadSwept(store, today);
  const [idx, current] = locate(tasks, id);

  let updated: Task = current;
  if (title !== undefined) updated = { ...updated, title };
  if (input.description !== undefined) updated = { ...updated, description: optionalText(input.description) };
  if (thawDate !== undefined) updated = { ...updated, thawDate };
  if (dueDate !== undefined) updated = { ...updated, dueDate };

  tasks[idx] = updated;
  store.save(tasks);
  return updated;
}

/** Fetch one task. The swept collection is always written back. */
export function showTask(store: TaskStore, id: TaskId, today: CalendarDate): Task {
  const { tasks } = loadSwept(store, today);
  store.save(tasks);

  const [, task] = locate(tasks, id);
  return task;
}

export type ListFilter = 'default' | 'frozen' | 'all';

export interface ListResult {
  tasks: Task[];
  /** How many tasks the sweep moved to Thawing */
  thawed: number;
}

const VISIBLE_STATES: Record<ListFilter, readonly TaskState[]> = {
  default: [TaskState.Thawing, TaskState.Active],
  frozen: [TaskState.Frozen],
  all: [TaskState.Frozen, TaskState.Thawing, TaskState.Active, TaskState.Done],
};

/** List tasks in insertion order. Writes only if the sweep changed something. */
export function listTasks(store: TaskStore, filter: ListFilter, today: CalendarDate): ListResult {
  const { tasks, thawed } = loadSwept(store, today);
  if (thawed > 0) store.save(tasks);

  const visible = VISIBLE_STATES[filter];
  return { tasks: tasks.filter(t => visible.includes(t.state)), thawed };
}

// ---------------------------------------------------------------------------
// Lifecycle transitions
// ---------------------------------------------------------------------------

function transitionTask(store: TaskStore, id: TaskId, transition: Transition, today: CalendarDate): Task {
  const { tasks } = loadSwept(store, today);
  const [idx, current] = locate(tasks, id);

  const next = applyTransition(current, transition);
  tasks[idx] = next;
  store.save(tasks);
  return next;
}

/** Thawing/Frozen -> Active */
export function warmTask(store: TaskStore, id: TaskId, today: CalendarDate): Task {
  return transitionTask(store, id, { kind: 'warm' }, today);
}

/** Active/Frozen -> Done */
export function burnTask(store: TaskStore, id: TaskId, today: CalendarDate): Task {
  return transitionTask(store, id, { kind: 'burn' }, today);
}

/** Done -> Active */
export function coolTask(store: TaskStore, id: TaskId, today: CalendarDate): Task {
  return transitionTask(store, id, { kind: 'cool' }, today);
}

/**
 * Any state -> Frozen. Without a spec the task thaws `thawDays` from today.
 */
export function freezeTask(
  store: TaskStore,
  id: TaskId,
  thawSpec: string | undefined,
  today: CalendarDate,
  thawDays: number,
): Task {
  let thawDate: CalendarDate;
  if (thawSpec !== undefined) {
    thawDate = resolveDateSpec(thawSpec, today);
  } else {
    const resolved = addDays(today, thawDays);
    if (resolved === null) throw new InvalidDateSpecError(`${thawDays}d`, 'date out of range');
    thawDate = resolved;
  }

  return transitionTask(store, id, { kind: 'freeze', thawDate }, today);
}
