/**
 * Task lifecycle state machine.
 *
 *   Frozen --[sweep]--> Thawing --[warm]--> Active --[burn]--> Done --[cool]--> Active
 *   Frozen --[warm]--> Active
 *   Frozen --[burn]--> Done
 *   (any)  --[freeze]--> Frozen
 *
 * Transitions never mutate; they return the next version of the task.
 */

import type { CalendarDate, FrozenTask, Task, UnfrozenTask } from '../types/task.js';
import { TaskState, assertNever } from '../types/task-state.js';
import { InvalidTransitionError } from '../errors.js';
import type { TransitionKind } from '../errors.js';

export type Transition =
  | { readonly kind: 'warm' }
  | { readonly kind: 'burn' }
  | { readonly kind: 'cool' }
  | { readonly kind: 'freeze'; readonly thawDate: CalendarDate };

export type { TransitionKind };

/** Thawing/Frozen -> Active. Clears the thaw date. */
export function warm(task: Task): UnfrozenTask {
  switch (task.state) {
    case TaskState.Thawing:
    case TaskState.Frozen:
      return { ...task, state: TaskState.Active, thawDate: null };
    case TaskState.Active:
    case TaskState.Done:
      throw new InvalidTransitionError(task.id, task.state, 'warm');
    default:
      return assertNever(task);
  }
}

/** Active/Frozen -> Done. The thaw date is left as it was. */
export function burn(task: Task): UnfrozenTask {
  switch (task.state) {
    case TaskState.Active:
    case TaskState.Frozen:
      return { ...task, state: TaskState.Done };
    case TaskState.Thawing:
    case TaskState.Done:
      throw new InvalidTransitionError(task.id, task.state, 'burn');
    default:
      return assertNever(task);
  }
}

/** Done -> Active. Clears the thaw date. */
export function cool(task: Task): UnfrozenTask {
  switch (task.state) {
    case TaskState.Done:
      return { ...task, state: TaskState.Active, thawDate: null };
    case TaskState.Frozen:
    case TaskState.Thawing:
    case TaskState.Active:
      throw new InvalidTransitionError(task.id, task.state, 'cool');
    default:
      return assertNever(task);
  }
}

/** Any state -> Frozen until `thawDate`. */
export function freeze(task: Task, thawDate: CalendarDate): FrozenTask {
  return { ...task, state: TaskState.Frozen, thawDate };
}

export function applyTransition(task: Task, transition: Transition): Task {
  switch (transition.kind) {
    case 'warm': return warm(task);
    case 'burn': return burn(task);
    case 'cool': return cool(task);
    case 'freeze': return freeze(task, transition.thawDate);
    default: return assertNever(transition);
  }
}

/** States each transition accepts, for help text and tests */
export const TRANSITION_SOURCES: Record<TransitionKind, readonly TaskState[]> = {
  warm: [TaskState.Thawing, TaskState.Frozen],
  burn: [TaskState.Active, TaskState.Frozen],
  cool: [TaskState.Done],
  freeze: [TaskState.Frozen, TaskState.Thawing, TaskState.Active, TaskState.Done],
};
