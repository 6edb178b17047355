import type { CalendarDate, Task } from '../types/task.js';
import { TaskState } from '../types/task-state.js';

/**
 * Promote every Frozen task whose thaw date has arrived to Thawing.
 * Replaces the promoted entries in place and returns how many changed.
 * The thaw date stays on the promoted task.
 */
export function sweepThawed(tasks: Task[], today: CalendarDate): number {
  let count = 0;
  tasks.forEach((task, i) => {
    if (task.state === TaskState.Frozen && today >= task.thawDate) {
      tasks[i] = { ...task, state: TaskState.Thawing };
      count++;
    }
  });
  return count;
}
