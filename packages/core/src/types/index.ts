export { TaskState, TaskStateName, assertNever } from './task-state.js';
export type { TaskId, CalendarDate, Task, FrozenTask, UnfrozenTask } from './task.js';
