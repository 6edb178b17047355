export {
  addTask,
  editTask,
  showTask,
  listTasks,
  warmTask,
  burnTask,
  coolTask,
  freezeTask,
} from './task-queries.js';
export type { AddTaskInput, EditTaskInput, ListFilter, ListResult } from './task-queries.js';
