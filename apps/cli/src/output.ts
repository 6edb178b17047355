/**
 * chalk-based output formatting.
 */

import chalk from 'chalk';
import { TaskState, TaskStateName } from '@kelvin/core';
import type { CalendarDate, Task } from '@kelvin/core';

// --- State colors (ice to steam) ---

const STATE_COLORS: Record<TaskState, string> = {
  [TaskState.Frozen]: '#BBE8F2',
  [TaskState.Thawing]: '#94D7F2',
  [TaskState.Active]: '#55B3D9',
  [TaskState.Done]: '#3F5F73',
};

const ID_WIDTH = 5;
const STATE_WIDTH = 11; // "Thawing" + margin
const DATE_WIDTH = 12; // "YYYY-MM-DD" + margin
const LABEL_WIDTH = 14;

// --- Formatting functions ---

export function formatState(state: TaskState): string {
  return chalk.hex(STATE_COLORS[state])(TaskStateName[state]);
}

/** Pad outside the color codes so columns line up */
export function formatStatePadded(state: TaskState, width: number): string {
  const padding = Math.max(0, width - TaskStateName[state].length);
  return formatState(state) + ' '.repeat(padding);
}

export function formatDate(date: CalendarDate | null): string {
  return date ?? '-';
}

/** One-line summary used after mutations */
export function formatTaskLine(task: Task): string {
  return `${task.id} [${TaskStateName[task.state]}]: ${task.title}`;
}

// --- Task views ---

/** Columns: ID, Task, State, Thaw Date, Due Date */
export function printTaskTable(tasks: readonly Task[]): void {
  if (tasks.length === 0) {
    info('No tasks found.');
    return;
  }

  const titleWidth = Math.max(4, ...tasks.map(t => t.title.length));

  console.log([
    chalk.bold('ID'.padEnd(ID_WIDTH)),
    chalk.bold('Task'.padEnd(titleWidth)),
    chalk.bold('State'.padEnd(STATE_WIDTH)),
    chalk.bold('Thaw Date'.padEnd(DATE_WIDTH)),
    chalk.bold('Due Date'),
  ].join('  '));

  const totalWidth = ID_WIDTH + titleWidth + STATE_WIDTH + DATE_WIDTH * 2 + 2 * 4;
  console.log('─'.repeat(totalWidth));

  for (const task of tasks) {
    console.log([
      String(task.id).padEnd(ID_WIDTH),
      task.title.padEnd(titleWidth),
      formatStatePadded(task.state, STATE_WIDTH),
      formatDate(task.thawDate).padEnd(DATE_WIDTH),
      formatDate(task.dueDate),
    ].join('  '));
  }
}

export function printTaskDetails(task: Task): void {
  const row = (label: string, value: string): void => {
    console.log(`${chalk.bold(label.padEnd(LABEL_WIDTH))} ${value}`);
  };

  row('ID:', String(task.id));
  row('Title:', task.title);
  if (task.description) row('Description:', task.description);
  row('State:', formatState(task.state));
  row('Thaw Date:', formatDate(task.thawDate));
  row('Due Date:', formatDate(task.dueDate));
  row('Created:', task.createdAt);
}

export function printTaskJson(task: Task): void {
  console.log(JSON.stringify(task, null, 2));
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.error(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}
