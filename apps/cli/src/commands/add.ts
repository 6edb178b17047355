import { Command } from 'commander';
import { addTask } from '@kelvin/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';
import type { ContextProvider } from '../helpers.js';

export function createAddCommand(context: ContextProvider): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<title>', 'Task title')
    .option('--desc <text>', 'Task description')
    .option('-d, --date <spec>', 'Thaw date (3d, 1w, 2026-03-01); the task starts frozen')
    .option('--due <spec>', 'Due date (3d, 1w, 2026-03-01)')
    .action((title: string, opts: { desc?: string; date?: string; due?: string }) => $try(() => {
      const { store, today } = context();
      const task = addTask(store, {
        title,
        description: opts.desc,
        thawSpec: opts.date,
        dueSpec: opts.due,
      }, today);
      out.success(`Added task ${out.formatTaskLine(task)}`);
    }));
}
