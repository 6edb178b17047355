import { Command } from 'commander';
import { TaskState, editTask } from '@kelvin/core';
import * as out from '../output.js';
import { $try, parseTaskId } from '../helpers.js';
import type { ContextProvider } from '../helpers.js';

export function createEditCommand(context: ContextProvider): Command {
  return new Command('edit')
    .description('Edit an existing task')
    .argument('<id>', 'Task ID')
    .option('-t, --title <title>', 'New title')
    .option('--desc <text>', 'New description (empty to clear)')
    .option('-d, --date <spec>', 'New thaw date (3d, 1w, 2026-03-01)')
    .option('--due <spec>', 'New due date (3d, 1w, 2026-03-01)')
    .action((rawId: string, opts: { title?: string; desc?: string; date?: string; due?: string }) => $try(() => {
      const id = parseTaskId(rawId);
      const { store, today } = context();
      const task = editTask(store, id, {
        title: opts.title,
        description: opts.desc,
        thawSpec: opts.date,
        dueSpec: opts.due,
      }, today);

      out.success(`Updated task ${out.formatTaskLine(task)}`);
      if (opts.date !== undefined && task.state !== TaskState.Frozen) {
        out.warning(`Task ${task.id} is not frozen; the thaw date applies once it is frozen again`);
      }
    }));
}
