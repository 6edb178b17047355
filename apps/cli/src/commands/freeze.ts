import { Command } from 'commander';
import { freezeTask } from '@kelvin/core';
import * as out from '../output.js';
import { $try, parseTaskId } from '../helpers.js';
import type { ContextProvider } from '../helpers.js';

export function createFreezeCommand(context: ContextProvider): Command {
  return new Command('freeze')
    .description('Defer a task until a thaw date (any state -> frozen)')
    .argument('<id>', 'Task ID')
    .option('-d, --date <spec>', 'Thaw date (3d, 1w, 2026-03-01); defaults to the configured thaw days')
    .action((rawId: string, opts: { date?: string }) => $try(() => {
      const id = parseTaskId(rawId);
      const { store, config, today } = context();
      const task = freezeTask(store, id, opts.date, today, config.defaults.thawDays);
      out.success(`Froze task ${task.id} [Frozen] until ${out.formatDate(task.thawDate)}: ${task.title}`);
    }));
}
