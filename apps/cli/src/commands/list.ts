import { Command } from 'commander';
import chalk from 'chalk';
import { listTasks } from '@kelvin/core';
import type { ListFilter } from '@kelvin/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';
import type { ContextProvider } from '../helpers.js';

export function createListCommand(context: ContextProvider): Command {
  return new Command('list')
    .description('List tasks (thawing and active by default)')
    .option('--frozen', 'Show only frozen tasks')
    .option('--all', 'Show tasks in every state')
    .action((opts: { frozen?: boolean; all?: boolean }) => $try(() => {
      const filter: ListFilter = opts.all ? 'all' : opts.frozen ? 'frozen' : 'default';
      const { store, today } = context();
      const { tasks, thawed } = listTasks(store, filter, today);

      if (thawed > 0) {
        out.info(chalk.dim(`Thawed ${thawed} task(s)`));
      }
      out.printTaskTable(tasks);
    }));
}
