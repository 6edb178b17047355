import { Command } from 'commander';
import { showTask } from '@kelvin/core';
import * as out from '../output.js';
import { $try, parseTaskId } from '../helpers.js';
import type { ContextProvider } from '../helpers.js';

export function createShowCommand(context: ContextProvider): Command {
  return new Command('show')
    .description('Show task details')
    .argument('<id>', 'Task ID')
    .option('--json', 'Output in JSON format')
    .action((rawId: string, opts: { json?: boolean }) => $try(() => {
      const id = parseTaskId(rawId);
      const { store, today } = context();
      const task = showTask(store, id, today);

      if (opts.json) {
        out.printTaskJson(task);
      } else {
        out.printTaskDetails(task);
      }
    }));
}
