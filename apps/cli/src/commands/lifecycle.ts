import { Command } from 'commander';
import { warmTask, burnTask, coolTask } from '@kelvin/core';
import * as out from '../output.js';
import { $try, parseTaskId } from '../helpers.js';
import type { ContextProvider } from '../helpers.js';

export function createWarmCommand(context: ContextProvider): Command {
  return new Command('warm')
    .description('Make a task active (thawing/frozen -> active)')
    .argument('<id>', 'Task ID')
    .action((rawId: string) => $try(() => {
      const id = parseTaskId(rawId);
      const { store, today } = context();
      const task = warmTask(store, id, today);
      out.success(`Warmed task ${out.formatTaskLine(task)}`);
    }));
}

export function createBurnCommand(context: ContextProvider): Command {
  return new Command('burn')
    .description('Complete a task (active/frozen -> done)')
    .argument('<id>', 'Task ID')
    .action((rawId: string) => $try(() => {
      const id = parseTaskId(rawId);
      const { store, today } = context();
      const task = burnTask(store, id, today);
      out.success(`Burned task ${out.formatTaskLine(task)}`);
    }));
}

export function createCoolCommand(context: ContextProvider): Command {
  return new Command('cool')
    .description('Reopen a completed task (done -> active)')
    .argument('<id>', 'Task ID')
    .action((rawId: string) => $try(() => {
      const id = parseTaskId(rawId);
      const { store, today } = context();
      const task = coolTask(store, id, today);
      out.success(`Cooled task ${out.formatTaskLine(task)}`);
    }));
}
