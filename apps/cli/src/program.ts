import { Command } from 'commander';
import type { ContextProvider } from './helpers.js';

import { createAddCommand } from './commands/add.js';
import { createEditCommand } from './commands/edit.js';
import { createShowCommand } from './commands/show.js';
import { createListCommand } from './commands/list.js';
import { createWarmCommand, createBurnCommand, createCoolCommand } from './commands/lifecycle.js';
import { createFreezeCommand } from './commands/freeze.js';

export const VERSION = '0.1.0';

/** Build the kelvin CLI around a lazily created context */
export function createProgram(context: ContextProvider): Command {
  const program = new Command()
    .name('kelvin')
    .description('A thermodynamic task manager')
    .version(VERSION);

  program.addCommand(createAddCommand(context));
  program.addCommand(createEditCommand(context));
  program.addCommand(createShowCommand(context));
  program.addCommand(createListCommand(context));
  program.addCommand(createWarmCommand(context));
  program.addCommand(createBurnCommand(context));
  program.addCommand(createCoolCommand(context));
  program.addCommand(createFreezeCommand(context));

  // Default action (no command): show task list
  program.action((_opts: unknown, cmd: Command) => {
    const [unknownCommand] = cmd.args;
    if (unknownCommand !== undefined) {
      cmd.error(`error: unknown command '${unknownCommand}'`, { code: 'commander.unknownCommand' });
    }
    cmd.commands.find(c => c.name() === 'list')?.parse([], { from: 'user' });
  });

  return program;
}
