/**
 * CLI helpers: command context, id parsing, error handling.
 */

import type { CalendarDate, KelvinConfig, TaskId, TaskStore } from '@kelvin/core';
import { ValidationError } from '@kelvin/core';
import * as out from './output.js';

/** What a command needs for one invocation */
export interface CliContext {
  readonly store: TaskStore;
  readonly config: KelvinConfig;
  readonly today: CalendarDate;
}

export type ContextProvider = () => CliContext;

/**
 * Build the context on first use only, so `--help` and `--version` never
 * touch the config or task file.
 */
export function lazyContext(factory: () => CliContext): ContextProvider {
  let ctx: CliContext | null = null;
  return () => {
    ctx ??= factory();
    return ctx;
  };
}

/** Parse a positive integer task id */
export function parseTaskId(raw: string): TaskId {
  const id = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(id) || id < 1) {
    throw new ValidationError(`Invalid task id '${raw}': expected a positive integer`);
  }
  return id;
}

/**
 * Run a command action, reporting any error and marking the process as
 * failed.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}
