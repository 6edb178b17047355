/**
 * Error taxonomy. Every failure a command can hit is one of these; the CLI
 * prints the message and exits non-zero.
 */

import type { ZodError } from 'zod';
import type { TaskId } from './types/task.js';
import type { TaskState } from './types/task-state.js';
import { TaskStateName } from './types/task-state.js';

export class KelvinError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or out-of-range date input */
export class InvalidDateSpecError extends KelvinError {
  constructor(readonly spec: string, reason: string) {
    super(`Invalid date '${spec}': ${reason}. Use Nd, Nw or YYYY-MM-DD`);
  }
}

export type TransitionKind = 'warm' | 'burn' | 'cool' | 'freeze';

export class InvalidTransitionError extends KelvinError {
  constructor(
    readonly taskId: TaskId,
    readonly state: TaskState,
    readonly operation: TransitionKind,
  ) {
    super(`Cannot ${operation} task ${taskId} (state: ${TaskStateName[state]})`);
  }
}

export class TaskNotFoundError extends KelvinError {
  constructor(readonly taskId: TaskId) {
    super(`Task ${taskId} not found`);
  }
}

export class StorageError extends KelvinError {
  constructor(readonly path: string, message: string, cause?: unknown) {
    super(`${message}: ${path}${causeSuffix(cause)}`, { cause });
  }
}

export class ConfigError extends KelvinError {
  constructor(readonly path: string, message: string, cause?: unknown) {
    super(`${message}: ${path}${causeSuffix(cause)}`, { cause });
  }
}

/** Bad user input that is not a date (empty title, non-numeric id) */
export class ValidationError extends KelvinError {}

/** "a.b: message; c: message" */
export function describeIssues(error: ZodError): string {
  return error.issues
    .map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
    .join('; ');
}

function causeSuffix(cause: unknown): string {
  if (cause === undefined) return '';
  const message = cause instanceof Error ? cause.message : String(cause);
  // Parser errors can carry a multi-line excerpt
  return ` (${message.split('\n', 1)[0]})`;
}
