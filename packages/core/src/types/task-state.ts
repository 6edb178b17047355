export const TaskState = {
  Frozen: 'frozen',
  Thawing: 'thawing',
  Active: 'active',
  Done: 'done',
} as const;

export type TaskState = (typeof TaskState)[keyof typeof TaskState];

/** Display labels */
export const TaskStateName: Record<TaskState, string> = {
  [TaskState.Frozen]: 'Frozen',
  [TaskState.Thawing]: 'Thawing',
  [TaskState.Active]: 'Active',
  [TaskState.Done]: 'Done',
};

/** Compile-time guard for exhaustive switches over TaskState */
export function assertNever(value: never): never {
  throw new Error(`Unhandled task state: ${String(value)}`);
}
