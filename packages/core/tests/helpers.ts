import type { CalendarDate, Task, TaskState } from '../src/types/index.js';

/** Build a task in any state with sensible defaults */
export function makeTask(
  state: TaskState,
  overrides: { id?: number; title?: string; thawDate?: CalendarDate | null; dueDate?: CalendarDate | null } = {},
): Task {
  const base = {
    id: overrides.id ?? 1,
    title: overrides.title ?? 'Test',
    description: null,
    dueDate: overrides.dueDate ?? null,
    createdAt: '2026-01-01',
  };
  if (state === 'frozen') {
    return { ...base, state, thawDate: overrides.thawDate ?? '2026-01-05' };
  }
  return { ...base, state, thawDate: overrides.thawDate ?? null };
}
