/**
 * Whole-collection persistence for tasks in a single pretty-printed JSON file.
 *
 * Every command loads the full collection, works on it in memory and writes
 * it back. Nothing is cached between calls; the file is the only source of
 * truth.
 */

import fs from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { Task, TaskId } from '../types/task.js';
import { TaskState } from '../types/task-state.js';
import { isCalendarDate } from '../parsers/date-parser.js';
import { StorageError, describeIssues } from '../errors.js';

/** On-disk shape of one task */
const TaskRecordSchema = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  /** Empty when the task has none */
  description: z.string().default(''),
  state: z.nativeEnum(TaskState),
  thaw_date: z.string().nullable().default(null),
  due_date: z.string().nullable().default(null),
  created_at: z.string(),
});

type TaskRecord = z.infer<typeof TaskRecordSchema>;

export class TaskStore {
  constructor(readonly path: string) {}

  /** All tasks in file order. Empty when the file is missing or blank. */
  load(): Task[] {
    if (!fs.existsSync(this.path)) return [];

    let content: string;
    try {
      content = fs.readFileSync(this.path, 'utf8');
    } catch (err: unknown) {
      throw new StorageError(this.path, 'Failed to read tasks', err);
    }
    if (!content.trim()) return [];

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err: unknown) {
      throw new StorageError(this.path, 'Failed to parse tasks', err);
    }
    if (!Array.isArray(raw)) {
      throw new StorageError(this.path, 'Failed to parse tasks', 'expected a list of tasks');
    }

    const seen = new Set<TaskId>();
    return raw.map((entry: unknown, index: number) => {
      const task = this.recordToTask(entry, index);
      if (seen.has(task.id)) {
        throw new StorageError(this.path, `Corrupt task ${task.id}: duplicate id`);
      }
      seen.add(task.id);
      return task;
    });
  }

  /** Replace the stored collection with `list`, all or nothing */
  save(list: readonly Task[]): void {
    if (new Set(list.map(t => t.id)).size !== list.length) {
      throw new StorageError(this.path, 'Failed to write tasks', 'duplicate task id');
    }

    const content = JSON.stringify(list.map(taskToRecord), null, 2);
    const tmpPath = `${this.path}.tmp`;
    try {
      fs.mkdirSync(dirname(this.path), { recursive: true });
      fs.writeFileSync(tmpPath, content);
      fs.renameSync(tmpPath, this.path);
    } catch (err: unknown) {
      fs.rmSync(tmpPath, { force: true });
      throw new StorageError(this.path, 'Failed to write tasks', err);
    }
  }

  /** max(id) + 1, or 1 for an empty collection */
  static nextId(list: readonly Task[]): TaskId {
    return list.reduce((max, t) => Math.max(max, t.id), 0) + 1;
  }

  private recordToTask(entry: unknown, index: number): Task {
    const parsed = TaskRecordSchema.safeParse(entry);
    if (!parsed.success) {
      throw new StorageError(this.path, `Corrupt task entry ${index + 1}`, describeIssues(parsed.error));
    }

    const record = parsed.data;
    const corrupt = (what: string): StorageError =>
      new StorageError(this.path, `Corrupt task ${record.id}: ${what}`);

    if (!record.title.trim()) throw corrupt('empty title');
    if (!isCalendarDate(record.created_at)) throw corrupt(`bad created date '${record.created_at}'`);
    for (const d of [record.thaw_date, record.due_date]) {
      if (d !== null && !isCalendarDate(d)) throw corrupt(`bad date '${d}'`);
    }

    const base = {
      id: record.id,
      title: record.title,
      description: record.description || null,
      dueDate: record.due_date,
      createdAt: record.created_at,
    };

    if (record.state === TaskState.Frozen) {
      if (record.thaw_date === null) throw corrupt('frozen without a thaw date');
      return { ...base, state: record.state, thawDate: record.thaw_date };
    }
    return { ...base, state: record.state, thawDate: record.thaw_date };
  }
}

function taskToRecord(task: Task): TaskRecord {
  return {
    id: task.id,
    title: task.title,
    description: task.description ?? '',
    state: task.state,
    thaw_date: task.thawDate,
    due_date: task.dueDate,
    created_at: task.createdAt,
  };
}
