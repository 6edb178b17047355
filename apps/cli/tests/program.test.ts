import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { TaskStore, TaskState, defaultConfig } from '@kelvin/core';
import type { CalendarDate } from '@kelvin/core';
import { createProgram } from '../src/program.js';

// Drives the assembled CLI against a temporary task file, capturing console output.

let tmpDir: string;
let store: TaskStore;
let day: CalendarDate;
let logs: string[];
let errors: string[];

function run(...args: string[]): void {
  const context = () => ({ store, config: defaultConfig(), today: day });
  createProgram(context).parse(args, { from: 'user' });
}

beforeAll(() => {
  chalk.level = 0;
});

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'kelvin-cli-test-'));
  store = new TaskStore(join(tmpDir, 'tasks.json'));
  day = '2026-01-01';
  logs = [];
  errors = [];
  vi.spyOn(console, 'log').mockImplementation((msg: unknown) => { logs.push(String(msg)); });
  vi.spyOn(console, 'error').mockImplementation((msg: unknown) => { errors.push(String(msg)); });
});

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
  rmSync(tmpDir, { recursive: true, force: true });
});

describe('add', () => {
  it('adds an active task', () => {
    run('add', 'Test integration task');
    expect(logs).toEqual(['Added task 1 [Active]: Test integration task']);
  });

  it('adds a frozen task with --date', () => {
    run('add', 'Future task', '-d', '7d', '--due', '2026-03-01', '--desc', 'later');
    expect(logs).toEqual(['Added task 1 [Frozen]: Future task']);
    expect(store.load()[0]).toMatchObject({
      state: TaskState.Frozen, thawDate: '2026-01-08', dueDate: '2026-03-01', description: 'later',
    });
  });

  it('reports a bad date and exits non-zero', () => {
    run('add', 'Broken', '--date', 'someday');
    expect(errors).toEqual(["Invalid date 'someday': unrecognised format. Use Nd, Nw or YYYY-MM-DD"]);
    expect(process.exitCode).toBe(1);
    expect(store.load()).toEqual([]);
  });
});

describe('list', () => {
  beforeEach(() => {
    run('add', 'Now');
    run('add', 'Future task', '-d', '2026-01-10');
    logs = [];
  });

  it('hides frozen tasks by default', () => {
    run('list');
    expect(logs).toEqual([
      'ID     Task  State        Thaw Date     Due Date',
      '─'.repeat(5 + 4 + 11 + 12 + 12 + 8),
      '1      Now   Active       -             -',
    ]);
  });

  it('shows frozen tasks with --frozen', () => {
    run('list', '--frozen');
    expect(logs[2]).toBe('2      Future task  Frozen       2026-01-10    -');
    expect(logs).toHaveLength(3);
  });

  it('shows every task with --all', () => {
    run('list', '--all');
    expect(logs).toHaveLength(4);
  });

  it('lists by default when no command is given', () => {
    run();
    expect(logs[2]).toBe('1      Now   Active       -             -');
  });

  it('rejects an unknown command instead of listing', () => {
    const load = vi.spyOn(store, 'load');
    const program = createProgram(() => ({ store, config: defaultConfig(), today: day }))
      .exitOverride()
      .configureOutput({ writeErr: (str) => { errors.push(str.trimEnd()); } });

    expect(() => program.parse(['lsit'], { from: 'user' })).toThrow("error: unknown command 'lsit'");
    expect(errors).toEqual(["error: unknown command 'lsit'"]);
    expect(logs).toEqual([]);
    expect(load).not.toHaveBeenCalled();
  });

  it('reports thawed tasks once their date arrives', () => {
    day = '2026-01-10';
    run('list');
    expect(logs[0]).toBe('Thawed 1 task(s)');
    expect(logs[4]).toBe('2      Future task  Thawing      2026-01-10    -');
  });

  it('says so when nothing matches', () => {
    run('burn', '1');
    logs = [];
    run('list');
    expect(logs).toEqual(['No tasks found.']);
  });
});

describe('show', () => {
  it('prints aligned details', () => {
    run('add', 'Show me', '--desc', 'Details here', '--due', '3d');
    logs = [];
    run('show', '1');
    expect(logs).toEqual([
      'ID:            1',
      'Title:         Show me',
      'Description:   Details here',
      'State:         Active',
      'Thaw Date:     -',
      'Due Date:      2026-01-04',
      'Created:       2026-01-01',
    ]);
  });

  it('omits an empty description', () => {
    run('add', 'Bare');
    logs = [];
    run('show', '1');
    expect(logs.some(l => l.startsWith('Description:'))).toBe(false);
    expect(logs).toHaveLength(6);
  });

  it('prints JSON with --json', () => {
    run('add', 'As JSON');
    logs = [];
    run('show', '1', '--json');
    expect(JSON.parse(logs[0] ?? '')).toEqual({
      id: 1, title: 'As JSON', description: null, state: 'active',
      thawDate: null, dueDate: null, createdAt: '2026-01-01',
    });
  });

  it('reports a missing task', () => {
    run('show', '5');
    expect(errors).toEqual(['Task 5 not found']);
    expect(process.exitCode).toBe(1);
  });

  it('rejects a non-numeric id before touching the store', () => {
    const load = vi.spyOn(store, 'load');
    run('show', 'abc');
    expect(errors).toEqual(["Invalid task id 'abc': expected a positive integer"]);
    expect(load).not.toHaveBeenCalled();
  });
});

describe('edit', () => {
  it('renames a task', () => {
    run('add', 'Old title');
    logs = [];
    run('edit', '1', '--title', 'New title');
    expect(logs).toEqual(['Updated task 1 [Active]: New title']);
  });

  it('warns when setting a thaw date on a task that is not frozen', () => {
    run('add', 'Open');
    logs = [];
    run('edit', '1', '-d', '3d');
    expect(logs).toEqual([
      'Updated task 1 [Active]: Open',
      'Task 1 is not frozen; the thaw date applies once it is frozen again',
    ]);
  });
});

describe('lifecycle commands', () => {
  beforeEach(() => {
    run('add', 'Cycle');
    logs = [];
  });

  it('burns, cools, freezes and warms', () => {
    run('burn', '1');
    run('cool', '1');
    run('freeze', '1');
    run('warm', '1');
    expect(logs).toEqual([
      'Burned task 1 [Done]: Cycle',
      'Cooled task 1 [Active]: Cycle',
      'Froze task 1 [Frozen] until 2026-01-08: Cycle',
      'Warmed task 1 [Active]: Cycle',
    ]);
    expect(errors).toEqual([]);
  });

  it('freezes until an explicit date', () => {
    run('freeze', '1', '--date', '2w');
    expect(logs).toEqual(['Froze task 1 [Frozen] until 2026-01-15: Cycle']);
  });

  it('uses the configured thaw days', () => {
    const context = () => ({
      store,
      config: { ...defaultConfig(), defaults: { thawDays: 3 } },
      today: day,
    });
    createProgram(context).parse(['freeze', '1'], { from: 'user' });
    expect(logs).toEqual(['Froze task 1 [Frozen] until 2026-01-04: Cycle']);
  });

  it('rejects an invalid transition', () => {
    run('warm', '1');
    expect(errors).toEqual(['Cannot warm task 1 (state: Active)']);
    expect(process.exitCode).toBe(1);
    expect(store.load()[0]?.state).toBe(TaskState.Active);
  });
});
