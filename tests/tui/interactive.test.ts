import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigSchema } from '../../src/config/loader.js';
import { ACKNOWLEDGE_PROMPT, runInteractiveTui } from '../../src/tui/interactive.js';
import type { ProcessResult } from '../../src/tcr/process-runner.js';
import { createScreenStub, type ScreenStub } from '../helpers/screen-stub.js';
import { createRecordingRunner, type RecordingRunner } from '../helpers/process-runner-stub.js';

let tempDir: string;
let tasksFile: string;
let exportFile: string;

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'taskloop-tui-'));
  tasksFile = path.join(tempDir, 'tasks.md');
  exportFile = path.join(tempDir, 'tasks.json');
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

function start(
  keys: string[],
  overrides: {
    tasksFile?: string;
    exportFile?: string;
    respond?: (program: string, args: string[]) => ProcessResult;
    /** Keys typed once the acknowledgement prompt is shown. */
    afterPrompt?: string[];
  } = {}
) {
  const screen: ScreenStub = createScreenStub();
  const write = screen.write;
  screen.write = (text) => {
    write(text);
    if (text === `\n${ACKNOWLEDGE_PROMPT}\n`) {
      for (const key of overrides.afterPrompt ?? []) screen.emitKey(key);
    }
  };
  const runner: RecordingRunner = createRecordingRunner(overrides.respond);
  const reported: string[] = [];
  const done = runInteractiveTui({
    tasksFile: overrides.tasksFile ?? tasksFile,
    exportFile: overrides.exportFile ?? exportFile,
    config: ConfigSchema.parse({ interactive: { pollIntervalMs: 5 } }),
    screen,
    runner,
    report: (line) => reported.push(line),
  });
  for (const key of keys) screen.emitKey(key);
  return { done, screen, runner, reported };
}

describe('runInteractiveTui', () => {
  it('adds a task, persists it and quits', async () => {
    const { done } = start(['a', 'N', 'e', 'w', 'ENTER', 'q']);
    const state = await done;

    expect(state.tasks).toEqual([{ description: 'New', status: 'pending' }]);
    expect(fs.readFileSync(tasksFile, 'utf-8')).toBe('# Tasks\n\n## Pending\n- [ ] New\n');
  });

  it('loads existing tasks and rewrites the file after a status cycle', async () => {
    fs.writeFileSync(tasksFile, '# Tasks\n\n## Pending\n- [ ] Write docs\n- [ ] Review\n', 'utf-8');
    const { done } = start(['j', 'ENTER', 'q']);
    const state = await done;

    expect(state.selected).toBe(1);
    expect(fs.readFileSync(tasksFile, 'utf-8')).toBe('# Tasks\n\n## Pending\n- [ ] Write docs\n\n## Done\n- [x] Review\n');
  });

  it('exports on E', async () => {
    fs.writeFileSync(tasksFile, '- [~] Busy\n', 'utf-8');
    const { done } = start(['E', 'q']);
    await done;

    const exported: unknown = JSON.parse(fs.readFileSync(exportFile, 'utf-8'));
    expect(exported).toEqual([{ description: 'Busy', status: 'working' }]);
  });

  it('keeps the previous state when the task file cannot be written', async () => {
    const unwritable = path.join(tempDir, 'missing', 'tasks.md');
    const { done, screen } = start(['a', 'x', 'ENTER', 'ESCAPE', 'q'], { tasksFile: unwritable });
    const state = await done;

    expect(state.tasks).toEqual([]);
    expect(fs.existsSync(unwritable)).toBe(false);
    const errors = screen.calls.filter(([kind]) => kind === 'red');
    expect(errors.length).toBeGreaterThan(0);
    expect(errors[0]?.[1]?.startsWith('Error: ')).toBe(true);
  });

  it('runs the tests and commits the selected task', async () => {
    fs.writeFileSync(tasksFile, '- [ ] Write docs\n', 'utf-8');
    const keys = ['T', ...Array.from('make test'), 'ENTER', 't', 'ENTER'];
    const { done, runner, reported, screen } = start(keys, { afterPrompt: ['x', 'ENTER', 'q'] });
    const state = await done;

    expect(runner.invocations).toEqual([
      ['make', 'test'],
      ['git', 'add', '-A'],
      ['git', 'commit', '-m', 'TCR: completed task "Write docs"'],
    ]);
    expect(reported).toEqual(['Running tests: make test', 'Tests passed.', 'Committed: TCR: completed task "Write docs"']);
    expect(state.testCommand).toBe('make test');
    expect(screen.calls).toContainEqual(['write', `\n${ACKNOWLEDGE_PROMPT}\n`]);
    expect(screen.calls.filter(([kind]) => kind === 'fullscreen')).toEqual([
      ['fullscreen', 'true'],
      ['fullscreen', 'false'],
      ['fullscreen', 'true'],
      ['fullscreen', 'false'],
    ]);
  });

  it('reverts the working tree when the tests fail', async () => {
    fs.writeFileSync(tasksFile, '- [ ] Write docs\n', 'utf-8');
    const keys = ['T', ...Array.from('fail'), 'ENTER', 't'];
    const { done, runner, screen } = start(keys, {
      respond: (program) => (program === 'fail' ? { status: 1 } : { status: 0 }),
      afterPrompt: ['ENTER', 'q'],
    });
    const state = await done;

    expect(runner.invocations).toEqual([['fail'], ['git', 'reset', '--hard']]);
    expect(state.tasks).toEqual([{ description: 'Write docs', status: 'pending' }]);
    expect(screen.calls).toContainEqual(['yellow', 'Tests failed, working tree reverted']);
  });

  it('reloads the task file after the working tree is reverted', async () => {
    const committed = '# Tasks\n\n## Pending\n- [ ] Committed\n';
    fs.writeFileSync(tasksFile, committed, 'utf-8');
    const keys = ['a', ...Array.from('New'), 'ENTER', 'T', ...Array.from('fail'), 'ENTER', 't'];
    const { done, runner } = start(keys, {
      afterPrompt: ['ENTER', 'q'],
      respond: (program, args) => {
        if (program === 'fail') return { status: 1 };
        if (program === 'git' && args[0] === 'reset') fs.writeFileSync(tasksFile, committed, 'utf-8');
        return { status: 0 };
      },
    });
    const state = await done;

    expect(runner.invocations).toEqual([['fail'], ['git', 'reset', '--hard']]);
    expect(state.tasks).toEqual([{ description: 'Committed', status: 'pending' }]);
    expect(state.selected).toBe(0);
    expect(fs.readFileSync(tasksFile, 'utf-8')).toBe(committed);
  });
});
