import { describe, expect, it } from 'vitest';
import { commitAll, revertWorkingTree } from '../../src/tcr/git.js';
import { createRecordingRunner } from '../helpers/process-runner-stub.js';

describe('commitAll', () => {
  it('stages everything and then commits', () => {
    const runner = createRecordingRunner();
    expect(commitAll('TCR: done', runner)).toEqual({ ok: true });
    expect(runner.invocations).toEqual([
      ['git', 'add', '-A'],
      ['git', 'commit', '-m', 'TCR: done'],
    ]);
  });

  it('stops after a failed stage step', () => {
    const runner = createRecordingRunner(() => ({ status: 128 }));
    expect(commitAll('msg', runner)).toEqual({ ok: false, step: 'stage', reason: 'git add failed (exit code 128)' });
    expect(runner.invocations).toHaveLength(1);
  });

  it('reports a failed commit step', () => {
    const runner = createRecordingRunner((_program, args) => (args[0] === 'commit' ? { status: 1 } : { status: 0 }));
    expect(commitAll('msg', runner)).toEqual({ ok: false, step: 'commit', reason: 'git commit failed (exit code 1)' });
  });

  it('uses the spawn error as the reason', () => {
    const runner = createRecordingRunner(() => ({ status: null, error: 'spawn git ENOENT' }));
    expect(commitAll('msg', runner)).toEqual({ ok: false, step: 'stage', reason: 'git add failed (spawn git ENOENT)' });
  });
});

describe('revertWorkingTree', () => {
  it('hard-resets the working tree', () => {
    const runner = createRecordingRunner();
    expect(revertWorkingTree(runner)).toEqual({ ok: true });
    expect(runner.invocations).toEqual([['git', 'reset', '--hard']]);
  });

  it('reports a signal as the failure', () => {
    const runner = createRecordingRunner(() => ({ status: null }));
    expect(revertWorkingTree(runner)).toEqual({ ok: false, step: 'revert', reason: 'git reset failed (terminated by signal)' });
  });
});
