import { describe, expect, it } from 'vitest';
import { createSpawnRunner, runTestCommand, splitCommand } from '../../src/tcr/process-runner.js';
import { createRecordingRunner } from '../helpers/process-runner-stub.js';

describe('splitCommand', () => {
  it('splits on any whitespace and drops empty tokens', () => {
    expect(splitCommand('  npm   run\ttest ')).toEqual(['npm', 'run', 'test']);
    expect(splitCommand('   ')).toEqual([]);
  });
});

describe('runTestCommand', () => {
  it('fails without spawning for an empty command', () => {
    const runner = createRecordingRunner();
    expect(runTestCommand('', runner)).toBe(false);
    expect(runTestCommand('  \t ', runner)).toBe(false);
    expect(runner.invocations).toEqual([]);
  });

  it('passes program and arguments without a shell', () => {
    const runner = createRecordingRunner();
    expect(runTestCommand('npm test -- --run "a b"', runner)).toBe(true);
    expect(runner.invocations).toEqual([['npm', 'test', '--', '--run', '"a', 'b"']]);
  });

  it('treats a non-zero exit, a signal or a spawn error as failure', () => {
    expect(runTestCommand('x', createRecordingRunner(() => ({ status: 2 })))).toBe(false);
    expect(runTestCommand('x', createRecordingRunner(() => ({ status: null })))).toBe(false);
    expect(runTestCommand('x', createRecordingRunner(() => ({ status: null, error: 'spawn x ENOENT' })))).toBe(false);
  });
});

describe('createSpawnRunner', () => {
  it('reports a missing program as an error instead of throwing', () => {
    const result = createSpawnRunner().run('taskloop-definitely-missing-binary', []);
    expect(result.status).toBeNull();
    expect(result.error).toMatch(/ENOENT/);
  });
});
