import type { ProcessResult, ProcessRunner } from './process-runner.js';

export type GitStep = 'stage' | 'commit' | 'revert';

export type GitStepResult = { ok: true } | { ok: false; step: GitStep; reason: string };

function describeFailure(result: ProcessResult): string {
  if (result.error) return result.error;
  if (result.status === null) return 'terminated by signal';
  return `exit code ${result.status}`;
}

function runGitStep(runner: ProcessRunner, step: GitStep, args: string[]): GitStepResult {
  const result = runner.run('git', args);
  if (result.status === 0) return { ok: true };
  return { ok: false, step, reason: `git ${args[0] ?? ''} failed (${describeFailure(result)})` };
}

/** Stage everything, then commit. Stops at the first failing step. */
export function commitAll(message: string, runner: ProcessRunner): GitStepResult {
  const staged = runGitStep(runner, 'stage', ['add', '-A']);
  if (!staged.ok) return staged;
  return runGitStep(runner, 'commit', ['commit', '-m', message]);
}

/** Discard all local modifications to tracked files. */
export function revertWorkingTree(runner: ProcessRunner): GitStepResult {
  return runGitStep(runner, 'revert', ['reset', '--hard']);
}
