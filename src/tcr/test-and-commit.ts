/**
 * test && commit || revert
 */

import type { Task } from '../schema/index.js';
import { PersistenceError } from '../cli/errors.js';
import { commitAll, revertWorkingTree, type GitStepResult } from './git.js';
import { runTestCommand, type ProcessRunner } from './process-runner.js';

export interface TcrContext {
  testCommand: string;
  tasks: readonly Task[];
  selectedTask: Task | null;
  runner: ProcessRunner;
  save: (tasks: readonly Task[]) => void;
  report: (line: string) => void;
}

export type TcrOutcome =
  | { kind: 'committed'; message: string }
  | { kind: 'commitFailed'; failure: Extract<GitStepResult, { ok: false }> }
  | { kind: 'commitSkipped' }
  | { kind: 'saveFailed'; error: PersistenceError }
  | { kind: 'reverted' }
  | { kind: 'revertFailed'; failure: Extract<GitStepResult, { ok: false }> };

export function buildCommitMessage(task: Task): string {
  return `TCR: completed task "${task.description}"`;
}

export function runTestAndCommit(ctx: TcrContext): TcrOutcome {
  const command = ctx.testCommand.trim();
  ctx.report(command ? `Running tests: ${command}` : 'No test command set (press T to set one).');

  if (!runTestCommand(ctx.testCommand, ctx.runner)) {
    ctx.report('Tests failed, not committing. Reverting working tree…');
    const reverted = revertWorkingTree(ctx.runner);
    if (!reverted.ok) {
      ctx.report(`Warning: revert failed: ${reverted.reason}`);
      return { kind: 'revertFailed', failure: reverted };
    }
    ctx.report('Working tree reverted.');
    return { kind: 'reverted' };
  }

  ctx.report('Tests passed.');
  try {
    ctx.save(ctx.tasks);
  } catch (error) {
    if (error instanceof PersistenceError) {
      ctx.report(`Error: ${error.message}`);
      return { kind: 'saveFailed', error };
    }
    throw error;
  }

  if (!ctx.selectedTask) {
    ctx.report('No task selected, skipping commit.');
    return { kind: 'commitSkipped' };
  }

  const message = buildCommitMessage(ctx.selectedTask);
  const committed = commitAll(message, ctx.runner);
  if (!committed.ok) {
    ctx.report(`Warning: commit failed at ${committed.step}: ${committed.reason}`);
    return { kind: 'commitFailed', failure: committed };
  }

  ctx.report(`Committed: ${message}`);
  return { kind: 'committed', message };
}

export function describeTcrOutcome(outcome: TcrOutcome): string {
  switch (outcome.kind) {
    case 'committed':
      return `Committed: ${outcome.message}`;
    case 'commitFailed':
      return `Tests passed, commit failed (${outcome.failure.step})`;
    case 'commitSkipped':
      return 'Tests passed, nothing selected to commit';
    case 'saveFailed':
      return `Error: ${outcome.error.message}`;
    case 'reverted':
      return 'Tests failed, working tree reverted';
    case 'revertFailed':
      return `Tests failed, revert failed: ${outcome.failure.reason}`;
    default: {
      const unreachable: never = outcome;
      throw new Error(`Unknown outcome: ${JSON.stringify(unreachable)}`);
    }
  }
}
