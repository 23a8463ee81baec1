import { spawnSync } from 'node:child_process';

export interface ProcessResult {
  /** Exit status, or null when the process could not be started or was killed. */
  status: number | null;
  error?: string;
}

export interface ProcessRunner {
  run(program: string, args: string[]): ProcessResult;
}

/**
 * Runs a program synchronously in the current directory with the terminal's stdio,
 * so its output stays visible while the UI is suspended.
 */
export function createSpawnRunner(cwd: string = process.cwd()): ProcessRunner {
  return {
    run(program, args) {
      const result = spawnSync(program, args, { cwd, stdio: 'inherit' });
      if (result.error) {
        return { status: null, error: result.error.message };
      }
      return { status: result.status };
    },
  };
}

export function splitCommand(command: string): string[] {
  return command.split(/\s+/).filter(Boolean);
}

/** An empty command fails without spawning anything. */
export function runTestCommand(command: string, runner: ProcessRunner): boolean {
  const [program, ...args] = splitCommand(command);
  if (!program) return false;
  return runner.run(program, args).status === 0;
}
