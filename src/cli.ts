#!/usr/bin/env node
import { loadConfig, resolveTaskPaths } from './config/loader.js';
import { TerminalError } from './cli/errors.js';
import { createSpawnRunner } from './tcr/process-runner.js';
import { runInteractiveTui } from './tui/interactive.js';
import { createTerminalScreen } from './tui/terminal.js';

async function main(): Promise<void> {
  try {
    const config = loadConfig();
    const { tasksFile, exportFile } = resolveTaskPaths(config);
    const finalState = await runInteractiveTui({
      tasksFile,
      exportFile,
      config,
      screen: createTerminalScreen(),
      runner: createSpawnRunner(),
    });
    console.log(`${finalState.tasks.length} tasks in ${tasksFile}`);
    process.exit(0);
  } catch (error) {
    if (error instanceof TerminalError) {
      console.error(`Terminal error: ${error.message}`);
      process.exit(1);
      return;
    }
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
      return;
    }
    throw error;
  }
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
