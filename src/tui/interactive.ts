import type { Config } from '../config/loader.js';
import { PersistenceError } from '../cli/errors.js';
import { loadTasks, saveTasks } from '../store/task-file.js';
import { exportTasks } from '../store/export-file.js';
import type { ProcessRunner } from '../tcr/process-runner.js';
import { describeTcrOutcome, runTestAndCommit, type TcrOutcome } from '../tcr/test-and-commit.js';
import { getScrollTop, getListHeight } from './layout.js';
import { render } from './render.js';
import { routeKey, type Effect } from './router.js';
import { clampSelection, createAppState, getSelectedTask, type AppState, type StatusMessage } from './state.js';
import { TerminalSession, type Screen } from './terminal.js';

export const ACKNOWLEDGE_PROMPT = 'Press Enter to return to the task list…';

export interface TuiOptions {
  tasksFile: string;
  exportFile: string;
  config: Config;
  screen: Screen;
  runner: ProcessRunner;
  /** Output while the display is suspended. */
  report?: (line: string) => void;
}

function errorMessage(error: PersistenceError): StatusMessage {
  return { level: 'error', text: `Error: ${error.message}` };
}

function tcrMessage(outcome: TcrOutcome): StatusMessage {
  const text = describeTcrOutcome(outcome);
  switch (outcome.kind) {
    case 'committed':
    case 'commitSkipped':
      return { level: 'info', text };
    case 'commitFailed':
    case 'reverted':
    case 'revertFailed':
      return { level: 'warning', text };
    case 'saveFailed':
      return { level: 'error', text };
    default: {
      const unreachable: never = outcome;
      throw new Error(`Unknown outcome: ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Full-screen task list. Resolves with the final state once the user quits.
 */
export async function runInteractiveTui(options: TuiOptions): Promise<AppState> {
  const { screen, tasksFile, exportFile, runner } = options;
  const report = options.report ?? ((line: string) => console.log(line));
  const colorsDisabled = Boolean(options.config.interactive.colors?.disable);
  const pollIntervalMs = options.config.interactive.pollIntervalMs;

  let state = createAppState(loadTasks(tasksFile));
  let scrollTop = 0;
  let dirty = true;

  const session = new TerminalSession(screen);

  /**
   * Runs the effects of one transition. A failed write keeps the state from
   * before the key; remaining effects are skipped.
   */
  async function applyEffects(previous: AppState, next: AppState, effects: Effect[]): Promise<{ state: AppState; quit: boolean }> {
    let current = next;
    for (const effect of effects) {
      switch (effect.kind) {
        case 'quit':
          return { state: current, quit: true };

        case 'persist':
          try {
            saveTasks(tasksFile, current.tasks);
          } catch (error) {
            if (error instanceof PersistenceError) {
              return { state: { ...previous, message: errorMessage(error) }, quit: false };
            }
            throw error;
          }
          break;

        case 'export':
          try {
            exportTasks(exportFile, current.tasks);
            current = { ...current, message: { level: 'info', text: `Exported ${current.tasks.length} tasks to ${exportFile}` } };
          } catch (error) {
            if (error instanceof PersistenceError) {
              return { state: { ...previous, message: errorMessage(error) }, quit: false };
            }
            throw error;
          }
          break;

        case 'testAndCommit': {
          session.suspend();
          const outcome = runTestAndCommit({
            testCommand: current.testCommand,
            tasks: current.tasks,
            selectedTask: getSelectedTask(current),
            runner,
            save: (tasks) => saveTasks(tasksFile, tasks),
            report,
          });
          await session.waitForAcknowledgement(ACKNOWLEDGE_PROMPT);
          session.resume();
          current = { ...current, message: tcrMessage(outcome) };
          if (outcome.kind === 'reverted') {
            // The reset may have rewritten the task file; show what is on disk.
            try {
              const tasks = loadTasks(tasksFile);
              current = { ...current, tasks, selected: clampSelection(current.selected, tasks.length) };
            } catch (error) {
              if (error instanceof PersistenceError) {
                current = { ...current, message: errorMessage(error) };
              } else {
                throw error;
              }
            }
          }
          break;
        }

        default: {
          const unreachable: never = effect;
          throw new Error(`Unknown effect: ${JSON.stringify(unreachable)}`);
        }
      }
    }
    return { state: current, quit: false };
  }

  const onResize = (): void => {
    dirty = true;
  };

  process.stdout.on('resize', onResize);

  try {
    session.start();
    while (true) {
      if (dirty) {
        scrollTop = getScrollTop(state.selected, scrollTop, getListHeight(screen.height));
        render(state, screen, { colorsDisabled, scrollTop, tasksFile });
        dirty = false;
      }

      const key = await session.keys.next(pollIntervalMs);
      if (key === null) continue;

      const transition = routeKey(state, key);
      const result = await applyEffects(state, transition.state, transition.effects);
      state = result.state;
      dirty = true;
      if (result.quit) break;
    }
  } finally {
    process.stdout.removeListener('resize', onResize);
    session.close();
    screen.clear();
  }

  return state;
}
