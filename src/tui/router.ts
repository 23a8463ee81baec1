import { appendTask, createTask, cycleTaskStatus, removeTaskAt, replaceDescription } from '../store/task-list.js';
import { isCancelKeyName } from './key-utils.js';
import { applyTextInputKey } from './text-input.js';
import {
  VIEW_MODE,
  clampSelection,
  enterInputMode,
  getSelectedTask,
  type AppState,
  type InputMode,
  type StatusMessage,
} from './state.js';

export type Effect =
  | { kind: 'persist' }
  | { kind: 'export' }
  | { kind: 'testAndCommit' }
  | { kind: 'quit' };

export interface Transition {
  state: AppState;
  effects: Effect[];
}

export const EMPTY_DESCRIPTION_WARNING = 'Task description cannot be empty';

function stay(state: AppState, message: StatusMessage | null = null): Transition {
  return { state: { ...state, message }, effects: [] };
}

/**
 * Route one key event. Pure: the returned effects are executed by the run loop,
 * and `persist` always refers to the task list of the returned state.
 */
export function routeKey(state: AppState, key: string): Transition {
  const mode = state.mode;
  switch (mode.kind) {
    case 'view':
      return routeViewKey(state, key);
    case 'addInput':
    case 'editInput':
    case 'setTestCommand':
      return routeInputKey(state, mode, key);
    default: {
      const unreachable: never = mode;
      throw new Error(`Unknown mode: ${JSON.stringify(unreachable)}`);
    }
  }
}

function routeViewKey(state: AppState, key: string): Transition {
  const size = state.tasks.length;

  switch (key) {
    case 'q':
    case 'CTRL_C':
      return { state: { ...state, message: null }, effects: [{ kind: 'quit' }] };

    case 'j':
    case 'DOWN':
      return stay({ ...state, selected: clampSelection(state.selected + 1, size) });

    case 'k':
    case 'UP':
      return stay({ ...state, selected: clampSelection(state.selected - 1, size) });

    case 'd': {
      if (size === 0) return stay(state);
      const tasks = removeTaskAt(state.tasks, state.selected);
      return {
        state: { ...state, tasks, selected: clampSelection(state.selected, tasks.length), message: null },
        effects: [{ kind: 'persist' }],
      };
    }

    case 'ENTER': {
      if (size === 0) return stay(state);
      return {
        state: { ...state, tasks: cycleTaskStatus(state.tasks, state.selected), message: null },
        effects: [{ kind: 'persist' }],
      };
    }

    case 'a':
      return stay({ ...state, mode: enterInputMode('addInput', '') });

    case 'e': {
      const task = getSelectedTask(state);
      if (!task) return stay(state);
      return stay({ ...state, mode: enterInputMode('editInput', task.description) });
    }

    case 'T':
      return stay({ ...state, mode: enterInputMode('setTestCommand', state.testCommand) });

    case 't':
      return { state: { ...state, message: null }, effects: [{ kind: 'testAndCommit' }] };

    case 'E':
      return { state: { ...state, message: null }, effects: [{ kind: 'export' }] };

    default:
      return stay(state);
  }
}

function routeInputKey(state: AppState, mode: InputMode, key: string): Transition {
  if (isCancelKeyName(key)) {
    return stay({ ...state, mode: VIEW_MODE });
  }
  if (key === 'ENTER') {
    return confirmInput(state, mode);
  }

  const edited = applyTextInputKey(mode.input, key);
  if (!edited) return stay(state);
  return stay({ ...state, mode: { ...mode, input: edited.state } });
}

function confirmInput(state: AppState, mode: InputMode): Transition {
  const value = mode.input.value;

  switch (mode.kind) {
    case 'addInput': {
      const task = createTask(value);
      if (!task) return stay(state, { level: 'warning', text: EMPTY_DESCRIPTION_WARNING });
      const tasks = appendTask(state.tasks, task);
      return {
        state: { ...state, tasks, selected: tasks.length - 1, mode: VIEW_MODE, message: null },
        effects: [{ kind: 'persist' }],
      };
    }

    case 'editInput': {
      const tasks = replaceDescription(state.tasks, state.selected, value);
      if (!tasks) return stay(state, { level: 'warning', text: EMPTY_DESCRIPTION_WARNING });
      return {
        state: { ...state, tasks, mode: VIEW_MODE, message: null },
        effects: [{ kind: 'persist' }],
      };
    }

    case 'setTestCommand':
      return stay({ ...state, testCommand: value, mode: VIEW_MODE });

    default: {
      const unreachable: never = mode;
      throw new Error(`Unknown input mode: ${JSON.stringify(unreachable)}`);
    }
  }
}
