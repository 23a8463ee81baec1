import type { Task } from '../schema/index.js';
import { createTextInput, type TextInputState } from './text-input.js';

export type InputModeKind = 'addInput' | 'editInput' | 'setTestCommand';

export type Mode =
  | { kind: 'view' }
  | { kind: 'addInput'; input: TextInputState }
  | { kind: 'editInput'; input: TextInputState }
  | { kind: 'setTestCommand'; input: TextInputState };

export type InputMode = Extract<Mode, { kind: InputModeKind }>;

export interface StatusMessage {
  level: 'info' | 'warning' | 'error';
  text: string;
}

export interface AppState {
  tasks: Task[];
  selected: number;
  mode: Mode;
  testCommand: string;
  message: StatusMessage | null;
}

export const VIEW_MODE: Mode = { kind: 'view' };

export function createAppState(tasks: Task[], testCommand = ''): AppState {
  return {
    tasks,
    selected: 0,
    mode: VIEW_MODE,
    testCommand,
    message: null,
  };
}

export function clampSelection(selected: number, listSize: number): number {
  return Math.min(Math.max(selected, 0), Math.max(0, listSize - 1));
}

export function getSelectedTask(state: AppState): Task | null {
  return state.tasks[state.selected] ?? null;
}

export function enterInputMode(kind: InputModeKind, seed: string): InputMode {
  return { kind, input: createTextInput(seed) };
}
