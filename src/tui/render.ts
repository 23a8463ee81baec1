import terminalKit from 'terminal-kit';
import type { Task, TaskStatus } from '../schema/index.js';
import type { AppState, InputMode, Mode } from './state.js';
import type { Screen } from './terminal.js';
import { FOOTER_HEIGHT, LIST_TOP, getListHeight } from './layout.js';
import { renderLabeledInputField } from './input-render.js';

export const KEY_HINTS =
  'Enter: cycle status  a: add  e: edit  d: delete  T: set test  t: test+commit  E: export  q: quit';

export interface RenderOptions {
  colorsDisabled: boolean;
  scrollTop: number;
  tasksFile: string;
}

const STATUS_LABELS: Record<TaskStatus, string> = {
  pending: '[ ]',
  working: '[working]',
  done: '[done]',
};

export function formatTaskRow(task: Task, isSelected: boolean): string {
  return `${isSelected ? '›' : ' '} ${STATUS_LABELS[task.status]} ${task.description}`;
}

export function getModeTitle(mode: Mode): string {
  switch (mode.kind) {
    case 'view':
      return 'Tasks';
    case 'addInput':
      return 'Add task';
    case 'editInput':
      return 'Edit task';
    case 'setTestCommand':
      return 'Set test command';
    default: {
      const unreachable: never = mode;
      throw new Error(`Unknown mode: ${JSON.stringify(unreachable)}`);
    }
  }
}

export function getInputLabel(mode: InputMode): string {
  switch (mode.kind) {
    case 'addInput':
      return 'Description ';
    case 'editInput':
      return 'Description ';
    case 'setTestCommand':
      return "Test command (used by 't') ";
    default: {
      const unreachable: never = mode;
      throw new Error(`Unknown input mode: ${JSON.stringify(unreachable)}`);
    }
  }
}

function truncate(s: string, max: number): string {
  if (max <= 0) return '';
  return terminalKit.truncateString(s, max);
}

export function render(state: AppState, screen: Screen, options: RenderOptions): void {
  const width = screen.width;
  const height = screen.height;
  const { colorsDisabled } = options;

  const style = {
    text: (s: string) => screen.write(s),
    bold: (s: string) => (colorsDisabled ? screen.write(s) : screen.bold(s)),
    dim: (s: string) => (colorsDisabled ? screen.write(s) : screen.dim(s)),
    selected: (s: string) => (colorsDisabled ? screen.write(s) : screen.yellow(s)),
    working: (s: string) => (colorsDisabled ? screen.write(s) : screen.cyan(s)),
    done: (s: string) => (colorsDisabled ? screen.write(s) : screen.green(s)),
    warning: (s: string) => (colorsDisabled ? screen.write(s) : screen.yellow(s)),
    error: (s: string) => (colorsDisabled ? screen.write(s) : screen.red(s)),
  };

  screen.clear();

  screen.moveTo(1, 1);
  style.bold(truncate(`taskloop – ${getModeTitle(state.mode)} (${state.tasks.length})`, width));
  screen.moveTo(1, 2);
  style.dim(truncate(KEY_HINTS, width));
  screen.moveTo(1, 3);
  style.dim('─'.repeat(width));

  const listHeight = getListHeight(height);
  if (state.tasks.length === 0) {
    screen.moveTo(1, LIST_TOP);
    style.dim(truncate(`No tasks in ${options.tasksFile}. Press a to add one.`, width));
  }

  const visible = state.tasks.slice(options.scrollTop, options.scrollTop + listHeight);
  visible.forEach((task, offset) => {
    const index = options.scrollTop + offset;
    const isSelected = index === state.selected;
    const line = truncate(formatTaskRow(task, isSelected), width);
    screen.moveTo(1, LIST_TOP + offset);
    if (isSelected) style.selected(line);
    else if (task.status === 'working') style.working(line);
    else if (task.status === 'done') style.done(line);
    else style.text(line);
  });

  const footerTop = height - FOOTER_HEIGHT + 1;
  screen.moveTo(1, footerTop);
  style.dim('─'.repeat(width));

  screen.moveTo(1, footerTop + 1);
  if (state.mode.kind !== 'view') {
    renderLabeledInputField(screen, {
      label: getInputLabel(state.mode),
      value: state.mode.input.value,
      width,
      colorsDisabled,
    });
  } else {
    style.dim(truncate(`Test command: ${state.testCommand.trim() || '(none)'}`, width));
  }

  screen.moveTo(1, footerTop + 2);
  const message = state.message;
  if (message) {
    const text = truncate(message.text, width);
    if (message.level === 'error') style.error(text);
    else if (message.level === 'warning') style.warning(text);
    else style.text(text);
  } else if (state.mode.kind !== 'view') {
    style.dim(truncate('Enter: confirm  Esc: cancel', width));
  }

  screen.styleReset();
}
