import { isPrintableKeyName, isSpaceKeyName } from './key-utils.js';

/**
 * Single-line input buffer. Editing happens at the end of the value only.
 */
export interface TextInputState {
  value: string;
}

function toChars(value: string): string[] {
  return Array.from(value);
}

export function createTextInput(initial: string): TextInputState {
  return { value: initial };
}

export function appendText(state: TextInputState, text: string): TextInputState {
  return { value: state.value + text };
}

export function deleteLastChar(state: TextInputState): TextInputState {
  const chars = toChars(state.value);
  if (chars.length === 0) return state;
  return { value: chars.slice(0, -1).join('') };
}

export function applyTextInputKey(
  state: TextInputState,
  name: string
): { state: TextInputState; didChangeValue: boolean } | null {
  const prevValue = state.value;

  const finish = (next: TextInputState): { state: TextInputState; didChangeValue: boolean } => ({
    state: next,
    didChangeValue: next.value !== prevValue,
  });

  // Cancel/submit are handled by callers.
  if (name === 'ESCAPE' || name === 'CTRL_C' || name === 'ENTER') return null;

  if (name === 'BACKSPACE') return finish(deleteLastChar(state));
  if (isSpaceKeyName(name)) return finish(appendText(state, ' '));
  if (isPrintableKeyName(name)) return finish(appendText(state, name));

  return null;
}
