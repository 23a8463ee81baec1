import terminalKit from 'terminal-kit';
import type { Screen } from './terminal.js';

function truncateStartByWidth(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return '';
  if (terminalKit.stringWidth(text) <= maxWidth) return text;

  const chars = Array.from(text);
  let width = 0;
  const out: string[] = [];

  for (let idx = chars.length - 1; idx >= 0; idx--) {
    const ch = chars[idx] ?? '';
    const w = terminalKit.stringWidth(ch);
    if (width + w > maxWidth) break;
    out.push(ch);
    width += w;
  }

  return out.reverse().join('');
}

/**
 * Draws `label [value|   ]`. The value is cut from the start so the end stays visible.
 */
export function renderLabeledInputField(
  screen: Screen,
  options: {
    label: string;
    value: string;
    width: number;
    colorsDisabled: boolean;
  }
): void {
  const { label, value, width, colorsDisabled } = options;
  const dim = (s: string): void => (colorsDisabled ? screen.write(s) : screen.dim(s));
  const cursor = (s: string): void => (colorsDisabled ? screen.write(s) : screen.inverse(s));

  screen.write(label);

  const prefixWidth = terminalKit.stringWidth(label);
  const available = Math.max(0, width - prefixWidth);
  if (available < 3) {
    // Not enough room for a bracketed field + cursor.
    screen.write('|'.slice(0, available));
    return;
  }

  const fieldWidth = available - 2; // [ ]
  const cursorToken = '|';
  const valueBudget = Math.max(0, fieldWidth - 1);

  const shown = truncateStartByWidth(value, valueBudget);
  const shownWidth = terminalKit.stringWidth(shown);
  const remaining = Math.max(0, fieldWidth - shownWidth - 1);

  dim('[');
  if (shown) screen.write(shown);
  cursor(cursorToken);
  if (remaining > 0) screen.write(' '.repeat(remaining));
  dim(']');
}
