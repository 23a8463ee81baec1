import type { Task, TaskStatus } from '../schema/index.js';

const CHECKLIST_REGEX = /^\s*- \[([^\]]*)\]\s?(.*)$/;

/** Anything other than `~`, `x` or `X` (surrounding spaces ignored) is pending. */
export function statusFromMarker(marker: string): TaskStatus {
  switch (marker.trim()) {
    case '~':
      return 'working';
    case 'x':
    case 'X':
      return 'done';
    default:
      return 'pending';
  }
}

export function markerForStatus(status: TaskStatus): string {
  switch (status) {
    case 'working':
      return '~';
    case 'done':
      return 'x';
    case 'pending':
      return ' ';
    default: {
      const unreachable: never = status;
      throw new Error(`Unknown task status: ${String(unreachable)}`);
    }
  }
}

export function parseChecklistLine(line: string): Task | null {
  const match = line.match(CHECKLIST_REGEX);
  if (!match) return null;

  const [, marker = '', rest = ''] = match;
  const description = rest.trim();
  if (!description) return null;

  return { description, status: statusFromMarker(marker) };
}

/**
 * Parse the checklist lines of a task file.
 * Headings, prose and checklist lines without a description are dropped.
 */
export function parseTaskContent(content: string): Task[] {
  const tasks: Task[] = [];
  for (const line of content.split(/\r?\n/)) {
    const task = parseChecklistLine(line);
    if (task) tasks.push(task);
  }
  return tasks;
}
