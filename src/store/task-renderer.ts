/**
 * Render the task list as a status-grouped markdown checklist
 */

import { STATUS_SECTION_ORDER, type Task, type TaskStatus } from '../schema/index.js';
import { markerForStatus } from '../parser/markdown-parser.js';
import { groupByStatus } from './task-list.js';

export const TASK_FILE_TITLE = '# Tasks';

const SECTION_TITLES: Record<TaskStatus, string> = {
  working: '## Working',
  pending: '## Pending',
  done: '## Done',
};

export function renderChecklistLine(task: Task): string {
  return `- [${markerForStatus(task.status)}] ${task.description}`;
}

/**
 * Sections are emitted in a fixed order and only when they hold tasks;
 * list order is kept inside each section.
 */
export function renderTaskFile(tasks: readonly Task[]): string {
  const groups = groupByStatus(tasks);
  const lines: string[] = [TASK_FILE_TITLE];

  for (const status of STATUS_SECTION_ORDER) {
    const group = groups[status];
    if (group.length === 0) continue;
    lines.push('', SECTION_TITLES[status]);
    for (const task of group) {
      lines.push(renderChecklistLine(task));
    }
  }

  return `${lines.join('\n')}\n`;
}
