import fs from 'node:fs';
import type { Task } from '../schema/index.js';
import { parseTaskContent } from '../parser/markdown-parser.js';
import { PersistenceError, describeError } from '../cli/errors.js';
import { renderTaskFile } from './task-renderer.js';

export const DEFAULT_TASKS_FILE = 'tasks.md';

/** A missing file is an empty list. */
export function loadTasks(filePath: string): Task[] {
  if (!fs.existsSync(filePath)) {
    return [];
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new PersistenceError(`Failed to read task file (${describeError(error)})`, filePath, { cause: error });
  }
  return parseTaskContent(content);
}

export function saveTasks(filePath: string, tasks: readonly Task[]): void {
  const content = renderTaskFile(tasks);
  try {
    fs.writeFileSync(filePath, content, 'utf-8');
  } catch (error) {
    throw new PersistenceError(`Failed to write task file (${describeError(error)})`, filePath, { cause: error });
  }
}
