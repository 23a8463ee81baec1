import fs from 'node:fs';
import { ExportFileSchema, type Task } from '../schema/index.js';
import { PersistenceError, describeError } from '../cli/errors.js';

export const DEFAULT_EXPORT_FILE = 'tasks.json';

export function renderExport(tasks: readonly Task[]): string {
  const payload = ExportFileSchema.parse(tasks.map((task) => ({ description: task.description, status: task.status })));
  return JSON.stringify(payload, null, 2);
}

export function exportTasks(filePath: string, tasks: readonly Task[]): void {
  const content = renderExport(tasks);
  try {
    fs.writeFileSync(filePath, content, 'utf-8');
  } catch (error) {
    throw new PersistenceError(`Failed to write export file (${describeError(error)})`, filePath, { cause: error });
  }
}
