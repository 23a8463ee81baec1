import type { Task, TaskStatus } from '../schema/index.js';

/** Pending → Done → Working → Pending. */
export function nextStatus(status: TaskStatus): TaskStatus {
  switch (status) {
    case 'pending':
      return 'done';
    case 'done':
      return 'working';
    case 'working':
      return 'pending';
    default: {
      const unreachable: never = status;
      throw new Error(`Unknown task status: ${String(unreachable)}`);
    }
  }
}

export function normalizeDescription(input: string): string | null {
  const trimmed = input.trim();
  return trimmed ? trimmed : null;
}

export function createTask(description: string, status: TaskStatus = 'pending'): Task | null {
  const normalized = normalizeDescription(description);
  if (!normalized) return null;
  return { description: normalized, status };
}

export function appendTask(tasks: readonly Task[], task: Task): Task[] {
  return [...tasks, task];
}

export function replaceDescription(tasks: readonly Task[], index: number, description: string): Task[] | null {
  const current = tasks[index];
  const normalized = normalizeDescription(description);
  if (!current || !normalized) return null;
  return tasks.map((task, i) => (i === index ? { ...task, description: normalized } : task));
}

export function removeTaskAt(tasks: readonly Task[], index: number): Task[] {
  if (index < 0 || index >= tasks.length) return [...tasks];
  return [...tasks.slice(0, index), ...tasks.slice(index + 1)];
}

export function cycleTaskStatus(tasks: readonly Task[], index: number): Task[] {
  return tasks.map((task, i) => (i === index ? { ...task, status: nextStatus(task.status) } : task));
}

export function groupByStatus(tasks: readonly Task[]): Record<TaskStatus, Task[]> {
  const groups: Record<TaskStatus, Task[]> = { working: [], pending: [], done: [] };
  for (const task of tasks) {
    groups[task.status].push(task);
  }
  return groups;
}
