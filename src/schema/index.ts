import { z } from 'zod';

export const TaskStatusSchema = z.enum(['pending', 'working', 'done']);
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

export const TaskSchema = z.object({
  description: z.string().refine((value) => value.trim().length > 0, {
    message: 'Task description cannot be empty',
  }),
  status: TaskStatusSchema,
});
export type Task = z.infer<typeof TaskSchema>;

export const ExportFileSchema = z.array(TaskSchema);
export type ExportFile = z.infer<typeof ExportFileSchema>;

/** Section order used by the task file. */
export const STATUS_SECTION_ORDER: readonly TaskStatus[] = ['working', 'pending', 'done'];
