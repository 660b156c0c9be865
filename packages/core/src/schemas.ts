import { z } from 'zod';
import type { User } from './models/user.js';
import type { Task } from './models/task.js';
import type { TaskResult } from './models/task-result.js';
import type { ProgressRecord, ProgressTable, ProgressUpdate } from './models/progress.js';
import type { ModelArtifact } from './models/model-artifact.js';
import { MAX_QUALITY, MIN_QUALITY } from './constants.js';
import { ValidationError } from './errors.js';

export const IdSchema = z.number().int().positive();

export const UserNameSchema = z.string().trim().min(1, 'name must not be empty');
export const TaskTypeSchema = z.string().trim().min(1, 'type must not be empty');
export const ComplexitySchema = z.number().finite().min(0).max(1);
export const DeadlineSchema = z.number().finite().positive();
export const TimeTakenSchema = z.number().finite().positive();
export const QualitySchema = z.number().int().min(MIN_QUALITY).max(MAX_QUALITY);
export const ProgressPercentSchema = z.number().finite().min(0).max(100);

export const UserSchema: z.ZodType<User> = z.object({
  userId: IdSchema,
  name: UserNameSchema,
});

export const TaskSchema: z.ZodType<Task> = z.object({
  taskId: IdSchema,
  type: TaskTypeSchema,
  complexity: ComplexitySchema,
  deadline: DeadlineSchema,
});

export const TaskResultSchema: z.ZodType<TaskResult> = z.object({
  taskId: IdSchema,
  userId: IdSchema,
  timeTaken: TimeTakenSchema,
  quality: QualitySchema,
});

export const ProgressUpdateSchema: z.ZodType<ProgressUpdate> = z.object({
  timestamp: z.string(),
  progressPercent: ProgressPercentSchema,
  notes: z.string(),
});

export const ProgressRecordSchema: z.ZodType<ProgressRecord> = z.object({
  taskId: IdSchema,
  userId: IdSchema,
  userName: z.string(),
  taskType: z.string(),
  complexity: ComplexitySchema,
  deadline: DeadlineSchema,
  status: z.enum(['assigned', 'in_progress', 'completed']),
  startTime: z.string(),
  updates: z.array(ProgressUpdateSchema),
  completionTime: z.string().nullable(),
  actualTimeTaken: z.number().optional(),
  actualDuration: z.number().optional(),
});

export const ProgressTableSchema: z.ZodType<ProgressTable> = z.record(z.string(), ProgressRecordSchema);

export const ModelArtifactSchema: z.ZodType<ModelArtifact> = z.object({
  version: z.number().int(),
  algorithm: z.string(),
  trainedAt: z.string(),
  sampleCount: z.number().int().nonnegative(),
  payload: z.record(z.string(), z.unknown()),
});

export const NewTaskInputSchema = z.object({
  type: TaskTypeSchema,
  complexity: ComplexitySchema,
  deadline: DeadlineSchema,
});

export const ProgressInputSchema = z.object({
  taskId: IdSchema,
  userId: IdSchema,
  percent: ProgressPercentSchema,
  notes: z.string().trim().default(''),
});

export const ResultInputSchema = z.object({
  taskId: IdSchema,
  userId: IdSchema,
  timeTaken: TimeTakenSchema,
  quality: QualitySchema,
});

/** Parse caller input, turning zod issues into a ValidationError. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: issue.message,
      })),
    );
  }
  return parsed.data;
}
