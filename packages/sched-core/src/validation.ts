import { z } from 'zod';
import { SchedulingInputError } from './errors.js';
import type { InputIssue } from './errors.js';
import type { Task, TaskSpec } from './types.js';

export const taskSpecSchema = z.object({
  pid: z.number().int(),
  arrivalTime: z.number().int().min(0, 'Arrival time must be non-negative'),
  burstTime: z.number().int().positive('Burst time must be positive'),
  weight: z.number().int().positive('Weight must be positive'),
});

/** A non-empty population sorted ascending by arrival time. */
export const populationSchema = z
  .array(taskSpecSchema)
  .min(1, 'At least one task is required')
  .superRefine((tasks, ctx) => {
    for (let i = 1; i < tasks.length; i++) {
      const prev = tasks[i - 1];
      const curr = tasks[i];
      if (prev && curr && curr.arrivalTime < prev.arrivalTime) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i, 'arrivalTime'],
          message: `Tasks must be sorted by arrival time (${curr.arrivalTime} follows ${prev.arrivalTime})`,
        });
      }
    }
  });

const unrun = z.number().refine((value) => value === 0, {
  message: 'Must be 0 before a run; reset the population first',
});

/** Simulation state of records that no run has touched yet. */
export const freshStateSchema = z.array(
  z.object({
    execTime: unrun,
    waitingTime: unrun,
    turnaroundTime: unrun,
    vruntime: unrun,
  }),
);

export const quantumSchema = z.number().int().positive('Quantum must be positive');

export type TaskSpecInput = z.infer<typeof taskSpecSchema>;

function toIssues(error: z.ZodError, root: string): InputIssue[] {
  return error.issues.map((issue) => ({
    path: [root, ...issue.path].join('.'),
    message: issue.message,
  }));
}

/** Throw `SchedulingInputError` unless `tasks` is a valid, sorted population. */
export function assertPopulation(tasks: readonly TaskSpec[]): void {
  const result = populationSchema.safeParse(tasks);
  if (!result.success) throw new SchedulingInputError(toIssues(result.error, 'tasks'));
}

/** Throw `SchedulingInputError` unless every record is freshly created or reset. */
export function assertFreshState(tasks: readonly Task[]): void {
  const result = freshStateSchema.safeParse(tasks);
  if (!result.success) throw new SchedulingInputError(toIssues(result.error, 'tasks'));
}

export function assertQuantum(quantum: number, name = 'quantum'): void {
  const result = quantumSchema.safeParse(quantum);
  if (!result.success) throw new SchedulingInputError(toIssues(result.error, name));
}

/**
 * Parse untrusted data (a task file, a request body) into task specs.
 * Unlike `assertPopulation`, ordering is not required here.
 */
export function parseTaskSpecs(data: unknown): TaskSpec[] {
  const result = z.array(taskSpecSchema).min(1, 'At least one task is required').safeParse(data);
  if (!result.success) throw new SchedulingInputError(toIssues(result.error, 'tasks'));
  return result.data;
}
