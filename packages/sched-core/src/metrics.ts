// ---------------------------------------------------------------------------
// Reset & summary statistics
// ---------------------------------------------------------------------------

import type { ScheduleSummary, Task } from './types.js';

/** Zero every task's simulation state so another discipline can run. */
export function resetTasks(tasks: Task[]): void {
  for (const task of tasks) {
    task.vruntime = 0;
    task.execTime = 0;
    task.waitingTime = 0;
    task.turnaroundTime = 0;
  }
}

/**
 * Arithmetic mean. Returns 0 for an empty list.
 */
export function computeMean(values: readonly number[]): number {
  const n = values.length;
  if (n === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / n;
}

/**
 * Population standard deviation. Returns 0 for fewer than 2 values.
 */
export function computeStdDev(values: readonly number[]): number {
  const n = values.length;
  if (n < 2) return 0;
  const mean = computeMean(values);
  let sumSq = 0;
  for (const v of values) {
    const d = v - mean;
    sumSq += d * d;
  }
  return Math.sqrt(sumSq / n);
}

/** Averages over a finished run. Reads the records, never mutates them. */
export function summarize(tasks: readonly Task[]): ScheduleSummary {
  const waiting = tasks.map((t) => t.waitingTime);
  return {
    taskCount: tasks.length,
    avgWaitingTime: computeMean(waiting),
    avgTurnaroundTime: computeMean(tasks.map((t) => t.turnaroundTime)),
    waitingTimeStdDev: computeStdDev(waiting),
  };
}
