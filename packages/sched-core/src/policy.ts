import type { Discipline, ReadySet, Task } from './types.js';

/**
 * What distinguishes one discipline from another. The engine owns the clock,
 * admission and bookkeeping; a policy only orders the ready set and sizes
 * slices.
 */
export type SchedulingPolicy = {
  discipline: Discipline;
  createReadySet(tasks: readonly Task[]): ReadySet;
  /** Largest slice for the next step; null lets the task run to completion. */
  quantumFor(readyCount: number): number | null;
  /** Called on a task as it is admitted, before it enters the ready set. */
  onAdmit?(task: Task, ready: ReadySet, tasks: readonly Task[]): void;
  /** Called after a slice of `time` units, before the task is reinserted. */
  onExecuted?(task: Task, time: number): void;
};

/** Mutable state of one run. */
export type SimulationState = {
  tasks: readonly Task[];
  ready: ReadySet;
  /** Number of tasks admitted so far; `tasks[cursor]` is the next to arrive. */
  cursor: number;
  clock: number;
};
