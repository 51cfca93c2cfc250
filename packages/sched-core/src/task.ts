import { invariant } from './errors.js';
import type { Task, TaskHandle, TaskResult, TaskSpec } from './types.js';

/** Build a task record with zeroed simulation state. */
export function createTask(spec: TaskSpec): Task {
  return {
    pid: spec.pid,
    arrivalTime: spec.arrivalTime,
    burstTime: spec.burstTime,
    weight: spec.weight,
    execTime: 0,
    waitingTime: 0,
    turnaroundTime: 0,
    vruntime: 0,
  };
}

/**
 * Build the task population sorted by arrival time. Tasks arriving together
 * keep their input order.
 */
export function createPopulation(specs: readonly TaskSpec[]): Task[] {
  return specs
    .map((spec, i) => ({ task: createTask(spec), i }))
    .sort((a, b) => a.task.arrivalTime - b.task.arrivalTime || a.i - b.i)
    .map(({ task }) => task);
}

/** Resolve a ready-set handle to its record. */
export function taskAt(tasks: readonly Task[], handle: TaskHandle): Task {
  const task = tasks[handle];
  invariant(task, `no task at handle ${handle}`);
  return task;
}

export function remainingTime(task: Task): number {
  return task.burstTime - task.execTime;
}

export function toTaskResult(task: Task): TaskResult {
  return {
    pid: task.pid,
    arrivalTime: task.arrivalTime,
    burstTime: task.burstTime,
    weight: task.weight,
    waitingTime: task.waitingTime,
    turnaroundTime: task.turnaroundTime,
  };
}
