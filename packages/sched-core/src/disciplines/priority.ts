import { runSchedule } from '../engine.js';
import type { SchedulingPolicy } from '../policy.js';
import { createKeyedReadySet } from '../ready-set/index.js';
import { taskAt } from '../task.js';
import type { ScheduleOptions, ScheduleRun, Task } from '../types.js';
import { assertQuantum } from '../validation.js';

/** Lowest weight first; ties by arrival time, then population order. */
export function priorityPolicy(quantum: number): SchedulingPolicy {
  return {
    discipline: 'priority',
    createReadySet: (tasks) =>
      createKeyedReadySet((handle) => {
        const task = taskAt(tasks, handle);
        return [task.weight, task.arrivalTime, handle];
      }),
    quantumFor: () => quantum,
  };
}

/**
 * Schedule tasks by preemptive priority and set waiting and turnaround times.
 */
export function prioritySchedule(
  tasks: Task[],
  quantum: number,
  options?: ScheduleOptions,
): ScheduleRun {
  assertQuantum(quantum);
  return runSchedule(tasks, priorityPolicy(quantum), options);
}
