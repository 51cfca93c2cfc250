import { runSchedule } from '../engine.js';
import type { SchedulingPolicy } from '../policy.js';
import { createFifoReadySet } from '../ready-set/index.js';
import type { ScheduleOptions, ScheduleRun, Task } from '../types.js';

/** Non-preemptive: arrival order, each task runs its whole burst at once. */
export function fcfsPolicy(): SchedulingPolicy {
  return {
    discipline: 'fcfs',
    createReadySet: () => createFifoReadySet(),
    quantumFor: () => null,
  };
}

/**
 * Schedule tasks first-come-first-served and set waiting and turnaround
 * times.
 */
export function fcfsSchedule(tasks: Task[], options?: ScheduleOptions): ScheduleRun {
  return runSchedule(tasks, fcfsPolicy(), options);
}
