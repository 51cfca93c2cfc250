import { runSchedule } from '../engine.js';
import type { SchedulingPolicy } from '../policy.js';
import { createFifoReadySet } from '../ready-set/index.js';
import type { ScheduleOptions, ScheduleRun, Task } from '../types.js';
import { assertQuantum } from '../validation.js';

export function rrPolicy(quantum: number): SchedulingPolicy {
  return {
    discipline: 'rr',
    createReadySet: () => createFifoReadySet(),
    quantumFor: () => quantum,
  };
}

/**
 * Schedule tasks by preemptive round robin and set waiting and turnaround
 * times. A preempted task rejoins the queue behind everything already
 * waiting, but ahead of tasks that arrived during its slice.
 */
export function rrSchedule(tasks: Task[], quantum: number, options?: ScheduleOptions): ScheduleRun {
  assertQuantum(quantum);
  return runSchedule(tasks, rrPolicy(quantum), options);
}
