// ---------------------------------------------------------------------------
// Completely Fair Scheduler
// ---------------------------------------------------------------------------
// The ready task with the smallest virtual runtime runs next. Its slice is
// the base quantum shared out among everyone currently ready:
//
//   slice = min(max(floor(quantum / readyCount), minGranularity), remaining)
//
// recomputed on every step. A slice of `t` units grows the runner's vruntime
// by `t * weight`, so heavier (nicer) tasks fall behind faster and are picked
// less often. Newcomers start at the smallest vruntime currently ready, or 0
// when nothing is ready, so they cannot jump ahead of tasks already running.
// ---------------------------------------------------------------------------

import { runSchedule } from '../engine.js';
import type { SchedulingPolicy } from '../policy.js';
import { createKeyedReadySet } from '../ready-set/index.js';
import { taskAt } from '../task.js';
import type { ReadySet, ScheduleOptions, ScheduleRun, Task } from '../types.js';
import { assertQuantum } from '../validation.js';

export const DEFAULT_MIN_GRANULARITY = 1;

/** Dynamic CFS slice for `readyCount` runnable tasks. */
export function cfsTimeslice(
  quantum: number,
  readyCount: number,
  minGranularity: number = DEFAULT_MIN_GRANULARITY,
): number {
  return Math.max(Math.floor(quantum / readyCount), minGranularity);
}

/** Smallest vruntime among ready tasks, 0 when none are ready. */
export function minReadyVruntime(ready: ReadySet, tasks: readonly Task[]): number {
  if (ready.size() === 0) return 0;
  return taskAt(tasks, ready.peek()).vruntime;
}

export function cfsPolicy(
  quantum: number,
  minGranularity: number = DEFAULT_MIN_GRANULARITY,
): SchedulingPolicy {
  return {
    discipline: 'cfs',
    createReadySet: (tasks) => createKeyedReadySet((handle) => [taskAt(tasks, handle).vruntime]),
    quantumFor: (readyCount) => cfsTimeslice(quantum, readyCount, minGranularity),
    onAdmit: (task, ready, tasks) => {
      task.vruntime = minReadyVruntime(ready, tasks);
    },
    onExecuted: (task, time) => {
      task.vruntime += time * task.weight;
    },
  };
}

/**
 * Schedule tasks according to CFS and set waiting and turnaround times.
 */
export function cfsSchedule(tasks: Task[], quantum: number, options: ScheduleOptions = {}): ScheduleRun {
  assertQuantum(quantum);
  const minGranularity = options.minGranularity ?? DEFAULT_MIN_GRANULARITY;
  assertQuantum(minGranularity, 'minGranularity');
  return runSchedule(tasks, cfsPolicy(quantum, minGranularity), options);
}
