import { runSchedule } from '../engine.js';
import type { SchedulingPolicy } from '../policy.js';
import { createKeyedReadySet } from '../ready-set/index.js';
import { remainingTime, taskAt } from '../task.js';
import type { ScheduleOptions, ScheduleRun, Task } from '../types.js';
import { assertQuantum } from '../validation.js';

/**
 * Shortest remaining time first. Ties go to the earlier arrival, then to the
 * earlier position in the population.
 */
export function sjfPolicy(quantum: number): SchedulingPolicy {
  return {
    discipline: 'sjf',
    createReadySet: (tasks) =>
      createKeyedReadySet((handle) => {
        const task = taskAt(tasks, handle);
        return [remainingTime(task), task.arrivalTime, handle];
      }),
    quantumFor: () => quantum,
  };
}

/**
 * Schedule tasks by preemptive SJF (SRTF) and set waiting and turnaround
 * times. The choice is revisited every `quantum` time units.
 */
export function sjfSchedule(tasks: Task[], quantum: number, options?: ScheduleOptions): ScheduleRun {
  assertQuantum(quantum);
  return runSchedule(tasks, sjfPolicy(quantum), options);
}
