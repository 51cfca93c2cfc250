import type { Discipline, ScheduleOptions, ScheduleRun, Task } from '../types.js';
import { cfsSchedule } from './cfs.js';
import { fcfsSchedule } from './fcfs.js';
import { prioritySchedule } from './priority.js';
import { rrSchedule } from './rr.js';
import { sjfSchedule } from './sjf.js';

export { cfsSchedule, cfsPolicy, cfsTimeslice, minReadyVruntime, DEFAULT_MIN_GRANULARITY } from './cfs.js';
export { fcfsSchedule, fcfsPolicy } from './fcfs.js';
export { prioritySchedule, priorityPolicy } from './priority.js';
export { rrSchedule, rrPolicy } from './rr.js';
export { sjfSchedule, sjfPolicy } from './sjf.js';

/** Run one discipline. `quantum` is ignored by FCFS. */
export function runDiscipline(
  discipline: Discipline,
  tasks: Task[],
  quantum: number,
  options?: ScheduleOptions,
): ScheduleRun {
  switch (discipline) {
    case 'cfs':
      return cfsSchedule(tasks, quantum, options);
    case 'fcfs':
      return fcfsSchedule(tasks, options);
    case 'sjf':
      return sjfSchedule(tasks, quantum, options);
    case 'priority':
      return prioritySchedule(tasks, quantum, options);
    case 'rr':
      return rrSchedule(tasks, quantum, options);
  }
}
