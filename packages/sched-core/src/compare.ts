import { runDiscipline } from './disciplines/index.js';
import { resetTasks, summarize } from './metrics.js';
import { toTaskResult } from './task.js';
import { DISCIPLINES } from './types.js';
import type { Discipline, DisciplineReport, ScheduleOptions, Task } from './types.js';

/**
 * Run each discipline in turn on a fresh reset of the same population.
 * Runs never overlap; the records are left holding the last run's results.
 */
export function compareDisciplines(
  tasks: Task[],
  quantum: number,
  disciplines: readonly Discipline[] = DISCIPLINES,
  options?: ScheduleOptions,
): DisciplineReport[] {
  const reports: DisciplineReport[] = [];
  for (const discipline of disciplines) {
    resetTasks(tasks);
    const run = runDiscipline(discipline, tasks, quantum, options);
    reports.push({
      discipline,
      run,
      summary: summarize(tasks),
      results: tasks.map(toTaskResult),
    });
  }
  return reports;
}
