import type { SchedulingPolicy, SimulationState } from './policy.js';

/**
 * Move every pending task whose arrival time has been reached into the ready
 * set. The only way a task enters a run. Expects `state.tasks` sorted by
 * arrival time; returns the number of tasks admitted.
 */
export function admitArrivals(state: SimulationState, policy: SchedulingPolicy): number {
  let admitted = 0;
  while (state.cursor < state.tasks.length) {
    const task = state.tasks[state.cursor];
    if (!task || task.arrivalTime > state.clock) break;

    // Time spent waiting before the run noticed the arrival.
    task.waitingTime = state.clock - task.arrivalTime;
    task.turnaroundTime = task.waitingTime;
    policy.onAdmit?.(task, state.ready, state.tasks);

    state.ready.insert(state.cursor);
    state.cursor++;
    admitted++;
  }
  return admitted;
}

/** Arrival time of the next pending task, or null once all are admitted. */
export function nextArrival(state: SimulationState): number | null {
  return state.tasks[state.cursor]?.arrivalTime ?? null;
}
