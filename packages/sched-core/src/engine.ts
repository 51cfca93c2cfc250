// ---------------------------------------------------------------------------
// @schedsim/core: Scheduling engine
// ---------------------------------------------------------------------------
// The loop shared by every discipline:
//
//   admit arrivals -> pick next task -> size the slice -> advance the clock
//   -> charge the slice to the runner and the wait to everyone else ready
//   -> reinsert the runner if it still has work left
//
// When nothing is ready but tasks are still pending, the clock jumps to the
// next arrival. The run ends once the ready set and the pending list are
// both empty. Records must arrive fresh or reset (`resetTasks`) and are
// mutated in place.
// ---------------------------------------------------------------------------

import { admitArrivals, nextArrival } from './admission.js';
import { invariant } from './errors.js';
import type { SchedulingPolicy, SimulationState } from './policy.js';
import { remainingTime, taskAt } from './task.js';
import type { ExecutionSlice, ScheduleOptions, ScheduleRun, Task } from './types.js';
import { assertFreshState, assertPopulation } from './validation.js';

export function runSchedule(
  tasks: Task[],
  policy: SchedulingPolicy,
  options: ScheduleOptions = {},
): ScheduleRun {
  assertPopulation(tasks);
  assertFreshState(tasks);

  const recordSlices = options.recordSlices ?? true;
  const slices: ExecutionSlice[] = [];
  const startTime = taskAt(tasks, 0).arrivalTime;
  const state: SimulationState = {
    tasks,
    ready: policy.createReadySet(tasks),
    cursor: 0,
    clock: startTime,
  };
  let sliceCount = 0;

  while (true) {
    admitArrivals(state, policy);

    const readyCount = state.ready.size();
    if (readyCount === 0) {
      const arrival = nextArrival(state);
      if (arrival === null) break;
      // Idle CPU: nothing to run until the next task shows up.
      invariant(arrival > state.clock, `pending arrival ${arrival} is not after clock ${state.clock}`);
      state.clock = arrival;
      continue;
    }

    const handle = state.ready.peek();
    const task = taskAt(tasks, handle);
    const quantum = policy.quantumFor(readyCount);
    const left = remainingTime(task);
    const time = quantum === null ? left : Math.min(quantum, left);
    invariant(time > 0, `non-positive slice ${time} for task at handle ${handle}`);

    const start = state.clock;
    state.clock += time;
    task.execTime += time;
    task.turnaroundTime += time;

    state.ready.forEachExcept(handle, (other) => {
      const waiting = taskAt(tasks, other);
      waiting.waitingTime += time;
      waiting.turnaroundTime += time;
    });

    const popped = state.ready.pop();
    invariant(popped === handle, `popped handle ${popped} differs from selected ${handle}`);
    policy.onExecuted?.(task, time);

    if (task.execTime < task.burstTime) {
      state.ready.insert(handle);
    }

    const slice: ExecutionSlice = {
      index: sliceCount,
      pid: task.pid,
      taskIndex: handle,
      start,
      end: state.clock,
      readyCount,
      quantum,
    };
    sliceCount++;
    if (recordSlices) slices.push(slice);
    options.onSlice?.(slice);
  }

  return {
    discipline: policy.discipline,
    startTime,
    endTime: state.clock,
    sliceCount,
    slices,
  };
}
