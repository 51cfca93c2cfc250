import { describe, it, expect, vi } from 'vitest';
import {
  fcfsSchedule,
  sjfSchedule,
  prioritySchedule,
  rrSchedule,
  runDiscipline,
} from '../disciplines/index.js';
import { createPopulation } from '../task.js';
import type { ExecutionSlice, Task } from '../types.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** `[arrivalTime, burstTime, weight]` per task; pids count up from 1. */
function makeTasks(rows: Array<[number, number, number]>): Task[] {
  return createPopulation(
    rows.map(([arrivalTime, burstTime, weight], i) => ({
      pid: i + 1,
      arrivalTime,
      burstTime,
      weight,
    })),
  );
}

function waits(tasks: Task[]): number[] {
  return tasks.map((t) => t.waitingTime);
}

function turnarounds(tasks: Task[]): number[] {
  return tasks.map((t) => t.turnaroundTime);
}

function trace(slices: ExecutionSlice[]): Array<[number, number, number]> {
  return slices.map((s): [number, number, number] => [s.pid, s.start, s.end]);
}

// ---------------------------------------------------------------------------
// FCFS
// ---------------------------------------------------------------------------

describe('fcfsSchedule', () => {
  it('runs tasks to completion in arrival order', () => {
    const tasks = makeTasks([
      [0, 5, 1],
      [1, 3, 1],
      [2, 8, 1],
    ]);
    const run = fcfsSchedule(tasks);

    expect(waits(tasks)).toEqual([0, 4, 6]);
    expect(turnarounds(tasks)).toEqual([5, 7, 14]);
    expect(trace(run.slices)).toEqual([
      [1, 0, 5],
      [2, 5, 8],
      [3, 8, 16],
    ]);
    expect(run.slices.every((s) => s.quantum === null)).toBe(true);
  });

  it('idles the clock across an arrival gap', () => {
    const tasks = makeTasks([
      [0, 2, 1],
      [10, 3, 1],
    ]);
    const run = fcfsSchedule(tasks);

    expect(waits(tasks)).toEqual([0, 0]);
    expect(turnarounds(tasks)).toEqual([2, 3]);
    expect(run.startTime).toBe(0);
    expect(run.endTime).toBe(13);
    expect(trace(run.slices)).toEqual([
      [1, 0, 2],
      [2, 10, 13],
    ]);
  });

  it('starts the clock at the earliest arrival', () => {
    const tasks = makeTasks([
      [7, 4, 1],
      [8, 1, 1],
    ]);
    const run = fcfsSchedule(tasks);

    expect(run.startTime).toBe(7);
    expect(run.endTime).toBe(12);
    expect(waits(tasks)).toEqual([0, 3]);
  });
});

// ---------------------------------------------------------------------------
// Round Robin
// ---------------------------------------------------------------------------

describe('rrSchedule', () => {
  it('rotates the queue every quantum', () => {
    const tasks = makeTasks([
      [0, 5, 1],
      [1, 3, 1],
      [2, 1, 1],
    ]);
    const run = rrSchedule(tasks, 2);

    expect(trace(run.slices)).toEqual([
      [1, 0, 2],
      [1, 2, 4],
      [2, 4, 6],
      [3, 6, 7],
      [1, 7, 8],
      [2, 8, 9],
    ]);
    expect(waits(tasks)).toEqual([3, 5, 4]);
    expect(turnarounds(tasks)).toEqual([8, 8, 5]);
  });

  it('queues a task arriving mid-slice behind the preempted task', () => {
    const tasks = makeTasks([
      [0, 4, 1],
      [0, 4, 1],
      [1, 2, 1],
    ]);
    const run = rrSchedule(tasks, 2);

    // pid 3 arrives at 1, while pid 1 holds the CPU; pid 1 requeues first.
    expect(run.slices.map((s) => s.pid)).toEqual([1, 2, 1, 3, 2]);
    expect(waits(tasks)).toEqual([2, 6, 5]);
  });
});

// ---------------------------------------------------------------------------
// SJF
// ---------------------------------------------------------------------------

describe('sjfSchedule', () => {
  it('preempts in favour of the shortest remaining time', () => {
    const tasks = makeTasks([
      [0, 5, 1],
      [1, 3, 1],
      [2, 1, 1],
    ]);
    const run = sjfSchedule(tasks, 2);

    expect(trace(run.slices)).toEqual([
      [1, 0, 2],
      [3, 2, 3],
      [1, 3, 5],
      [1, 5, 6],
      [2, 6, 8],
      [2, 8, 9],
    ]);
    expect(waits(tasks)).toEqual([1, 5, 0]);
    expect(turnarounds(tasks)).toEqual([6, 8, 1]);
  });

  it('breaks remaining-time ties by arrival, then population order', () => {
    const tasks = makeTasks([
      [0, 2, 1],
      [0, 2, 1],
      [0, 2, 1],
    ]);
    const run = sjfSchedule(tasks, 5);
    expect(run.slices.map((s) => s.pid)).toEqual([1, 2, 3]);
  });
});

// ---------------------------------------------------------------------------
// Priority
// ---------------------------------------------------------------------------

describe('prioritySchedule', () => {
  it('runs the lowest weight first and ties on arrival time', () => {
    const tasks = makeTasks([
      [0, 4, 3],
      [1, 2, 1],
      [1, 3, 3],
    ]);
    const run = prioritySchedule(tasks, 2);

    expect(trace(run.slices)).toEqual([
      [1, 0, 2],
      [2, 2, 4],
      [1, 4, 6],
      [3, 6, 8],
      [3, 8, 9],
    ]);
    expect(waits(tasks)).toEqual([2, 1, 5]);
    expect(turnarounds(tasks)).toEqual([6, 3, 8]);
  });
});

// ---------------------------------------------------------------------------
// Run options
// ---------------------------------------------------------------------------

describe('ScheduleOptions', () => {
  it('reports every slice to onSlice in order', () => {
    const tasks = makeTasks([
      [0, 5, 1],
      [1, 3, 1],
    ]);
    const onSlice = vi.fn();
    const run = rrSchedule(tasks, 2, { onSlice });

    expect(onSlice).toHaveBeenCalledTimes(run.slices.length);
    expect(onSlice.mock.calls.map(([slice]) => slice)).toEqual(run.slices);
  });

  it('skips the slice list when recordSlices is false', () => {
    const tasks = makeTasks([
      [0, 5, 1],
      [1, 3, 1],
    ]);
    const run = rrSchedule(tasks, 2, { recordSlices: false });

    expect(run.slices).toEqual([]);
    expect(run.sliceCount).toBe(5);
    expect(run.endTime).toBe(8);
  });
});

describe('runDiscipline', () => {
  it('dispatches to the named discipline', () => {
    const tasks = makeTasks([
      [0, 5, 1],
      [1, 3, 1],
      [2, 1, 1],
    ]);
    const run = runDiscipline('sjf', tasks, 2);
    expect(run.discipline).toBe('sjf');
    expect(waits(tasks)).toEqual([1, 5, 0]);
  });

  it('ignores the quantum for FCFS', () => {
    const tasks = makeTasks([
      [0, 5, 1],
      [1, 3, 1],
    ]);
    const run = runDiscipline('fcfs', tasks, 1);
    expect(run.sliceCount).toBe(2);
  });
});
