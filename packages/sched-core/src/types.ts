// ---------------------------------------------------------------------------
// @schedsim/core: Shared types
// ---------------------------------------------------------------------------
// Task records, ready-set contract, slice trace and run results shared by the
// admission step, the scheduling engine and every discipline.
// ---------------------------------------------------------------------------

// ---------------------------------------------------------------------------
// Disciplines
// ---------------------------------------------------------------------------

export const DISCIPLINES = ['cfs', 'fcfs', 'sjf', 'priority', 'rr'] as const;

export type Discipline = (typeof DISCIPLINES)[number];

/** Human-readable names, as printed in report headers. */
export const DISCIPLINE_TITLES: Record<Discipline, string> = {
  cfs: 'CFS',
  fcfs: 'FCFS',
  sjf: 'SJF',
  priority: 'PRIORITY',
  rr: 'ROUND ROBIN',
};

// ---------------------------------------------------------------------------
// Task records
// ---------------------------------------------------------------------------

/** Static description of a task, fixed before any scheduling run. */
export type TaskSpec = {
  /** Display identity only; not guaranteed unique. */
  pid: number;
  arrivalTime: number;
  burstTime: number;
  /** Niceness: larger means lower priority and faster vruntime growth. */
  weight: number;
};

/**
 * A task record mutated in place by a scheduling run.
 * `waitingTime + execTime === turnaroundTime` holds after every mutation.
 */
export type Task = TaskSpec & {
  execTime: number;
  waitingTime: number;
  turnaroundTime: number;
  /** CFS fairness counter; untouched by the other disciplines. */
  vruntime: number;
};

/**
 * Index of a task in its population array. Ready sets hold handles, never a
 * second copy of the record.
 */
export type TaskHandle = number;

// ---------------------------------------------------------------------------
// Ready set
// ---------------------------------------------------------------------------

/** Ordered container of admitted, unfinished tasks. */
export type ReadySet = {
  insert(handle: TaskHandle): void;
  /** Next task to run. Throws `InvariantError` when empty. */
  peek(): TaskHandle;
  /** Remove and return the next task to run. Throws `InvariantError` when empty. */
  pop(): TaskHandle;
  size(): number;
  /** Visit every ready task except `handle`. */
  forEachExcept(handle: TaskHandle, fn: (handle: TaskHandle) => void): void;
};

/**
 * Composite ordering key, compared lexicographically. Lower sorts first.
 */
export type ReadyKey = readonly number[];

// ---------------------------------------------------------------------------
// Runs
// ---------------------------------------------------------------------------

/** One contiguous stretch of CPU time given to a single task. */
export type ExecutionSlice = {
  /** Position of the slice within its run, starting at 0. */
  index: number;
  pid: number;
  taskIndex: TaskHandle;
  start: number;
  end: number;
  /** Ready tasks (including the running one) when the slice was chosen. */
  readyCount: number;
  /** Quantum in force for this slice; null when the task runs to completion. */
  quantum: number | null;
};

export type ScheduleOptions = {
  /** Called once per executed slice, in clock order. */
  onSlice?: (slice: ExecutionSlice) => void;
  /** Keep the slice list on the returned run. Defaults to true. */
  recordSlices?: boolean;
  /** Smallest CFS slice when `quantum / readyCount` rounds below it. Defaults to 1. */
  minGranularity?: number;
};

export type ScheduleRun = {
  discipline: Discipline;
  startTime: number;
  endTime: number;
  sliceCount: number;
  slices: ExecutionSlice[];
};

// ---------------------------------------------------------------------------
// Reporting
// ---------------------------------------------------------------------------

export type ScheduleSummary = {
  taskCount: number;
  avgWaitingTime: number;
  avgTurnaroundTime: number;
  /** Population standard deviation of waiting times. */
  waitingTimeStdDev: number;
};

export type TaskResult = TaskSpec & {
  waitingTime: number;
  turnaroundTime: number;
};

export type DisciplineReport = {
  discipline: Discipline;
  run: ScheduleRun;
  summary: ScheduleSummary;
  results: TaskResult[];
};
