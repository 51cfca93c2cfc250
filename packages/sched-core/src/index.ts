// ---------------------------------------------------------------------------
// @schedsim/core: CPU scheduling simulation
// ---------------------------------------------------------------------------
// Barrel re-export: task records, ready sets, the engine, the five
// disciplines (CFS, FCFS, SJF, Priority, Round Robin) and run metrics.
// ---------------------------------------------------------------------------

export * from './types.js';
export * from './errors.js';
export * from './validation.js';
export * from './task.js';
export * from './ready-set/index.js';
export type { SchedulingPolicy, SimulationState } from './policy.js';
export { admitArrivals, nextArrival } from './admission.js';
export { runSchedule } from './engine.js';
export * from './disciplines/index.js';
export * from './metrics.js';
export { compareDisciplines } from './compare.js';
