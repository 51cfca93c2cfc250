/**
 * Task populations for the simulator: seeded random generation, or a JSON
 * file of task specs.
 */

import { readFileSync } from 'node:fs'
import { parseTaskSpecs } from '@schedsim/core'
import type { TaskSpec } from '@schedsim/core'

/** Seedable PRNG returning values in [0, 1). */
export type PRNG = () => number

/**
 * mulberry32. Identical seeds produce identical sequences.
 */
export function createPRNG(seed: number): PRNG {
  let s = seed | 0
  return () => {
    s = (s + 0x6d2b79f5) | 0
    let t = Math.imul(s ^ (s >>> 15), 1 | s)
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/** Uniform integer in [min, max]. */
export function randomInt(rng: PRNG, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1))
}

export interface WorkloadOptions {
  count: number
  maxArrivalTime: number
  maxBurstTime: number
  maxWeight: number
  seed: number
}

/**
 * Generate `count` task specs. pids are drawn from [1, count²] and may repeat;
 * burst times start at 1 so every task has work to do.
 */
export function generateWorkload(options: WorkloadOptions): TaskSpec[] {
  const rng = createPRNG(options.seed)
  const specs: TaskSpec[] = []
  for (let i = 0; i < options.count; i++) {
    specs.push({
      pid: randomInt(rng, 1, options.count * options.count),
      arrivalTime: randomInt(rng, 0, options.maxArrivalTime),
      burstTime: randomInt(rng, 1, options.maxBurstTime),
      weight: randomInt(rng, 1, options.maxWeight),
    })
  }
  return specs
}

/** A task file that cannot be read or is not JSON. */
export class TaskFileError extends Error {
  constructor(
    public readonly path: string,
    reason: string,
  ) {
    super(`Cannot load task file ${path}: ${reason}`)
    this.name = 'TaskFileError'
  }
}

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Read task specs from a JSON array on disk. Order does not matter.
 * Throws `SchedulingInputError` when the content is not a list of valid specs.
 */
export function loadTaskFile(path: string): TaskSpec[] {
  let raw: string
  try {
    raw = readFileSync(path, 'utf8')
  } catch (err) {
    throw new TaskFileError(path, reasonOf(err))
  }

  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch (err) {
    throw new TaskFileError(path, reasonOf(err))
  }
  return parseTaskSpecs(data)
}
