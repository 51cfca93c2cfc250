/**
 * Environment configuration: validated once, fail-fast.
 *
 * Every value has a default, so an empty environment is valid. A value that
 * is present but malformed throws with the variable's name rather than
 * silently falling back.
 */

import { z } from 'zod'
import { LOG_LEVELS } from './logger.js'
import type { LogLevel } from './logger.js'

/** An exported-but-empty variable counts as unset. */
function envVar<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema)
}

const envSchema = z.object({
  SCHED_QUANTUM: envVar(z.coerce.number().int().positive().default(200)),
  SCHED_TASK_COUNT: envVar(z.coerce.number().int().positive().default(10)),
  SCHED_MAX_ARRIVAL_TIME: envVar(z.coerce.number().int().min(0).default(20_000)),
  SCHED_MAX_BURST_TIME: envVar(z.coerce.number().int().positive().default(50_000)),
  SCHED_MAX_WEIGHT: envVar(z.coerce.number().int().positive().default(10)),
  SCHED_SEED: envVar(z.coerce.number().int().optional()),
  LOG_LEVEL: envVar(z.enum(LOG_LEVELS).default('info')),
})

export interface SimulationConfig {
  /** Base time quantum, in ms. */
  quantum: number
  taskCount: number
  maxArrivalTime: number
  maxBurstTime: number
  maxWeight: number
  seed: number | undefined
  logLevel: LogLevel
}

/** Read the simulation settings from `source` (defaults to `process.env`). */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): SimulationConfig {
  const result = envSchema.safeParse(source)
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')} (${issue.message})`)
      .join(', ')
    throw new Error(
      `Invalid environment variable: ${details}. ` +
      `Fix it in your shell or unset it to use the default.`,
    )
  }

  const env = result.data
  return {
    quantum: env.SCHED_QUANTUM,
    taskCount: env.SCHED_TASK_COUNT,
    maxArrivalTime: env.SCHED_MAX_ARRIVAL_TIME,
    maxBurstTime: env.SCHED_MAX_BURST_TIME,
    maxWeight: env.SCHED_MAX_WEIGHT,
    seed: env.SCHED_SEED,
    logLevel: env.LOG_LEVEL,
  }
}
