/**
 * schedsim: compare CPU scheduling disciplines on one workload.
 *
 * Usage:
 *   schedsim                                  # 10 random tasks, quantum 200
 *   schedsim --tasks 50 --seed 7              # reproducible workload
 *   schedsim --input tasks.json --json        # tasks from a file, JSON report
 *   schedsim --disciplines cfs,rr --no-table  # summaries only
 *
 * Defaults come from the environment (see lib/env.ts); flags override them.
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander'
import {
  DISCIPLINES,
  SchedulingInputError,
  compareDisciplines,
  createPopulation,
} from '@schedsim/core'
import type { Discipline, DisciplineReport, TaskSpec } from '@schedsim/core'
import { loadConfig } from './lib/env.js'
import type { SimulationConfig } from './lib/env.js'
import { createLogger } from './lib/logger.js'
import type { LogSink, Logger } from './lib/logger.js'
import { renderReport } from './render.js'
import { TaskFileError, generateWorkload, loadTaskFile } from './workload.js'

export interface CliIO {
  /** Report output; receives complete chunks including newlines. */
  stdout: (text: string) => void
  /** Log lines and usage errors. */
  stderr: LogSink
  env: NodeJS.ProcessEnv
  /** Seed used when neither a flag nor SCHED_SEED provides one. */
  defaultSeed: () => number
}

export interface CliOptions {
  tasks?: number
  quantum?: number
  seed?: number
  input?: string
  disciplines: Discipline[]
  table: boolean
  json?: boolean
}

export function defaultIO(): CliIO {
  return {
    stdout: (text) => {
      process.stdout.write(text)
    },
    stderr: (line) => {
      process.stderr.write(line.endsWith('\n') ? line : line + '\n')
    },
    env: process.env,
    defaultSeed: () => Date.now(),
  }
}

// ─── Option parsers ──────────────────────────────────────────────────────────

function parseInteger(value: string): number {
  const n = Number(value)
  if (!Number.isInteger(n)) throw new InvalidArgumentError('Not an integer.')
  return n
}

function parsePositiveInteger(value: string): number {
  const n = parseInteger(value)
  if (n <= 0) throw new InvalidArgumentError('Must be a positive integer.')
  return n
}

function isDiscipline(value: string): value is Discipline {
  return DISCIPLINES.some((discipline) => discipline === value)
}

function parseDisciplines(value: string): Discipline[] {
  const names = value
    .split(',')
    .map((name) => name.trim().toLowerCase())
    .filter(Boolean)
  if (names.length === 0) throw new InvalidArgumentError('No disciplines given.')

  const result: Discipline[] = []
  for (const name of names) {
    if (!isDiscipline(name)) {
      throw new InvalidArgumentError(`Unknown discipline "${name}". Expected one of: ${DISCIPLINES.join(', ')}.`)
    }
    result.push(name)
  }
  return result
}

// ─── Simulation ──────────────────────────────────────────────────────────────

interface Workload {
  source: 'generated' | 'file'
  seed: number | null
  specs: TaskSpec[]
}

function resolveWorkload(options: CliOptions, config: SimulationConfig, io: CliIO): Workload {
  if (options.input) {
    return { source: 'file', seed: null, specs: loadTaskFile(options.input) }
  }
  const seed = options.seed ?? config.seed ?? io.defaultSeed()
  const specs = generateWorkload({
    count: options.tasks ?? config.taskCount,
    maxArrivalTime: config.maxArrivalTime,
    maxBurstTime: config.maxBurstTime,
    maxWeight: config.maxWeight,
    seed,
  })
  return { source: 'generated', seed, specs }
}

/** Run every selected discipline, one after another, on a fresh reset. */
export function runSimulation(
  options: CliOptions,
  config: SimulationConfig,
  io: CliIO,
  logger: Logger,
): DisciplineReport[] {
  const workload = resolveWorkload(options, config, io)
  const quantum = options.quantum ?? config.quantum
  const tasks = createPopulation(workload.specs)
  logger.info('workload ready', {
    source: workload.source,
    seed: workload.seed,
    tasks: tasks.length,
    quantum,
  })

  const reports: DisciplineReport[] = []
  for (const discipline of options.disciplines) {
    const runLog = logger.child(discipline)
    const [report] = compareDisciplines(tasks, quantum, [discipline], {
      recordSlices: false,
      onSlice: (slice) => runLog.debug('slice', { ...slice }),
    })
    if (!report) continue
    runLog.info('run finished', {
      slices: report.run.sliceCount,
      endTime: report.run.endTime,
      avgWaitingTime: report.summary.avgWaitingTime,
    })
    reports.push(report)
  }

  if (options.json) {
    const payload = {
      source: workload.source,
      seed: workload.seed,
      quantum,
      reports: reports.map((r) => ({
        discipline: r.discipline,
        summary: r.summary,
        results: r.results,
      })),
    }
    io.stdout(JSON.stringify(payload, null, 2) + '\n')
  } else {
    for (const report of reports) {
      io.stdout('\n' + renderReport(report, { table: options.table }) + '\n')
    }
  }

  return reports
}

// ─── Program ─────────────────────────────────────────────────────────────────

export function createProgram(io: CliIO): Command {
  const program = new Command()
    .name('schedsim')
    .description('Compare CFS, FCFS, SJF, priority and round-robin scheduling on one workload')
    .option('-n, --tasks <count>', 'number of generated tasks', parsePositiveInteger)
    .option('-q, --quantum <ms>', 'base time quantum', parsePositiveInteger)
    .option('-s, --seed <seed>', 'workload seed', parseInteger)
    .option('-i, --input <file>', 'read task specs from a JSON file instead of generating them')
    .option(
      '-d, --disciplines <list>',
      `comma-separated disciplines to run (${DISCIPLINES.join(', ')})`,
      parseDisciplines,
      [...DISCIPLINES],
    )
    .option('--no-table', 'print summaries without the per-task tables')
    .option('--json', 'print the comparison as JSON')
    .configureOutput({
      writeOut: (str) => io.stdout(str),
      writeErr: (str) => io.stderr(str),
    })
    .exitOverride()

  return program
}

/**
 * Parse `args` (without the node and script entries), run, and return the
 * process exit code.
 */
export function runCli(args: string[], io: CliIO = defaultIO()): number {
  const program = createProgram(io)
  try {
    program.parse(args, { from: 'user' })
  } catch (err: unknown) {
    if (err instanceof CommanderError) return err.exitCode
    throw err
  }

  let config: SimulationConfig
  try {
    config = loadConfig(io.env)
  } catch (err: unknown) {
    io.stderr(err instanceof Error ? err.message : String(err))
    return 1
  }

  const logger = createLogger({ scope: 'schedsim', level: config.logLevel, sink: io.stderr })
  try {
    runSimulation(program.opts<CliOptions>(), config, io, logger)
    return 0
  } catch (err: unknown) {
    if (err instanceof SchedulingInputError) {
      logger.error('input rejected', { issues: err.issues })
      return 1
    }
    if (err instanceof TaskFileError) {
      logger.error('task file unreadable', { path: err.path, error: err.message })
      return 1
    }
    throw err
  }
}
