/**
 * Terminal rendering for scheduling reports.
 *
 * Times are simulated milliseconds and print as seconds with three decimals.
 */

import chalk from 'chalk'
import Table from 'cli-table3'
import { DISCIPLINE_TITLES } from '@schedsim/core'
import type { DisciplineReport, ScheduleSummary, TaskResult } from '@schedsim/core'

const TASK_TABLE_HEAD = [
  'ID',
  'Arrival Time',
  'Burst Time',
  'Weight',
  'Waiting Time',
  'Turnaround Time',
]

export function formatSeconds(ms: number): string {
  return (ms / 1000).toFixed(3)
}

/** Per-task table, one row per task in population order. */
export function renderTaskTable(results: readonly TaskResult[]): string {
  const table = new Table({
    head: TASK_TABLE_HEAD,
    style: { head: [], border: [] },
  })

  for (const r of results) {
    table.push([
      String(r.pid),
      formatSeconds(r.arrivalTime),
      formatSeconds(r.burstTime),
      String(r.weight),
      formatSeconds(r.waitingTime),
      formatSeconds(r.turnaroundTime),
    ])
  }

  return table.toString()
}

export function renderSummary(summary: ScheduleSummary): string {
  return [
    `Average waiting time: ${formatSeconds(summary.avgWaitingTime)} seconds`,
    `Average turnaround time: ${formatSeconds(summary.avgTurnaroundTime)} seconds`,
    `Standard deviation in waiting time: ${formatSeconds(summary.waitingTimeStdDev)} seconds`,
  ].join('\n')
}

export function renderHeading(report: DisciplineReport): string {
  return chalk.bold.cyan(`**************** ${DISCIPLINE_TITLES[report.discipline]} SCHEDULING ****************`)
}

/** Heading, optional task table and summary for one discipline. */
export function renderReport(report: DisciplineReport, options: { table: boolean }): string {
  const parts = [renderHeading(report)]
  if (options.table) parts.push(renderTaskTable(report.results))
  parts.push(renderSummary(report.summary))
  return parts.join('\n\n')
}
