/**
 * Task reporting helpers.
 */

import type { Task } from './scheduler'
import { formatInstant } from './time-format'

export type TaskRecord = {
  name: string
  schedule: string
  description: string
  enabled: boolean
  runCount: number
  lastRun: string | null
}

export function taskToRecord(task: Task): TaskRecord {
  return {
    name: task.name,
    schedule: task.schedule,
    description: task.description ?? '',
    enabled: task.enabled,
    runCount: task.runCount,
    lastRun: task.lastRun ? formatInstant(task.lastRun) : null,
  }
}

export function formatTaskInfo(task: Task): string {
  const lines = [
    `Task: ${task.name}`,
    ...(task.description ? [`  Description: ${task.description}`] : []),
    `  Schedule: ${task.schedule}`,
    `  Status: ${task.enabled ? 'Enabled' : 'Disabled'}`,
    `  Run Count: ${task.runCount}`,
  ]
  if (task.lastRun) lines.push(`  Last Run: ${formatInstant(task.lastRun)}`)
  return lines.join('\n')
}
