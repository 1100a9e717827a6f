/**
 * Scheduler
 *
 * Task registry and polling engine. Each scheduler owns its tasks and their
 * triggers; nothing is shared between instances.
 *
 * Polling is sequential: a cycle snapshots the enabled tasks, then awaits each
 * due action in turn, so at most one action is in flight. A failing action is
 * logged and recorded against its task and the cycle moves on.
 */

import { setTimeout as delay } from 'node:timers/promises'
import type { Instant } from './time-date'
import { nowInstant } from './time-date'
import { formatInstant } from './time-format'
import { type Trigger, triggerFromPhrase } from './trigger'
import type { Action, ActionParameters } from './actions'
import { type HistoryAdapter, type RunRecord, createMemoryAdapter } from './adapter'
import { type Logger, createLogger } from './logger'
import { isResult } from './result'

// ============================================================================
// Error Classes
// ============================================================================

export {
  InvalidTaskError, DuplicateTaskNameError, TaskNotFoundError,
  ActionExecutionFailureError, SchedulerStateError,
} from './errors'
import {
  InvalidTaskError, DuplicateTaskNameError, TaskNotFoundError,
  ActionExecutionFailureError, SchedulerStateError,
} from './errors'

// ============================================================================
// Types
// ============================================================================

export type TaskInput = {
  name: string
  /** Recurrence phrase, e.g. "every 2 hours" or "every monday at 15:00". */
  schedule: string
  action: Action
  /** Registry name of the action, kept for reporting only. */
  actionName?: string
  parameters?: ActionParameters
  description?: string
  enabled?: boolean
}

/** Read-only view of a registered task. */
export type Task = {
  readonly name: string
  readonly schedule: string
  readonly actionName?: string
  readonly parameters: ActionParameters
  readonly description?: string
  readonly enabled: boolean
  readonly runCount: number
  readonly lastRun?: Instant
}

export type RunOutcome =
  | { readonly taskName: string; readonly at: Instant; readonly ok: true }
  | { readonly taskName: string; readonly at: Instant; readonly ok: false; readonly error: ActionExecutionFailureError }

export type PollReport = {
  readonly at: Instant
  readonly executed: RunOutcome[]
}

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>

export type SchedulerConfig = {
  /** Current wall-clock time. Defaults to the local system clock. */
  clock?: () => Instant
  /** Waits between poll cycles; must resolve early once `signal` aborts. */
  sleep?: Sleep
  history?: HistoryAdapter
  logger?: Logger
}

export type Scheduler = {
  register(input: TaskInput): Task
  remove(name: string): void
  enable(name: string): void
  disable(name: string): void
  get(name: string): Task
  has(name: string): boolean
  list(): Task[]
  clear(): void
  nextRun(name: string, now?: Instant): Instant
  history(name: string): Promise<RunRecord[]>
  pollOnce(now?: Instant): Promise<PollReport>
  runNow(name: string, now?: Instant): Promise<RunOutcome>
  run(pollIntervalSeconds?: number): Promise<void>
  stop(): void
  isRunning(): boolean
}

type TaskEntry = {
  readonly name: string
  readonly schedule: string
  readonly trigger: Trigger
  readonly action: Action
  readonly actionName?: string
  readonly parameters: ActionParameters
  readonly description?: string
  enabled: boolean
  runCount: number
  lastRun?: Instant
  /** When the task was registered or last re-enabled; earlier fire windows are skipped. */
  since: Instant
}

// ============================================================================
// Defaults
// ============================================================================

export const defaultSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal })
  } catch (e) {
    // An abort ends the wait; anything else is a real failure
    if (!signal.aborted) throw e
  }
}

function snapshot(entry: TaskEntry): Task {
  return {
    name: entry.name,
    schedule: entry.schedule,
    parameters: { ...entry.parameters },
    enabled: entry.enabled,
    runCount: entry.runCount,
    ...(entry.actionName !== undefined ? { actionName: entry.actionName } : {}),
    ...(entry.description !== undefined ? { description: entry.description } : {}),
    ...(entry.lastRun !== undefined ? { lastRun: entry.lastRun } : {}),
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createScheduler(config: SchedulerConfig = {}): Scheduler {
  const clock = config.clock ?? nowInstant
  const sleep = config.sleep ?? defaultSleep
  const historyAdapter = config.history ?? createMemoryAdapter()
  const log = config.logger ?? createLogger('scheduler')

  const tasks = new Map<string, TaskEntry>()

  let busy = false
  let running = false
  let stopRequested = false
  let wake: AbortController | undefined

  // ========== Registry ==========

  function entryOf(name: string): TaskEntry {
    const entry = tasks.get(name)
    if (!entry) throw new TaskNotFoundError(name)
    return entry
  }

  function register(input: TaskInput): Task {
    if (typeof input.name !== 'string' || input.name.trim() === '') {
      throw new InvalidTaskError('Task name is required')
    }
    if (typeof input.action !== 'function') {
      throw new InvalidTaskError(`Task '${input.name}' has no action`)
    }
    if (tasks.has(input.name)) throw new DuplicateTaskNameError(input.name)

    // Parsing happens before any mutation so a bad phrase registers nothing
    const trigger = triggerFromPhrase(input.schedule)

    const entry: TaskEntry = {
      name: input.name,
      schedule: input.schedule,
      trigger,
      action: input.action,
      parameters: { ...input.parameters },
      enabled: input.enabled ?? true,
      runCount: 0,
      since: clock(),
      ...(input.actionName !== undefined ? { actionName: input.actionName } : {}),
      ...(input.description !== undefined ? { description: input.description } : {}),
    }
    tasks.set(entry.name, entry)
    log.info("added task '%s' (%s)", entry.name, trigger.describe())
    return snapshot(entry)
  }

  function remove(name: string): void {
    entryOf(name)
    tasks.delete(name)
    log.info("removed task '%s'", name)
  }

  function enable(name: string): void {
    const entry = entryOf(name)
    if (!entry.enabled) {
      entry.enabled = true
      entry.since = clock()
    }
    log.info("enabled task '%s'", name)
  }

  function disable(name: string): void {
    entryOf(name).enabled = false
    log.info("disabled task '%s'", name)
  }

  function clear(): void {
    tasks.clear()
    log.info('all tasks cleared')
  }

  function nextRun(name: string, now: Instant = clock()): Instant {
    const entry = entryOf(name)
    return entry.trigger.nextFire(now, entry.lastRun, entry.since)
  }

  // ========== Execution ==========

  async function record(run: RunRecord): Promise<void> {
    try {
      await historyAdapter.append(run)
    } catch (e) {
      log.error("could not record run of task '%s': %O", run.taskName, e)
    }
  }

  async function execute(entry: TaskEntry, now: Instant): Promise<RunOutcome> {
    log.info("executing task '%s'", entry.name)
    entry.runCount += 1
    entry.lastRun = now

    let failure: ActionExecutionFailureError | undefined
    try {
      const result = await entry.action({ ...entry.parameters })
      if (isResult(result) && !result.ok) failure = new ActionExecutionFailureError(entry.name, result.error)
    } catch (e) {
      failure = new ActionExecutionFailureError(entry.name, e)
    }

    if (failure) {
      log.error(failure.message)
      await record({ taskName: entry.name, startedAt: now, ok: false, error: failure.message })
      return { taskName: entry.name, at: now, ok: false, error: failure }
    }

    log.info("task '%s' completed successfully", entry.name)
    await record({ taskName: entry.name, startedAt: now, ok: true })
    return { taskName: entry.name, at: now, ok: true }
  }

  async function exclusive<T>(what: string, fn: () => Promise<T>): Promise<T> {
    if (busy) throw new SchedulerStateError(`Cannot ${what} while another task is executing`)
    busy = true
    try {
      return await fn()
    } finally {
      busy = false
    }
  }

  function pollOnce(now: Instant = clock()): Promise<PollReport> {
    return exclusive('poll', async () => {
      const due = [...tasks.values()].filter((e) => e.enabled)
      const executed: RunOutcome[] = []
      for (const entry of due) {
        // Skip tasks removed or disabled by an earlier action in this cycle
        if (tasks.get(entry.name) !== entry || !entry.enabled) continue
        if (!entry.trigger.isDue(now, entry.lastRun, entry.since)) continue
        executed.push(await execute(entry, now))
      }
      log.debug('poll at %s ran %d task(s)', formatInstant(now), executed.length)
      return { at: now, executed }
    })
  }

  function runNow(name: string, now: Instant = clock()): Promise<RunOutcome> {
    return exclusive('run a task', () => execute(entryOf(name), now))
  }

  // ========== Loop ==========

  async function run(pollIntervalSeconds = 1): Promise<void> {
    if (!(pollIntervalSeconds > 0)) {
      throw new SchedulerStateError(`Poll interval must be positive, got ${pollIntervalSeconds}`)
    }
    if (running) throw new SchedulerStateError('Scheduler is already running')

    running = true
    stopRequested = false
    log.info('scheduler started')
    try {
      while (!stopRequested) {
        // A runNow still in flight owns the scheduler; this cycle is skipped
        if (busy) log.warn('skipping poll: a task is still executing')
        else await pollOnce(clock())
        if (stopRequested) break
        wake = new AbortController()
        await sleep(pollIntervalSeconds * 1000, wake.signal)
      }
    } finally {
      running = false
      wake = undefined
      log.info('scheduler stopped')
    }
  }

  function stop(): void {
    if (!running) return
    stopRequested = true
    wake?.abort()
  }

  return {
    register,
    remove,
    enable,
    disable,
    get: (name) => snapshot(entryOf(name)),
    has: (name) => tasks.has(name),
    list: () => [...tasks.values()].map(snapshot),
    clear,
    nextRun,
    history: async (name) => historyAdapter.list(entryOf(name).name),
    pollOnce,
    runNow,
    run,
    stop,
    isRunning: () => running,
  }
}
