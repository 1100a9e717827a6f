/**
 * recurra
 *
 * Public API exports
 */

// Error system
export {
  RecurraError, RecurraErrorCode,
  InvalidCalendarValueError, InvalidRecurrenceError, InvalidScheduleSpecError,
  InvalidTaskError, DuplicateTaskNameError, TaskNotFoundError, SchedulerStateError,
  ActionExecutionFailureError, UnknownActionError, ConfigError,
  describeError,
} from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err, isResult, unwrap } from './result'

// Time & Date
export type { CalendarDate, TimeOfDay, Instant, Weekday, Duration } from './time-date'
export {
  SECONDS_PER_MINUTE, SECONDS_PER_HOUR, SECONDS_PER_DAY, MIDNIGHT, WEEKDAYS,
  isLeapYear, daysInMonth, daysInYear,
  checkDate, checkTime, makeDate, makeTime, makeInstant, instantOf,
  startOfDay, instantFromJSDate, nowInstant,
  makeDuration, durationOf, bestEffortDuration,
  addDays, daysBetween, timeToSeconds, addSeconds, addInstant, secondsBetween,
  isWeekday, dayOfWeek, weekdayToIndex, indexToWeekday,
  compareDates, compareTimes, compareInstants,
  dateEquals, timeEquals, instantEquals, instantBefore, instantAfter, maxInstant,
} from './time-date'
export {
  DEFAULT_DATE_PATTERN, DEFAULT_TIME_PATTERN, DEFAULT_INSTANT_PATTERN,
  formatDate, formatTime, formatInstant,
  parseDate, parseTime, parseInstant,
  tryParseDate, tryParseTime, tryParseInstant,
} from './time-format'

// Intervals & recurrence
export type { Interval } from './interval'
export {
  makeInterval, intervalFromDuration, intervalDuration, shiftInterval,
  compareIntervals, intervalEquals, formatInterval,
} from './interval'
export type { Offset, RecurringInterval } from './recurrence'
export {
  makeRecurringInterval, everyNDaysRecurrence, everyNWeeksRecurrence, recurrenceFromCount,
  expandOccurrences, countOccurrences,
} from './recurrence'

// Schedule phrases & triggers
export type { IntervalUnit, TriggerSpec } from './schedule-spec'
export { UNIT_SECONDS, parseScheduleSpec, formatScheduleSpec, intervalSeconds } from './schedule-spec'
export type { Trigger } from './trigger'
export { createTrigger, triggerFromPhrase } from './trigger'

// Scheduler
export type {
  TaskInput, Task, RunOutcome, PollReport, Sleep, SchedulerConfig, Scheduler,
} from './scheduler'
export { createScheduler, defaultSleep } from './scheduler'
export type { TaskRecord } from './task-info'
export { taskToRecord, formatTaskInfo } from './task-info'

// Actions
export type {
  ActionParameters, ActionResult, Action, ActionResolver, ActionRegistry, ActionRegistryOptions,
} from './actions'
export {
  DEFAULT_PRINT_MESSAGE, createActionRegistry,
  createPrintAction, createLogAction, createCustomAction,
} from './actions'

// Run history
export type { RunRecord, HistoryAdapter, MemoryAdapterOptions } from './adapter'
export { createMemoryAdapter } from './adapter'
export type { SqliteHistoryAdapter } from './sqlite-adapter'
export { createSqliteAdapter } from './sqlite-adapter'

// Configuration
export type {
  TaskDescriptor, SchedulerDocument, SchedulerFromConfigOptions,
} from './config'
export {
  validateConfig, parseConfig, loadConfig, stringifyConfig, saveConfig, defaultConfig,
  createSchedulerFromConfig, loadScheduler,
} from './config'

// Logging
export type { Logger, LogFn, LogLevel } from './logger'
export { LOG_LEVELS, isLogLevel, createLogger } from './logger'
