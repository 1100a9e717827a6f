/**
 * Consolidated error system for recurra.
 *
 * All error classes extend RecurraError, which carries a typed error code.
 * Modules re-export the classes they throw so existing import paths continue to work.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const RecurraErrorCode = {
  // Time & date
  INVALID_CALENDAR_VALUE: 'INVALID_CALENDAR_VALUE',

  // Occurrence enumeration
  INVALID_RECURRENCE: 'INVALID_RECURRENCE',

  // Recurrence phrases
  INVALID_SCHEDULE_SPEC: 'INVALID_SCHEDULE_SPEC',

  // Task registry
  INVALID_TASK: 'INVALID_TASK',
  DUPLICATE_TASK_NAME: 'DUPLICATE_TASK_NAME',
  TASK_NOT_FOUND: 'TASK_NOT_FOUND',
  SCHEDULER_STATE: 'SCHEDULER_STATE',

  // Actions
  ACTION_EXECUTION_FAILURE: 'ACTION_EXECUTION_FAILURE',
  UNKNOWN_ACTION: 'UNKNOWN_ACTION',

  // Configuration documents
  CONFIG: 'CONFIG',
} as const

export type RecurraErrorCode = (typeof RecurraErrorCode)[keyof typeof RecurraErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class RecurraError extends Error {
  readonly code: RecurraErrorCode

  constructor(code: RecurraErrorCode, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'RecurraError'
    this.code = code
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class InvalidCalendarValueError extends RecurraError {
  constructor(message: string) {
    super(RecurraErrorCode.INVALID_CALENDAR_VALUE, message)
    this.name = 'InvalidCalendarValueError'
  }
}

// ============================================================================
// Occurrence Errors
// ============================================================================

export class InvalidRecurrenceError extends RecurraError {
  constructor(message: string) {
    super(RecurraErrorCode.INVALID_RECURRENCE, message)
    this.name = 'InvalidRecurrenceError'
  }
}

// ============================================================================
// Schedule Phrase Errors
// ============================================================================

export class InvalidScheduleSpecError extends RecurraError {
  readonly phrase: string

  constructor(phrase: string, detail?: string) {
    super(
      RecurraErrorCode.INVALID_SCHEDULE_SPEC,
      detail
        ? `Invalid schedule specification '${phrase}': ${detail}`
        : `Invalid schedule specification '${phrase}'`,
    )
    this.name = 'InvalidScheduleSpecError'
    this.phrase = phrase
  }
}

// ============================================================================
// Registry Errors
// ============================================================================

export class InvalidTaskError extends RecurraError {
  constructor(message: string) {
    super(RecurraErrorCode.INVALID_TASK, message)
    this.name = 'InvalidTaskError'
  }
}

export class DuplicateTaskNameError extends RecurraError {
  readonly taskName: string

  constructor(taskName: string) {
    super(RecurraErrorCode.DUPLICATE_TASK_NAME, `Task with name '${taskName}' already exists`)
    this.name = 'DuplicateTaskNameError'
    this.taskName = taskName
  }
}

export class TaskNotFoundError extends RecurraError {
  readonly taskName: string

  constructor(taskName: string) {
    super(RecurraErrorCode.TASK_NOT_FOUND, `Task '${taskName}' not found`)
    this.name = 'TaskNotFoundError'
    this.taskName = taskName
  }
}

export class SchedulerStateError extends RecurraError {
  constructor(message: string) {
    super(RecurraErrorCode.SCHEDULER_STATE, message)
    this.name = 'SchedulerStateError'
  }
}

// ============================================================================
// Action Errors
// ============================================================================

export function describeError(cause: unknown): string {
  if (cause instanceof Error) return cause.message
  return String(cause)
}

export class ActionExecutionFailureError extends RecurraError {
  readonly taskName: string

  constructor(taskName: string, cause: unknown) {
    super(
      RecurraErrorCode.ACTION_EXECUTION_FAILURE,
      `Error executing task '${taskName}': ${describeError(cause)}`,
      { cause },
    )
    this.name = 'ActionExecutionFailureError'
    this.taskName = taskName
  }
}

export class UnknownActionError extends RecurraError {
  readonly actionName: string

  constructor(actionName: string) {
    super(RecurraErrorCode.UNKNOWN_ACTION, `Unknown action: ${actionName}`)
    this.name = 'UnknownActionError'
    this.actionName = actionName
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ConfigError extends RecurraError {
  constructor(message: string, options?: ErrorOptions) {
    super(RecurraErrorCode.CONFIG, message, options)
    this.name = 'ConfigError'
  }
}
