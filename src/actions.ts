/**
 * Actions
 *
 * Named action registry. The scheduler never sees names: configuration loading
 * resolves a name to its Action once, and the task keeps the function.
 */

import { type Result, Err } from './result'
import { type Logger, createLogger, isLogLevel } from './logger'

export { UnknownActionError } from './errors'
import { UnknownActionError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type ActionParameters = Readonly<Record<string, unknown>>

export type ActionResult = Result<void, Error> | void

/**
 * A task's capability. Failure is reported by returning an Err, throwing, or
 * rejecting; the scheduler treats all three alike.
 */
export type Action = (parameters: ActionParameters) => ActionResult | Promise<ActionResult>

export type ActionResolver = (name: string) => Action

export type ActionRegistry = {
  /** Adds an action, replacing any action registered under the same name. */
  register(name: string, action: Action): void
  has(name: string): boolean
  names(): string[]
  /** Throws UnknownActionError for unregistered names. */
  resolve(name: string): Action
  /** `resolve` bound to this registry. */
  readonly resolver: ActionResolver
}

export type ActionRegistryOptions = {
  /** Sink for the print action. Defaults to stdout. */
  output?: (line: string) => void
  logger?: Logger
  /** Register print, log and custom. Defaults to true. */
  includeBuiltins?: boolean
}

export const DEFAULT_PRINT_MESSAGE = 'Hello from recurra!'

// ============================================================================
// Built-in Actions
// ============================================================================

export function createPrintAction(output: (line: string) => void): Action {
  return (parameters) => {
    const message = parameters['message'] ?? DEFAULT_PRINT_MESSAGE
    output(String(message))
  }
}

export function createLogAction(logger: Logger): Action {
  return (parameters) => {
    const message = String(parameters['message'] ?? '')
    const level = String(parameters['level'] ?? 'info').toLowerCase()
    logger[isLogLevel(level) ? level : 'info'](message)
  }
}

/** Placeholder for user-supplied functions: records the call and its parameters. */
export function createCustomAction(logger: Logger): Action {
  return (parameters) => {
    const { function: fn, ...rest } = parameters
    if (typeof fn !== 'string' || fn === '') {
      return Err(new Error("custom action requires a 'function' parameter"))
    }
    logger.warn("custom action '%s' called with parameters: %O", fn, rest)
  }
}

// ============================================================================
// Registry
// ============================================================================

export function createActionRegistry(options: ActionRegistryOptions = {}): ActionRegistry {
  const log = options.logger ?? createLogger('actions')
  const output = options.output ?? ((line: string) => { process.stdout.write(`${line}\n`) })
  const actions = new Map<string, Action>()

  function register(name: string, action: Action): void {
    if (name.trim() === '') throw new TypeError('Action name must not be empty')
    actions.set(name, action)
    log.debug("registered action '%s'", name)
  }

  function resolve(name: string): Action {
    const action = actions.get(name)
    if (!action) throw new UnknownActionError(name)
    return action
  }

  if (options.includeBuiltins ?? true) {
    register('print', createPrintAction(output))
    register('log', createLogAction(log))
    register('custom', createCustomAction(log))
  }

  return {
    register,
    has: (name) => actions.has(name),
    names: () => [...actions.keys()],
    resolve,
    resolver: resolve,
  }
}
