/**
 * Segment 08: Action Registry Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import {
  createActionRegistry,
  createCustomAction,
  DEFAULT_PRINT_MESSAGE,
  UnknownActionError,
} from '../src/actions'

function recordingLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

afterEach(() => {
  vi.restoreAllMocks()
})

// ============================================================================
// 1. REGISTRY
// ============================================================================

describe('Action Registry', () => {
  it('registers the built-in actions', () => {
    const registry = createActionRegistry({ output: () => {}, logger: recordingLogger() })
    expect(registry.names()).toEqual(['print', 'log', 'custom'])
  })

  it('can start empty', () => {
    const registry = createActionRegistry({ includeBuiltins: false, logger: recordingLogger() })
    expect(registry.names()).toEqual([])
    expect(registry.has('print')).toBe(false)
  })

  it('resolves a registered action', async () => {
    const registry = createActionRegistry({ includeBuiltins: false, logger: recordingLogger() })
    const email = vi.fn()
    registry.register('email', email)
    await registry.resolve('email')({ to: 'someone' })
    expect(email).toHaveBeenCalledWith({ to: 'someone' })
  })

  it('a later registration replaces an earlier one', () => {
    const registry = createActionRegistry({ includeBuiltins: false, logger: recordingLogger() })
    const first = vi.fn()
    const second = vi.fn()
    registry.register('job', first)
    registry.register('job', second)
    expect(registry.resolve('job')).toBe(second)
    expect(registry.names()).toEqual(['job'])
  })

  it('rejects an unknown name', () => {
    const registry = createActionRegistry({ logger: recordingLogger() })
    expect(() => registry.resolve('email')).toThrow(UnknownActionError)
    expect(() => registry.resolve('email')).toThrow('Unknown action: email')
  })

  it('rejects an empty name', () => {
    const registry = createActionRegistry({ logger: recordingLogger() })
    expect(() => registry.register(' ', () => {})).toThrow(TypeError)
  })

  it('resolver works detached from the registry', () => {
    const registry = createActionRegistry({ output: () => {}, logger: recordingLogger() })
    const { resolver } = registry
    expect(resolver('print')).toBe(registry.resolve('print'))
  })
})

// ============================================================================
// 2. BUILT-IN ACTIONS
// ============================================================================

describe('Built-in Actions', () => {
  describe('print', () => {
    it('writes the message', async () => {
      const lines: string[] = []
      const registry = createActionRegistry({ output: (line) => lines.push(line), logger: recordingLogger() })
      await registry.resolve('print')({ message: 'backing up' })
      expect(lines).toEqual(['backing up'])
    })

    it('falls back to the default message', async () => {
      const lines: string[] = []
      const registry = createActionRegistry({ output: (line) => lines.push(line), logger: recordingLogger() })
      await registry.resolve('print')({})
      expect(lines).toEqual([DEFAULT_PRINT_MESSAGE])
      expect(DEFAULT_PRINT_MESSAGE).toBe('Hello from recurra!')
    })

    it('stringifies non-string messages', async () => {
      const lines: string[] = []
      const registry = createActionRegistry({ output: (line) => lines.push(line), logger: recordingLogger() })
      await registry.resolve('print')({ message: 42 })
      expect(lines).toEqual(['42'])
    })

    it('writes to stdout by default', async () => {
      const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
      const registry = createActionRegistry({ logger: recordingLogger() })
      await registry.resolve('print')({ message: 'to stdout' })
      expect(write).toHaveBeenCalledWith('to stdout\n')
    })
  })

  describe('log', () => {
    it('logs at the requested level', async () => {
      const logger = recordingLogger()
      const registry = createActionRegistry({ logger })
      await registry.resolve('log')({ message: 'careful', level: 'WARN' })
      expect(logger.warn).toHaveBeenCalledWith('careful')
    })

    it('falls back to info for unknown levels', async () => {
      const logger = recordingLogger()
      const registry = createActionRegistry({ logger })
      await registry.resolve('log')({ message: 'hello', level: 'loud' })
      expect(logger.info).toHaveBeenCalledWith('hello')
    })
  })

  describe('custom', () => {
    it('records the call and its parameters', () => {
      const logger = recordingLogger()
      const result = createCustomAction(logger)({ function: 'cleanup', days: 7 })
      expect(result).toBeUndefined()
      expect(logger.warn).toHaveBeenCalledWith("custom action '%s' called with parameters: %O", 'cleanup', { days: 7 })
    })

    it('returns an Err without a function name', () => {
      const result = createCustomAction(recordingLogger())({})
      expect(result).toEqual({ ok: false, error: new Error("custom action requires a 'function' parameter") })
    })
  })
})
