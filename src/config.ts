/**
 * Configuration
 *
 * YAML task documents: loading, validation, serialization, and turning a
 * validated document into a populated scheduler.
 *
 *   tasks:
 *     - name: backup
 *       schedule: every 2 hours
 *       action: print
 *       parameters:
 *         message: backing up
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import * as yaml from 'js-yaml'
import { z } from 'zod'
import type { ActionResolver } from './actions'
import { type Scheduler, type SchedulerConfig, createScheduler } from './scheduler'

export { ConfigError } from './errors'
import { ConfigError, describeError } from './errors'

// ============================================================================
// Schema
// ============================================================================

const TaskDescriptorSchema = z.object({
  name: z.string().min(1),
  schedule: z.string().min(1),
  action: z.string().min(1),
  description: z.string().optional(),
  enabled: z.boolean().default(true),
  parameters: z.record(z.string(), z.unknown()).default({}),
})

const SchedulerDocumentSchema = z
  .object({
    tasks: z.array(TaskDescriptorSchema).default([]),
  })
  .superRefine((doc, ctx) => {
    const seen = new Set<string>()
    doc.tasks.forEach((task, i) => {
      if (seen.has(task.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tasks', i, 'name'],
          message: `duplicate task name '${task.name}'`,
        })
      }
      seen.add(task.name)
    })
  })

export type TaskDescriptor = z.infer<typeof TaskDescriptorSchema>
export type SchedulerDocument = z.infer<typeof SchedulerDocumentSchema>

// ============================================================================
// Validation & Parsing
// ============================================================================

export function validateConfig(value: unknown): SchedulerDocument {
  // An empty YAML document decodes to null/undefined
  const parsed = SchedulerDocumentSchema.safeParse(value ?? {})
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid configuration: ${details}`)
  }
  return parsed.data
}

export function parseConfig(text: string): SchedulerDocument {
  let decoded: unknown
  try {
    decoded = yaml.load(text)
  } catch (e) {
    throw new ConfigError(`Invalid YAML: ${describeError(e)}`, { cause: e })
  }
  return validateConfig(decoded)
}

export async function loadConfig(path: string): Promise<SchedulerDocument> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (e) {
    throw new ConfigError(`Cannot read configuration file ${path}: ${describeError(e)}`, { cause: e })
  }
  return parseConfig(text)
}

export function stringifyConfig(doc: SchedulerDocument): string {
  return yaml.dump(doc, { sortKeys: false, noRefs: true })
}

export async function saveConfig(doc: SchedulerDocument, path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, stringifyConfig(doc), 'utf8')
}

export function defaultConfig(): SchedulerDocument {
  return {
    tasks: [
      {
        name: 'example_task',
        description: 'An example task',
        schedule: 'every 1 hour',
        action: 'print',
        enabled: true,
        parameters: { message: 'Hello from recurra!' },
      },
    ],
  }
}

// ============================================================================
// Scheduler Construction
// ============================================================================

export type SchedulerFromConfigOptions = SchedulerConfig & {
  resolveAction: ActionResolver
}

/**
 * Builds a fresh scheduler holding every task of the document. Any unknown
 * action or bad schedule phrase throws and no scheduler is returned.
 */
export function createSchedulerFromConfig(doc: SchedulerDocument, options: SchedulerFromConfigOptions): Scheduler {
  const { resolveAction, ...schedulerConfig } = options
  const scheduler = createScheduler(schedulerConfig)
  for (const task of doc.tasks) {
    scheduler.register({
      name: task.name,
      schedule: task.schedule,
      action: resolveAction(task.action),
      actionName: task.action,
      parameters: task.parameters,
      enabled: task.enabled,
      ...(task.description !== undefined ? { description: task.description } : {}),
    })
  }
  return scheduler
}

export async function loadScheduler(path: string, options: SchedulerFromConfigOptions): Promise<Scheduler> {
  return createSchedulerFromConfig(await loadConfig(path), options)
}
