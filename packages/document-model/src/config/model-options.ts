/**
 * @file Model Options
 *
 * Combines frozen defaults, application-wide global options and per-model
 * options into the resolved options a model runs with. Every layer is
 * checked with zod before it is accepted.
 *
 * @module document-model/config/model-options
 */

import { z } from 'zod'
import { StructuralError } from '../errors.js'
import type { DebugOption } from '../logging/debug-logger.js'
import { formatIssues } from '../schema/field-spec.js'
import { ChangeFeed } from '../sync/change-feed.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Options accepted by `createModel` and `setGlobalModelOptions`.
 */
export interface ModelOptions {
  /** Name used in log output and change message metadata */
  name?: string
  /** Document field that stores the persistence identifier */
  idField?: string
  /** Timeout applied to every persistence call, in milliseconds */
  timeoutMs?: number
  /** Enable debug logging */
  debug?: DebugOption
  /** Feed that receives a change message for every save and delete */
  changeFeed?: ChangeFeed
}

/**
 * Options with every defaulted field resolved.
 */
export interface ResolvedModelOptions {
  readonly name: string
  readonly idField: string
  readonly timeoutMs?: number
  readonly debug: DebugOption
  readonly changeFeed?: ChangeFeed
}

// =============================================================================
// Validation
// =============================================================================

const modelOptionsShape = z
  .object({
    name: z.string().min(1).optional(),
    idField: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().optional(),
    debug: z
      .union([z.boolean(), z.custom<(message: string) => void>((value) => typeof value === 'function')])
      .optional(),
    changeFeed: z
      .custom<ChangeFeed>((value) => value instanceof ChangeFeed, { message: 'expected a ChangeFeed' })
      .optional(),
  })
  .strict()

/**
 * @throws {StructuralError} If the options contain unknown keys or invalid values
 */
export function checkModelOptions(options: unknown, layer: string): void {
  const parsed = modelOptionsShape.safeParse(options)
  if (!parsed.success) {
    throw new StructuralError(`invalid ${layer} options: ${formatIssues(parsed.error.issues)}`)
  }
}

// =============================================================================
// Module State
// =============================================================================

let defaultOptions: Readonly<ResolvedModelOptions> | null = null
let globalOptions: ModelOptions = {}

// =============================================================================
// Default Options
// =============================================================================

/**
 * Gets the default options. Returns a frozen object that cannot be modified.
 */
export function getDefaultModelOptions(): Readonly<ResolvedModelOptions> {
  if (!defaultOptions) {
    defaultOptions = Object.freeze({
      name: 'Model',
      idField: '_id',
      debug: false,
    })
  }
  return defaultOptions
}

// =============================================================================
// Global Options
// =============================================================================

/**
 * Sets options that apply to every model created afterwards. Merges with
 * previously set global options.
 */
export function setGlobalModelOptions(options: ModelOptions): void {
  checkModelOptions(options, 'global model')
  globalOptions = { ...globalOptions, ...options }
}

export function getGlobalModelOptions(): Readonly<ModelOptions> {
  return { ...globalOptions }
}

/**
 * Clears global options.
 */
export function resetGlobalModelOptions(): void {
  globalOptions = {}
}

// =============================================================================
// Resolution
// =============================================================================

function definedEntries(options: ModelOptions): ModelOptions {
  const result: ModelOptions = {}
  if (options.name !== undefined) result.name = options.name
  if (options.idField !== undefined) result.idField = options.idField
  if (options.timeoutMs !== undefined) result.timeoutMs = options.timeoutMs
  if (options.debug !== undefined) result.debug = options.debug
  if (options.changeFeed !== undefined) result.changeFeed = options.changeFeed
  return result
}

/**
 * Resolves per-model options over global options over defaults. Keys set to
 * `undefined` do not override lower layers.
 */
export function resolveModelOptions(options: ModelOptions = {}): Readonly<ResolvedModelOptions> {
  checkModelOptions(options, 'model')
  return Object.freeze({
    ...getDefaultModelOptions(),
    ...definedEntries(globalOptions),
    ...definedEntries(options),
  })
}
