/**
 * @file Middleware Pipeline
 *
 * Ordered hook lists per lifecycle event, and the runner that executes them
 * with stop-on-abort semantics. A hook continues by returning nothing or
 * `context.next()`, and stops the pipeline by returning
 * `context.abort(reason)` or by throwing.
 *
 * @example
 * ```typescript
 * schema.pre('save', (post, ctx) => {
 *   if (post.get('locked') === true) return ctx.abort('post is locked')
 *   post.set('updatedAt', new Date())
 *   return ctx.next()
 * })
 * ```
 *
 * @module document-model/middleware/pipeline
 */

import type { HookPhase } from '../errors.js'
import { MiddlewareAbortError, StructuralError } from '../errors.js'
import type { DebugLogger } from '../logging/debug-logger.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Lifecycle events hooks can be registered against.
 */
export const HOOK_EVENTS = ['save', 'delete'] as const

export type HookEvent = (typeof HOOK_EVENTS)[number]

/**
 * Outcome of a single hook.
 */
export type HookResult =
  | { readonly action: 'continue' }
  | { readonly action: 'abort'; readonly reason: string; readonly cause?: unknown }

/**
 * Second argument every hook receives.
 */
export interface HookContext {
  readonly event: HookEvent
  readonly phase: HookPhase
  /** Signal of the operation that triggered the pipeline */
  readonly signal?: AbortSignal
  /** Advance to the next hook */
  next(): HookResult
  /** Stop the pipeline and surface `reason` to the caller */
  abort(reason: string, cause?: unknown): HookResult
}

/**
 * A hook run against the in-flight target (a model instance).
 */
export type Hook<T> = (
  target: T,
  context: HookContext
) => HookResult | void | Promise<HookResult | void>

const CONTINUE: HookResult = Object.freeze({ action: 'continue' })

export function isHookEvent(value: unknown): value is HookEvent {
  return typeof value === 'string' && HOOK_EVENTS.some((event) => event === value)
}

// =============================================================================
// Registry
// =============================================================================

/**
 * Append-only hook lists keyed by phase and event.
 */
export class HookRegistry<T> {
  private readonly hooks = new Map<string, Hook<T>[]>()

  add(phase: HookPhase, event: HookEvent, hook: Hook<T>): void {
    if (!isHookEvent(event)) {
      throw new StructuralError(`unknown hook event "${String(event)}"`)
    }
    if (typeof hook !== 'function') {
      throw new StructuralError(`${phase}-${event} hook must be a function`)
    }
    const key = `${phase}:${event}`
    const list = this.hooks.get(key)
    if (list) {
      list.push(hook)
    } else {
      this.hooks.set(key, [hook])
    }
  }

  list(phase: HookPhase, event: HookEvent): readonly Hook<T>[] {
    return this.hooks.get(`${phase}:${event}`) ?? []
  }

  count(phase: HookPhase, event: HookEvent): number {
    return this.list(phase, event).length
  }
}

// =============================================================================
// Runner
// =============================================================================

export interface RunHooksOptions {
  event: HookEvent
  phase: HookPhase
  signal?: AbortSignal
  logger?: DebugLogger
}

/**
 * Runs hooks one after another. Each hook fully settles before the next one
 * starts. The first abort (returned or thrown) raises MiddlewareAbortError
 * and no later hook runs.
 */
export async function runHooks<T>(
  hooks: readonly Hook<T>[],
  target: T,
  options: RunHooksOptions
): Promise<void> {
  const { event, phase, signal, logger } = options

  const context: HookContext = {
    event,
    phase,
    signal,
    next: () => CONTINUE,
    abort: (reason, cause) => ({ action: 'abort', reason, cause }),
  }

  for (let index = 0; index < hooks.length; index++) {
    const hook = hooks[index]
    let result: HookResult | void

    try {
      result = await hook(target, context)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      logger?.('hook threw', { event, phase, index, reason })
      throw new MiddlewareAbortError(reason, { event, phase, hookIndex: index, cause: error })
    }

    if (typeof result === 'object' && result.action === 'abort') {
      logger?.('hook aborted', { event, phase, index, reason: result.reason })
      throw new MiddlewareAbortError(result.reason, {
        event,
        phase,
        hookIndex: index,
        cause: result.cause,
      })
    }
  }
}
