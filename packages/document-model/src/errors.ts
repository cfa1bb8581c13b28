/**
 * @file Document Model Error Classes
 *
 * The error taxonomy surfaced by schemas, the validation engine and the model
 * save pipeline. Every failure path raises one of these so callers can branch
 * on the kind of failure.
 *
 * @example
 * ```typescript
 * try {
 *   await post.save()
 * } catch (error) {
 *   if (isValidationError(error)) {
 *     showFieldErrors(error.errors)
 *   } else if (isPersistenceError(error)) {
 *     showGenericFailure()
 *   }
 * }
 * ```
 *
 * @module document-model/errors
 */

import type { ErrorTree } from './validation/error-tree.js'
import { countErrors } from './validation/error-tree.js'

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base class for all errors raised by this package.
 */
export class DocumentModelError extends Error {
  /** The underlying error, if any */
  override readonly cause?: unknown

  constructor(message: string, options?: { cause?: unknown }) {
    super(message)
    this.name = 'DocumentModelError'
    this.cause = options?.cause

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

// =============================================================================
// Schema Errors
// =============================================================================

/**
 * Raised immediately when a schema declaration is malformed: a duplicate
 * field or virtual name, an unknown field-spec key, an inapplicable
 * validator, a literal default of the wrong type, or cyclic document data.
 */
export class StructuralError extends DocumentModelError {
  /** Field path the problem was found at, when there is one */
  readonly path?: string

  constructor(message: string, options?: { path?: string; cause?: unknown }) {
    super(options?.path ? `${options.path}: ${message}` : message, options)
    this.name = 'StructuralError'
    this.path = options?.path
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Raised when a document fails validation. Always carries the complete error
 * tree, never just the first violation.
 */
export class ValidationError extends DocumentModelError {
  /** Field path to the ordered messages recorded at that path */
  readonly errors: ErrorTree

  constructor(errors: ErrorTree, message = 'Document validation failed') {
    const count = countErrors(errors)
    super(`${message} (${count} error${count !== 1 ? 's' : ''})`)
    this.name = 'ValidationError'
    this.errors = errors
  }

  /**
   * Paths that carry at least one error, in walk order.
   */
  get paths(): string[] {
    return Object.keys(this.errors)
  }
}

// =============================================================================
// Pipeline Errors
// =============================================================================

/**
 * The side of the pipeline a hook was registered on.
 */
export type HookPhase = 'pre' | 'post'

/**
 * Raised when a pre or post hook aborts the pipeline, either by returning an
 * abort result or by throwing.
 */
export class MiddlewareAbortError extends DocumentModelError {
  /** Lifecycle event the pipeline was running */
  readonly event: string

  /** Whether the aborting hook ran before or after persistence */
  readonly phase: HookPhase

  /** Position of the aborting hook in its registration list */
  readonly hookIndex: number

  /** Reason given by the hook */
  readonly reason: string

  constructor(
    reason: string,
    options: { event: string; phase: HookPhase; hookIndex: number; cause?: unknown }
  ) {
    super(`${options.phase}-${options.event} hook #${options.hookIndex} aborted: ${reason}`, options)
    this.name = 'MiddlewareAbortError'
    this.event = options.event
    this.phase = options.phase
    this.hookIndex = options.hookIndex
    this.reason = reason
  }
}

// =============================================================================
// Persistence Errors
// =============================================================================

/**
 * Persistence operations the core delegates to its collaborator.
 */
export type PersistenceOperation = 'insertOrUpdate' | 'findById' | 'deleteById'

/**
 * Raised when the persistence collaborator fails. The original failure is kept
 * as `cause` and is not interpreted or retried.
 */
export class PersistenceError extends DocumentModelError {
  /** The collaborator operation that failed */
  readonly operation: PersistenceOperation

  constructor(message: string, options: { operation: PersistenceOperation; cause?: unknown }) {
    super(message, options)
    this.name = 'PersistenceError'
    this.operation = options.operation
  }

  /**
   * Wraps an arbitrary thrown value from the collaborator.
   */
  static wrap(operation: PersistenceOperation, cause: unknown): PersistenceError {
    if (cause instanceof PersistenceError) return cause
    const detail = cause instanceof Error ? cause.message : String(cause)
    return new PersistenceError(`${operation} failed: ${detail}`, { operation, cause })
  }
}

/**
 * Raised when a deleted or never-saved instance is saved or deleted.
 */
export class StaleModelError extends PersistenceError {
  constructor(message: string, operation: PersistenceOperation) {
    super(message, { operation })
    this.name = 'StaleModelError'
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isDocumentModelError(error: unknown): error is DocumentModelError {
  return error instanceof DocumentModelError
}

export function isStructuralError(error: unknown): error is StructuralError {
  return error instanceof StructuralError
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

export function isMiddlewareAbortError(error: unknown): error is MiddlewareAbortError {
  return error instanceof MiddlewareAbortError
}

export function isPersistenceError(error: unknown): error is PersistenceError {
  return error instanceof PersistenceError
}
