/**
 * @file Field Validators
 *
 * Parametrized validator factories. A validator returns a message when the
 * value fails and nothing when it passes. Custom validators follow the same
 * contract and are run identically.
 *
 * @example
 * ```typescript
 * const car = new Schema({
 *   wheels: { type: 'integer', default: 4, validates: gte(0) },
 *   color: { type: 'string', validates: [oneOf('red', 'blue'), length(3, 10)] },
 * })
 * ```
 *
 * @module document-model/validation/validators
 */

import type { DocumentData, DocumentValue } from '../types/values.js'
import type { ValueCategory } from '../schema/field-types.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Context passed to validators alongside the value.
 */
export interface ValidatorContext {
  /** Path of the field being validated */
  readonly path: string
  /** The root document under validation */
  readonly document: Readonly<DocumentData>
}

/**
 * Returns an error message on failure, or nothing on success.
 */
export type Validator = (
  value: DocumentValue,
  context: ValidatorContext
) => string | null | undefined | void

type Comparable = number | bigint | Date

// =============================================================================
// Applicability Registry
// =============================================================================

const validatorTargets = new WeakMap<Validator, readonly ValueCategory[]>()

/**
 * Registers the value categories a validator can meaningfully check.
 */
function restrictTo(validator: Validator, targets: readonly ValueCategory[]): Validator {
  validatorTargets.set(validator, targets)
  return validator
}

/**
 * Value categories a built-in validator applies to, or `undefined` for
 * validators that accept anything (including all custom validators).
 */
export function getValidatorTargets(validator: Validator): readonly ValueCategory[] | undefined {
  return validatorTargets.get(validator)
}

const ORDERED: readonly ValueCategory[] = ['integer', 'float', 'long', 'datetime']
const SIZED: readonly ValueCategory[] = ['string', 'array']
const TEXT: readonly ValueCategory[] = ['string']

// =============================================================================
// Helpers
// =============================================================================

function toOrdinal(value: DocumentValue | Comparable): number | bigint | undefined {
  if (value instanceof Date) return value.getTime()
  if (typeof value === 'number' || typeof value === 'bigint') return value
  return undefined
}

function formatBound(bound: Comparable): string {
  return bound instanceof Date ? bound.toISOString() : String(bound)
}

/**
 * @throws {TypeError} If the bound is not a number, bigint or valid Date, or is NaN
 */
function boundOrdinal(bound: Comparable): number | bigint {
  const ordinal = toOrdinal(bound)
  if (ordinal === undefined || (typeof ordinal === 'number' && Number.isNaN(ordinal))) {
    throw new TypeError(`bound must be a number, bigint or valid Date, got ${String(bound)}`)
  }
  return ordinal
}

function compareWith(
  bound: Comparable,
  passes: (value: number | bigint, limit: number | bigint) => boolean,
  operator: string
): Validator {
  const limit = boundOrdinal(bound)
  const message = `must be ${operator} ${formatBound(bound)}`
  return restrictTo((value) => {
    const ordinal = toOrdinal(value)
    if (ordinal === undefined) return undefined
    return passes(ordinal, limit) ? undefined : message
  }, ORDERED)
}

function sameValue(a: DocumentValue, b: DocumentValue): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime()
  return a === b
}

function formatMember(value: DocumentValue): string {
  if (value instanceof Date) return value.toISOString()
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return String(value)
  }
  return JSON.stringify(value)
}

// =============================================================================
// Comparison Validators
// =============================================================================

/** Fails unless `value >= bound`. */
export function gte(bound: Comparable): Validator {
  return compareWith(bound, (v, b) => v >= b, '>=')
}

/** Fails unless `value <= bound`. */
export function lte(bound: Comparable): Validator {
  return compareWith(bound, (v, b) => v <= b, '<=')
}

/** Fails unless `value > bound`. */
export function gt(bound: Comparable): Validator {
  return compareWith(bound, (v, b) => v > b, '>')
}

/** Fails unless `value < bound`. */
export function lt(bound: Comparable): Validator {
  return compareWith(bound, (v, b) => v < b, '<')
}

/**
 * Inclusive range check.
 */
export function between(min: Comparable, max: Comparable): Validator {
  const low = boundOrdinal(min)
  const high = boundOrdinal(max)
  if (low > high) {
    throw new RangeError(`between: min ${formatBound(min)} is greater than max ${formatBound(max)}`)
  }
  const message = `must be between ${formatBound(min)} and ${formatBound(max)}`
  return restrictTo((value) => {
    const ordinal = toOrdinal(value)
    if (ordinal === undefined) return undefined
    return ordinal < low || ordinal > high ? message : undefined
  }, ORDERED)
}

// =============================================================================
// Size and Shape Validators
// =============================================================================

/**
 * Length bounds for strings and arrays. `max` is optional.
 */
export function length(min: number, max?: number): Validator {
  if (min < 0 || (max !== undefined && max < min)) {
    throw new RangeError(`length: invalid bounds ${min}..${max ?? ''}`)
  }
  const message =
    max === undefined ? `length must be at least ${min}` : `length must be between ${min} and ${max}`
  return restrictTo((value) => {
    if (typeof value !== 'string' && !Array.isArray(value)) return undefined
    if (value.length < min) return message
    if (max !== undefined && value.length > max) return message
    return undefined
  }, SIZED)
}

/**
 * Full-string regular expression match. The pattern is anchored at both ends
 * regardless of how it was written.
 */
export function match(pattern: RegExp | string, message?: string): Validator {
  const source = typeof pattern === 'string' ? pattern : pattern.source
  const flags = typeof pattern === 'string' ? '' : pattern.flags.replace(/[gy]/g, '')
  const anchored = new RegExp(`^(?:${source})$`, flags)
  const failure = message ?? `must match pattern ${source}`
  return restrictTo((value) => {
    if (typeof value !== 'string') return undefined
    return anchored.test(value) ? undefined : failure
  }, TEXT)
}

/**
 * Membership check against a fixed list of literals.
 */
export function oneOf(...values: DocumentValue[]): Validator {
  const message = `must be one of: ${values.map(formatMember).join(', ')}`
  return (value) => (values.some((candidate) => sameValue(candidate, value)) ? undefined : message)
}

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/

/**
 * Loose email address check.
 */
export function isEmail(): Validator {
  return restrictTo((value) => {
    if (typeof value !== 'string') return undefined
    return EMAIL_PATTERN.test(value) ? undefined : 'must be a valid email address'
  }, TEXT)
}

/**
 * Absolute URL check using the WHATWG URL parser.
 */
export function isUrl(): Validator {
  return restrictTo((value) => {
    if (typeof value !== 'string') return undefined
    try {
      new URL(value)
      return undefined
    } catch {
      return 'must be a valid URL'
    }
  }, TEXT)
}
