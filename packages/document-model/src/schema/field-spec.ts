/**
 * @file Field Specs
 *
 * Field declarations as written by application code, their zod shape check,
 * and the normalized, immutable FieldSpec a built schema stores.
 *
 * @module document-model/schema/field-spec
 */

import { z } from 'zod'
import { StructuralError } from '../errors.js'
import type { DocumentValue } from '../types/values.js'
import { cloneValue, isDocumentValue } from '../types/values.js'
import type { Validator } from '../validation/validators.js'
import type { FieldType, FieldTypeDeclaration } from './field-types.js'

// =============================================================================
// Types
// =============================================================================

/**
 * A default is either a literal or a zero-argument producer. Producers are
 * called on every resolution; literals are copied on every resolution.
 */
export type DefaultValue =
  | { readonly kind: 'literal'; readonly value: DocumentValue }
  | { readonly kind: 'producer'; readonly produce: () => DocumentValue }

/**
 * Field declaration accepted by the Schema constructor.
 */
export interface FieldDeclaration {
  type: FieldTypeDeclaration
  required?: boolean
  /** Accept an explicit `null` as a value instead of treating it as absent */
  nullable?: boolean
  default?: DocumentValue | (() => DocumentValue)
  validates?: Validator | readonly Validator[]
}

/**
 * Normalized field spec. Shared by every document validated against the
 * schema and never mutated.
 */
export interface FieldSpec {
  readonly name: string
  readonly type: FieldType
  readonly required: boolean
  readonly nullable: boolean
  readonly default?: DefaultValue
  readonly validators: readonly Validator[]
}

// =============================================================================
// Declaration Shape
// =============================================================================

const validatorShape = z.custom<Validator>((value) => typeof value === 'function', {
  message: 'validator must be a function',
})

const fieldDeclarationShape = z
  .object({
    type: z.custom<FieldTypeDeclaration>((value) => value !== undefined && value !== null, {
      message: 'type is required',
    }),
    required: z.boolean().optional(),
    nullable: z.boolean().optional(),
    default: z.unknown().optional(),
    validates: z.union([validatorShape, z.array(validatorShape)]).optional(),
  })
  .strict()

/**
 * Joins zod issues into one line.
 */
export function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

/**
 * Checks the keys and primitive options of a declaration.
 *
 * @throws {StructuralError} On unknown keys or wrongly typed options
 */
export function checkFieldDeclaration(name: string, declaration: unknown): void {
  const parsed = fieldDeclarationShape.safeParse(declaration)
  if (!parsed.success) {
    throw new StructuralError(formatIssues(parsed.error.issues), { path: name })
  }
}

// =============================================================================
// Defaults
// =============================================================================

/**
 * Converts a declared default into its tagged form.
 */
export function normalizeDefault(
  name: string,
  declared: FieldDeclaration['default']
): DefaultValue | undefined {
  if (declared === undefined) return undefined
  if (typeof declared === 'function') {
    return { kind: 'producer', produce: declared }
  }
  if (!isDocumentValue(declared)) {
    throw new StructuralError('default is not a storable document value', { path: name })
  }
  return { kind: 'literal', value: cloneValue(declared) }
}

/**
 * Resolves a default for one document.
 */
export function resolveDefault(value: DefaultValue): DocumentValue {
  switch (value.kind) {
    case 'literal':
      return cloneValue(value.value)
    case 'producer':
      return value.produce()
  }
}

/**
 * Normalizes `validates` to an array.
 */
export function normalizeValidators(declared: FieldDeclaration['validates']): readonly Validator[] {
  if (declared === undefined) return []
  if (typeof declared === 'function') return [declared]
  return [...declared]
}
