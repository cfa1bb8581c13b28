/**
 * @file Field Types
 *
 * Type tags a field can declare, and the structural kind checks the
 * validation engine performs over the document value union.
 *
 * @module document-model/schema/field-types
 */

import type { DocumentData, DocumentValue } from '../types/values.js'
import { isDocumentData } from '../types/values.js'
import type { Schema } from './schema.js'

// =============================================================================
// Scalar Kinds
// =============================================================================

/**
 * Scalar kinds a field can hold.
 */
export const SCALAR_KINDS = ['string', 'integer', 'float', 'boolean', 'datetime', 'long'] as const

export type ScalarKind = (typeof SCALAR_KINDS)[number]

export function isScalarKind(value: unknown): value is ScalarKind {
  return typeof value === 'string' && SCALAR_KINDS.some((kind) => kind === value)
}

// =============================================================================
// Field Types
// =============================================================================

/**
 * Chooses a schema for a sub-document based on its contents.
 */
export type SchemaSelector = (value: DocumentData) => Schema

/**
 * Array of elements that all match one element type.
 */
export interface ArrayFieldType<E> {
  readonly kind: 'array'
  readonly element: E
}

/**
 * A value matching any one of several scalar kinds.
 */
export interface MixedFieldType {
  readonly kind: 'mixed'
  readonly members: readonly ScalarKind[]
}

/**
 * A sub-document whose schema is picked at validation time.
 */
export interface DynamicFieldType {
  readonly kind: 'dynamic'
  readonly select: SchemaSelector
}

/**
 * Type as written in a schema declaration.
 */
export type FieldTypeDeclaration =
  | ScalarKind
  | Schema
  | ArrayFieldType<FieldTypeDeclaration>
  | MixedFieldType
  | DynamicFieldType

/**
 * Normalized field type stored on a built schema.
 */
export type FieldType =
  | { readonly kind: 'scalar'; readonly scalar: ScalarKind }
  | { readonly kind: 'schema'; readonly schema: Schema }
  | ArrayFieldType<FieldType>
  | MixedFieldType
  | DynamicFieldType

// =============================================================================
// Type Builders
// =============================================================================

/**
 * Declares an embedded collection.
 *
 * @example
 * ```typescript
 * const post = new Schema({
 *   tags: { type: arrayOf('string') },
 *   comments: { type: arrayOf(commentSchema) },
 * })
 * ```
 */
export function arrayOf(element: FieldTypeDeclaration): ArrayFieldType<FieldTypeDeclaration> {
  return { kind: 'array', element }
}

/**
 * Declares a field accepting any of the given scalar kinds. At least two
 * kinds are required; this is checked when the schema is built.
 */
export function mixed(...members: ScalarKind[]): MixedFieldType {
  return { kind: 'mixed', members }
}

/**
 * Declares a sub-document whose schema depends on its own contents.
 *
 * @example
 * ```typescript
 * const author = dynamic((value) => ('birthYear' in value ? aboutSchema : nameSchema))
 * ```
 */
export function dynamic(select: SchemaSelector): DynamicFieldType {
  return { kind: 'dynamic', select }
}

// =============================================================================
// Kind Checks
// =============================================================================

/**
 * Checks a present, non-null value against a scalar kind.
 */
export function matchesScalar(value: DocumentValue, kind: ScalarKind): boolean {
  switch (kind) {
    case 'string':
      return typeof value === 'string'
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value)
    case 'float':
      return typeof value === 'number' && Number.isFinite(value)
    case 'boolean':
      return typeof value === 'boolean'
    case 'datetime':
      return value instanceof Date && !Number.isNaN(value.getTime())
    case 'long':
      return typeof value === 'bigint' || (typeof value === 'number' && Number.isSafeInteger(value))
  }
}

/**
 * Shallow kind check: only the top level of containers is inspected.
 */
export function matchesKind(value: DocumentValue, type: FieldType): boolean {
  switch (type.kind) {
    case 'scalar':
      return matchesScalar(value, type.scalar)
    case 'mixed':
      return type.members.some((member) => matchesScalar(value, member))
    case 'array':
      return Array.isArray(value)
    case 'schema':
    case 'dynamic':
      return isDocumentData(value)
  }
}

/**
 * Human-readable name of a field type for error messages.
 */
export function describeFieldType(type: FieldType): string {
  switch (type.kind) {
    case 'scalar':
      return type.scalar
    case 'mixed':
      return type.members.join(' or ')
    case 'array':
      return 'array'
    case 'schema':
    case 'dynamic':
      return 'document'
  }
}

/**
 * Categories a built-in validator may declare it applies to.
 */
export type ValueCategory = ScalarKind | 'array' | 'document'

/**
 * Value categories a field of the given type can hold.
 */
export function categoriesOf(type: FieldType): readonly ValueCategory[] {
  switch (type.kind) {
    case 'scalar':
      return [type.scalar]
    case 'mixed':
      return type.members
    case 'array':
      return ['array']
    case 'schema':
    case 'dynamic':
      return ['document']
  }
}
