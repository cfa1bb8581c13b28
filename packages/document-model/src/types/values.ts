/**
 * @file Document Value Types
 *
 * The value union every document field holds. Type checks in the validation
 * engine are structural matches over this union.
 *
 * @module document-model/types/values
 */

// =============================================================================
// Value Union
// =============================================================================

/**
 * A single value stored in a document.
 *
 * - `string`, `number`, `bigint`, `boolean` are scalars
 * - `Date` is a timestamp
 * - `DocumentData` is a nested sub-document
 * - arrays are embedded collections
 * - `null` is an explicit absence
 */
export type DocumentValue =
  | string
  | number
  | bigint
  | boolean
  | Date
  | null
  | DocumentValue[]
  | DocumentData

/**
 * A document: an ordered mapping from field name to value.
 */
export interface DocumentData {
  [field: string]: DocumentValue
}

/**
 * Identifier assigned to a document by the persistence layer.
 */
export type Identifier = string | number

// =============================================================================
// Guards
// =============================================================================

/**
 * Checks whether a value is document-shaped (a plain object, not an array,
 * Date or null).
 */
export function isDocumentData(value: unknown): value is DocumentData {
  if (value === null || typeof value !== 'object') return false
  if (Array.isArray(value) || value instanceof Date) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Checks whether an unknown value fits the document value union, recursing
 * into arrays and nested objects.
 */
export function isDocumentValue(value: unknown): value is DocumentValue {
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'bigint':
    case 'boolean':
      return true
    case 'object':
      if (value === null || value instanceof Date) return true
      if (Array.isArray(value)) return value.every(isDocumentValue)
      return isDocumentData(value) && Object.values(value).every(isDocumentValue)
    default:
      return false
  }
}

/**
 * Describes the runtime category of a value for error messages.
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null'
  if (value === undefined) return 'undefined'
  if (Array.isArray(value)) return 'array'
  if (value instanceof Date) return 'date'
  if (typeof value === 'number') {
    if (Number.isNaN(value)) return 'NaN'
    if (!Number.isFinite(value)) return 'Infinity'
  }
  if (typeof value === 'object') return 'document'
  return typeof value
}

// =============================================================================
// Copying
// =============================================================================

/**
 * Deep-copies a document value so that the copy shares no mutable state with
 * the source.
 */
export function cloneValue(value: DocumentValue): DocumentValue {
  if (value instanceof Date) return new Date(value.getTime())
  if (Array.isArray(value)) return value.map((item) => cloneValue(item))
  if (value !== null && typeof value === 'object') return cloneDocument(value)
  return value
}

/**
 * Deep-copies a document.
 */
export function cloneDocument(document: DocumentData): DocumentData {
  const copy: DocumentData = {}
  for (const [key, value] of Object.entries(document)) {
    copy[key] = cloneValue(value)
  }
  return copy
}
