/**
 * @file Hydration Coercion
 *
 * Converts documents read back from a store into the document value union.
 * Wire formats lose type information (dates become strings, 64-bit integers
 * become strings or numbers), so declared field types guide the conversion.
 * Values that cannot be converted are passed through for the validator to
 * report.
 *
 * @module document-model/validation/coerce
 */

import type { FieldType } from '../schema/field-types.js'
import type { Schema } from '../schema/schema.js'
import type { DocumentData, DocumentValue } from '../types/values.js'

// =============================================================================
// Helpers
// =============================================================================

function isRecord(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
}

const INTEGER_STRING = /^-?\d+$/

/**
 * Converts an arbitrary value into the document value union without any
 * schema guidance. `undefined` and functions are dropped by the caller;
 * unrecognized objects such as driver id wrappers are stringified.
 */
export function toDocumentValue(value: unknown): DocumentValue | undefined {
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'bigint':
    case 'boolean':
      return value
    case 'undefined':
    case 'function':
    case 'symbol':
      return undefined
  }
  if (value === null || value instanceof Date) return value
  if (Array.isArray(value)) {
    return value.map((item) => toDocumentValue(item) ?? null)
  }
  if (isRecord(value)) {
    const proto: unknown = Object.getPrototypeOf(value)
    if (proto === Object.prototype || proto === null) {
      return toPlainDocument(value)
    }
  }
  return String(value)
}

function toPlainDocument(value: object): DocumentData {
  const document: DocumentData = {}
  for (const [key, item] of Object.entries(value)) {
    const converted = toDocumentValue(item)
    if (converted !== undefined) document[key] = converted
  }
  return document
}

// =============================================================================
// Schema-guided Coercion
// =============================================================================

function coerceValue(value: unknown, type: FieldType): DocumentValue | undefined {
  switch (type.kind) {
    case 'scalar':
      if (type.scalar === 'datetime' && (typeof value === 'string' || typeof value === 'number')) {
        const date = new Date(value)
        if (!Number.isNaN(date.getTime())) return date
      }
      if (type.scalar === 'long') {
        if (typeof value === 'string' && INTEGER_STRING.test(value)) return BigInt(value)
        if (typeof value === 'number' && Number.isSafeInteger(value)) return BigInt(value)
      }
      break

    case 'schema':
      if (isRecord(value)) return coerceFields(type.schema, value)
      break

    case 'dynamic':
      if (isRecord(value)) {
        const plain = toPlainDocument(value)
        return coerceFields(type.select(plain), plain)
      }
      break

    case 'array':
      if (Array.isArray(value)) {
        return value.map((item) => coerceValue(item, type.element) ?? null)
      }
      break

    case 'mixed':
      break
  }

  return toDocumentValue(value)
}

function coerceFields(schema: Schema, raw: object): DocumentData {
  const document: DocumentData = {}
  for (const [key, value] of Object.entries(raw)) {
    const spec = schema.fields.get(key)
    const converted = spec ? coerceValue(value, spec.type) : toDocumentValue(value)
    if (converted !== undefined) document[key] = converted
  }
  return document
}

/**
 * Coerces a raw stored record into a document shaped by the schema.
 */
export function coerceDocument(schema: Schema, raw: object): DocumentData {
  return coerceFields(schema, raw)
}
