/**
 * @file Hydration Coercion Tests
 *
 * Stored records lose type information on the wire. These tests cover how
 * declared field types restore dates and 64-bit integers, and how values
 * without a declared type are brought into the document value union.
 */

import { describe, it, expect } from 'vitest'
import { arrayOf } from '../../src/schema/field-types.js'
import { Schema } from '../../src/schema/schema.js'
import { coerceDocument, toDocumentValue } from '../../src/validation/coerce.js'

describe('coerceDocument', () => {
  const nestedSchema = new Schema({ at: { type: 'datetime' } })
  const schema = new Schema({
    at: { type: 'datetime' },
    big: { type: 'long' },
    count: { type: 'integer' },
    nested: { type: nestedSchema },
    history: { type: arrayOf('datetime') },
  })

  it('restores dates from ISO strings and epoch milliseconds', () => {
    const document = coerceDocument(schema, {
      at: '2024-01-02T03:04:05.000Z',
      nested: { at: 0 },
    })

    expect(document.at).toEqual(new Date('2024-01-02T03:04:05.000Z'))
    expect(document.nested).toEqual({ at: new Date(0) })
  })

  it('restores longs from integer strings and safe integers', () => {
    expect(coerceDocument(schema, { big: '12345678901234567890' }).big).toBe(12345678901234567890n)
    expect(coerceDocument(schema, { big: 5 }).big).toBe(5n)
  })

  it('passes through values it cannot convert', () => {
    expect(coerceDocument(schema, { big: 2 ** 53 }).big).toBe(2 ** 53)
    expect(coerceDocument(schema, { at: 'not a date' }).at).toBe('not a date')
  })

  it('coerces array elements by the element type', () => {
    const document = coerceDocument(schema, {
      history: ['2024-01-01T00:00:00.000Z', 'garbage'],
    })

    expect(document.history).toEqual([new Date('2024-01-01T00:00:00.000Z'), 'garbage'])
  })

  it('keeps undeclared keys and drops values that cannot be stored', () => {
    const document = coerceDocument(schema, {
      count: 3,
      extra: { a: undefined, b: 1 },
      callback: () => 1,
    })

    expect(document).toEqual({ count: 3, extra: { b: 1 } })
  })
})

describe('toDocumentValue', () => {
  it('keeps primitives, null and dates', () => {
    const date = new Date(0)
    expect(toDocumentValue('a')).toBe('a')
    expect(toDocumentValue(1)).toBe(1)
    expect(toDocumentValue(1n)).toBe(1n)
    expect(toDocumentValue(false)).toBe(false)
    expect(toDocumentValue(null)).toBeNull()
    expect(toDocumentValue(date)).toBe(date)
  })

  it('drops undefined, functions and symbols', () => {
    expect(toDocumentValue(undefined)).toBeUndefined()
    expect(toDocumentValue(() => 1)).toBeUndefined()
    expect(toDocumentValue(Symbol('s'))).toBeUndefined()
  })

  it('replaces undefined array items with null', () => {
    expect(toDocumentValue([1, undefined])).toEqual([1, null])
  })

  it('stringifies objects that are not plain documents', () => {
    class ObjectId {
      toString(): string {
        return '65f0c0ffee'
      }
    }
    expect(toDocumentValue(new ObjectId())).toBe('65f0c0ffee')
  })
})
