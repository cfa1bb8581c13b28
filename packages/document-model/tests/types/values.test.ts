/**
 * @file Document Value Tests
 */

import { describe, it, expect } from 'vitest'
import {
  cloneDocument,
  describeValue,
  isDocumentData,
  isDocumentValue,
  type DocumentData,
} from '../../src/types/values.js'

describe('isDocumentData', () => {
  it('accepts plain objects only', () => {
    expect(isDocumentData({})).toBe(true)
    expect(isDocumentData(Object.create(null))).toBe(true)
    expect(isDocumentData([])).toBe(false)
    expect(isDocumentData(new Date())).toBe(false)
    expect(isDocumentData(new Map())).toBe(false)
    expect(isDocumentData(null)).toBe(false)
  })
})

describe('isDocumentValue', () => {
  it('accepts the value union recursively', () => {
    expect(isDocumentValue({ a: [1, 'b', null, { c: new Date(0), d: 1n, e: true }] })).toBe(true)
    expect(isDocumentValue({ a: undefined })).toBe(false)
    expect(isDocumentValue([() => 1])).toBe(false)
    expect(isDocumentValue(Symbol('s'))).toBe(false)
  })
})

describe('describeValue', () => {
  it('names runtime categories', () => {
    expect(describeValue(null)).toBe('null')
    expect(describeValue(undefined)).toBe('undefined')
    expect(describeValue([])).toBe('array')
    expect(describeValue(new Date())).toBe('date')
    expect(describeValue(Number.NaN)).toBe('NaN')
    expect(describeValue(Number.POSITIVE_INFINITY)).toBe('Infinity')
    expect(describeValue({})).toBe('document')
    expect(describeValue(1n)).toBe('bigint')
    expect(describeValue('a')).toBe('string')
  })
})

describe('cloneDocument', () => {
  it('shares no mutable state with the source', () => {
    const source: DocumentData = { at: new Date(0), tags: ['a'], nested: { n: 1 } }
    const copy = cloneDocument(source)

    expect(copy).toEqual(source)
    expect(copy.at).not.toBe(source.at)
    expect(copy.tags).not.toBe(source.tags)
    expect(copy.nested).not.toBe(source.nested)
  })
})
