/**
 * @file Accessor Table
 *
 * Single get/set dispatch for model instances. Built once per schema: names
 * registered as virtuals route to their getter and setter, every other name
 * reads and writes the literal document.
 *
 * @module document-model/model/accessors
 */

import { StructuralError } from '../errors.js'
import type { Schema, VirtualField } from '../schema/schema.js'
import type { DocumentData, DocumentValue } from '../types/values.js'

type Accessor =
  | { readonly kind: 'virtual'; readonly virtual: VirtualField }
  | { readonly kind: 'field' }

const FIELD: Accessor = Object.freeze({ kind: 'field' })

const tables = new WeakMap<Schema, AccessorTable>()

export class AccessorTable {
  private readonly virtuals: ReadonlyMap<string, Accessor>

  private constructor(schema: Schema) {
    const virtuals = new Map<string, Accessor>()
    for (const name of schema.virtualNames) {
      const virtual = schema.getVirtual(name)
      if (virtual) virtuals.set(name, { kind: 'virtual', virtual })
    }
    this.virtuals = virtuals
  }

  /**
   * Returns the table for a schema, building it on first use.
   */
  static for(schema: Schema): AccessorTable {
    let table = tables.get(schema)
    if (!table) {
      table = new AccessorTable(schema)
      tables.set(schema, table)
    }
    return table
  }

  private lookup(name: string): Accessor {
    return this.virtuals.get(name) ?? FIELD
  }

  get(document: DocumentData, name: string): DocumentValue | undefined {
    const accessor = this.lookup(name)
    if (accessor.kind === 'virtual') {
      return accessor.virtual.get(document)
    }
    return Object.hasOwn(document, name) ? document[name] : undefined
  }

  /**
   * @throws {StructuralError} If the name is a virtual without a setter
   */
  set(document: DocumentData, name: string, value: DocumentValue): void {
    const accessor = this.lookup(name)
    if (accessor.kind === 'virtual') {
      if (!accessor.virtual.set) {
        throw new StructuralError(`virtual "${name}" is read-only`, { path: name })
      }
      accessor.virtual.set(document, value)
      return
    }
    document[name] = value
  }

  /**
   * Removes a literal field. Virtuals cannot be unset.
   */
  unset(document: DocumentData, name: string): void {
    if (this.lookup(name).kind === 'virtual') {
      throw new StructuralError(`virtual "${name}" cannot be unset`, { path: name })
    }
    delete document[name]
  }

  isVirtual(name: string): boolean {
    return this.lookup(name).kind === 'virtual'
  }
}
