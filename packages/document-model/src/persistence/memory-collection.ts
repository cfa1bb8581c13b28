/**
 * @file In-memory Collection
 *
 * A PersistenceCollection backed by a Map. Stored documents are deep copies,
 * so callers never share state with the store.
 *
 * @module document-model/persistence/memory-collection
 */

import { randomUUID } from 'node:crypto'
import type { DocumentData, Identifier } from '../types/values.js'
import { cloneDocument } from '../types/values.js'
import type { OperationOptions, PersistenceCollection } from './types.js'
import { isIdentifier } from './types.js'

export interface MemoryCollectionOptions {
  /** Field holding the identifier. Defaults to `_id` */
  idField?: string
  /** Identifier generator for documents saved without one */
  generateId?: () => Identifier
}

/**
 * In-process document store.
 *
 * @example
 * ```typescript
 * const Car = createModel(carSchema, new MemoryCollection())
 * ```
 */
export class MemoryCollection implements PersistenceCollection {
  private readonly documents = new Map<Identifier, DocumentData>()
  private readonly idField: string
  private readonly generateId: () => Identifier

  constructor(options: MemoryCollectionOptions = {}) {
    this.idField = options.idField ?? '_id'
    this.generateId = options.generateId ?? (() => randomUUID())
  }

  get size(): number {
    return this.documents.size
  }

  async insertOrUpdate(document: DocumentData, options?: OperationOptions): Promise<Identifier> {
    options?.signal?.throwIfAborted()

    const existing = document[this.idField]
    const id = isIdentifier(existing) ? existing : this.generateId()
    const stored = cloneDocument(document)
    stored[this.idField] = id
    this.documents.set(id, stored)
    return id
  }

  async findById(id: Identifier, options?: OperationOptions): Promise<DocumentData | null> {
    options?.signal?.throwIfAborted()

    const stored = this.documents.get(id)
    return stored ? cloneDocument(stored) : null
  }

  async deleteById(id: Identifier, options?: OperationOptions): Promise<void> {
    options?.signal?.throwIfAborted()

    if (!this.documents.delete(id)) {
      throw new Error(`no document with ${this.idField} ${String(id)}`)
    }
  }

  /**
   * Removes every stored document.
   */
  clear(): void {
    this.documents.clear()
  }
}
