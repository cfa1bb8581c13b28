/**
 * @file Persistence Collaborator
 *
 * The narrow interface the model layer uses to store documents. Any store
 * offering create-or-replace, lookup and removal by identifier can back a
 * model.
 *
 * @module document-model/persistence/types
 */

import type { DocumentData, Identifier } from '../types/values.js'

/**
 * Per-call options. Implementations should stop work and reject when the
 * signal aborts.
 */
export interface OperationOptions {
  signal?: AbortSignal
}

/**
 * Document store keyed by identifier.
 */
export interface PersistenceCollection {
  /**
   * Inserts the document, or replaces the stored one when the document
   * already carries an identifier. Resolves to the document's identifier.
   */
  insertOrUpdate(document: DocumentData, options?: OperationOptions): Promise<Identifier>

  /**
   * Resolves to the stored record, or `null` when there is none.
   */
  findById(id: Identifier, options?: OperationOptions): Promise<object | null>

  /**
   * Removes the stored record. Rejects when nothing was removed.
   */
  deleteById(id: Identifier, options?: OperationOptions): Promise<void>
}

export function isIdentifier(value: unknown): value is Identifier {
  return typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value))
}
