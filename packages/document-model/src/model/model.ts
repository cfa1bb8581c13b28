/**
 * @file Model
 *
 * A model type binds a schema to a persistence collection. Each instance
 * owns one document and runs the save pipeline:
 *
 * ```
 * pre-save hooks -> validate -> insertOrUpdate -> post-save hooks
 * ```
 *
 * Validation is part of the pipeline rather than a hook, so an invalid
 * document never reaches the collection. A hook abort, a validation failure
 * or a persistence failure stops the pipeline at that step.
 *
 * @example
 * ```typescript
 * const carSchema = new Schema({
 *   name: { type: 'string', required: true },
 *   wheels: { type: 'integer', default: 4, validates: gte(0) },
 * })
 *
 * const Car = createModel(carSchema, new MemoryCollection(), { name: 'Car' })
 *
 * const car = new Car({ name: 'Roadster' })
 * const id = await car.save()
 * const found = await Car.findById(id)
 * ```
 *
 * @module document-model/model/model
 */

import type { ModelOptions, ResolvedModelOptions } from '../config/model-options.js'
import { resolveModelOptions } from '../config/model-options.js'
import type { PersistenceOperation } from '../errors.js'
import { DocumentModelError, PersistenceError, StaleModelError, StructuralError, ValidationError } from '../errors.js'
import type { DebugLogger } from '../logging/debug-logger.js'
import { createDebugLogger } from '../logging/debug-logger.js'
import type { HookEvent } from '../middleware/pipeline.js'
import { runHooks } from '../middleware/pipeline.js'
import type { OperationOptions, PersistenceCollection } from '../persistence/types.js'
import { isIdentifier } from '../persistence/types.js'
import type { Schema } from '../schema/schema.js'
import { createDeleteMessage, createInsertMessage, createUpdateMessage } from '../sync/change-feed.js'
import type { DocumentData, DocumentValue, Identifier } from '../types/values.js'
import { cloneDocument, cloneValue } from '../types/values.js'
import { coerceDocument } from '../validation/coerce.js'
import { validate } from '../validation/engine.js'
import { AccessorTable } from './accessors.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Everything an instance shares with the other instances of its model type.
 */
export interface ModelBinding {
  readonly schema: Schema
  readonly collection: PersistenceCollection
  readonly options: ResolvedModelOptions
  readonly accessors: AccessorTable
  readonly log: DebugLogger
}

/**
 * Lifecycle state of an instance.
 *
 * - `new`: constructed, never saved
 * - `persisted`: saved or loaded from the collection
 * - `deleted`: removed from the collection; further saves are rejected
 */
export type ModelState = 'new' | 'persisted' | 'deleted'

/**
 * Failure kinds `trySave` reports.
 */
export type SaveError = DocumentModelError

export type SaveResult =
  | { readonly ok: true; readonly id: Identifier }
  | { readonly ok: false; readonly error: SaveError }

export interface ToObjectOptions {
  /** Include virtual field values. Defaults to false */
  virtuals?: boolean
}

/**
 * Constructor and static operations produced by `createModel`.
 */
export interface ModelType {
  new (initial?: DocumentData): Model
  readonly schema: Schema
  readonly collection: PersistenceCollection
  readonly options: ResolvedModelOptions
  /**
   * Loads a stored document. Resolves to `null` when there is none.
   *
   * @throws {PersistenceError} If the collection fails or returns something
   *   that is not a document
   */
  findById(id: Identifier, options?: OperationOptions): Promise<Model | null>
}

// =============================================================================
// Signals
// =============================================================================

/**
 * Combines a caller's signal with the configured timeout.
 */
function operationSignal(signal: AbortSignal | undefined, timeoutMs: number | undefined): AbortSignal | undefined {
  if (timeoutMs === undefined) return signal
  const timeout = AbortSignal.timeout(timeoutMs)
  return signal ? AbortSignal.any([signal, timeout]) : timeout
}

function assertNotAborted(signal: AbortSignal | undefined, operation: PersistenceOperation): void {
  if (signal?.aborted) {
    throw new PersistenceError(`${operation} aborted before it started`, {
      operation,
      cause: signal.reason,
    })
  }
}

// =============================================================================
// Model
// =============================================================================

/**
 * One document bound to a schema and a collection.
 */
export class Model {
  protected readonly binding: ModelBinding
  private readonly doc: DocumentData
  /** Top-level values written by producer defaults, re-resolved on every validation */
  private readonly produced = new Map<string, DocumentValue>()
  private snapshot: DocumentData | null = null
  private lifecycle: ModelState = 'new'

  /**
   * Literal keys of `initial` are copied; keys naming a virtual run its setter
   * after the literals are in place.
   *
   * @throws {StructuralError} If `initial` names a read-only virtual
   */
  constructor(binding: ModelBinding, initial: DocumentData = {}) {
    this.binding = binding
    this.doc = {}
    const { accessors } = binding
    const virtuals: Array<[string, DocumentValue]> = []
    for (const [name, value] of Object.entries(initial)) {
      if (accessors.isVirtual(name)) {
        virtuals.push([name, value])
      } else {
        this.doc[name] = cloneValue(value)
      }
    }
    for (const [name, value] of virtuals) {
      accessors.set(this.doc, name, cloneValue(value))
    }
  }

  // ---------------------------------------------------------------------------
  // Properties
  // ---------------------------------------------------------------------------

  get schema(): Schema {
    return this.binding.schema
  }

  /**
   * Identifier stored in the id field, if any.
   */
  get id(): Identifier | undefined {
    const value = this.doc[this.binding.options.idField]
    return isIdentifier(value) ? value : undefined
  }

  get state(): ModelState {
    return this.lifecycle
  }

  get isNew(): boolean {
    return this.lifecycle === 'new'
  }

  get isDeleted(): boolean {
    return this.lifecycle === 'deleted'
  }

  // ---------------------------------------------------------------------------
  // Field Access
  // ---------------------------------------------------------------------------

  /**
   * Reads a literal field or computes a virtual.
   */
  get(name: string): DocumentValue | undefined {
    return this.binding.accessors.get(this.doc, name)
  }

  /**
   * Writes a literal field or runs a virtual's setter.
   *
   * @throws {StructuralError} If the name is a read-only virtual
   */
  set(name: string, value: DocumentValue): this {
    this.binding.accessors.set(this.doc, name, value)
    this.produced.delete(name)
    return this
  }

  /**
   * Removes a literal field from the document.
   */
  unset(name: string): this {
    this.binding.accessors.unset(this.doc, name)
    this.produced.delete(name)
    return this
  }

  /**
   * Deep copy of the document, optionally with virtuals computed in.
   */
  toObject(options: ToObjectOptions = {}): DocumentData {
    const copy = cloneDocument(this.doc)
    if (options.virtuals) {
      for (const name of this.binding.schema.virtualNames) {
        const value = this.binding.accessors.get(this.doc, name)
        if (value !== undefined) copy[name] = value
      }
    }
    return copy
  }

  toJSON(): DocumentData {
    return this.toObject()
  }

  // ---------------------------------------------------------------------------
  // Validation
  // ---------------------------------------------------------------------------

  /**
   * Validates the current document. Resolved defaults are written into it.
   * A top-level value a producer default wrote is resolved again on the next
   * validation unless it was changed in between.
   *
   * @throws {ValidationError} Carrying the full error tree
   */
  validate(): void {
    for (const [name, value] of this.produced) {
      if (Object.is(this.doc[name], value)) delete this.doc[name]
    }
    this.produced.clear()

    const result = validate(this.binding.schema, this.doc, {
      allowedFields: [this.binding.options.idField],
      onDefault: (path, kind, value) => {
        if (kind === 'producer' && this.binding.schema.fields.has(path)) {
          this.produced.set(path, value)
        }
      },
    })
    if (!result.valid) {
      throw new ValidationError(result.errors, `${this.binding.options.name} validation failed`)
    }
  }

  // ---------------------------------------------------------------------------
  // Persistence
  // ---------------------------------------------------------------------------

  /**
   * Runs the save pipeline and resolves to the document's identifier. The
   * first save stores the identifier assigned by the collection in the id
   * field; later saves replace the stored document under that identifier.
   *
   * @throws {StaleModelError} If the instance was deleted
   * @throws {MiddlewareAbortError} If a pre or post hook aborts
   * @throws {ValidationError} If the document is invalid after pre hooks ran
   * @throws {PersistenceError} If the collection fails
   */
  async save(options: OperationOptions = {}): Promise<Identifier> {
    if (this.lifecycle === 'deleted') {
      throw new StaleModelError('cannot save a deleted document', 'insertOrUpdate')
    }

    const { schema, collection, options: modelOptions, log } = this.binding
    const signal = operationSignal(options.signal, modelOptions.timeoutMs)

    log('save: pre hooks', { count: schema.hooksFor('pre', 'save').length })
    await this.runPhase('pre', 'save', signal)

    log('save: validate')
    this.validate()

    assertNotAborted(signal, 'insertOrUpdate')
    log('save: insertOrUpdate', { id: this.id })
    let id: Identifier
    try {
      id = await collection.insertOrUpdate(cloneDocument(this.doc), { signal })
    } catch (error) {
      log('save: insertOrUpdate failed', { error: error instanceof Error ? error.message : String(error) })
      throw PersistenceError.wrap('insertOrUpdate', error)
    }
    if (!isIdentifier(id)) {
      throw new PersistenceError(`insertOrUpdate returned an invalid identifier: ${String(id)}`, {
        operation: 'insertOrUpdate',
      })
    }

    this.doc[modelOptions.idField] = id
    const previous = this.snapshot
    this.snapshot = cloneDocument(this.doc)
    this.lifecycle = 'persisted'
    this.publish(previous === null ? 'insert' : 'update', id, previous)

    log('save: post hooks', { id, count: schema.hooksFor('post', 'save').length })
    await this.runPhase('post', 'save', signal)

    return id
  }

  /**
   * Like `save`, but reports failures as a result instead of rejecting.
   * Errors that are not part of the taxonomy still reject.
   */
  async trySave(options: OperationOptions = {}): Promise<SaveResult> {
    try {
      const id = await this.save(options)
      return { ok: true, id }
    } catch (error) {
      if (error instanceof DocumentModelError) {
        return { ok: false, error }
      }
      throw error
    }
  }

  /**
   * Runs pre-delete hooks, removes the stored document and runs post-delete
   * hooks. The instance is stale afterwards.
   *
   * @throws {StaleModelError} If the instance was already deleted or has no identifier
   * @throws {MiddlewareAbortError} If a pre or post hook aborts
   * @throws {PersistenceError} If the collection fails
   */
  async delete(options: OperationOptions = {}): Promise<void> {
    if (this.lifecycle === 'deleted') {
      throw new StaleModelError('document was already deleted', 'deleteById')
    }
    const id = this.id
    if (id === undefined) {
      throw new StaleModelError('cannot delete a document that has no identifier', 'deleteById')
    }

    const { collection, options: modelOptions, log } = this.binding
    const signal = operationSignal(options.signal, modelOptions.timeoutMs)

    await this.runPhase('pre', 'delete', signal)

    assertNotAborted(signal, 'deleteById')
    log('delete: deleteById', { id })
    try {
      await collection.deleteById(id, { signal })
    } catch (error) {
      log('delete: deleteById failed', { error: error instanceof Error ? error.message : String(error) })
      throw PersistenceError.wrap('deleteById', error)
    }

    const previous = this.snapshot
    this.lifecycle = 'deleted'
    this.publish('delete', id, previous)

    await this.runPhase('post', 'delete', signal)
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /**
   * Marks a freshly hydrated instance as persisted.
   */
  protected markLoaded(): void {
    this.snapshot = cloneDocument(this.doc)
    this.lifecycle = 'persisted'
  }

  private runPhase(phase: 'pre' | 'post', event: HookEvent, signal: AbortSignal | undefined): Promise<void> {
    return runHooks(this.binding.schema.hooksFor(phase, event), this, {
      event,
      phase,
      signal,
      logger: this.binding.log,
    })
  }

  private publish(type: 'insert' | 'update' | 'delete', id: Identifier, previous: DocumentData | null): void {
    const { changeFeed, name } = this.binding.options
    if (!changeFeed) return

    const metadata = { model: name }
    const value = cloneDocument(this.doc)
    switch (type) {
      case 'insert':
        changeFeed.publish(createInsertMessage(id, value, metadata))
        break
      case 'update':
        changeFeed.publish(createUpdateMessage(id, value, previous ?? {}, metadata))
        break
      case 'delete':
        changeFeed.publish(createDeleteMessage(id, previous ?? value, metadata))
        break
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Builds a model type bound to a schema and a collection. The schema is
 * sealed: virtuals and hooks registered afterwards are rejected.
 *
 * @throws {StructuralError} If the options are invalid or the id field is
 *   declared as a virtual or a required field
 */
export function createModel(
  schema: Schema,
  collection: PersistenceCollection,
  options: ModelOptions = {}
): ModelType {
  const resolved = resolveModelOptions(options)

  if (schema.hasVirtual(resolved.idField) || schema.field(resolved.idField)?.required) {
    throw new StructuralError('id field must not be a virtual or a required field', {
      path: resolved.idField,
    })
  }

  schema.seal()

  const binding: ModelBinding = Object.freeze({
    schema,
    collection,
    options: resolved,
    accessors: AccessorTable.for(schema),
    log: createDebugLogger(resolved.name, resolved.debug),
  })

  binding.log('model created', {
    fields: schema.fieldNames,
    virtuals: schema.virtualNames,
    idField: resolved.idField,
  })

  return class BoundModel extends Model {
    static readonly schema = schema
    static readonly collection = collection
    static readonly options = resolved

    constructor(initial: DocumentData = {}) {
      super(binding, initial)
    }

    static async findById(id: Identifier, options: OperationOptions = {}): Promise<BoundModel | null> {
      const signal = operationSignal(options.signal, resolved.timeoutMs)
      assertNotAborted(signal, 'findById')
      binding.log('findById', { id })

      let raw: object | null
      try {
        raw = await collection.findById(id, { signal })
      } catch (error) {
        throw PersistenceError.wrap('findById', error)
      }
      if (!raw) return null
      if (typeof raw !== 'object' || Array.isArray(raw)) {
        throw new PersistenceError('findById returned a value that is not a document', {
          operation: 'findById',
        })
      }

      let document: DocumentData
      try {
        document = coerceDocument(schema, raw)
      } catch (error) {
        throw new PersistenceError('findById returned a document that could not be read', {
          operation: 'findById',
          cause: error,
        })
      }
      document[resolved.idField] ??= id
      for (const name of schema.virtualNames) {
        delete document[name]
      }

      const instance = new BoundModel(document)
      instance.markLoaded()
      return instance
    }
  }
}
