/**
 * @file Schema
 *
 * A schema is an ordered set of field specs plus registries of virtual fields
 * and lifecycle hooks. Declarations are checked when the schema is built; a
 * malformed declaration raises StructuralError immediately.
 *
 * @example
 * ```typescript
 * const nameSchema = new Schema({
 *   first: { type: 'string', required: true },
 *   last: { type: 'string', required: true },
 * })
 *
 * const person = new Schema({
 *   first: { type: 'string', required: true },
 *   last: { type: 'string', required: true },
 *   age: { type: 'integer', validates: between(0, 150) },
 *   spouse: { type: nameSchema },
 * })
 *
 * person.virtual(
 *   'initials',
 *   (doc) => String(doc.first).charAt(0) + String(doc.last).charAt(0),
 * )
 * ```
 *
 * @module document-model/schema/schema
 */

import type { HookPhase } from '../errors.js'
import { StructuralError } from '../errors.js'
import type { Hook, HookEvent } from '../middleware/pipeline.js'
import { HookRegistry } from '../middleware/pipeline.js'
import type { Model } from '../model/model.js'
import type { DocumentData, DocumentValue } from '../types/values.js'
import { getValidatorTargets } from '../validation/validators.js'
import type { FieldDeclaration, FieldSpec } from './field-spec.js'
import {
  checkFieldDeclaration,
  normalizeDefault,
  normalizeValidators,
} from './field-spec.js'
import type { FieldType, FieldTypeDeclaration } from './field-types.js'
import { categoriesOf, describeFieldType, isScalarKind, matchesKind } from './field-types.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Field name to declaration, in declaration order.
 */
export type SchemaDefinition = Record<string, FieldDeclaration>

export interface SchemaOptions {
  /** Report document keys that are neither fields nor virtuals. Defaults to false */
  strict?: boolean
}

/**
 * Computes a derived value from the document. Must not mutate it.
 */
export type VirtualGetter = (document: Readonly<DocumentData>) => DocumentValue

/**
 * Writes an incoming value into the literal fields it derives from.
 */
export type VirtualSetter = (document: DocumentData, value: DocumentValue) => void

export interface VirtualField {
  readonly name: string
  readonly get: VirtualGetter
  readonly set?: VirtualSetter
}

// =============================================================================
// Type Normalization
// =============================================================================

function normalizeFieldType(path: string, declared: FieldTypeDeclaration): FieldType {
  if (declared instanceof Schema) {
    return { kind: 'schema', schema: declared }
  }
  if (isScalarKind(declared)) {
    return { kind: 'scalar', scalar: declared }
  }
  if (typeof declared === 'object' && declared !== null) {
    switch (declared.kind) {
      case 'array':
        return { kind: 'array', element: normalizeFieldType(`${path}[]`, declared.element) }
      case 'mixed': {
        const members = [...new Set(declared.members)]
        if (members.length < 2) {
          throw new StructuralError('mixed type needs at least two distinct kinds', { path })
        }
        const invalid = members.find((member) => !isScalarKind(member))
        if (invalid !== undefined) {
          throw new StructuralError(`unknown scalar kind "${String(invalid)}" in mixed type`, { path })
        }
        return { kind: 'mixed', members }
      }
      case 'dynamic':
        if (typeof declared.select !== 'function') {
          throw new StructuralError('dynamic type needs a selector function', { path })
        }
        return { kind: 'dynamic', select: declared.select }
    }
  }
  throw new StructuralError(`unknown field type ${JSON.stringify(declared)}`, { path })
}

function buildFieldSpec(name: string, declaration: FieldDeclaration): FieldSpec {
  checkFieldDeclaration(name, declaration)

  const type = normalizeFieldType(name, declaration.type)
  const validators = normalizeValidators(declaration.validates)
  const defaultValue = normalizeDefault(name, declaration.default)

  if (defaultValue?.kind === 'literal' && defaultValue.value !== null && !matchesKind(defaultValue.value, type)) {
    throw new StructuralError(`default value does not match type ${describeFieldType(type)}`, {
      path: name,
    })
  }

  const categories = categoriesOf(type)
  validators.forEach((validator, index) => {
    const targets = getValidatorTargets(validator)
    if (targets && !categories.some((category) => targets.includes(category))) {
      throw new StructuralError(
        `validator #${index} cannot be applied to ${describeFieldType(type)} values`,
        { path: name }
      )
    }
  })

  return Object.freeze({
    name,
    type,
    required: declaration.required ?? false,
    nullable: declaration.nullable ?? false,
    default: defaultValue,
    validators: Object.freeze([...validators]),
  })
}

// =============================================================================
// Schema
// =============================================================================

/**
 * Declarative description of a document.
 */
export class Schema {
  /** Field specs in declaration order */
  readonly fields: ReadonlyMap<string, FieldSpec>

  readonly options: Readonly<Required<SchemaOptions>>

  private readonly virtuals = new Map<string, VirtualField>()
  private readonly hooks = new HookRegistry<Model>()
  private sealed = false

  constructor(definition: SchemaDefinition, options: SchemaOptions = {}) {
    if (typeof definition !== 'object' || definition === null || Array.isArray(definition)) {
      throw new StructuralError('schema definition must be an object of field declarations')
    }

    const fields = new Map<string, FieldSpec>()
    for (const [name, declaration] of Object.entries(definition)) {
      if (name === '') {
        throw new StructuralError('field names must not be empty')
      }
      fields.set(name, buildFieldSpec(name, declaration))
    }

    this.fields = fields
    this.options = Object.freeze({ strict: options.strict ?? false })
  }

  // ---------------------------------------------------------------------------
  // Fields
  // ---------------------------------------------------------------------------

  get fieldNames(): string[] {
    return [...this.fields.keys()]
  }

  field(name: string): FieldSpec | undefined {
    return this.fields.get(name)
  }

  // ---------------------------------------------------------------------------
  // Virtuals
  // ---------------------------------------------------------------------------

  /**
   * Registers a computed field.
   *
   * @throws {StructuralError} If the name is already a field or a virtual, or
   *   the schema is already bound to a model
   */
  virtual(name: string, get: VirtualGetter, set?: VirtualSetter): this {
    this.assertOpen(`virtual "${name}"`)
    if (this.fields.has(name)) {
      throw new StructuralError(`"${name}" is already declared as a field`, { path: name })
    }
    if (this.virtuals.has(name)) {
      throw new StructuralError(`virtual "${name}" is already declared`, { path: name })
    }
    if (typeof get !== 'function' || (set !== undefined && typeof set !== 'function')) {
      throw new StructuralError('virtual getter and setter must be functions', { path: name })
    }
    this.virtuals.set(name, Object.freeze({ name, get, set }))
    return this
  }

  getVirtual(name: string): VirtualField | undefined {
    return this.virtuals.get(name)
  }

  hasVirtual(name: string): boolean {
    return this.virtuals.has(name)
  }

  get virtualNames(): string[] {
    return [...this.virtuals.keys()]
  }

  // ---------------------------------------------------------------------------
  // Middleware
  // ---------------------------------------------------------------------------

  /**
   * Appends a hook that runs before the event's core step.
   */
  pre(event: HookEvent, hook: Hook<Model>): this {
    return this.addHook('pre', event, hook)
  }

  /**
   * Appends a hook that runs after the event's core step succeeded.
   */
  post(event: HookEvent, hook: Hook<Model>): this {
    return this.addHook('post', event, hook)
  }

  hooksFor(phase: HookPhase, event: HookEvent): readonly Hook<Model>[] {
    return this.hooks.list(phase, event)
  }

  private addHook(phase: HookPhase, event: HookEvent, hook: Hook<Model>): this {
    this.assertOpen(`${phase}-${event} hook`)
    this.hooks.add(phase, event, hook)
    return this
  }

  // ---------------------------------------------------------------------------
  // Sealing
  // ---------------------------------------------------------------------------

  /**
   * Whether the schema has been bound to a model and no longer accepts
   * virtuals or hooks.
   */
  get isSealed(): boolean {
    return this.sealed
  }

  /**
   * Stops further registration. Called when a model is created from the
   * schema, since models build their accessor tables once.
   */
  seal(): void {
    this.sealed = true
  }

  private assertOpen(what: string): void {
    if (this.sealed) {
      throw new StructuralError(`cannot register ${what}: schema is already bound to a model`)
    }
  }
}
