/**
 * @file Validation Engine
 *
 * Walks a schema against a document. For every field, in declaration order:
 *
 * 1. resolve and materialize the default when the value is absent
 * 2. record a required error when the value is still absent
 * 3. type-check a present value, recursing into sub-documents and arrays
 * 4. run every validator against a present, type-correct value
 *
 * Errors are aggregated for the whole tree. The walk never stops at the first
 * failure; the result is either valid or carries every message.
 *
 * @module document-model/validation/engine
 */

import { StructuralError } from '../errors.js'
import { resolveDefault } from '../schema/field-spec.js'
import type { DefaultValue, FieldSpec } from '../schema/field-spec.js'
import type { FieldType } from '../schema/field-types.js'
import { describeFieldType, matchesKind } from '../schema/field-types.js'
import type { Schema } from '../schema/schema.js'
import type { DocumentData, DocumentValue } from '../types/values.js'
import { describeValue, isDocumentData } from '../types/values.js'
import type { ErrorTree } from './error-tree.js'
import { ErrorCollector, fieldPath, indexPath } from './error-tree.js'

// =============================================================================
// Types
// =============================================================================

export interface ValidateOptions {
  /**
   * Top-level keys that strict schemas accept without declaring them, such
   * as the model's identifier field.
   */
  allowedFields?: readonly string[]
  /**
   * Called for every default written into the document, with the field's
   * path, the kind of default and the resolved value.
   */
  onDefault?: (path: string, kind: DefaultValue['kind'], value: DocumentValue) => void
}

/**
 * Outcome of a full validation walk. `document` is the input document, with
 * resolved defaults written into it.
 */
export type ValidationResult =
  | { readonly valid: true; readonly document: DocumentData }
  | { readonly valid: false; readonly errors: ErrorTree; readonly document: DocumentData }

/**
 * State shared across one walk.
 */
interface WalkState {
  readonly root: DocumentData
  readonly errors: ErrorCollector
  /** Sub-documents on the current recursion path */
  readonly ancestry: Set<object>
  readonly onDefault?: ValidateOptions['onDefault']
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Validates a document against a schema, writing resolved defaults into it.
 *
 * @throws {StructuralError} Only if the document contains a reference cycle
 */
export function validate(
  schema: Schema,
  document: DocumentData,
  options: ValidateOptions = {}
): ValidationResult {
  const state: WalkState = {
    root: document,
    errors: new ErrorCollector(),
    ancestry: new Set(),
    onDefault: options.onDefault,
  }

  walkSchema(schema, document, '', state, new Set(options.allowedFields ?? []))

  if (state.errors.isEmpty) {
    return { valid: true, document }
  }
  return { valid: false, errors: state.errors.toTree(), document }
}

// =============================================================================
// Walk
// =============================================================================

function walkSchema(
  schema: Schema,
  document: DocumentData,
  path: string,
  state: WalkState,
  allowedFields: ReadonlySet<string>
): void {
  if (state.ancestry.has(document)) {
    throw new StructuralError('document contains a reference to itself', { path: path || '(root)' })
  }
  state.ancestry.add(document)

  for (const spec of schema.fields.values()) {
    walkField(spec, document, fieldPath(path, spec.name), state)
  }

  if (schema.options.strict) {
    for (const key of Object.keys(document)) {
      if (schema.hasVirtual(key)) {
        state.errors.add(fieldPath(path, key), 'is a virtual field and cannot be stored')
      } else if (!schema.fields.has(key) && !allowedFields.has(key)) {
        state.errors.add(fieldPath(path, key), 'is not a field of the schema')
      }
    }
  }

  state.ancestry.delete(document)
}

function isAbsent(value: DocumentValue | undefined, spec: FieldSpec): boolean {
  return value === undefined || (value === null && !spec.nullable)
}

function walkField(spec: FieldSpec, document: DocumentData, path: string, state: WalkState): void {
  let value: DocumentValue | undefined = document[spec.name]

  // defaults are materialized before any check
  if (isAbsent(value, spec) && spec.default) {
    let resolved: DocumentValue | undefined
    try {
      resolved = resolveDefault(spec.default)
    } catch (error) {
      state.errors.add(path, `default failed: ${error instanceof Error ? error.message : String(error)}`)
      return
    }
    if (resolved !== undefined) {
      document[spec.name] = resolved
      value = resolved
      state.onDefault?.(path, spec.default.kind, resolved)
    }
  }

  // absent values skip the type check and validators
  if (isAbsent(value, spec)) {
    if (spec.required) {
      state.errors.add(path, 'is required')
    }
    return
  }

  // explicit null on a nullable field
  if (value === undefined || value === null) return

  // type check
  if (!checkType(value, spec.type, path, state)) return

  // every validator runs, no short-circuit
  for (const validator of spec.validators) {
    let message: string | null | undefined | void
    try {
      message = validator(value, { path, document: state.root })
    } catch (error) {
      message = `validator threw: ${error instanceof Error ? error.message : String(error)}`
    }
    if (typeof message === 'string' && message !== '') {
      state.errors.add(path, message)
    }
  }
}

/**
 * Checks a present value against a field type and recurses into containers.
 * Returns whether the top-level kind matched; nested errors do not affect the
 * return value.
 */
function checkType(value: DocumentValue, type: FieldType, path: string, state: WalkState): boolean {
  if (!matchesKind(value, type)) {
    state.errors.add(path, `expected ${describeFieldType(type)}, got ${describeValue(value)}`)
    return false
  }

  switch (type.kind) {
    case 'schema':
      if (isDocumentData(value)) {
        walkSchema(type.schema, value, path, state, new Set())
      }
      break

    case 'dynamic':
      if (isDocumentData(value)) {
        const selected = selectSchema(type.select, value, path, state)
        if (selected) {
          walkSchema(selected, value, path, state, new Set())
        }
      }
      break

    case 'array':
      if (Array.isArray(value)) {
        checkElements(value, type.element, path, state)
      }
      break

    case 'scalar':
    case 'mixed':
      break
  }

  return true
}

function selectSchema(
  select: (value: DocumentData) => Schema,
  value: DocumentData,
  path: string,
  state: WalkState
): Schema | undefined {
  try {
    return select(value)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    state.errors.add(path, `schema selection failed: ${reason}`)
    return undefined
  }
}

function checkElements(
  elements: DocumentValue[],
  elementType: FieldType,
  path: string,
  state: WalkState
): void {
  if (state.ancestry.has(elements)) {
    throw new StructuralError('array contains a reference to itself', { path })
  }
  state.ancestry.add(elements)

  elements.forEach((element, index) => {
    const elementPath = indexPath(path, index)
    if (element === null || element === undefined) {
      state.errors.add(elementPath, `expected ${describeFieldType(elementType)}, got ${describeValue(element)}`)
      return
    }
    checkType(element, elementType, elementPath, state)
  })

  state.ancestry.delete(elements)
}
