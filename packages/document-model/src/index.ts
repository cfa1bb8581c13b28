/**
 * document-model
 *
 * Declarative document schemas with typed fields, defaults, validators,
 * virtual fields and save/delete middleware, bound to a pluggable
 * persistence collection.
 *
 * @packageDocumentation
 * @module document-model
 */

// ============================================================================
// Type Exports
// ============================================================================

export type { DocumentValue, DocumentData, Identifier } from './types/values.js'
export type { ErrorTree } from './validation/error-tree.js'
export type { Validator, ValidatorContext } from './validation/validators.js'
export type { ValidateOptions, ValidationResult } from './validation/engine.js'
export type {
  ScalarKind,
  FieldType,
  FieldTypeDeclaration,
  ArrayFieldType,
  MixedFieldType,
  DynamicFieldType,
  SchemaSelector,
} from './schema/field-types.js'
export type { DefaultValue, FieldDeclaration, FieldSpec } from './schema/field-spec.js'
export type {
  SchemaDefinition,
  SchemaOptions,
  VirtualField,
  VirtualGetter,
  VirtualSetter,
} from './schema/schema.js'
export type { Hook, HookContext, HookEvent, HookResult } from './middleware/pipeline.js'
export type { HookPhase, PersistenceOperation } from './errors.js'
export type { OperationOptions, PersistenceCollection } from './persistence/types.js'
export type { MemoryCollectionOptions } from './persistence/memory-collection.js'
export type { RpcClient, RetryConfig, RpcCollectionConfig } from './persistence/rpc-collection.js'
export type { ChangeListener, ChangeFeedOptions, DocumentChangeMessage } from './sync/change-feed.js'
export type { ModelOptions, ResolvedModelOptions } from './config/model-options.js'
export type { DebugLogger, DebugOption } from './logging/debug-logger.js'
export type { ModelState, ModelType, SaveError, SaveResult, ToObjectOptions } from './model/model.js'

// ============================================================================
// Schema
// ============================================================================

export { Schema } from './schema/schema.js'
export { arrayOf, mixed, dynamic, SCALAR_KINDS } from './schema/field-types.js'

// ============================================================================
// Validation
// ============================================================================

export { validate } from './validation/engine.js'
export { coerceDocument } from './validation/coerce.js'
export { gte, lte, gt, lt, between, length, match, oneOf, isEmail, isUrl } from './validation/validators.js'

// ============================================================================
// Model
// ============================================================================

export { Model, createModel } from './model/model.js'

// ============================================================================
// Persistence
// ============================================================================

export { MemoryCollection } from './persistence/memory-collection.js'
export { RpcCollection } from './persistence/rpc-collection.js'

// ============================================================================
// Sync
// ============================================================================

export {
  ChangeFeed,
  createInsertMessage,
  createUpdateMessage,
  createDeleteMessage,
} from './sync/change-feed.js'

// ============================================================================
// Configuration
// ============================================================================

export {
  getDefaultModelOptions,
  setGlobalModelOptions,
  getGlobalModelOptions,
  resetGlobalModelOptions,
} from './config/model-options.js'

// ============================================================================
// Errors
// ============================================================================

export {
  DocumentModelError,
  StructuralError,
  ValidationError,
  MiddlewareAbortError,
  PersistenceError,
  StaleModelError,
  isDocumentModelError,
  isStructuralError,
  isValidationError,
  isMiddlewareAbortError,
  isPersistenceError,
} from './errors.js'
