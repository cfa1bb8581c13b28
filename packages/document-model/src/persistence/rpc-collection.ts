/**
 * @file RPC Collection
 *
 * A PersistenceCollection that talks to a remote document database through a
 * JSON-RPC style client exposing `rpc(method, params)`. Saves use
 * `insertOne` for new documents and an upserting `replaceOne` for documents
 * that already carry an identifier.
 *
 * @example
 * ```typescript
 * const users = new RpcCollection({
 *   rpcClient,
 *   database: 'app',
 *   collection: 'users',
 *   retryConfig: { maxRetries: 3, initialDelayMs: 100 },
 * })
 *
 * const User = createModel(userSchema, users)
 * ```
 *
 * @module document-model/persistence/rpc-collection
 */

import { z } from 'zod'
import type { DocumentData, Identifier } from '../types/values.js'
import type { OperationOptions, PersistenceCollection } from './types.js'
import { isIdentifier } from './types.js'

// =============================================================================
// Types
// =============================================================================

/**
 * RPC client interface for making database operations.
 * Must provide an `rpc` method for making remote procedure calls.
 */
export interface RpcClient {
  /** Execute an RPC call */
  rpc: (method: string, params?: Record<string, unknown>, options?: OperationOptions) => Promise<unknown>
  /** Check if connected */
  isConnected?: () => boolean
}

/**
 * Retry configuration for transient error handling.
 */
export interface RetryConfig {
  /** Maximum number of retry attempts */
  maxRetries?: number
  /** Initial delay between retries in milliseconds */
  initialDelayMs?: number
  /** Maximum delay between retries in milliseconds */
  maxDelayMs?: number
  /** Backoff multiplier */
  backoffMultiplier?: number
}

export interface RpcCollectionConfig {
  /** RPC client for database operations */
  rpcClient: RpcClient
  /** Target database name */
  database: string
  /** Target collection name */
  collection: string
  /** Field holding the identifier. Defaults to `_id` */
  idField?: string
  /** Retry configuration for transient errors. No retries by default */
  retryConfig?: RetryConfig
}

// =============================================================================
// Response Shapes
// =============================================================================

const identifierShape = z.union([z.string(), z.number().finite()])

const insertOneResponse = z.object({ insertedId: identifierShape })

const replaceOneResponse = z.object({
  matchedCount: z.number().optional(),
  upsertedId: identifierShape.nullish(),
})

const findOneResponse = z.record(z.unknown()).nullable()

const deleteOneResponse = z.object({ deletedCount: z.number() })

function parseResponse<T>(method: string, shape: z.ZodType<T>, response: unknown): T {
  const parsed = shape.safeParse(response)
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => issue.message).join('; ')
    throw new Error(`unexpected ${method} response: ${detail}`)
  }
  return parsed.data
}

// =============================================================================
// Retry
// =============================================================================

/**
 * Checks if an error is retryable (transient network error, etc.).
 */
function isRetryableError(error: Error): boolean {
  if (error.name === 'AbortError') return false
  if (error.message.includes('E11000') || error.message.includes('duplicate key')) return false

  const retryablePatterns = [
    'network',
    'connection',
    'timeout',
    'temporarily unavailable',
    'ECONNRESET',
    'ECONNREFUSED',
    'ETIMEDOUT',
  ]

  const lowerMessage = error.message.toLowerCase()
  return retryablePatterns.some((pattern) => lowerMessage.includes(pattern.toLowerCase()))
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Executes an operation with retry logic.
 */
async function withRetry<T>(
  operation: () => Promise<T>,
  config: RetryConfig = {},
  signal?: AbortSignal
): Promise<T> {
  const maxRetries = config.maxRetries ?? 0
  const maxDelayMs = config.maxDelayMs ?? 5000
  const backoffMultiplier = config.backoffMultiplier ?? 2
  let currentDelay = config.initialDelayMs ?? 100

  for (let attempt = 0; ; attempt++) {
    signal?.throwIfAborted()
    try {
      return await operation()
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error))
      if (!isRetryableError(err) || attempt >= maxRetries) {
        throw err
      }
      await delay(currentDelay)
      currentDelay = Math.min(currentDelay * backoffMultiplier, maxDelayMs)
    }
  }
}

// =============================================================================
// Collection
// =============================================================================

/**
 * Remote document store reached over RPC.
 */
export class RpcCollection implements PersistenceCollection {
  private readonly rpcClient: RpcClient
  private readonly database: string
  private readonly collection: string
  private readonly idField: string
  private readonly retryConfig?: RetryConfig

  /**
   * @throws {Error} If rpcClient, database or collection is missing
   */
  constructor(config: RpcCollectionConfig) {
    if (!config.rpcClient) {
      throw new Error('rpcClient is required')
    }
    if (!config.database) {
      throw new Error('database is required')
    }
    if (!config.collection) {
      throw new Error('collection is required')
    }

    this.rpcClient = config.rpcClient
    this.database = config.database
    this.collection = config.collection
    this.idField = config.idField ?? '_id'
    this.retryConfig = config.retryConfig
  }

  async insertOrUpdate(document: DocumentData, options: OperationOptions = {}): Promise<Identifier> {
    const id = document[this.idField]

    if (isIdentifier(id)) {
      const response = await this.call('replaceOne', options, {
        filter: { [this.idField]: id },
        replacement: document,
        options: { upsert: true },
      })
      parseResponse('replaceOne', replaceOneResponse, response)
      return id
    }

    const response = await this.call('insertOne', options, { document })
    return parseResponse('insertOne', insertOneResponse, response).insertedId
  }

  async findById(id: Identifier, options: OperationOptions = {}): Promise<Record<string, unknown> | null> {
    const response = await this.call('findOne', options, { filter: { [this.idField]: id } })
    return parseResponse('findOne', findOneResponse, response ?? null)
  }

  async deleteById(id: Identifier, options: OperationOptions = {}): Promise<void> {
    const response = await this.call('deleteOne', options, { filter: { [this.idField]: id } })
    const { deletedCount } = parseResponse('deleteOne', deleteOneResponse, response)
    if (deletedCount === 0) {
      throw new Error(`no document with ${this.idField} ${String(id)} in ${this.database}.${this.collection}`)
    }
  }

  private async call(
    method: string,
    options: OperationOptions,
    params: Record<string, unknown>
  ): Promise<unknown> {
    if (this.rpcClient.isConnected && !this.rpcClient.isConnected()) {
      throw new Error('RPC client is not connected')
    }

    const { signal } = options
    return withRetry(
      () =>
        this.rpcClient.rpc(
          method,
          { database: this.database, collection: this.collection, ...params },
          { signal }
        ),
      this.retryConfig,
      signal
    )
  }
}
