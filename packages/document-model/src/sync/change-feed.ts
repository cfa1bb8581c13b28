/**
 * @file Change Feed
 *
 * Publishes model saves and deletes as TanStack DB change messages, so a
 * TanStack DB collection (or any other subscriber) can mirror the documents a
 * model persists.
 *
 * @example
 * ```typescript
 * const feed = new ChangeFeed()
 * const Post = createModel(postSchema, collection, { changeFeed: feed })
 *
 * feed.subscribe((message) => {
 *   if (message.type === 'delete') cache.delete(message.key)
 *   else cache.set(message.key, message.value)
 * })
 * ```
 *
 * @module document-model/sync/change-feed
 */

import type { ChangeMessage } from '@tanstack/db'
import type { DebugOption } from '../logging/debug-logger.js'
import { createDebugLogger } from '../logging/debug-logger.js'
import type { DocumentData, Identifier } from '../types/values.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Change message carrying a model document.
 */
export type DocumentChangeMessage = ChangeMessage<DocumentData, Identifier>

export type ChangeListener = (message: DocumentChangeMessage) => void

export interface ChangeFeedOptions {
  /**
   * Called when a listener throws. Delivery continues with the remaining
   * listeners. Defaults to reporting through the debug logger.
   */
  onListenerError?: (error: unknown, message: DocumentChangeMessage) => void
  /** Enable debug logging */
  debug?: DebugOption
}

// =============================================================================
// Message Builders
// =============================================================================

export function createInsertMessage(
  key: Identifier,
  value: DocumentData,
  metadata?: Record<string, unknown>
): DocumentChangeMessage {
  return { type: 'insert', key, value, metadata }
}

export function createUpdateMessage(
  key: Identifier,
  value: DocumentData,
  previousValue: DocumentData,
  metadata?: Record<string, unknown>
): DocumentChangeMessage {
  return { type: 'update', key, value, previousValue, metadata }
}

/**
 * Delete messages carry the last persisted state as their value.
 */
export function createDeleteMessage(
  key: Identifier,
  value: DocumentData,
  metadata?: Record<string, unknown>
): DocumentChangeMessage {
  return { type: 'delete', key, value, metadata }
}

// =============================================================================
// ChangeFeed
// =============================================================================

/**
 * Synchronous fan-out of change messages to subscribers.
 */
export class ChangeFeed {
  private readonly listeners = new Set<ChangeListener>()
  private readonly onListenerError: (error: unknown, message: DocumentChangeMessage) => void

  constructor(options: ChangeFeedOptions = {}) {
    const log = createDebugLogger('ChangeFeed', options.debug)
    this.onListenerError =
      options.onListenerError ??
      ((error, message) => {
        log('listener failed', {
          type: message.type,
          key: message.key,
          error: error instanceof Error ? error.message : String(error),
        })
      })
  }

  get listenerCount(): number {
    return this.listeners.size
  }

  /**
   * Adds a listener. Returns a function that removes it.
   */
  subscribe(listener: ChangeListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /**
   * Delivers a message to every current listener in subscription order.
   */
  publish(message: DocumentChangeMessage): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(message)
      } catch (error) {
        this.onListenerError(error, message)
      }
    }
  }
}
