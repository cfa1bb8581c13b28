/**
 * @file RPC Collection Tests
 *
 * Uses a mock RPC client to check the calls each persistence operation makes,
 * response parsing, connection checks and retry of transient failures.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { RpcCollection, type RpcClient } from '../../src/persistence/rpc-collection.js'

// =============================================================================
// Test Helpers
// =============================================================================

function createMockRpcClient() {
  return {
    rpc: vi.fn<RpcClient['rpc']>(),
    isConnected: vi.fn(() => true),
  }
}

describe('RpcCollection', () => {
  let client: ReturnType<typeof createMockRpcClient>
  let collection: RpcCollection

  beforeEach(() => {
    client = createMockRpcClient()
    collection = new RpcCollection({ rpcClient: client, database: 'app', collection: 'cars' })
  })

  // ===========================================================================
  // Configuration
  // ===========================================================================

  describe('configuration', () => {
    it('requires a database and a collection', () => {
      expect(() => new RpcCollection({ rpcClient: client, database: '', collection: 'cars' })).toThrow(
        'database is required'
      )
      expect(() => new RpcCollection({ rpcClient: client, database: 'app', collection: '' })).toThrow(
        'collection is required'
      )
    })
  })

  // ===========================================================================
  // insertOrUpdate
  // ===========================================================================

  describe('insertOrUpdate', () => {
    it('inserts a document without an identifier', async () => {
      client.rpc.mockResolvedValueOnce({ insertedId: 'abc' })

      const id = await collection.insertOrUpdate({ name: 'Roadster' })

      expect(id).toBe('abc')
      expect(client.rpc).toHaveBeenCalledWith(
        'insertOne',
        { database: 'app', collection: 'cars', document: { name: 'Roadster' } },
        { signal: undefined }
      )
    })

    it('upserts a document that has an identifier', async () => {
      client.rpc.mockResolvedValueOnce({ matchedCount: 1 })
      const document = { _id: 'abc', name: 'Coupe' }

      const id = await collection.insertOrUpdate(document)

      expect(id).toBe('abc')
      expect(client.rpc).toHaveBeenCalledWith(
        'replaceOne',
        {
          database: 'app',
          collection: 'cars',
          filter: { _id: 'abc' },
          replacement: document,
          options: { upsert: true },
        },
        { signal: undefined }
      )
    })

    it('rejects a malformed response', async () => {
      client.rpc.mockResolvedValueOnce({ ok: 1 })

      await expect(collection.insertOrUpdate({ name: 'x' })).rejects.toThrow(/^unexpected insertOne response/)
    })

    it('passes the signal to the client', async () => {
      const controller = new AbortController()
      client.rpc.mockResolvedValueOnce({ insertedId: 1 })

      await collection.insertOrUpdate({ name: 'x' }, { signal: controller.signal })

      expect(client.rpc.mock.calls[0]?.[2]).toEqual({ signal: controller.signal })
    })
  })

  // ===========================================================================
  // findById / deleteById
  // ===========================================================================

  describe('findById', () => {
    it('returns the stored record', async () => {
      client.rpc.mockResolvedValueOnce({ _id: 'abc', name: 'Roadster' })

      expect(await collection.findById('abc')).toEqual({ _id: 'abc', name: 'Roadster' })
      expect(client.rpc).toHaveBeenCalledWith(
        'findOne',
        { database: 'app', collection: 'cars', filter: { _id: 'abc' } },
        { signal: undefined }
      )
    })

    it('returns null when nothing matches', async () => {
      client.rpc.mockResolvedValueOnce(null)
      expect(await collection.findById('abc')).toBeNull()

      client.rpc.mockResolvedValueOnce(undefined)
      expect(await collection.findById('abc')).toBeNull()
    })
  })

  describe('deleteById', () => {
    it('deletes by identifier', async () => {
      client.rpc.mockResolvedValueOnce({ deletedCount: 1 })

      await collection.deleteById('abc')

      expect(client.rpc).toHaveBeenCalledWith(
        'deleteOne',
        { database: 'app', collection: 'cars', filter: { _id: 'abc' } },
        { signal: undefined }
      )
    })

    it('rejects when nothing was deleted', async () => {
      client.rpc.mockResolvedValueOnce({ deletedCount: 0 })

      await expect(collection.deleteById('abc')).rejects.toThrow('no document with _id abc in app.cars')
    })
  })

  // ===========================================================================
  // Connection and Retry
  // ===========================================================================

  describe('connection and retry', () => {
    it('rejects when the client is not connected', async () => {
      client.isConnected.mockReturnValue(false)

      await expect(collection.findById('abc')).rejects.toThrow('RPC client is not connected')
      expect(client.rpc).not.toHaveBeenCalled()
    })

    it('retries transient failures', async () => {
      const retrying = new RpcCollection({
        rpcClient: client,
        database: 'app',
        collection: 'cars',
        retryConfig: { maxRetries: 2, initialDelayMs: 1 },
      })
      client.rpc.mockRejectedValueOnce(new Error('network error')).mockResolvedValueOnce({ insertedId: 'abc' })

      expect(await retrying.insertOrUpdate({ name: 'x' })).toBe('abc')
      expect(client.rpc).toHaveBeenCalledTimes(2)
    })

    it('gives up after the configured number of retries', async () => {
      const retrying = new RpcCollection({
        rpcClient: client,
        database: 'app',
        collection: 'cars',
        retryConfig: { maxRetries: 2, initialDelayMs: 1 },
      })
      client.rpc.mockRejectedValue(new Error('connection reset'))

      await expect(retrying.findById('abc')).rejects.toThrow('connection reset')
      expect(client.rpc).toHaveBeenCalledTimes(3)
    })

    it('does not retry duplicate key errors', async () => {
      const retrying = new RpcCollection({
        rpcClient: client,
        database: 'app',
        collection: 'cars',
        retryConfig: { maxRetries: 2, initialDelayMs: 1 },
      })
      client.rpc.mockRejectedValue(new Error('E11000 duplicate key error'))

      await expect(retrying.insertOrUpdate({ name: 'x' })).rejects.toThrow('E11000')
      expect(client.rpc).toHaveBeenCalledTimes(1)
    })

    it('does not retry by default', async () => {
      client.rpc.mockRejectedValue(new Error('network error'))

      await expect(collection.findById('abc')).rejects.toThrow('network error')
      expect(client.rpc).toHaveBeenCalledTimes(1)
    })
  })
})
