/**
 * @file Validation Error Tree
 *
 * Accumulates validation messages keyed by field path. Paths are dotted for
 * nested documents and indexed for embedded collections:
 * `author.first`, `tags[2]`, `comments[1].commenter.last`.
 *
 * @module document-model/validation/error-tree
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Field path to a non-empty, ordered list of messages.
 */
export type ErrorTree = Readonly<Record<string, readonly string[]>>

// =============================================================================
// Path Helpers
// =============================================================================

/**
 * Joins a parent path and a field name.
 */
export function fieldPath(parent: string, field: string): string {
  return parent === '' ? field : `${parent}.${field}`
}

/**
 * Appends an element index to a path.
 */
export function indexPath(parent: string, index: number): string {
  return `${parent}[${index}]`
}

// =============================================================================
// Collector
// =============================================================================

/**
 * Mutable collector used during a single validation walk. Messages recorded
 * at the same path keep their insertion order.
 */
export class ErrorCollector {
  private readonly entries = new Map<string, string[]>()

  add(path: string, message: string): void {
    const existing = this.entries.get(path)
    if (existing) {
      existing.push(message)
    } else {
      this.entries.set(path, [message])
    }
  }

  get isEmpty(): boolean {
    return this.entries.size === 0
  }

  /**
   * Freezes the collected messages into an error tree.
   */
  toTree(): ErrorTree {
    const tree: Record<string, readonly string[]> = {}
    for (const [path, messages] of this.entries) {
      // defineProperty keeps a `__proto__` path as an own key
      Object.defineProperty(tree, path, {
        value: Object.freeze([...messages]),
        enumerable: true,
      })
    }
    return Object.freeze(tree)
  }
}

/**
 * Total number of messages in a tree.
 */
export function countErrors(tree: ErrorTree): number {
  let count = 0
  for (const messages of Object.values(tree)) {
    count += messages.length
  }
  return count
}
