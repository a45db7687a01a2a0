// src/persistence/document-store.ts — Versioned JSON document store port
//
// Every backend exposes the same contract: read a named document with its
// opaque version token, and write it either unconditionally or only when the
// caller's token still matches (compare-and-swap). A mismatch is a tagged
// result, not an exception; transport failures throw.

// ── Types ────────────────────────────────────────────────────

export interface VersionedDocument {
  /** Raw JSON text, or null if the key has never been written */
  body: string | null
  /** Opaque revision token, or null if the key has never been written */
  version: string | null
}

export type WriteResult =
  | { ok: true; version: string }
  | { ok: false; reason: "version_conflict" }

/**
 * Expected version for a write:
 *   undefined → unconditional (last writer wins, side logs only)
 *   null      → key must not exist yet
 *   string    → key must currently carry exactly this token
 */
export type ExpectedVersion = string | null | undefined

export interface DocumentStore {
  /** Backend label for logs and /health */
  readonly kind: string
  read(key: string): Promise<VersionedDocument>
  write(key: string, body: string, expected?: ExpectedVersion): Promise<WriteResult>
  /** Reachability probe; never throws */
  ping(): Promise<boolean>
}

export const VERSION_CONFLICT: WriteResult = { ok: false, reason: "version_conflict" }

// ── Timeouts ─────────────────────────────────────────────────

/** A store round trip exceeded its deadline; the outcome of a write is unknown. */
export class StoreTimeoutError extends Error {
  constructor(readonly operation: string, readonly timeoutMs: number) {
    super(`Store ${operation} timed out after ${timeoutMs}ms`)
    this.name = "StoreTimeoutError"
  }
}

/** Race a store call against a deadline. The underlying call is not cancelled. */
export function withTimeout<T>(promise: Promise<T>, ms: number, operation: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new StoreTimeoutError(operation, ms)), ms)
  })
  return Promise.race([promise, deadline]).finally(() => {
    if (timer !== undefined) clearTimeout(timer)
  })
}

// ── In-memory backend ────────────────────────────────────────

interface StoredDocument {
  body: string
  version: string
}

export interface InMemoryDocumentStoreOptions {
  /** Artificial delay before each call resolves, for interleaving tests */
  latencyMs?: () => number
  /**
   * Called after a write has been applied and before it resolves. Throwing or
   * hanging here simulates a write whose acknowledgement is lost.
   */
  afterWrite?: (key: string) => Promise<void> | void
}

/**
 * Process-local store with the same CAS contract as the durable backends.
 * Used in tests and as the startup fallback when the configured store is
 * unreachable. State lives on the instance, never in module globals.
 */
export class InMemoryDocumentStore implements DocumentStore {
  readonly kind = "memory"
  private readonly docs = new Map<string, StoredDocument>()
  private counter = 0

  constructor(private readonly options: InMemoryDocumentStoreOptions = {}) {}

  async read(key: string): Promise<VersionedDocument> {
    await this.delay()
    const doc = this.docs.get(key)
    return doc ? { body: doc.body, version: doc.version } : { body: null, version: null }
  }

  async write(key: string, body: string, expected?: ExpectedVersion): Promise<WriteResult> {
    await this.delay()
    // Compare and set happen in one synchronous step after the delay
    const current = this.docs.get(key)
    if (expected === null && current) return VERSION_CONFLICT
    if (typeof expected === "string" && current?.version !== expected) return VERSION_CONFLICT

    const version = `v${++this.counter}`
    this.docs.set(key, { body, version })
    if (this.options.afterWrite) await this.options.afterWrite(key)
    return { ok: true, version }
  }

  async ping(): Promise<boolean> {
    return true
  }

  /** Number of stored documents. */
  get size(): number {
    return this.docs.size
  }

  private async delay(): Promise<void> {
    const ms = this.options.latencyMs?.() ?? 0
    if (ms > 0) await new Promise<void>((resolve) => setTimeout(resolve, ms))
  }
}
