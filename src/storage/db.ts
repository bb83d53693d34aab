/**
 * Read-only statistics store
 *
 * Sorted key-value access to one node's history, keyed by sample
 * timestamp. Keys are non-negative integers encoded as 8-byte big-endian
 * so byte order matches numeric order. Backed by LevelDB; the in-memory
 * variant serves tests.
 */

import { Level } from "level"
import { resolve } from "node:path"

export const STORE_DIR_PREFIX = "leveldb-"

const KEY_BYTES = 8

export interface StoreEntry {
  key: number
  value: Uint8Array
}

export interface ScanOptions {
  gte?: number
  lte?: number
  reverse?: boolean
  limit?: number
}

export interface IStatsStore {
  seekFirst(): Promise<StoreEntry | null>
  seekLast(): Promise<StoreEntry | null>
  /** Greatest entry whose key is <= `key` */
  seekForPrev(key: number): Promise<StoreEntry | null>
  entries(opts?: ScanOptions): AsyncIterable<StoreEntry>
  close(): Promise<void>
}

export function assertValidKey(key: number): void {
  if (!Number.isSafeInteger(key) || key < 0) {
    throw new RangeError(`invalid store key: ${key}`)
  }
}

export function encodeKey(key: number): Uint8Array {
  assertValidKey(key)
  const bytes = new Uint8Array(KEY_BYTES)
  new DataView(bytes.buffer).setBigUint64(0, BigInt(key))
  return bytes
}

export function decodeKey(bytes: Uint8Array): number {
  if (bytes.byteLength !== KEY_BYTES) {
    throw new RangeError(`invalid store key length: ${bytes.byteLength}`)
  }
  const value = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getBigUint64(0)
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new RangeError(`store key out of range: ${value}`)
  }
  return Number(value)
}

export function storePath(dataDir: string, node: string): string {
  return resolve(dataDir, `${STORE_DIR_PREFIX}${node}`)
}

export class LevelStatsStore implements IStatsStore {
  private db: Level<Uint8Array, Uint8Array>
  private isOpen: boolean = false

  constructor(dataDir: string, node: string) {
    this.db = new Level<Uint8Array, Uint8Array>(storePath(dataDir, node), {
      keyEncoding: "view",
      valueEncoding: "view",
    })
  }

  async open(): Promise<void> {
    if (this.isOpen) return
    // Never create a store: a missing one is an error, not an empty history
    await this.db.open({ createIfMissing: false })
    this.isOpen = true
  }

  async seekFirst(): Promise<StoreEntry | null> {
    return this.first({})
  }

  async seekLast(): Promise<StoreEntry | null> {
    return this.first({ reverse: true })
  }

  async seekForPrev(key: number): Promise<StoreEntry | null> {
    return this.first({ lte: key, reverse: true })
  }

  async *entries(opts: ScanOptions = {}): AsyncIterable<StoreEntry> {
    await this.ensureOpen()
    const iterator = this.db.iterator({
      ...(opts.gte === undefined ? {} : { gte: encodeKey(opts.gte) }),
      ...(opts.lte === undefined ? {} : { lte: encodeKey(opts.lte) }),
      reverse: opts.reverse ?? false,
      limit: opts.limit ?? -1,
    })
    try {
      for await (const [key, value] of iterator) {
        yield { key: decodeKey(key), value }
      }
    } finally {
      await iterator.close()
    }
  }

  async close(): Promise<void> {
    if (!this.isOpen) return
    await this.db.close()
    this.isOpen = false
  }

  private async first(opts: ScanOptions): Promise<StoreEntry | null> {
    for await (const entry of this.entries({ ...opts, limit: 1 })) {
      return entry
    }
    return null
  }

  private async ensureOpen(): Promise<void> {
    if (!this.isOpen) {
      await this.open()
    }
  }
}

/**
 * In-memory store for testing
 */
export class MemoryStatsStore implements IStatsStore {
  private readonly sorted: StoreEntry[]
  closed = false

  constructor(entries: Iterable<StoreEntry> = []) {
    const byKey = new Map<number, Uint8Array>()
    for (const entry of entries) {
      assertValidKey(entry.key)
      byKey.set(entry.key, entry.value)
    }
    this.sorted = [...byKey.entries()]
      .sort(([a], [b]) => a - b)
      .map(([key, value]) => ({ key, value }))
  }

  static fromJson(records: Record<number, unknown>): MemoryStatsStore {
    const encoder = new TextEncoder()
    return new MemoryStatsStore(
      Object.entries(records).map(([key, doc]) => ({
        key: Number(key),
        value: encoder.encode(typeof doc === "string" ? doc : JSON.stringify(doc)),
      })),
    )
  }

  async seekFirst(): Promise<StoreEntry | null> {
    return this.sorted[0] ?? null
  }

  async seekLast(): Promise<StoreEntry | null> {
    return this.sorted[this.sorted.length - 1] ?? null
  }

  async seekForPrev(key: number): Promise<StoreEntry | null> {
    let found: StoreEntry | null = null
    for (const entry of this.sorted) {
      if (entry.key > key) break
      found = entry
    }
    return found
  }

  async *entries(opts: ScanOptions = {}): AsyncIterable<StoreEntry> {
    let selected = this.sorted.filter(
      (e) => (opts.gte === undefined || e.key >= opts.gte) && (opts.lte === undefined || e.key <= opts.lte),
    )
    if (opts.reverse) selected = [...selected].reverse()
    if (opts.limit !== undefined && opts.limit >= 0) selected = selected.slice(0, opts.limit)
    for (const entry of selected) {
      yield entry
    }
  }

  async close(): Promise<void> {
    this.closed = true
  }
}
