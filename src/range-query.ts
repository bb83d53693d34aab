/**
 * Range queries over a node's history store
 *
 * Three selection modes, in order of precedence:
 *  - window: `fromTs` and/or `toTs` set, inclusive on both ends
 *  - from start: every record in ascending order, `count` ignored
 *  - tail (default): the `count` most recent records, oldest first
 */

import { DecodeError, InvalidRangeError } from "./errors.ts"
import { formatHumanTimestamp } from "./format.ts"
import { HUMAN_TIMESTAMP_FIELD } from "./record-schema.ts"
import type { IStatsStore, StoreEntry } from "./storage/db.ts"

export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject
export interface JsonObject {
  [key: string]: JsonValue
}

export interface QueryRequest {
  /** Tail size; null means every record */
  count?: number | null
  fromStart?: boolean
  fromTs?: number
  toTs?: number
}

export interface HistoryRecord {
  timestamp: number
  data: JsonObject
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export function validateRequest(req: QueryRequest): void {
  if (req.count !== undefined && req.count !== null) {
    if (!Number.isInteger(req.count) || req.count < 0) {
      throw new InvalidRangeError(`count must be a non-negative integer, got ${req.count}`)
    }
  }
  for (const [name, ts] of [["from", req.fromTs], ["to", req.toTs]] as const) {
    // Bounds must be encodable as store keys
    if (ts !== undefined && (!Number.isSafeInteger(ts) || ts < 0)) {
      throw new InvalidRangeError(`${name} timestamp must be a non-negative safe integer, got ${ts}`)
    }
  }
  if (req.fromTs !== undefined && req.toTs !== undefined && req.fromTs > req.toTs) {
    throw new InvalidRangeError(`from (${req.fromTs}) is later than to (${req.toTs})`)
  }
}

const decoder = new TextDecoder("utf-8", { fatal: true })

export function decodeRecord(entry: StoreEntry): HistoryRecord {
  let parsed: unknown
  try {
    parsed = JSON.parse(decoder.decode(entry.value))
  } catch (err) {
    throw new DecodeError(entry.key, err instanceof Error ? err.message : String(err))
  }
  if (!isJsonObject(parsed)) {
    throw new DecodeError(entry.key, "document is not a JSON object")
  }
  parsed[HUMAN_TIMESTAMP_FIELD] = formatHumanTimestamp(entry.key)
  return { timestamp: entry.key, data: parsed }
}

export async function queryRecords(store: IStatsStore, req: QueryRequest): Promise<HistoryRecord[]> {
  validateRequest(req)
  if (req.fromTs !== undefined || req.toTs !== undefined) {
    return queryWindow(store, req.fromTs, req.toTs)
  }
  if (req.fromStart) {
    return queryFromStart(store)
  }
  return queryTail(store, req.count ?? null)
}

async function queryWindow(store: IStatsStore, fromTs?: number, toTs?: number): Promise<HistoryRecord[]> {
  // A lower bound before the first key must still start at the first record
  const start = (fromTs === undefined ? null : await store.seekForPrev(fromTs)) ?? (await store.seekFirst())
  if (start === null) return []

  const records: HistoryRecord[] = []
  for await (const entry of store.entries({ gte: start.key })) {
    if (toTs !== undefined && entry.key > toTs) break
    if (fromTs !== undefined && entry.key < fromTs) continue
    records.push(decodeRecord(entry))
  }
  return records
}

async function queryFromStart(store: IStatsStore): Promise<HistoryRecord[]> {
  const records: HistoryRecord[] = []
  for await (const entry of store.entries()) {
    records.push(decodeRecord(entry))
  }
  return records
}

async function queryTail(store: IStatsStore, count: number | null): Promise<HistoryRecord[]> {
  if (count === 0) return []
  const newestFirst: HistoryRecord[] = []
  for await (const entry of store.entries({ reverse: true, limit: count ?? undefined })) {
    newestFirst.push(decodeRecord(entry))
  }
  return newestFirst.reverse()
}
