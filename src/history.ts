/**
 * History report orchestration
 *
 * Stores are processed one at a time: opened, queried to completion and
 * closed before the next. A store that fails (missing, unreadable or holding
 * an undecodable record) is reported on its own while the others continue.
 */

import { enrichRecord } from "./enrichment.ts"
import type { Probes } from "./enrichment.ts"
import { MissingPathError } from "./errors.ts"
import { createLogger } from "./logger.ts"
import { queryRecords, validateRequest } from "./range-query.ts"
import type { HistoryRecord, QueryRequest } from "./range-query.ts"
import { renderField, renderJson, renderNarrative, renderTree, selectPath } from "./render.ts"
import { buildTree } from "./schema.ts"
import type { Schema, TypedTree } from "./schema.ts"
import type { IStatsStore } from "./storage/db.ts"
import type { StoreLocator } from "./storage/store-locator.ts"

const log = createLogger("history")

export type OutputFormat = "json" | "tree" | "narrative"

export interface StoreReport {
  node: string
  records: HistoryRecord[]
  error: Error | null
}

export interface RenderOptions {
  format: OutputFormat
  verbose: boolean
  schema: Schema
  /** Dotted field paths; when set only these fields are printed */
  fields?: readonly string[]
  /** Live probes for enrichment; omitted for offline reports */
  probes?: Probes
}

export interface RenderResult {
  output: string
  errors: string[]
}

async function closeQuietly(node: string, store: IStatsStore): Promise<void> {
  try {
    await store.close()
  } catch (err) {
    log.warn("store close failed", { node, error: err instanceof Error ? err.message : String(err) })
  }
}

export async function queryStores(
  locator: StoreLocator,
  request: QueryRequest,
  nodes: readonly string[] = [],
): Promise<StoreReport[]> {
  validateRequest(request)
  const selected = nodes.length > 0 ? [...nodes] : await locator.list()
  const reports: StoreReport[] = []

  for (const node of selected) {
    let store: IStatsStore | null = null
    try {
      store = await locator.open(node)
      const records = await queryRecords(store, request)
      log.debug("store queried", { node, records: records.length })
      reports.push({ node, records, error: null })
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err))
      log.error("store query failed", { node, error: error.message })
      reports.push({ node, records: [], error })
    } finally {
      if (store) await closeQuietly(node, store)
    }
  }
  return reports
}

export function normalizeRecord(
  record: HistoryRecord,
  schema: Schema,
  verbose: boolean,
  probes?: Probes,
): TypedTree {
  const tree = buildTree(record.data, schema, verbose)
  if (probes) enrichRecord(tree, probes)
  return tree
}

export function renderReports(reports: readonly StoreReport[], opts: RenderOptions): RenderResult {
  const errors = reports
    .filter((r) => r.error !== null)
    .map((r) => `${r.node}: ${r.error?.message ?? "unknown error"}`)
  const ok = reports.filter((r) => r.error === null)

  if (opts.fields && opts.fields.length > 0) {
    return { output: renderFields(ok, opts.fields, errors), errors }
  }

  if (opts.format === "json") {
    const byNode: Record<string, TypedTree[]> = {}
    for (const report of ok) {
      byNode[report.node] = report.records.map((r) => normalizeRecord(r, opts.schema, opts.verbose, opts.probes))
    }
    return { output: renderJson(byNode), errors }
  }

  const sections = ok.map((report) => {
    const blocks = report.records.map((record) =>
      opts.format === "tree"
        ? renderTree(record.data)
        : renderNarrative(normalizeRecord(record, opts.schema, opts.verbose, opts.probes), opts.verbose),
    )
    return withHeader(report.node, blocks, ok.length > 1)
  })
  return { output: sections.filter((s) => s.length > 0).join("\n\n"), errors }
}

function withHeader(node: string, blocks: string[], multi: boolean): string {
  const body = blocks.join("\n\n")
  return multi ? `=== ${node} ===\n${body}` : body
}

/**
 * Print selected fields of every record. A path missing from a record is
 * reported once and not printed for any later record.
 */
function renderFields(reports: readonly StoreReport[], paths: readonly string[], errors: string[]): string {
  const halted = new Set<string>()
  const sections = reports.map((report) => {
    const blocks = report.records.map((record) => {
      const lines: string[] = []
      for (const path of paths) {
        if (halted.has(path)) continue
        try {
          lines.push(...renderField(path, selectPath(record.data, path)))
        } catch (err) {
          if (!(err instanceof MissingPathError)) throw err
          errors.push(`${report.node}@${record.timestamp}: ${err.message}`)
          halted.add(path)
        }
      }
      return lines.join("\n")
    })
    return withHeader(report.node, blocks.filter((b) => b.length > 0), reports.length > 1)
  })
  return sections.filter((s) => s.length > 0).join("\n\n")
}
