/**
 * Report rendering
 *
 * Canonical JSON and the narrative report work on typed trees; the flat
 * tree and dotted-path selection work on the raw decoded documents.
 */

import { MissingPathError } from "./errors.ts"
import { HUMAN_TIMESTAMP_FIELD } from "./record-schema.ts"
import { isJsonObject } from "./range-query.ts"
import type { JsonObject, JsonValue } from "./range-query.ts"
import type { TypedTree } from "./schema.ts"
import { UNKNOWN, VERBOSE_MARKER } from "./value-cell.ts"

export const NOT_AVAILABLE = "n/a"

export function renderJson(value: TypedTree | TypedTree[] | Record<string, TypedTree[]>): string {
  return JSON.stringify(value, null, 2)
}

// --- flat tree ---

function isContainer(value: JsonValue): value is JsonValue[] | JsonObject {
  return Array.isArray(value) || isJsonObject(value)
}

function isEmptyContainer(value: JsonValue): boolean {
  if (Array.isArray(value)) return value.length === 0
  return isJsonObject(value) && Object.keys(value).length === 0
}

function leaf(value: JsonValue): string {
  return typeof value === "string" ? value : String(value)
}

export function renderTreeLines(value: JsonValue, indent = 0): string[] {
  const pad = " ".repeat(indent)
  if (isEmptyContainer(value)) return [pad + NOT_AVAILABLE]

  if (Array.isArray(value)) {
    return value.flatMap((item) => (isContainer(item) ? renderTreeLines(item, indent + 2) : [pad + leaf(item)]))
  }

  if (isJsonObject(value)) {
    const lines: string[] = []
    for (const [key, child] of Object.entries(value)) {
      const quoted = JSON.stringify(key)
      if (!isContainer(child)) {
        lines.push(`${pad}${quoted}: ${leaf(child)}`)
      } else if (isEmptyContainer(child)) {
        lines.push(`${pad}${quoted}: ${NOT_AVAILABLE}`)
      } else {
        lines.push(`${pad}${quoted}:`)
        lines.push(...renderTreeLines(child, indent + 2))
      }
    }
    return lines
  }

  return [pad + leaf(value)]
}

export function renderTree(value: JsonValue): string {
  return renderTreeLines(value).join("\n")
}

// --- field selection ---

export function selectPath(data: JsonValue, path: string): JsonValue {
  let current = data
  for (const segment of path.split(".")) {
    if (Array.isArray(current) && /^\d+$/.test(segment) && Number(segment) < current.length) {
      current = current[Number(segment)]
    } else if (isJsonObject(current) && Object.hasOwn(current, segment)) {
      current = current[segment]
    } else {
      throw new MissingPathError(path, segment)
    }
  }
  return current
}

export function renderField(path: string, value: JsonValue): string[] {
  if (isContainer(value) && !isEmptyContainer(value)) {
    return [`${path}:`, ...renderTreeLines(value, 2)]
  }
  return [`${path}: ${isContainer(value) ? NOT_AVAILABLE : leaf(value)}`]
}

// --- narrative ---

/**
 * Drop verbose-only lines unless `verbose`, and strip the marker from
 * every line that is kept.
 */
export function applyVerbosity(lines: readonly string[], verbose: boolean): string[] {
  return lines
    .filter((line) => verbose || !line.startsWith(VERBOSE_MARKER))
    .map((line) => (line.startsWith(VERBOSE_MARKER) ? line.slice(VERBOSE_MARKER.length) : line))
}

function aliasLines(tree: TypedTree, field: string): string[] {
  const aliases = tree.cellAt("Pool_info", field)
  if (!aliases || aliases.isUnknown()) return [`${VERBOSE_MARKER}    ${UNKNOWN}`]
  return aliases.render().split("\n").filter((line) => line.length > 0)
}

export function narrativeLines(tree: TypedTree): string[] {
  const text = (...path: string[]): string => tree.cellAt(...path)?.render() ?? UNKNOWN
  const m = VERBOSE_MARKER
  const human = tree.cellAt(HUMAN_TIMESTAMP_FIELD)
  const currentTime = human && !human.isUnknown() ? human.render() : text("timestamp")
  const metric = (...path: string[]): string => text("Node_info", "Metrics", ...path)

  const lines = [
    `Validator ${text("Node_info", "Name")} is ${text("state")}`,
    `${m}Current time:     ${currentTime}`,
    `Validator DID:    ${text("Node_info", "did")}`,
    `Verification Key: ${text("Node_info", "verkey")}`,
    `${m}BLS Key:          ${text("Node_info", "BLS_key")}`,
    `Node Port:        ${text("Node_info", "Node_port")}`,
    `Client Port:      ${text("Node_info", "Client_port")}`,
    `Metrics:`,
    `  Uptime: ${metric("uptime")}`,
    `${m}  Total Config Transactions:  ${metric("transaction-count", "config")}`,
    `  Total Ledger Transactions:  ${metric("transaction-count", "ledger")}`,
    `  Total Pool Transactions:    ${metric("transaction-count", "pool")}`,
    `${m}  Total Audit Transactions:   ${metric("transaction-count", "audit")}`,
    `  Read Transactions/Seconds:  ${metric("average-per-second", "read-transactions")}`,
    `  Write Transactions/Seconds: ${metric("average-per-second", "write-transactions")}`,
    `Reachable Hosts:   ${text("Pool_info", "Reachable_nodes_count")}/${text("Pool_info", "Total_nodes_count")}`,
    ...aliasLines(tree, "Reachable_nodes"),
    `Unreachable Hosts: ${text("Pool_info", "Unreachable_nodes_count")}/${text("Pool_info", "Total_nodes_count")}`,
    ...aliasLines(tree, "Unreachable_nodes"),
    `${m}Software Versions:`,
  ]

  const software = tree.subtree("Software")
  for (const name of software?.keys() ?? []) {
    lines.push(`${m}  ${name}: ${software?.cell(name)?.render() ?? UNKNOWN}`)
  }
  return lines
}

export function renderNarrative(tree: TypedTree, verbose: boolean = tree.verbose): string {
  return applyVerbosity(narrativeLines(tree), verbose).join("\n")
}
