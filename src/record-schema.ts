// Shape of one stored validator statistics record

import { cell, defineSchema, nested } from "./schema.ts"
import type { FieldKind, Schema } from "./schema.ts"
import {
  AliasListKind,
  BindingsKind,
  DurationKind,
  EnabledKind,
  FloatKind,
  IntegerKind,
  StateKind,
  TextKind,
  TimestampKind,
  VersionKind,
} from "./value-cell.ts"

/** Field injected by the query engine into every decoded record */
export const HUMAN_TIMESTAMP_FIELD = "Human_readable_time"

export const DEFAULT_PACKAGES: readonly string[] = ["indy-node", "sovrin"]

export const TransactionCountSchema = defineSchema("TransactionCount", [
  ["ledger", cell(IntegerKind)],
  ["pool", cell(IntegerKind)],
  ["config", cell(IntegerKind)],
  ["audit", cell(IntegerKind)],
])

export const AverageRateSchema = defineSchema("AveragePerSecond", [
  ["read-transactions", cell(FloatKind)],
  ["write-transactions", cell(FloatKind)],
])

export const MetricsSchema = defineSchema("Metrics", [
  ["uptime", cell(DurationKind)],
  ["transaction-count", nested(TransactionCountSchema)],
  ["average-per-second", nested(AverageRateSchema)],
])

export const NodeInfoSchema = defineSchema("NodeInfo", [
  ["Name", cell(TextKind)],
  ["did", cell(TextKind)],
  ["verkey", cell(TextKind)],
  ["BLS_key", cell(TextKind)],
  ["Node_port", cell(BindingsKind)],
  ["Client_port", cell(BindingsKind)],
  ["Metrics", nested(MetricsSchema)],
])

export const PoolInfoSchema = defineSchema("PoolInfo", [
  ["Total_nodes_count", cell(IntegerKind)],
  ["Reachable_nodes_count", cell(IntegerKind)],
  ["Unreachable_nodes_count", cell(IntegerKind)],
  ["Reachable_nodes", cell(AliasListKind)],
  ["Unreachable_nodes", cell(AliasListKind)],
])

export function createSoftwareSchema(packages: readonly string[]): Schema {
  return defineSchema(
    "Software",
    packages.map((name): [string, FieldKind] => [name, cell(VersionKind)]),
  )
}

export function createRecordSchema(packages: readonly string[] = DEFAULT_PACKAGES): Schema {
  return defineSchema("ValidatorRecord", [
    ["response-version", cell(TextKind)],
    ["timestamp", cell(TimestampKind)],
    [HUMAN_TIMESTAMP_FIELD, cell(TextKind)],
    ["Node_info", nested(NodeInfoSchema)],
    ["state", cell(StateKind)],
    ["enabled", cell(EnabledKind)],
    ["Pool_info", nested(PoolInfoSchema)],
    ["Software", nested(createSoftwareSchema(packages))],
  ])
}
