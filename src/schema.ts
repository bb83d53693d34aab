/**
 * Declarative record schemas
 *
 * A schema is an ordered list of fields, each either a value cell kind or a
 * nested schema. `buildTree` turns loose JSON into a TypedTree, isolating a
 * malformed field to that one field: it becomes an unknown cell of its
 * declared kind and the rest of the record is built as usual.
 */

import { FieldParseError } from "./errors.ts"
import { createLogger } from "./logger.ts"
import type { AnyCellKind, ValueCell } from "./value-cell.ts"

const log = createLogger("schema")

export type FieldKind =
  | { type: "cell"; cell: AnyCellKind }
  | { type: "schema"; schema: Schema }

export interface FieldSpec {
  readonly name: string
  readonly kind: FieldKind
}

export interface Schema {
  readonly name: string
  readonly fields: readonly FieldSpec[]
}

export type TreeNode = ValueCell<unknown> | TypedTree

export function cell(kind: AnyCellKind): FieldKind {
  return { type: "cell", cell: kind }
}

export function nested(schema: Schema): FieldKind {
  return { type: "schema", schema }
}

export function defineSchema(name: string, fields: Array<[string, FieldKind]>): Schema {
  const seen = new Set<string>()
  for (const [field] of fields) {
    if (field.length === 0) throw new Error(`schema ${name}: empty field name`)
    if (seen.has(field)) throw new Error(`schema ${name}: duplicate field "${field}"`)
    seen.add(field)
  }
  return {
    name,
    fields: fields.map(([field, kind]) => ({ name: field, kind })),
  }
}

export class TypedTree implements Iterable<[string, TreeNode]> {
  readonly schema: Schema
  readonly verbose: boolean
  private readonly nodes: Map<string, TreeNode>

  constructor(schema: Schema, verbose: boolean, nodes: Map<string, TreeNode>) {
    this.schema = schema
    this.verbose = verbose
    this.nodes = nodes
  }

  get(name: string): TreeNode | undefined {
    return this.nodes.get(name)
  }

  cell(name: string): ValueCell<unknown> | undefined {
    const node = this.nodes.get(name)
    return node instanceof TypedTree ? undefined : node
  }

  subtree(name: string): TypedTree | undefined {
    const node = this.nodes.get(name)
    return node instanceof TypedTree ? node : undefined
  }

  /** Follow a chain of field names down nested subtrees to a cell */
  cellAt(...path: string[]): ValueCell<unknown> | undefined {
    let tree: TypedTree | undefined = this
    for (const name of path.slice(0, -1)) {
      tree = tree?.subtree(name)
    }
    const last = path[path.length - 1]
    return last === undefined ? undefined : tree?.cell(last)
  }

  /** Replace the value of a declared cell field */
  replace(name: string, value: ValueCell<unknown>): void {
    const current = this.nodes.get(name)
    if (current === undefined || current instanceof TypedTree) {
      throw new Error(`${this.schema.name} has no cell field "${name}"`)
    }
    this.nodes.set(name, value)
  }

  keys(): string[] {
    return [...this.nodes.keys()]
  }

  [Symbol.iterator](): Iterator<[string, TreeNode]> {
    return this.nodes.entries()
  }

  toJSON(): Record<string, unknown> {
    const out: Record<string, unknown> = {}
    for (const [name, node] of this.nodes) {
      out[name] = node.toJSON()
    }
    return out
  }
}

function isRecord(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === "object" && raw !== null && !Array.isArray(raw)
}

export function buildTree(raw: unknown, schema: Schema, verbose = false): TypedTree {
  let source: Record<string, unknown> | null = null
  if (isRecord(raw)) {
    source = raw
  } else if (raw !== null && raw !== undefined) {
    log.warn("expected object for schema, treating as no data", { schema: schema.name })
  }

  const nodes = new Map<string, TreeNode>()
  for (const field of schema.fields) {
    const value = source === null ? null : source[field.name]
    nodes.set(field.name, buildField(field, value, schema, verbose))
  }
  return new TypedTree(schema, verbose, nodes)
}

function buildField(field: FieldSpec, value: unknown, schema: Schema, verbose: boolean): TreeNode {
  if (field.kind.type === "schema") {
    return buildTree(value, field.kind.schema, verbose)
  }

  const kind = field.kind.cell
  const outcome = kind.parse(value)
  switch (outcome.status) {
    case "present":
      return kind.create(outcome.value)
    case "unknown":
      return kind.create(null)
    case "invalid": {
      const error = new FieldParseError(field.name, schema.name, outcome.reason)
      log.warn("field parse failed", {
        field: error.field,
        schema: error.schema,
        kind: kind.name,
        reason: error.reason,
      })
      return kind.create(null)
    }
  }
}
