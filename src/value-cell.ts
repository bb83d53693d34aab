/**
 * Value cells
 *
 * A cell wraps one field of a validator record. `null` is the only unknown
 * sentinel: zero, empty strings, empty lists and `false` are present values.
 * Each cell kind pairs a parser for loose JSON input with the cell class
 * that renders the parsed value.
 */

import { formatDuration, formatLocalDateTime } from "./format.ts"
import { createLogger } from "./logger.ts"

const log = createLogger("value-cell")

export const UNKNOWN = "unknown"
export const UNKNOWN_STATE = "in unknown state"

/** Prefix for report lines shown only in verbose mode */
export const VERBOSE_MARKER = "#"

export type ParseOutcome<T> =
  | { status: "present"; value: T }
  | { status: "unknown" }
  | { status: "invalid"; reason: string }

export abstract class ValueCell<T> {
  abstract readonly kind: string
  protected readonly value: T | null

  constructor(value: T | null) {
    this.value = value
  }

  isUnknown(): boolean {
    return this.value === null
  }

  rawValue(): T | null {
    return this.value
  }

  render(): string {
    if (this.value === null) return this.unknownText()
    try {
      return this.format(this.value)
    } catch (err) {
      log.warn("cell render failed", { kind: this.kind, error: String(err) })
      return UNKNOWN
    }
  }

  toJSON(): unknown {
    return this.value
  }

  protected unknownText(): string {
    return UNKNOWN
  }

  protected abstract format(value: T): string
}

export interface CellKind<T, C extends ValueCell<T> = ValueCell<T>> {
  readonly name: string
  parse(raw: unknown): ParseOutcome<T>
  create(value: T | null): C
}

export type AnyCellKind = CellKind<unknown, ValueCell<unknown>>

export function wrap<T, C extends ValueCell<T>>(kind: CellKind<T, C>, raw: unknown): C {
  const outcome = kind.parse(raw)
  return kind.create(outcome.status === "present" ? outcome.value : null)
}

// --- parsers ---

const present = <T>(value: T): ParseOutcome<T> => ({ status: "present", value })
const unknown = <T>(): ParseOutcome<T> => ({ status: "unknown" })
const invalid = <T>(reason: string): ParseOutcome<T> => ({ status: "invalid", reason })

function typeName(raw: unknown): string {
  if (raw === null) return "null"
  if (Array.isArray(raw)) return "array"
  return typeof raw
}

export function parseText(raw: unknown): ParseOutcome<string> {
  if (raw === null || raw === undefined) return unknown()
  if (typeof raw === "string") return present(raw)
  if (typeof raw === "number" || typeof raw === "boolean") return present(String(raw))
  return invalid(`expected string, got ${typeName(raw)}`)
}

export function parseInteger(raw: unknown): ParseOutcome<number> {
  if (raw === null || raw === undefined) return unknown()
  if (typeof raw === "number" && Number.isInteger(raw)) return present(raw)
  if (typeof raw === "string" && /^-?\d+$/.test(raw.trim())) return present(Number(raw.trim()))
  return invalid(`expected integer, got ${typeName(raw)}`)
}

export function parseDecimal(raw: unknown): ParseOutcome<number> {
  if (raw === null || raw === undefined) return unknown()
  if (typeof raw === "number" && Number.isFinite(raw)) return present(raw)
  if (typeof raw === "string" && raw.trim() !== "" && Number.isFinite(Number(raw))) {
    return present(Number(raw))
  }
  return invalid(`expected number, got ${typeName(raw)}`)
}

export function parseBoolean(raw: unknown): ParseOutcome<boolean> {
  if (raw === null || raw === undefined) return unknown()
  if (typeof raw === "boolean") return present(raw)
  if (raw === "true" || raw === "false") return present(raw === "true")
  return invalid(`expected boolean, got ${typeName(raw)}`)
}

function parseNonNegative(parse: (raw: unknown) => ParseOutcome<number>, raw: unknown): ParseOutcome<number> {
  const outcome = parse(raw)
  if (outcome.status === "present" && outcome.value < 0) {
    return invalid(`expected non-negative value, got ${outcome.value}`)
  }
  return outcome
}

/** A bare alias or an `[alias, ...]` tuple such as `[alias, rank]` */
export type AliasEntry = string | [string, ...unknown[]]

export function aliasName(entry: AliasEntry): string {
  return typeof entry === "string" ? entry : entry[0]
}

/** Distinct alias names in first-seen order */
export function aliasNames(entries: readonly AliasEntry[]): string[] {
  return [...new Set(entries.map(aliasName))]
}

export function parseAliases(raw: unknown): ParseOutcome<AliasEntry[]> {
  if (raw === null || raw === undefined) return unknown()
  if (!Array.isArray(raw)) return invalid(`expected list, got ${typeName(raw)}`)
  const entries: AliasEntry[] = []
  for (const entry of raw) {
    if (typeof entry === "string") {
      entries.push(entry)
      continue
    }
    if (!Array.isArray(entry)) return invalid(`expected alias string, got ${typeName(entry)}`)
    const [alias, ...rest]: unknown[] = entry
    if (typeof alias !== "string") return invalid(`expected alias string, got ${typeName(alias)}`)
    entries.push([alias, ...rest])
  }
  return present(entries)
}

// --- bindings ---

export interface Binding {
  port: number
  protocol: string
  ip: string
}

/**
 * A declared port and the listeners resolved for it. `bindings` is null
 * until the live socket table has been consulted.
 */
export interface PortBindings {
  port: number | null
  bindings: Binding[] | null
}

function isPort(n: number): boolean {
  return Number.isInteger(n) && n > 0 && n <= 65_535
}

function parseBinding(raw: unknown): Binding | null {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) return null
  const port: unknown = Reflect.get(raw, "port")
  const protocol: unknown = Reflect.get(raw, "protocol")
  const ip: unknown = Reflect.get(raw, "ip")
  if (typeof port !== "number" || !isPort(port)) return null
  if (typeof protocol !== "string" || typeof ip !== "string") return null
  return { port, protocol, ip }
}

export function bindingKey(b: Binding): string {
  return `${b.port}|${b.protocol}|${b.ip}`
}

export function dedupeBindings(bindings: Binding[]): Binding[] {
  const seen = new Set<string>()
  const out: Binding[] = []
  for (const b of bindings) {
    const key = bindingKey(b)
    if (seen.has(key)) continue
    seen.add(key)
    out.push(b)
  }
  return out
}

export function parsePortBindings(raw: unknown): ParseOutcome<PortBindings> {
  if (raw === null || raw === undefined) return unknown()
  if (Array.isArray(raw)) {
    const bindings: Binding[] = []
    for (const entry of raw) {
      const binding = parseBinding(entry)
      if (!binding) return invalid("expected {port, protocol, ip} binding")
      bindings.push(binding)
    }
    return present({ port: bindings[0]?.port ?? null, bindings })
  }
  const port = parseInteger(raw)
  if (port.status !== "present") return invalid(`expected port, got ${typeName(raw)}`)
  if (!isPort(port.value)) return invalid(`port ${port.value} out of range`)
  return present({ port: port.value, bindings: null })
}

// --- cell classes ---

export class TextCell extends ValueCell<string> {
  readonly kind = "Text"
  protected format(value: string): string {
    return value
  }
}

export class VersionCell extends ValueCell<string> {
  readonly kind = "Version"
  protected format(value: string): string {
    return value
  }
}

export class IntegerCell extends ValueCell<number> {
  readonly kind = "Integer"
  protected format(value: number): string {
    return value.toString()
  }
}

export class FloatCell extends ValueCell<number> {
  readonly kind = "Float"
  protected format(value: number): string {
    return value.toFixed(2)
  }
}

export class BooleanCell extends ValueCell<boolean> {
  readonly kind = "Boolean"
  protected format(value: boolean): string {
    return value ? "true" : "false"
  }
}

export class TimestampCell extends ValueCell<number> {
  readonly kind = "Timestamp"
  protected format(value: number): string {
    return formatLocalDateTime(value)
  }
}

export class DurationCell extends ValueCell<number> {
  readonly kind = "Duration"
  protected format(value: number): string {
    return formatDuration(value)
  }
}

export class StateCell extends ValueCell<string> {
  readonly kind = "State"
  protected format(value: string): string {
    return value
  }
  protected unknownText(): string {
    return UNKNOWN_STATE
  }
}

export class EnabledCell extends ValueCell<boolean> {
  readonly kind = "Enabled"
  protected format(value: boolean): string {
    return value ? "enabled" : "disabled"
  }
}

export class AliasListCell extends ValueCell<AliasEntry[]> {
  readonly kind = "AliasList"
  protected format(value: AliasEntry[]): string {
    return aliasNames(value).map((alias) => `${VERBOSE_MARKER}    ${alias}`).join("\n")
  }
}

export class BindingsCell extends ValueCell<PortBindings> {
  readonly kind = "Bindings"

  /** Declared port awaiting resolution against the live socket table */
  isUnresolved(): boolean {
    return this.value !== null && this.value.bindings === null && this.value.port !== null
  }

  protected format(value: PortBindings): string {
    if (value.bindings === null) return String(value.port)
    if (value.bindings.length === 0) {
      return value.port === null ? "no listeners" : `${value.port} (no listeners)`
    }
    return dedupeBindings(value.bindings).map((b) => `${b.port}/${b.protocol} on ${b.ip}`).join(", ")
  }

  toJSON(): unknown {
    if (this.value === null) return null
    return this.value.bindings ?? this.value.port
  }
}

// --- kinds ---

export const TextKind: CellKind<string, TextCell> = {
  name: "Text",
  parse: parseText,
  create: (value) => new TextCell(value),
}

export const VersionKind: CellKind<string, VersionCell> = {
  name: "Version",
  parse: parseText,
  create: (value) => new VersionCell(value),
}

export const IntegerKind: CellKind<number, IntegerCell> = {
  name: "Integer",
  parse: parseInteger,
  create: (value) => new IntegerCell(value),
}

export const FloatKind: CellKind<number, FloatCell> = {
  name: "Float",
  parse: parseDecimal,
  create: (value) => new FloatCell(value),
}

export const BooleanKind: CellKind<boolean, BooleanCell> = {
  name: "Boolean",
  parse: parseBoolean,
  create: (value) => new BooleanCell(value),
}

export const TimestampKind: CellKind<number, TimestampCell> = {
  name: "Timestamp",
  parse: (raw) => parseNonNegative(parseInteger, raw),
  create: (value) => new TimestampCell(value),
}

export const DurationKind: CellKind<number, DurationCell> = {
  name: "Duration",
  parse: (raw) => parseNonNegative(parseDecimal, raw),
  create: (value) => new DurationCell(value),
}

export const StateKind: CellKind<string, StateCell> = {
  name: "State",
  parse: parseText,
  create: (value) => new StateCell(value),
}

export const EnabledKind: CellKind<boolean, EnabledCell> = {
  name: "Enabled",
  parse: parseBoolean,
  create: (value) => new EnabledCell(value),
}

export const AliasListKind: CellKind<AliasEntry[], AliasListCell> = {
  name: "AliasList",
  parse: parseAliases,
  create: (value) => new AliasListCell(value),
}

export const BindingsKind: CellKind<PortBindings, BindingsCell> = {
  name: "Bindings",
  parse: parsePortBindings,
  create: (value) => new BindingsCell(value),
}
