/**
 * Live enrichment of parsed records
 *
 * After a record's tree is built, each policy may replace an unknown cell
 * with a value computed from a live probe. Every record gets a fresh pass,
 * so the interface prefix cache never outlives one record. Probe failures
 * are logged and leave the cell unknown.
 */

import { createLogger } from "./logger.ts"
import { TypedTree } from "./schema.ts"
import {
  BindingsCell,
  EnabledCell,
  StateCell,
  VersionCell,
  dedupeBindings,
} from "./value-cell.ts"
import type { Binding, ValueCell } from "./value-cell.ts"
import type { ProcessControlProbe } from "./probes/process-control.ts"
import type { AddressProbe, SocketTableProbe } from "./probes/socket-table.ts"
import { anyNetwork, isWildcard } from "./probes/socket-table.ts"
import type { PackageProbe } from "./probes/package-version.ts"

const log = createLogger("enrichment")

export interface Probes {
  sockets: SocketTableProbe
  addresses: AddressProbe
  processControl: ProcessControlProbe
  packages: PackageProbe
}

/** Returns a replacement cell, or null to leave the field as it is */
export type EnrichmentPolicy = (field: string, cell: ValueCell<unknown>, pass: EnrichmentPass) => ValueCell<unknown> | null

export class EnrichmentPass {
  readonly probes: Probes
  private readonly prefixes = new Map<string, number | null>()

  constructor(probes: Probes) {
    this.probes = probes
  }

  /** Run a probe call; failures are logged and yield `fallback` */
  probe<T>(name: string, call: () => T, fallback: T): T {
    try {
      return call()
    } catch (err) {
      log.warn("probe failed", { probe: name, error: err instanceof Error ? err.message : String(err) })
      return fallback
    }
  }

  /** Address in CIDR notation; lookups are cached per distinct address */
  networkOf(address: string): string {
    if (isWildcard(address)) return anyNetwork(address)
    let prefix = this.prefixes.get(address)
    if (prefix === undefined) {
      prefix = this.probe("address", () => this.probes.addresses.prefixLength(address), null)
      this.prefixes.set(address, prefix)
    }
    return prefix === null ? address : `${address}/${prefix}`
  }

  run(tree: TypedTree, policies: readonly EnrichmentPolicy[] = DEFAULT_POLICIES): void {
    for (const [field, node] of tree) {
      if (node instanceof TypedTree) {
        this.run(node, policies)
        continue
      }
      let current = node
      for (const policy of policies) {
        const replacement = policy(field, current, this)
        if (replacement !== null) current = replacement
      }
      if (current !== node) tree.replace(field, current)
    }
  }
}

export const bindingsPolicy: EnrichmentPolicy = (_field, cell, pass) => {
  if (!(cell instanceof BindingsCell) || !cell.isUnresolved()) return null
  const port = cell.rawValue()?.port
  if (port === undefined || port === null) return null

  const listeners = pass.probe("sockets", () => pass.probes.sockets.listListeners(port), null)
  if (listeners === null) return new BindingsCell(null)
  const bindings: Binding[] = listeners.map((l) => ({
    port,
    protocol: l.protocol,
    ip: pass.networkOf(l.address),
  }))
  return new BindingsCell({ port, bindings: dedupeBindings(bindings) })
}

export const processStatusPolicy: EnrichmentPolicy = (field, cell, pass) => {
  if (!cell.isUnknown()) return null
  const control = pass.probes.processControl

  if (cell instanceof StateCell) {
    const state = pass.probe("process-control", () => control.getRunState(), "indeterminate")
    if (state === "indeterminate") {
      log.info("service run state is indeterminate", { field })
      return null
    }
    return new StateCell(state)
  }

  if (cell instanceof EnabledCell) {
    const state = pass.probe("process-control", () => control.getEnabledState(), "indeterminate")
    if (state === "indeterminate") {
      log.info("service enabled state is indeterminate", { field })
      return null
    }
    return new EnabledCell(state === "enabled")
  }

  return null
}

export const softwareVersionPolicy: EnrichmentPolicy = (field, cell, pass) => {
  if (!(cell instanceof VersionCell) || !cell.isUnknown()) return null
  const version = pass.probe("packages", () => pass.probes.packages.getInstalledVersion(field), null)
  if (version === null) {
    log.warn("package version unavailable", { package: field })
    return null
  }
  return new VersionCell(version)
}

export const DEFAULT_POLICIES: readonly EnrichmentPolicy[] = [
  bindingsPolicy,
  processStatusPolicy,
  softwareVersionPolicy,
]

export function enrichRecord(tree: TypedTree, probes: Probes, policies?: readonly EnrichmentPolicy[]): void {
  new EnrichmentPass(probes).run(tree, policies)
}
