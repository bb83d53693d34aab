/**
 * Socket table and interface address probes
 *
 * Listeners come from `ss -ltun`; interface prefixes from `ip -o addr show`.
 */

import { ProbeFailureError } from "../errors.ts"
import { spawnRunner } from "./exec.ts"
import type { CommandResult, CommandRunner } from "./exec.ts"

export interface Listener {
  protocol: string
  address: string
}

export interface SocketTableProbe {
  listListeners(port: number): Listener[]
}

export interface AddressProbe {
  /** Prefix length of the interface network holding `ip`, if any */
  prefixLength(ip: string): number | null
}

const WILDCARD_V4 = new Set(["0.0.0.0", "*"])
const WILDCARD_V6 = new Set(["::", "[::]"])

export function isWildcard(address: string): boolean {
  return WILDCARD_V4.has(address) || WILDCARD_V6.has(address)
}

/** The "any" network for a wildcard bind address */
export function anyNetwork(address: string): string {
  return WILDCARD_V6.has(address) ? "::/0" : "0.0.0.0/0"
}

/**
 * Split `ss` local address column ("10.0.0.5:9701", "[::1]:9701",
 * "127.0.0.53%lo:53", "*:9702") into address and port.
 */
export function splitLocalAddress(column: string): { address: string; port: number } | null {
  const idx = column.lastIndexOf(":")
  if (idx <= 0) return null
  const port = Number(column.slice(idx + 1))
  if (!Number.isInteger(port)) return null
  let address = column.slice(0, idx)
  if (address.startsWith("[") && address.endsWith("]")) address = address.slice(1, -1)
  const scope = address.indexOf("%")
  if (scope >= 0) address = address.slice(0, scope)
  return { address, port }
}

export function parseSsListeners(output: string, port: number): Listener[] {
  const listeners: Listener[] = []
  for (const line of output.split("\n")) {
    const cols = line.trim().split(/\s+/)
    // Netid State Recv-Q Send-Q Local-Address:Port Peer-Address:Port
    if (cols.length < 5 || cols[0] === "Netid") continue
    const local = splitLocalAddress(cols[4] ?? "")
    if (!local || local.port !== port) continue
    listeners.push({ protocol: cols[0] ?? "", address: local.address })
  }
  return listeners
}

export function parseIpPrefixes(output: string): Map<string, number> {
  const prefixes = new Map<string, number>()
  for (const line of output.split("\n")) {
    const cols = line.trim().split(/\s+/)
    for (let i = 0; i < cols.length - 1; i++) {
      if (cols[i] !== "inet" && cols[i] !== "inet6") continue
      const [ip, bits] = (cols[i + 1] ?? "").split("/")
      const prefix = Number(bits)
      if (ip && Number.isInteger(prefix)) prefixes.set(ip, prefix)
    }
  }
  return prefixes
}

function checked(command: string, result: CommandResult): string {
  if (result.status !== 0) {
    throw new ProbeFailureError(command, result.stderr.trim() || `exit status ${result.status}`)
  }
  return result.stdout
}

export class SsSocketTable implements SocketTableProbe {
  private readonly run: CommandRunner

  constructor(run: CommandRunner = spawnRunner) {
    this.run = run
  }

  listListeners(port: number): Listener[] {
    return parseSsListeners(checked("ss", this.run("ss", ["-ltun"])), port)
  }
}

export class IpAddressProbe implements AddressProbe {
  private readonly run: CommandRunner

  constructor(run: CommandRunner = spawnRunner) {
    this.run = run
  }

  prefixLength(ip: string): number | null {
    return parseIpPrefixes(checked("ip", this.run("ip", ["-o", "addr", "show"]))).get(ip) ?? null
  }
}
