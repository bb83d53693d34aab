import { describe, it, afterEach } from "node:test"
import assert from "node:assert/strict"
import { EnrichmentPass, enrichRecord } from "./enrichment.ts"
import type { Probes } from "./enrichment.ts"
import { configureLogging, resetLogging } from "./logger.ts"
import { createLiveProbes } from "./probes/index.ts"
import type { CommandRunner } from "./probes/exec.ts"
import type { EnabledState, RunState } from "./probes/process-control.ts"
import type { Listener } from "./probes/socket-table.ts"
import { createRecordSchema } from "./record-schema.ts"
import { buildTree } from "./schema.ts"
import type { TypedTree } from "./schema.ts"

interface FakeState {
  listeners: Record<number, Listener[]>
  prefixes: Record<string, number>
  runState: RunState
  enabledState: EnabledState
  versions: Record<string, string>
  failSockets?: boolean
  failControl?: boolean
}

interface ProbeCalls {
  sockets: number[]
  prefixes: string[]
  control: number
  packages: string[]
}

function fakeProbes(state: FakeState): { probes: Probes; calls: ProbeCalls } {
  const calls: ProbeCalls = { sockets: [], prefixes: [], control: 0, packages: [] }
  const probes: Probes = {
    sockets: {
      listListeners(port) {
        calls.sockets.push(port)
        if (state.failSockets) throw new Error("ss not available")
        return state.listeners[port] ?? []
      },
    },
    addresses: {
      prefixLength(ip) {
        calls.prefixes.push(ip)
        return state.prefixes[ip] ?? null
      },
    },
    processControl: {
      getRunState() {
        calls.control++
        if (state.failControl) throw new Error("systemctl not available")
        return state.runState
      },
      getEnabledState() {
        calls.control++
        if (state.failControl) throw new Error("systemctl not available")
        return state.enabledState
      },
    },
    packages: {
      getInstalledVersion(name) {
        calls.packages.push(name)
        return state.versions[name] ?? null
      },
    },
  }
  return { probes, calls }
}

const baseState: FakeState = {
  listeners: {
    9701: [
      { protocol: "tcp", address: "10.0.0.5" },
      { protocol: "tcp", address: "10.0.0.5" },
      { protocol: "udp", address: "10.0.0.5" },
    ],
    9702: [
      { protocol: "tcp", address: "0.0.0.0" },
      { protocol: "tcp", address: "::" },
    ],
  },
  prefixes: { "10.0.0.5": 24 },
  runState: "running",
  enabledState: "disabled",
  versions: { "indy-node": "1.12.6", sovrin: "9.9.9" },
}

function record(overrides: Record<string, unknown> = {}): TypedTree {
  return buildTree(
    {
      Node_info: { Name: "Node1", Node_port: 9701, Client_port: 9702 },
      Software: { sovrin: "1.1.89" },
      ...overrides,
    },
    createRecordSchema(),
  )
}

function captureLogs(): Array<Record<string, unknown>> {
  const entries: Array<Record<string, unknown>> = []
  configureLogging({ level: "debug", sink: (line) => entries.push(JSON.parse(line)) })
  return entries
}

afterEach(() => resetLogging())

describe("bindings enrichment", () => {
  it("resolves declared ports against the socket table", () => {
    const { probes } = fakeProbes(baseState)
    const tree = record()
    enrichRecord(tree, probes)

    assert.deepEqual(tree.cellAt("Node_info", "Node_port")?.rawValue(), {
      port: 9701,
      bindings: [
        { port: 9701, protocol: "tcp", ip: "10.0.0.5/24" },
        { port: 9701, protocol: "udp", ip: "10.0.0.5/24" },
      ],
    })
    assert.equal(tree.cellAt("Node_info", "Client_port")?.render(), "9702/tcp on 0.0.0.0/0, 9702/tcp on ::/0")
  })

  it("caches prefix lookups within one record only", () => {
    const { probes, calls } = fakeProbes(baseState)
    enrichRecord(record(), probes)
    assert.deepEqual(calls.prefixes, ["10.0.0.5"])
    enrichRecord(record(), probes)
    assert.deepEqual(calls.prefixes, ["10.0.0.5", "10.0.0.5"])
  })

  it("leaves an address without a known prefix bare", () => {
    const pass = new EnrichmentPass(fakeProbes(baseState).probes)
    assert.equal(pass.networkOf("192.168.1.9"), "192.168.1.9")
    assert.equal(pass.networkOf("*"), "0.0.0.0/0")
  })

  it("records an empty listener list as no listeners", () => {
    const { probes } = fakeProbes({ ...baseState, listeners: {} })
    const tree = record()
    enrichRecord(tree, probes)
    assert.equal(tree.cellAt("Node_info", "Node_port")?.render(), "9701 (no listeners)")
    assert.deepEqual(tree.cellAt("Node_info", "Node_port")?.toJSON(), [])
  })

  it("does not probe when the port is unknown", () => {
    const { probes, calls } = fakeProbes(baseState)
    const tree = record({ Node_info: { Name: "Node1" } })
    enrichRecord(tree, probes)
    assert.deepEqual(calls.sockets, [])
    assert.equal(tree.cellAt("Node_info", "Node_port")?.isUnknown(), true)
  })

  it("leaves bindings unknown when the socket table cannot be read", () => {
    const logs = captureLogs()
    const { probes } = fakeProbes({ ...baseState, failSockets: true })
    const tree = record()
    enrichRecord(tree, probes)
    const cell = tree.cellAt("Node_info", "Node_port")
    assert.equal(cell?.isUnknown(), true)
    assert.equal(cell?.toJSON(), null)
    assert.equal(cell?.render(), "unknown")
    assert.equal(tree.cellAt("Node_info", "Client_port")?.isUnknown(), true)
    assert.deepEqual(
      logs.filter((e) => e["msg"] === "probe failed").map((e) => e["error"]),
      ["ss not available", "ss not available"],
    )
  })

  it("leaves bindings unknown when ss exits with an error", () => {
    const logs = captureLogs()
    const run: CommandRunner = (command) =>
      command === "ss"
        ? { status: 1, stdout: "", stderr: "Cannot open netlink socket: Permission denied\n" }
        : { status: 0, stdout: "", stderr: "" }
    const tree = record()
    enrichRecord(tree, createLiveProbes({ controlBackend: "systemd", serviceName: "indy-node" }, run))
    assert.equal(tree.cellAt("Node_info", "Node_port")?.isUnknown(), true)
    assert.equal(
      logs.find((e) => e["msg"] === "probe failed" && e["probe"] === "sockets")?.["error"],
      "ss failed: Cannot open netlink socket: Permission denied",
    )
  })
})

describe("process status enrichment", () => {
  it("fills unknown state and enabled flags from the control plane", () => {
    const { probes } = fakeProbes(baseState)
    const tree = record()
    enrichRecord(tree, probes)
    assert.equal(tree.cell("state")?.render(), "running")
    assert.equal(tree.cell("enabled")?.rawValue(), false)
    assert.equal(tree.cell("enabled")?.render(), "disabled")
  })

  it("never overwrites stored values", () => {
    const { probes, calls } = fakeProbes(baseState)
    const tree = record({ state: "stopped", enabled: true })
    enrichRecord(tree, probes)
    assert.equal(tree.cell("state")?.render(), "stopped")
    assert.equal(tree.cell("enabled")?.render(), "enabled")
    assert.equal(calls.control, 0)
  })

  it("leaves indeterminate states unknown", () => {
    const logs = captureLogs()
    const { probes } = fakeProbes({ ...baseState, runState: "indeterminate", enabledState: "indeterminate" })
    const tree = record()
    enrichRecord(tree, probes)
    assert.equal(tree.cell("state")?.render(), "in unknown state")
    assert.equal(tree.cell("enabled")?.isUnknown(), true)
    assert.deepEqual(
      logs.filter((e) => e["level"] === "info").map((e) => e["msg"]),
      ["service run state is indeterminate", "service enabled state is indeterminate"],
    )
  })

  it("survives a failing control plane", () => {
    const logs = captureLogs()
    const { probes } = fakeProbes({ ...baseState, failControl: true })
    const tree = record()
    enrichRecord(tree, probes)
    assert.equal(tree.cell("state")?.isUnknown(), true)
    assert.equal(logs.filter((e) => e["msg"] === "probe failed").length, 2)
  })
})

describe("software version enrichment", () => {
  it("fills missing versions and keeps stored ones", () => {
    const { probes, calls } = fakeProbes(baseState)
    const tree = record()
    enrichRecord(tree, probes)
    assert.equal(tree.cellAt("Software", "indy-node")?.render(), "1.12.6")
    assert.equal(tree.cellAt("Software", "sovrin")?.render(), "1.1.89")
    assert.deepEqual(calls.packages, ["indy-node"])
  })

  it("warns when a package is not installed", () => {
    const logs = captureLogs()
    const { probes } = fakeProbes({ ...baseState, versions: {} })
    const tree = record()
    enrichRecord(tree, probes)
    assert.equal(tree.cellAt("Software", "indy-node")?.isUnknown(), true)
    const warning = logs.find((e) => e["msg"] === "package version unavailable")
    assert.equal(warning?.["package"], "indy-node")
  })
})

describe("custom policies", () => {
  it("runs only the policies given", () => {
    const { probes, calls } = fakeProbes(baseState)
    const tree = record()
    enrichRecord(tree, probes, [])
    assert.equal(tree.cell("state")?.isUnknown(), true)
    assert.deepEqual(calls.sockets, [])
  })
})
