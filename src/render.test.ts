import { describe, it } from "node:test"
import assert from "node:assert/strict"
import { MissingPathError } from "./errors.ts"
import { formatHumanTimestamp } from "./format.ts"
import { HUMAN_TIMESTAMP_FIELD, createRecordSchema } from "./record-schema.ts"
import {
  applyVerbosity,
  renderField,
  renderJson,
  renderNarrative,
  renderTree,
  renderTreeLines,
  selectPath,
} from "./render.ts"
import type { JsonObject } from "./range-query.ts"
import { buildTree } from "./schema.ts"
import { BindingsCell } from "./value-cell.ts"

process.env.TZ = "UTC"

function sampleData(): JsonObject {
  return {
    "response-version": "0.0.1",
    timestamp: 1700000000,
    Node_info: {
      Name: "Node1",
      did: "did-node1",
      verkey: "test-verkey",
      BLS_key: "test-bls",
      Node_port: 9701,
      Client_port: 9702,
      Metrics: {
        uptime: 90061,
        "transaction-count": { ledger: 10, pool: 4, config: 0, audit: 12 },
        "average-per-second": { "read-transactions": 0.5, "write-transactions": 1.25 },
      },
    },
    state: "running",
    enabled: true,
    Pool_info: {
      Total_nodes_count: 4,
      Reachable_nodes_count: 3,
      Unreachable_nodes_count: 1,
      Reachable_nodes: [["Node1", 0], ["Node2", 1], ["Node3", 2]],
      Unreachable_nodes: [["Node4", null]],
    },
    Software: { "indy-node": "1.12.6", sovrin: "1.1.89" },
    [HUMAN_TIMESTAMP_FIELD]: formatHumanTimestamp(1700000000),
  }
}

describe("applyVerbosity", () => {
  it("drops marked lines unless verbose", () => {
    assert.deepEqual(applyVerbosity(["a", "#b", "c", "#  d"], false), ["a", "c"])
  })

  it("strips the marker from kept lines", () => {
    assert.deepEqual(applyVerbosity(["a", "#b", "c", "#  d"], true), ["a", "b", "c", "  d"])
  })
})

describe("renderTreeLines", () => {
  it("flattens nested documents with two-space indentation", () => {
    assert.deepEqual(renderTreeLines({ a: 1, b: { c: "x", d: [] }, e: [1, 2], f: {}, g: null }), [
      '"a": 1',
      '"b":',
      '  "c": x',
      '  "d": n/a',
      '"e":',
      "  1",
      "  2",
      '"f": n/a',
      '"g": null',
    ])
  })

  it("renders empty top-level containers as n/a", () => {
    assert.deepEqual(renderTreeLines({}), ["n/a"])
    assert.deepEqual(renderTreeLines([]), ["n/a"])
  })

  it("indents objects inside lists", () => {
    assert.deepEqual(renderTreeLines([{ x: 1 }, "y"]), ['  "x": 1', "y"])
  })

  it("joins lines for a whole document", () => {
    assert.equal(renderTree({ Name: "Node1", ports: [9701] }), '"Name": Node1\n"ports":\n  9701')
  })
})

describe("field selection", () => {
  it("follows dotted paths through objects and lists", () => {
    const data = sampleData()
    assert.equal(selectPath(data, "Node_info.Metrics.uptime"), 90061)
    assert.deepEqual(selectPath(data, "Pool_info.Reachable_nodes.1"), ["Node2", 1])
    assert.equal(selectPath(data, "Pool_info.Reachable_nodes.1.0"), "Node2")
  })

  it("raises MissingPath naming the absent segment", () => {
    assert.throws(() => selectPath(sampleData(), "Node_info.Nope.uptime"), (err: unknown) => {
      assert.ok(err instanceof MissingPathError)
      assert.equal(err.path, "Node_info.Nope.uptime")
      assert.equal(err.message, 'field path "Node_info.Nope.uptime" not found (missing "Nope")')
      return true
    })
    assert.throws(() => selectPath(sampleData(), "Pool_info.Reachable_nodes.7"), MissingPathError)
    assert.throws(() => selectPath(sampleData(), "state.length"), MissingPathError)
  })

  it("renders a selected field", () => {
    assert.deepEqual(renderField("Node_info.Name", "Node1"), ["Node_info.Name: Node1"])
    assert.deepEqual(renderField("x", { b: 1 }), ["x:", '  "b": 1'])
    assert.deepEqual(renderField("y", []), ["y: n/a"])
    assert.deepEqual(renderField("z", null), ["z: null"])
  })
})

describe("narrative report", () => {
  const expectedBrief = [
    "Validator Node1 is running",
    "Validator DID:    did-node1",
    "Verification Key: test-verkey",
    "Node Port:        9701",
    "Client Port:      9702",
    "Metrics:",
    "  Uptime: 1 day, 1 hour, 1 minute, 1 second",
    "  Total Ledger Transactions:  10",
    "  Total Pool Transactions:    4",
    "  Read Transactions/Seconds:  0.50",
    "  Write Transactions/Seconds: 1.25",
    "Reachable Hosts:   3/4",
    "Unreachable Hosts: 1/4",
  ]

  it("omits verbose-only lines by default", () => {
    const tree = buildTree(sampleData(), createRecordSchema())
    assert.equal(renderNarrative(tree), expectedBrief.join("\n"))
  })

  it("shows every line in verbose mode", () => {
    const tree = buildTree(sampleData(), createRecordSchema(), true)
    assert.equal(
      renderNarrative(tree),
      [
        "Validator Node1 is running",
        "Current time:     1700000000 (2023-11-14 22:13:20)",
        "Validator DID:    did-node1",
        "Verification Key: test-verkey",
        "BLS Key:          test-bls",
        "Node Port:        9701",
        "Client Port:      9702",
        "Metrics:",
        "  Uptime: 1 day, 1 hour, 1 minute, 1 second",
        "  Total Config Transactions:  0",
        "  Total Ledger Transactions:  10",
        "  Total Pool Transactions:    4",
        "  Total Audit Transactions:   12",
        "  Read Transactions/Seconds:  0.50",
        "  Write Transactions/Seconds: 1.25",
        "Reachable Hosts:   3/4",
        "    Node1",
        "    Node2",
        "    Node3",
        "Unreachable Hosts: 1/4",
        "    Node4",
        "Software Versions:",
        "  indy-node: 1.12.6",
        "  sovrin: 1.1.89",
      ].join("\n"),
    )
  })

  it("lets the caller override the tree's verbosity", () => {
    const tree = buildTree(sampleData(), createRecordSchema(), true)
    assert.equal(renderNarrative(tree, false), expectedBrief.join("\n"))
  })

  it("renders unknown for missing subtrees", () => {
    const data = sampleData()
    delete data["Pool_info"]
    delete data["Software"]
    const lines = renderNarrative(buildTree(data, createRecordSchema()), true).split("\n")
    assert.deepEqual(lines.slice(15), [
      "Reachable Hosts:   unknown/unknown",
      "    unknown",
      "Unreachable Hosts: unknown/unknown",
      "    unknown",
      "Software Versions:",
      "  indy-node: unknown",
      "  sovrin: unknown",
    ])
  })

  it("renders an empty record without failing", () => {
    const lines = renderNarrative(buildTree(null, createRecordSchema())).split("\n")
    assert.equal(lines[0], "Validator unknown is in unknown state")
    assert.equal(lines[3], "Node Port:        unknown")
  })

  it("shows resolved bindings", () => {
    const tree = buildTree(sampleData(), createRecordSchema())
    tree.subtree("Node_info")?.replace(
      "Node_port",
      new BindingsCell({ port: 9701, bindings: [{ port: 9701, protocol: "tcp", ip: "10.0.0.5/24" }] }),
    )
    assert.equal(renderNarrative(tree).split("\n")[3], "Node Port:        9701/tcp on 10.0.0.5/24")
  })
})

describe("renderJson", () => {
  it("emits the canonical tree with resolved bindings as a list", () => {
    const tree = buildTree(sampleData(), createRecordSchema())
    tree.subtree("Node_info")?.replace(
      "Node_port",
      new BindingsCell({ port: 9701, bindings: [{ port: 9701, protocol: "tcp", ip: "10.0.0.5/24" }] }),
    )
    const parsed = JSON.parse(renderJson(tree))
    assert.deepEqual(parsed.Node_info.Node_port, [{ port: 9701, protocol: "tcp", ip: "10.0.0.5/24" }])
    assert.equal(parsed.Node_info.Client_port, 9702)
    assert.deepEqual(parsed.Pool_info.Reachable_nodes, [["Node1", 0], ["Node2", 1], ["Node3", 2]])
    assert.equal(parsed[HUMAN_TIMESTAMP_FIELD], "1700000000 (2023-11-14 22:13:20)")
  })

  it("indents with two spaces", () => {
    const tree = buildTree({ Software: {} }, createRecordSchema([]))
    assert.equal(
      renderJson(tree),
      [
        "{",
        '  "response-version": null,',
        '  "timestamp": null,',
        `  "${HUMAN_TIMESTAMP_FIELD}": null,`,
        '  "Node_info": {',
        '    "Name": null,',
        '    "did": null,',
        '    "verkey": null,',
        '    "BLS_key": null,',
        '    "Node_port": null,',
        '    "Client_port": null,',
        '    "Metrics": {',
        '      "uptime": null,',
        '      "transaction-count": {',
        '        "ledger": null,',
        '        "pool": null,',
        '        "config": null,',
        '        "audit": null',
        "      },",
        '      "average-per-second": {',
        '        "read-transactions": null,',
        '        "write-transactions": null',
        "      }",
        "    }",
        "  },",
        '  "state": null,',
        '  "enabled": null,',
        '  "Pool_info": {',
        '    "Total_nodes_count": null,',
        '    "Reachable_nodes_count": null,',
        '    "Unreachable_nodes_count": null,',
        '    "Reachable_nodes": null,',
        '    "Unreachable_nodes": null',
        "  },",
        '  "Software": {}',
        "}",
      ].join("\n"),
    )
  })
})
