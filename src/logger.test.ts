import { describe, it, afterEach } from "node:test"
import assert from "node:assert/strict"
import { configureLogging, createLogger, parseLogLevel, resetLogging } from "./logger.ts"

afterEach(() => resetLogging())

function capture(level: "debug" | "info" | "warn" | "error"): string[] {
  const lines: string[] = []
  configureLogging({ level, sink: (line) => lines.push(line) })
  return lines
}

describe("logger", () => {
  it("writes one JSON line per entry with component and fields", () => {
    const lines = capture("debug")
    createLogger("history").info("store queried", { node: "Node1", records: 3 })
    assert.equal(lines.length, 1)
    const entry = JSON.parse(lines[0] ?? "{}")
    assert.equal(typeof entry.ts, "string")
    assert.equal(entry.level, "info")
    assert.equal(entry.component, "history")
    assert.equal(entry.msg, "store queried")
    assert.equal(entry.node, "Node1")
    assert.equal(entry.records, 3)
  })

  it("drops entries below the configured level", () => {
    const lines = capture("warn")
    const log = createLogger("test")
    log.debug("a")
    log.info("b")
    log.warn("c")
    log.error("d")
    assert.deepEqual(lines.map((l) => JSON.parse(l).msg), ["c", "d"])
  })

  it("serializes errors by message", () => {
    const lines = capture("debug")
    createLogger("test").error("failed", { error: new Error("disk gone") })
    assert.equal(JSON.parse(lines[0] ?? "{}").error, "disk gone")
  })

  it("parses level names", () => {
    assert.equal(parseLogLevel("warn"), "warn")
    assert.equal(parseLogLevel("verbose"), undefined)
    assert.equal(parseLogLevel(undefined), undefined)
  })
})
