#!/usr/bin/env -S node --import tsx
import { runCli } from "./cli/commands.ts"
import { createLogger } from "./logger.ts"

const log = createLogger("main")

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    log.error("fatal", { error: err instanceof Error ? err.message : String(err) })
    process.exitCode = 1
  },
)
