import { Command, CommanderError, InvalidArgumentError } from "commander"
import { ZodError } from "zod"

import { expandHome, loadConfig } from "../config.ts"
import type { Probes } from "../enrichment.ts"
import { InvalidRangeError } from "../errors.ts"
import { queryStores, renderReports } from "../history.ts"
import type { OutputFormat } from "../history.ts"
import { configureLogging, createLogger } from "../logger.ts"
import { createLiveProbes } from "../probes/index.ts"
import type { QueryRequest } from "../range-query.ts"
import { createRecordSchema } from "../record-schema.ts"
import { LevelStoreLocator } from "../storage/store-locator.ts"
import type { StoreLocator } from "../storage/store-locator.ts"

const log = createLogger("cli")

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

export interface CliOptions {
  config?: string
  dataDir?: string
  count?: number
  all?: boolean
  fromStart?: boolean
  from?: number
  to?: number
  json?: boolean
  tree?: boolean
  field: string[]
  offline?: boolean
  list?: boolean
  verbose?: boolean
}

export interface CliDeps {
  locator?: StoreLocator
  probes?: Probes
  env?: Record<string, string | undefined>
  stdout?: (text: string) => void
  stderr?: (text: string) => void
}

/** Epoch seconds, or any date string Date.parse understands */
export function parseTimeArg(raw: string): number {
  const trimmed = raw.trim()
  if (/^\d+$/.test(trimmed)) return Number(trimmed)
  const ms = Date.parse(trimmed)
  if (Number.isNaN(ms)) throw new InvalidArgumentError(`not a timestamp or date: ${raw}`)
  return Math.floor(ms / 1000)
}

export function parseCountArg(raw: string): number {
  if (!/^\d+$/.test(raw.trim())) throw new InvalidArgumentError(`not a non-negative integer: ${raw}`)
  return Number(raw.trim())
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

export function buildProgram(): Command {
  return new Command()
    .name("validator-history")
    .description("Report historical validator statistics")
    .argument("[node...]", "nodes to report (default: every store in the data dir)")
    .option("-c, --config <file>", "JSON config file")
    .option("-d, --data-dir <dir>", "directory holding leveldb-<node> stores")
    .option("-n, --count <n>", "most recent N records (default 1)", parseCountArg)
    .option("--all", "every record, most recent last")
    .option("--from-start", "every record from the first one")
    .option("--from <time>", "window lower bound (epoch seconds or date)", parseTimeArg)
    .option("--to <time>", "window upper bound (epoch seconds or date)", parseTimeArg)
    .option("--json", "canonical JSON output")
    .option("--tree", "flat indented tree of the raw records")
    .option("--field <path>", "print only this dotted field path (repeatable)", collect, [])
    .option("--offline", "do not consult live probes for missing values")
    .option("--list", "list nodes with a history store")
    .option("-v, --verbose", "include verbose-only report lines")
}

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const out = deps.stdout ?? ((text: string) => process.stdout.write(text + "\n"))
  const err = deps.stderr ?? ((text: string) => process.stderr.write(text + "\n"))

  const program = buildProgram()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => out(text.trimEnd()),
      writeErr: (text) => err(text.trimEnd()),
    })

  let nodes: string[] = []
  let opts: CliOptions = { field: [] }
  program.action((nodeArgs: string[], parsed: CliOptions) => {
    nodes = nodeArgs
    opts = parsed
  })
  try {
    program.parse(argv, { from: "user" })
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE
    }
    throw error
  }

  if (opts.json && opts.tree) {
    err("error: --json and --tree are mutually exclusive")
    return EXIT_USAGE
  }

  try {
    const config = await loadConfig({ configPath: opts.config, env: deps.env })
    configureLogging({ level: config.logLevel, file: config.logFile })

    const dataDir = opts.dataDir ? expandHome(opts.dataDir) : config.dataDir
    const locator = deps.locator ?? new LevelStoreLocator(dataDir)

    if (opts.list) {
      const names = await locator.list()
      if (names.length > 0) out(names.join("\n"))
      return EXIT_OK
    }

    const request: QueryRequest = {
      count: opts.all ? null : opts.count ?? 1,
      fromStart: opts.fromStart ?? false,
      fromTs: opts.from,
      toTs: opts.to,
    }
    const reports = await queryStores(locator, request, nodes)

    const format: OutputFormat = opts.json ? "json" : opts.tree ? "tree" : "narrative"
    const probes = opts.offline ? undefined : deps.probes ?? createLiveProbes(config)
    const result = renderReports(reports, {
      format,
      verbose: opts.verbose ?? false,
      schema: createRecordSchema(config.packages),
      fields: opts.field,
      probes,
    })

    if (result.output.length > 0) out(result.output)
    for (const message of result.errors) err(`error: ${message}`)
    return result.errors.length > 0 ? EXIT_FAILURE : EXIT_OK
  } catch (error) {
    if (error instanceof InvalidRangeError) {
      err(`error: ${error.message}`)
      return EXIT_USAGE
    }
    if (error instanceof ZodError) {
      err(`error: invalid configuration: ${error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`)
      return EXIT_USAGE
    }
    const message = error instanceof Error ? error.message : String(error)
    log.error("history report failed", { error: message })
    err(`error: ${message}`)
    return EXIT_FAILURE
  }
}
