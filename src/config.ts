import { readFile } from "node:fs/promises"
import { join } from "node:path"
import { homedir } from "node:os"
import { z } from "zod"

export const DEFAULT_DATA_DIR = "/var/lib/validator-history"

export const ConfigSchema = z.object({
  dataDir: z.string().min(1).default(DEFAULT_DATA_DIR).describe("Directory holding leveldb-<node> stores"),
  serviceName: z.string().min(1).default("indy-node").describe("Validator service unit / program name"),
  controlBackend: z.enum(["systemd", "supervisor"]).default("systemd").describe("Process control plane"),
  packages: z.array(z.string().min(1)).default(["indy-node", "sovrin"]).describe("Packages listed under Software"),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  logFile: z.string().optional().describe("Append log lines here instead of stderr"),
})

export type HistoryConfig = z.infer<typeof ConfigSchema>

type Env = Record<string, string | undefined>

export function expandHome(raw: string): string {
  if (raw === "~") return homedir()
  if (raw.startsWith("~/")) return join(homedir(), raw.slice(2))
  return raw
}

/** Environment overrides, applied on top of the config file */
export function envOverrides(env: Env): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  if (env.VH_DATA_DIR) out.dataDir = env.VH_DATA_DIR
  if (env.VH_SERVICE) out.serviceName = env.VH_SERVICE
  if (env.VH_CONTROL) out.controlBackend = env.VH_CONTROL.trim().toLowerCase()
  if (env.VH_LOG_LEVEL) out.logLevel = env.VH_LOG_LEVEL.trim().toLowerCase()
  if (env.VH_LOG_FILE) out.logFile = env.VH_LOG_FILE
  if (env.VH_PACKAGES) {
    out.packages = env.VH_PACKAGES.split(",").map((p) => p.trim()).filter((p) => p.length > 0)
  }
  return out
}

async function readConfigFile(path: string, required: boolean): Promise<Record<string, unknown>> {
  let raw: string
  try {
    raw = await readFile(path, "utf-8")
  } catch (err) {
    if (!required && err instanceof Error && "code" in err && err.code === "ENOENT") return {}
    throw err
  }
  const parsed: unknown = JSON.parse(raw)
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`config file ${path} must contain a JSON object`)
  }
  return { ...parsed }
}

/**
 * Resolve configuration: defaults, then the JSON config file (`configPath`,
 * `VH_CONFIG`, or `<dataDir>/config.json` when present), then environment.
 */
export async function loadConfig(opts: { configPath?: string; env?: Env } = {}): Promise<HistoryConfig> {
  const env = opts.env ?? process.env
  const explicit = opts.configPath ?? env.VH_CONFIG
  const overrides = envOverrides(env)

  let fileConfig: Record<string, unknown>
  if (explicit) {
    fileConfig = await readConfigFile(expandHome(explicit), true)
  } else {
    const dataDir = typeof overrides.dataDir === "string" ? overrides.dataDir : DEFAULT_DATA_DIR
    fileConfig = await readConfigFile(join(expandHome(dataDir), "config.json"), false)
  }

  const config = ConfigSchema.parse({ ...fileConfig, ...overrides })
  return {
    ...config,
    dataDir: expandHome(config.dataDir),
    logFile: config.logFile === undefined ? undefined : expandHome(config.logFile),
  }
}
