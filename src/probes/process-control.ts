/**
 * Validator service state probes
 *
 * Two control planes are supported: systemd (`systemctl`) and supervisord
 * (`supervisorctl`). Output that does not match a known state yields
 * "indeterminate" rather than an error.
 */

import { createLogger } from "../logger.ts"
import { spawnRunner } from "./exec.ts"
import type { CommandRunner } from "./exec.ts"

const log = createLogger("process-control")

export type RunState = "running" | "stopped" | "indeterminate"
export type EnabledState = "enabled" | "disabled" | "indeterminate"
export type ControlBackend = "systemd" | "supervisor"

export interface ProcessControlProbe {
  getRunState(): RunState
  getEnabledState(): EnabledState
}

const SYSTEMD_RUNNING = new Set(["active", "activating", "reloading"])
const SYSTEMD_STOPPED = new Set(["inactive", "failed", "deactivating"])
const SYSTEMD_ENABLED = new Set(["enabled", "enabled-runtime", "static", "alias", "indirect"])
const SYSTEMD_DISABLED = new Set(["disabled", "masked", "masked-runtime"])

const SUPERVISOR_RUNNING = new Set(["RUNNING", "STARTING"])
const SUPERVISOR_STOPPED = new Set(["STOPPED", "STOPPING", "EXITED", "FATAL", "BACKOFF"])

export class SystemdControl implements ProcessControlProbe {
  private readonly service: string
  private readonly run: CommandRunner

  constructor(service: string, run: CommandRunner = spawnRunner) {
    this.service = service
    this.run = run
  }

  getRunState(): RunState {
    const out = this.run("systemctl", ["is-active", this.service]).stdout.trim()
    if (SYSTEMD_RUNNING.has(out)) return "running"
    if (SYSTEMD_STOPPED.has(out)) return "stopped"
    log.info("unrecognized systemctl is-active output", { service: this.service, output: out })
    return "indeterminate"
  }

  getEnabledState(): EnabledState {
    const out = this.run("systemctl", ["is-enabled", this.service]).stdout.trim()
    if (SYSTEMD_ENABLED.has(out)) return "enabled"
    if (SYSTEMD_DISABLED.has(out)) return "disabled"
    log.info("unrecognized systemctl is-enabled output", { service: this.service, output: out })
    return "indeterminate"
  }
}

export class SupervisorControl implements ProcessControlProbe {
  private readonly service: string
  private readonly run: CommandRunner

  constructor(service: string, run: CommandRunner = spawnRunner) {
    this.service = service
    this.run = run
  }

  // "indy-node   RUNNING   pid 1234, uptime 1:02:03"
  getRunState(): RunState {
    const out = this.run("supervisorctl", ["status", this.service]).stdout
    const line = this.findLine(out)
    const status = line?.split(/\s+/)[1] ?? ""
    if (SUPERVISOR_RUNNING.has(status)) return "running"
    if (SUPERVISOR_STOPPED.has(status)) return "stopped"
    log.info("unrecognized supervisorctl status output", { service: this.service, output: out.trim() })
    return "indeterminate"
  }

  // "indy-node   in use    auto      999:999"
  getEnabledState(): EnabledState {
    const out = this.run("supervisorctl", ["avail"]).stdout
    const line = this.findLine(out)
    if (line !== undefined) {
      const rest = line.slice(this.service.length).trim()
      if (rest.startsWith("in use")) return "enabled"
      if (rest.startsWith("avail")) return "disabled"
    }
    log.info("unrecognized supervisorctl avail output", { service: this.service, output: out.trim() })
    return "indeterminate"
  }

  private findLine(out: string): string | undefined {
    return out
      .split("\n")
      .map((l) => l.trim())
      .find((l) => l.split(/\s+/)[0] === this.service)
  }
}

export function createProcessControl(
  backend: ControlBackend,
  service: string,
  run: CommandRunner = spawnRunner,
): ProcessControlProbe {
  return backend === "supervisor" ? new SupervisorControl(service, run) : new SystemdControl(service, run)
}
