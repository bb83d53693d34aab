import type { Probes } from "../enrichment.ts"
import { spawnRunner } from "./exec.ts"
import type { CommandRunner } from "./exec.ts"
import { DpkgPackageProbe } from "./package-version.ts"
import { createProcessControl } from "./process-control.ts"
import type { ControlBackend } from "./process-control.ts"
import { IpAddressProbe, SsSocketTable } from "./socket-table.ts"

export function createLiveProbes(
  opts: { controlBackend: ControlBackend; serviceName: string },
  run: CommandRunner = spawnRunner,
): Probes {
  return {
    sockets: new SsSocketTable(run),
    addresses: new IpAddressProbe(run),
    processControl: createProcessControl(opts.controlBackend, opts.serviceName, run),
    packages: new DpkgPackageProbe(run),
  }
}
