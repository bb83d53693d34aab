import { spawnRunner } from "./exec.ts"
import type { CommandRunner } from "./exec.ts"

export interface PackageProbe {
  /** Installed version of a system package, null when not installed */
  getInstalledVersion(name: string): string | null
}

export class DpkgPackageProbe implements PackageProbe {
  private readonly run: CommandRunner

  constructor(run: CommandRunner = spawnRunner) {
    this.run = run
  }

  getInstalledVersion(name: string): string | null {
    const result = this.run("dpkg-query", ["-W", "-f=${Version}", name])
    const version = result.stdout.trim()
    if (result.status !== 0 || version.length === 0) return null
    return version
  }
}
