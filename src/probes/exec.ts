import { spawnSync } from "node:child_process"
import { ProbeFailureError } from "../errors.ts"

export interface CommandResult {
  status: number | null
  stdout: string
  stderr: string
}

/**
 * Runs an external tool to completion. Throws ProbeFailureError when the
 * tool cannot be started; a non-zero exit status is returned, not thrown,
 * since tools like `systemctl is-active` report state through it.
 */
export type CommandRunner = (command: string, args: string[]) => CommandResult

export const spawnRunner: CommandRunner = (command, args) => {
  const result = spawnSync(command, args, { encoding: "utf-8", stdio: ["ignore", "pipe", "pipe"] })
  if (result.error) {
    throw new ProbeFailureError(command, result.error.message)
  }
  return { status: result.status, stdout: result.stdout, stderr: result.stderr }
}
