import { execa } from "execa"
import type { Logger } from "../utils/logger"

export type CompanionLauncher = (input: { readonly command: string; readonly cwd: string }) => Promise<boolean>

/**
 * Runs the companion tool (editor, TUI) in the new worktree and waits for it
 * to exit. A failure to launch is a warning.
 */
export const createCompanionLauncher = ({
  logger,
  stdio = "inherit",
}: {
  readonly logger: Logger
  readonly stdio?: "inherit" | "ignore"
}): CompanionLauncher => {
  return async ({ command, cwd }) => {
    logger.info(`Launching ${command} in ${cwd}`)
    const result = await execa(command, {
      shell: true,
      cwd,
      stdio,
      reject: false,
    })
    if (result.failed || result.exitCode !== 0) {
      logger.warn(`Companion tool '${command}' exited with ${result.exitCode === undefined ? "an error" : `code ${String(result.exitCode)}`}`)
      return false
    }
    return true
  }
}
