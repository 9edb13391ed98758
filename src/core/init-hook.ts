import { constants as fsConstants } from "node:fs"
import { access, appendFile, mkdir } from "node:fs/promises"
import { join } from "node:path"
import { execa } from "execa"
import type { Logger } from "../utils/logger"
import { getInitHookPath, getLogsDirectoryPath, getMetaDirectoryPath } from "./paths"

export type InitHookContext = {
  readonly repoRoot: string
  readonly worktreePath: string
  readonly featureName: string
  readonly branch: string
  readonly baseBranch: string
  readonly basePath: string | null
}

export type InitHookRunner = (input: {
  readonly command: string
  readonly context: InitHookContext
}) => Promise<boolean>

type InitHookStdio = "inherit" | "pipe"

const nowTimestamp = (): string => {
  return new Date().toISOString().replace(/[^\d]/g, "").slice(0, 14)
}

const toLogFileName = (featureName: string): string => {
  return `${nowTimestamp()}_init_${featureName.replace(/[^\w.-]/g, "_")}.log`
}

export const buildInitHookEnv = (context: InitHookContext): Record<string, string> => {
  return {
    WT_ROOT: getMetaDirectoryPath(context.repoRoot),
    WT_REPO_ROOT: context.repoRoot,
    WT_WORKTREE_PATH: context.worktreePath,
    WT_FEAT_NAME: context.featureName,
    WT_BRANCH: context.branch,
    WT_BASE_BRANCH: context.baseBranch,
    WT_BASE_PATH: context.basePath ?? "",
  }
}

/** Configured `initCommand`, else `.wt/hooks/init.sh` when it exists. */
export const resolveInitCommand = async ({
  repoRoot,
  configured,
}: {
  readonly repoRoot: string
  readonly configured: string | null
}): Promise<string | null> => {
  if (configured !== null) {
    return configured
  }
  const hookPath = getInitHookPath(repoRoot)
  try {
    await access(hookPath, fsConstants.F_OK)
    return hookPath
  } catch {
    return null
  }
}

const writeInitHookLog = async ({
  context,
  lines,
}: {
  readonly context: InitHookContext
  readonly lines: readonly string[]
}): Promise<void> => {
  const logsDir = getLogsDirectoryPath(context.repoRoot)
  await mkdir(logsDir, { recursive: true })
  await appendFile(join(logsDir, toLogFileName(context.featureName)), `${lines.join("\n")}\n`, "utf8")
}

/**
 * Runs the init command through the shell inside the new worktree.
 * Resolves `false` on a non-zero exit or a spawn failure; never rejects.
 */
export const createInitHookRunner = ({
  logger,
  stdio = "inherit",
}: {
  readonly logger: Logger
  readonly stdio?: InitHookStdio
}): InitHookRunner => {
  return async ({ command, context }) => {
    const startedAt = new Date().toISOString()
    logger.info(`Running init hook: ${command}`)
    const result = await execa(command, {
      shell: true,
      cwd: context.worktreePath,
      env: buildInitHookEnv(context),
      stdio,
      reject: false,
    })
    const endedAt = new Date().toISOString()
    const exitCode = result.exitCode ?? null
    const succeeded = result.failed !== true && exitCode === 0

    try {
      await writeInitHookLog({
        context,
        lines: [
          `command=${command}`,
          `cwd=${context.worktreePath}`,
          `start=${startedAt}`,
          `end=${endedAt}`,
          `exitCode=${exitCode === null ? "none" : String(exitCode)}`,
          `stderr=${typeof result.stderr === "string" ? result.stderr : ""}`,
        ],
      })
    } catch (error) {
      logger.warn(`Could not write init hook log: ${error instanceof Error ? error.message : String(error)}`)
    }

    if (succeeded !== true) {
      logger.debug(`Init hook exited with ${exitCode === null ? "no exit code" : `code ${String(exitCode)}`}`)
    }
    return succeeded
  }
}
