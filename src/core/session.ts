import { loadResolvedConfig } from "../config/loader"
import type { ResolvedConfig } from "../config/types"
import { createGitRepository, type GitRepository } from "../git/repository"
import { type CompanionLauncher, createCompanionLauncher } from "../integrations/companion"
import type { Logger } from "../utils/logger"
import { createInitHookRunner, type InitHookRunner } from "./init-hook"
import { canonicalizePath, getRegistryFilePath, getWorktreeRootPath, resolveRepoContext } from "./paths"
import { reconcileRegistry, type ReconcileResult } from "./reconcile"
import { loadRegistry, saveRegistry } from "./registry"
import type { InvocationLocation } from "./selection"

/** Everything one command invocation needs to know about the repository. */
export type RepoSession = {
  readonly repoRoot: string
  readonly cwd: string
  readonly location: InvocationLocation
  readonly config: ResolvedConfig
  readonly worktreeRoot: string
  readonly registryPath: string
  readonly git: GitRepository
  readonly logger: Logger
  readonly runInitHook: InitHookRunner
  readonly launchCompanion: CompanionLauncher
}

export type CreateRepoSessionInput = {
  readonly cwd: string
  readonly logger: Logger
  readonly runInitHook?: InitHookRunner
  readonly launchCompanion?: CompanionLauncher
}

export const createRepoSession = async ({
  cwd,
  logger,
  runInitHook,
  launchCompanion,
}: CreateRepoSessionInput): Promise<RepoSession> => {
  const context = await resolveRepoContext(cwd)
  const repoRoot = await canonicalizePath(context.repoRoot)
  const currentWorktreeRoot = await canonicalizePath(context.currentWorktreeRoot)
  const { config } = await loadResolvedConfig({ repoRoot })
  const git = createGitRepository(repoRoot)

  const location: InvocationLocation =
    currentWorktreeRoot === repoRoot
      ? { kind: "root" }
      : { kind: "worktree", path: currentWorktreeRoot, branch: await git.currentBranch(currentWorktreeRoot) }

  return {
    repoRoot,
    cwd,
    location,
    config,
    worktreeRoot: await canonicalizePath(getWorktreeRootPath(repoRoot, config.worktreesDir)),
    registryPath: getRegistryFilePath(repoRoot),
    git,
    logger,
    runInitHook: runInitHook ?? createInitHookRunner({ logger: logger.createChild("[init]") }),
    launchCompanion: launchCompanion ?? createCompanionLauncher({ logger: logger.createChild("[companion]") }),
  }
}

/** Reconciles the registry with `git worktree list`, saving only when it changed. */
export const syncRegistry = async (session: RepoSession): Promise<ReconcileResult> => {
  const registry = await loadRegistry(session.registryPath)
  const result = await reconcileRegistry({ registry, worktrees: await session.git.listWorktrees() })
  if (result.removed.length > 0) {
    await saveRegistry(result.registry, session.registryPath)
    for (const record of result.removed) {
      session.logger.info(`Dropped stale registry entry '${record.featureName}' (${record.path})`)
    }
  }
  return result
}
