import { mkdir, readdir, stat } from "node:fs/promises"
import type { GitWorktree } from "../git/worktree"
import { DEFAULT_AUTO_COMMIT_MESSAGE_PREFIX } from "./constants"
import { createCliError, describeError, hasErrorCode } from "./errors"
import { deriveFeatureNameFromBranch, normalizeFeatureName } from "./feature-name"
import { ensureMetaGitignore } from "./init"
import { type InitHookContext, resolveInitCommand } from "./init-hook"
import { featureNameToWorktreePath, pathExists } from "./paths"
import {
  addRecord,
  createRecord,
  ensureRecordSlotAvailable,
  loadRegistry,
  type Registry,
  removeRecordByPath,
  saveRegistry,
  type WorktreeRecord,
} from "./registry"
import { findByLocation, resolveTargetRecord, type WorktreeChooser } from "./selection"
import type { RepoSession } from "./session"

export type HookPolicy = {
  readonly enabled: boolean
  readonly strict: boolean
}

export type HookOutcome = "skipped" | "succeeded" | "failed"

export type CreateFeatureWorktreeInput = {
  readonly featureName: string
  readonly base?: string | undefined
  readonly push?: boolean | undefined
  readonly hook: HookPolicy
  readonly companion: boolean
}

export type CreateFeatureWorktreeResult = {
  readonly record: WorktreeRecord
  readonly pushed: boolean
  readonly hook: HookOutcome
}

export type CheckoutBranchWorktreeInput = {
  readonly branch: string
  readonly hook: HookPolicy
  readonly companion: boolean
}

export type CheckoutBranchWorktreeResult =
  | { readonly kind: "existing"; readonly path: string; readonly branch: string }
  | {
      readonly kind: "created"
      readonly path: string
      readonly branch: string
      readonly record: WorktreeRecord
      readonly hook: HookOutcome
    }

export type DeleteManagedWorktreeInput = {
  readonly identifier: string | undefined
  readonly force: boolean
  readonly remote: boolean
  readonly interactive: boolean
  readonly chooser: WorktreeChooser
}

export type DeleteManagedWorktreeResult = {
  readonly record: WorktreeRecord
  readonly stale: boolean
  readonly remoteDeleted: boolean | null
}

export type MergeManagedWorktreeInput = {
  readonly base?: string | undefined
  readonly push?: boolean | undefined
  readonly force: boolean
  readonly noFf: boolean
  readonly ffOnly: boolean
  readonly message?: string | undefined
}

export type MergeManagedWorktreeResult = {
  readonly record: WorktreeRecord
  readonly base: string
  readonly autoCommitted: boolean
  readonly pushed: boolean
}

const warnOnFailure = async ({
  session,
  label,
  task,
}: {
  readonly session: RepoSession
  readonly label: string
  readonly task: () => Promise<void>
}): Promise<boolean> => {
  try {
    await task()
    return true
  } catch (error) {
    session.logger.warn(`${label}: ${describeError(error)}`)
    return false
  }
}

const ensureTargetPathAvailable = async (path: string): Promise<void> => {
  try {
    const info = await stat(path)
    const empty = info.isDirectory() && (await readdir(path)).length === 0
    if (empty) {
      return
    }
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return
    }
    throw error
  }
  throw createCliError("TARGET_PATH_NOT_EMPTY", {
    message: `Target path already exists and is not empty: ${path}`,
    details: { path },
  })
}

/** Makes `base` available locally, fetching it from the remote when needed. */
export const ensureBaseBranch = async (session: RepoSession, base: string): Promise<void> => {
  if (await session.git.branchExists(base)) {
    return
  }
  session.logger.info(`Fetching base branch '${base}' from ${session.config.remote}`)
  if (await session.git.fetchBranch({ remote: session.config.remote, branch: base })) {
    return
  }
  throw createCliError("BASE_BRANCH_NOT_FOUND", {
    message: `Base branch not found locally or on ${session.config.remote}: ${base}`,
    details: { base, remote: session.config.remote },
  })
}

const findBranchWorktree = (worktrees: ReadonlyArray<GitWorktree>, branch: string): GitWorktree | undefined => {
  return worktrees.find((worktree) => worktree.branch === branch && worktree.prunable !== true)
}

const persistNewRecord = async (session: RepoSession, record: WorktreeRecord): Promise<void> => {
  const registry = await loadRegistry(session.registryPath)
  await saveRegistry(addRecord(registry, record), session.registryPath)
}

const dropRecord = async (session: RepoSession, registry: Registry, path: string): Promise<void> => {
  await saveRegistry(removeRecordByPath(registry, path), session.registryPath)
}

/**
 * Runs the init hook for a freshly created worktree. In strict mode a
 * failure undoes the creation through `rollback` and throws.
 */
const runInitHookForRecord = async ({
  session,
  record,
  baseBranch,
  policy,
  rollback,
}: {
  readonly session: RepoSession
  readonly record: WorktreeRecord
  readonly baseBranch: string
  readonly policy: HookPolicy
  readonly rollback: () => Promise<void>
}): Promise<HookOutcome> => {
  if (policy.enabled !== true) {
    return "skipped"
  }
  const command = await resolveInitCommand({ repoRoot: session.repoRoot, configured: session.config.initCommand })
  if (command === null) {
    return "skipped"
  }

  const worktrees = await session.git.listWorktrees()
  const context: InitHookContext = {
    repoRoot: session.repoRoot,
    worktreePath: record.path,
    featureName: record.featureName,
    branch: record.branch,
    baseBranch,
    basePath: findBranchWorktree(worktrees, baseBranch)?.path ?? null,
  }
  if (await session.runInitHook({ command, context })) {
    return "succeeded"
  }

  if (policy.strict !== true) {
    session.logger.warn(`Init hook failed for '${record.featureName}'; the worktree was kept`)
    return "failed"
  }

  session.logger.info(`Init hook failed; rolling back '${record.featureName}'`)
  await rollback()
  throw createCliError("INIT_HOOK_FAILED", {
    message: `Init hook failed for '${record.featureName}'; the worktree was rolled back`,
    details: { command, featureName: record.featureName, branch: record.branch, path: record.path },
  })
}

const rollbackCreatedWorktree = async ({
  session,
  record,
  deleteBranch,
  deleteRemote,
}: {
  readonly session: RepoSession
  readonly record: WorktreeRecord
  readonly deleteBranch: boolean
  readonly deleteRemote: boolean
}): Promise<void> => {
  await session.git.removeWorktree({ path: record.path, force: true })
  if (deleteBranch) {
    await session.git.deleteBranch({ branch: record.branch, force: true })
  }
  if (deleteRemote) {
    await warnOnFailure({
      session,
      label: `Could not delete remote branch '${session.config.remote}/${record.branch}'`,
      task: async () => session.git.deleteRemoteBranch({ remote: session.config.remote, branch: record.branch }),
    })
  }
  const registry = await loadRegistry(session.registryPath)
  await dropRecord(session, registry, record.path)
}

const launchCompanionTool = async (session: RepoSession, cwd: string): Promise<void> => {
  const command = session.config.defaultCompanionTool
  if (command === null) {
    return
  }
  await session.launchCompanion({ command, cwd })
}

export const createFeatureWorktree = async (
  session: RepoSession,
  input: CreateFeatureWorktreeInput,
): Promise<CreateFeatureWorktreeResult> => {
  const featureName = normalizeFeatureName(input.featureName)
  const branch = `${session.config.branchPrefix}${featureName}`
  if (await session.git.branchExists(branch)) {
    throw createCliError("BRANCH_EXISTS", {
      message: `Branch already exists: ${branch}`,
      details: { branch },
    })
  }

  const path = featureNameToWorktreePath({ worktreeRoot: session.worktreeRoot, featureName })
  ensureRecordSlotAvailable({ registry: await loadRegistry(session.registryPath), featureName, path })
  await ensureTargetPathAvailable(path)

  const base = input.base ?? session.config.baseBranch
  await ensureBaseBranch(session, base)

  await ensureMetaGitignore({ repoRoot: session.repoRoot, worktreesDir: session.config.worktreesDir })
  await mkdir(session.worktreeRoot, { recursive: true })
  session.logger.info(`Creating worktree at ${path}`)
  await session.git.addWorktree({ path, branch, base })

  const record = createRecord({ featureName, branch, path, base })
  await persistNewRecord(session, record)

  let pushed = false
  if (input.push ?? session.config.pushOnCreate) {
    pushed = await warnOnFailure({
      session,
      label: `Could not push '${branch}' to ${session.config.remote}`,
      task: async () => {
        await session.git.pushBranch({ cwd: path, remote: session.config.remote, branch, setUpstream: true })
      },
    })
  }

  const hook = await runInitHookForRecord({
    session,
    record,
    baseBranch: base,
    policy: input.hook,
    rollback: async () => rollbackCreatedWorktree({ session, record, deleteBranch: true, deleteRemote: pushed }),
  })

  if (input.companion) {
    await launchCompanionTool(session, path)
  }

  return { record, pushed, hook }
}

export const checkoutBranchWorktree = async (
  session: RepoSession,
  input: CheckoutBranchWorktreeInput,
): Promise<CheckoutBranchWorktreeResult> => {
  const { branch } = input
  const worktrees = await session.git.listWorktrees()
  const existing = findBranchWorktree(worktrees, branch)
  if (existing !== undefined) {
    if (input.companion) {
      await launchCompanionTool(session, existing.path)
    }
    return { kind: "existing", path: existing.path, branch }
  }
  if (worktrees.some((worktree) => worktree.branch === branch && worktree.prunable)) {
    await session.git.pruneWorktrees()
  }

  let fetched = false
  if ((await session.git.branchExists(branch)) !== true) {
    session.logger.info(`Fetching branch '${branch}' from ${session.config.remote}`)
    fetched = await session.git.fetchBranch({ remote: session.config.remote, branch })
    if (fetched !== true) {
      throw createCliError("BRANCH_NOT_FOUND", {
        message: `Branch not found locally or on ${session.config.remote}: ${branch}`,
        details: { branch, remote: session.config.remote },
      })
    }
  }

  const featureName = deriveFeatureNameFromBranch({ branch, branchPrefix: session.config.branchPrefix })
  const path = featureNameToWorktreePath({ worktreeRoot: session.worktreeRoot, featureName })
  ensureRecordSlotAvailable({ registry: await loadRegistry(session.registryPath), featureName, path })
  await ensureTargetPathAvailable(path)

  await ensureMetaGitignore({ repoRoot: session.repoRoot, worktreesDir: session.config.worktreesDir })
  await mkdir(session.worktreeRoot, { recursive: true })
  session.logger.info(`Creating worktree at ${path}`)
  await session.git.addWorktree({ path, branch })

  const base = session.config.baseBranch
  const record = createRecord({ featureName, branch, path, base })
  await persistNewRecord(session, record)

  const hook = await runInitHookForRecord({
    session,
    record,
    baseBranch: base,
    policy: input.hook,
    rollback: async () => rollbackCreatedWorktree({ session, record, deleteBranch: fetched, deleteRemote: false }),
  })

  if (input.companion) {
    await launchCompanionTool(session, path)
  }

  return { kind: "created", path, branch, record, hook }
}

const ensureNothingWouldBeLost = async (session: RepoSession, record: WorktreeRecord): Promise<void> => {
  if (await session.git.hasUncommittedChanges(record.path)) {
    throw createCliError("UNCOMMITTED_CHANGES", {
      message: `Worktree '${record.featureName}' has uncommitted changes`,
      details: { featureName: record.featureName, path: record.path },
    })
  }
  const unpushed = await session.git.countUnpushedCommits(record.path)
  if (unpushed === null || unpushed > 0) {
    throw createCliError("UNPUSHED_COMMITS", {
      message:
        unpushed === null
          ? `Branch '${record.branch}' has no upstream; its commits may exist only locally`
          : `Branch '${record.branch}' has ${String(unpushed)} unpushed commit(s)`,
      details: { featureName: record.featureName, branch: record.branch, unpushed },
    })
  }
}

export const deleteManagedWorktree = async (
  session: RepoSession,
  input: DeleteManagedWorktreeInput,
): Promise<DeleteManagedWorktreeResult> => {
  const registry = await loadRegistry(session.registryPath)
  const record = await resolveTargetRecord({
    registry,
    identifier: input.identifier,
    location: session.location,
    interactive: input.interactive,
    chooser: input.chooser,
    message: "Select worktree to delete",
  })

  const stale = (await pathExists(record.path)) !== true
  if (stale) {
    session.logger.warn(`Worktree path '${record.path}' not found on disk; treating as stale entry`)
    await warnOnFailure({
      session,
      label: "Could not remove worktree",
      task: async () => session.git.removeWorktree({ path: record.path, force: true }),
    })
    await warnOnFailure({
      session,
      label: "Could not prune worktrees",
      task: async () => session.git.pruneWorktrees(),
    })
    await warnOnFailure({
      session,
      label: `Could not delete branch '${record.branch}'`,
      task: async () => session.git.deleteBranch({ branch: record.branch, force: input.force }),
    })
  } else {
    if (input.force !== true) {
      await ensureNothingWouldBeLost(session, record)
    }
    session.logger.info(`Removing worktree at ${record.path}`)
    await session.git.removeWorktree({ path: record.path, force: input.force })
    session.logger.info(`Deleting branch '${record.branch}'`)
    await session.git.deleteBranch({ branch: record.branch, force: true })
  }

  let remoteDeleted: boolean | null = null
  if (input.remote) {
    remoteDeleted = await warnOnFailure({
      session,
      label: `Could not delete remote branch '${session.config.remote}/${record.branch}'`,
      task: async () => session.git.deleteRemoteBranch({ remote: session.config.remote, branch: record.branch }),
    })
  }

  await dropRecord(session, registry, record.path)
  return { record, stale, remoteDeleted }
}

/**
 * Commits everything in `cwd` when it is dirty. Returns whether a commit was
 * made; throws `UNCOMMITTED_CHANGES` when auto-commit is disabled.
 */
export const commitPendingChanges = async ({
  session,
  cwd,
  branch,
  message,
}: {
  readonly session: RepoSession
  readonly cwd: string
  readonly branch: string
  readonly message?: string | undefined
}): Promise<boolean> => {
  if ((await session.git.hasUncommittedChanges(cwd)) !== true) {
    return false
  }
  if (session.config.autoCommit !== true) {
    throw createCliError("UNCOMMITTED_CHANGES", {
      message: `Worktree for '${branch}' has uncommitted changes`,
      details: { branch, path: cwd },
    })
  }
  session.logger.info("Auto-committing uncommitted changes")
  await session.git.commitAll({ cwd, message: message ?? `${DEFAULT_AUTO_COMMIT_MESSAGE_PREFIX}${branch}` })
  return true
}

/** Record of the worktree the command runs in, or `NOT_IN_WORKTREE`. */
export const resolveCurrentRecord = async (
  session: RepoSession,
  registry: Registry,
): Promise<WorktreeRecord> => {
  const { location } = session
  const record =
    location.kind === "worktree"
      ? await findByLocation({ registry, path: location.path, branch: location.branch })
      : undefined
  if (record === undefined) {
    throw createCliError("NOT_IN_WORKTREE", {
      message: "Run this command from inside a managed worktree",
      details: { cwd: session.cwd },
    })
  }
  return record
}

export const mergeManagedWorktree = async (
  session: RepoSession,
  input: MergeManagedWorktreeInput,
): Promise<MergeManagedWorktreeResult> => {
  if (input.noFf && input.ffOnly) {
    throw createCliError("USAGE_ERROR", {
      message: "Cannot use --no-ff and --ff-only together",
    })
  }

  const registry = await loadRegistry(session.registryPath)
  const record = await resolveCurrentRecord(session, registry)

  const autoCommitted =
    input.force !== true &&
    (await commitPendingChanges({ session, cwd: record.path, branch: record.branch, message: input.message }))

  const base = input.base ?? (record.base.length > 0 ? record.base : session.config.baseBranch)
  await ensureBaseBranch(session, base)

  session.logger.info(`Checking out '${base}'`)
  await session.git.checkout(base)
  session.logger.info(`Merging '${record.branch}' into '${base}'`)
  await session.git.merge({ branch: record.branch, noFf: input.noFf, ffOnly: input.ffOnly })

  const pushed = input.push ?? session.config.pushOnMerge
  if (pushed) {
    session.logger.info(`Pushing '${base}' to ${session.config.remote}`)
    await session.git.pushBranch({
      cwd: session.repoRoot,
      remote: session.config.remote,
      branch: base,
      setUpstream: false,
    })
  }

  session.logger.info(`Removing worktree at ${record.path}`)
  await session.git.removeWorktree({ path: record.path, force: true })
  await session.git.deleteBranch({ branch: record.branch, force: true })
  await dropRecord(session, registry, record.path)

  return { record, base, autoCommitted, pushed }
}
