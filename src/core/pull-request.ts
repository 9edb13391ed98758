import { createPullRequest, defaultRunGh, ensureGhAvailable, type GhCommandRunner } from "../integrations/gh"
import { createCliError } from "./errors"
import { commitPendingChanges, resolveCurrentRecord } from "./lifecycle"
import { loadRegistry, type WorktreeRecord } from "./registry"
import type { RepoSession } from "./session"

export type CreatePullRequestForWorktreeInput = {
  readonly base?: string | undefined
  readonly title?: string | undefined
  readonly body?: string | undefined
  readonly draft: boolean
  readonly push: boolean
  readonly runGh?: GhCommandRunner
}

export type CreatePullRequestForWorktreeResult = {
  readonly record: WorktreeRecord
  readonly base: string
  readonly url: string
  readonly autoCommitted: boolean
  readonly pushed: boolean
}

/**
 * Opens a pull request for the worktree the command runs in. The branch is
 * pushed first (with upstream when it has none) unless `push` is false, in
 * which case an upstream must already exist.
 */
export const createPullRequestForWorktree = async (
  session: RepoSession,
  input: CreatePullRequestForWorktreeInput,
): Promise<CreatePullRequestForWorktreeResult> => {
  const runGh = input.runGh ?? defaultRunGh
  const record = await resolveCurrentRecord(session, await loadRegistry(session.registryPath))
  await ensureGhAvailable({ cwd: record.path, runGh })

  const base = input.base ?? (record.base.length > 0 ? record.base : session.config.baseBranch)
  const autoCommitted = await commitPendingChanges({ session, cwd: record.path, branch: record.branch })

  const upstream = await session.git.upstreamBranch(record.path)
  if (input.push !== true && upstream === null) {
    throw createCliError("USAGE_ERROR", {
      message: `Branch '${record.branch}' has no upstream set`,
      suggestion: "Run without --no-push to set the upstream.",
      details: { branch: record.branch },
    })
  }
  if (input.push) {
    session.logger.info(`Pushing '${record.branch}' to ${session.config.remote}`)
    await session.git.pushBranch({
      cwd: record.path,
      remote: session.config.remote,
      branch: record.branch,
      setUpstream: upstream === null,
    })
  }

  session.logger.info("Creating pull request")
  const url = await createPullRequest({
    cwd: record.path,
    base,
    head: record.branch,
    title: input.title,
    body: input.body,
    draft: input.draft,
    runGh,
  })

  return { record, base, url, autoCommitted, pushed: input.push }
}
