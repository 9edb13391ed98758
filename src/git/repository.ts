import { doesGitRefExist, runGitCommand } from "./exec"
import { type GitWorktree, listGitWorktrees } from "./worktree"

export type AheadBehind = {
  readonly ahead: number
  readonly behind: number
}

export type MergeFastForwardPolicy = {
  readonly noFf: boolean
  readonly ffOnly: boolean
}

/**
 * Queries and mutation primitives the lifecycle needs from git.
 *
 * Queries report "not found" as a value (`false` / `null`); mutations throw
 * `COMMAND_FAILED` when git exits non-zero.
 */
export type GitRepository = {
  readonly repoRoot: string
  currentBranch: (cwd?: string) => Promise<string | null>
  branchExists: (branch: string) => Promise<boolean>
  fetchBranch: (input: { readonly remote: string; readonly branch: string }) => Promise<boolean>
  listWorktrees: () => Promise<GitWorktree[]>
  hasUncommittedChanges: (path: string) => Promise<boolean>
  countUnpushedCommits: (path: string) => Promise<number | null>
  aheadBehind: (path: string) => Promise<AheadBehind | null>
  lastCommitTime: (path: string) => Promise<Date | null>
  isBranchMerged: (input: { readonly branch: string; readonly into: string }) => Promise<boolean | null>
  upstreamBranch: (cwd: string) => Promise<string | null>
  listRemoteBranches: (remote: string) => Promise<string[]>
  addWorktree: (input: { readonly path: string; readonly branch: string; readonly base?: string }) => Promise<void>
  removeWorktree: (input: { readonly path: string; readonly force: boolean }) => Promise<void>
  pruneWorktrees: () => Promise<void>
  deleteBranch: (input: { readonly branch: string; readonly force: boolean }) => Promise<void>
  deleteRemoteBranch: (input: { readonly remote: string; readonly branch: string }) => Promise<void>
  pushBranch: (input: {
    readonly cwd: string
    readonly remote: string
    readonly branch: string
    readonly setUpstream: boolean
  }) => Promise<void>
  checkout: (branch: string) => Promise<void>
  merge: (input: { readonly branch: string } & MergeFastForwardPolicy) => Promise<void>
  commitAll: (input: { readonly cwd: string; readonly message: string }) => Promise<void>
}

const parseCount = (value: string | undefined): number | null => {
  if (value === undefined) {
    return null
  }
  const parsed = Number.parseInt(value.trim(), 10)
  return Number.isNaN(parsed) ? null : parsed
}

export const buildMergeArgs = ({ branch, noFf, ffOnly }: { readonly branch: string } & MergeFastForwardPolicy): string[] => {
  const args = ["merge"]
  if (noFf) {
    args.push("--no-ff")
  }
  if (ffOnly) {
    args.push("--ff-only")
  }
  args.push(branch)
  return args
}

export const createGitRepository = (repoRoot: string): GitRepository => {
  const upstreamBranch = async (cwd: string): Promise<string | null> => {
    const result = await runGitCommand({
      cwd,
      args: ["rev-parse", "--abbrev-ref", "--symbolic-full-name", "@{upstream}"],
      reject: false,
    })
    const upstream = result.stdout.trim()
    return result.exitCode === 0 && upstream.length > 0 ? upstream : null
  }

  return {
    repoRoot,

    async currentBranch(cwd = repoRoot) {
      const result = await runGitCommand({
        cwd,
        args: ["symbolic-ref", "--quiet", "--short", "HEAD"],
        reject: false,
      })
      const branch = result.stdout.trim()
      return result.exitCode === 0 && branch.length > 0 ? branch : null
    },

    async branchExists(branch) {
      return doesGitRefExist(repoRoot, `refs/heads/${branch}`)
    },

    async fetchBranch({ remote, branch }) {
      const result = await runGitCommand({
        cwd: repoRoot,
        args: ["fetch", remote, `${branch}:${branch}`],
        reject: false,
      })
      return result.exitCode === 0
    },

    async listWorktrees() {
      return listGitWorktrees(repoRoot)
    },

    async hasUncommittedChanges(path) {
      const result = await runGitCommand({
        cwd: path,
        args: ["status", "--porcelain"],
      })
      return result.stdout.trim().length > 0
    },

    async countUnpushedCommits(path) {
      const result = await runGitCommand({
        cwd: path,
        args: ["rev-list", "--count", "@{upstream}..HEAD"],
        reject: false,
      })
      if (result.exitCode !== 0) {
        return null
      }
      return parseCount(result.stdout)
    },

    async aheadBehind(path) {
      const result = await runGitCommand({
        cwd: path,
        args: ["rev-list", "--left-right", "--count", "HEAD...@{upstream}"],
        reject: false,
      })
      if (result.exitCode !== 0) {
        return null
      }
      const [aheadRaw, behindRaw] = result.stdout.trim().split(/\s+/)
      const ahead = parseCount(aheadRaw)
      const behind = parseCount(behindRaw)
      if (ahead === null || behind === null) {
        return null
      }
      return { ahead, behind }
    },

    async lastCommitTime(path) {
      const result = await runGitCommand({
        cwd: path,
        args: ["log", "-1", "--format=%cI"],
        reject: false,
      })
      const raw = result.stdout.trim()
      if (result.exitCode !== 0 || raw.length === 0) {
        return null
      }
      const parsed = new Date(raw)
      return Number.isNaN(parsed.getTime()) ? null : parsed
    },

    async isBranchMerged({ branch, into }) {
      const result = await runGitCommand({
        cwd: repoRoot,
        args: ["merge-base", "--is-ancestor", branch, into],
        reject: false,
      })
      if (result.exitCode === 0) {
        return true
      }
      if (result.exitCode === 1) {
        return false
      }
      return null
    },

    upstreamBranch,

    async listRemoteBranches(remote) {
      const result = await runGitCommand({
        cwd: repoRoot,
        args: ["for-each-ref", "--format=%(refname)", `refs/remotes/${remote}/`],
        reject: false,
      })
      if (result.exitCode !== 0) {
        return []
      }
      const prefix = `refs/remotes/${remote}/`
      return result.stdout
        .split("\n")
        .map((line) => line.trim())
        .filter((line) => line.startsWith(prefix))
        .map((line) => line.slice(prefix.length))
        .filter((branch) => branch.length > 0 && branch !== "HEAD")
    },

    async addWorktree({ path, branch, base }) {
      const args = base === undefined ? ["worktree", "add", path, branch] : ["worktree", "add", "-b", branch, path, base]
      await runGitCommand({ cwd: repoRoot, args })
    },

    async removeWorktree({ path, force }) {
      const args = force ? ["worktree", "remove", "--force", path] : ["worktree", "remove", path]
      await runGitCommand({ cwd: repoRoot, args })
    },

    async pruneWorktrees() {
      await runGitCommand({ cwd: repoRoot, args: ["worktree", "prune"] })
    },

    async deleteBranch({ branch, force }) {
      await runGitCommand({ cwd: repoRoot, args: ["branch", force ? "-D" : "-d", branch] })
    },

    async deleteRemoteBranch({ remote, branch }) {
      await runGitCommand({ cwd: repoRoot, args: ["push", remote, "--delete", branch] })
    },

    async pushBranch({ cwd, remote, branch, setUpstream }) {
      const args = setUpstream ? ["push", "-u", remote, branch] : ["push", remote, branch]
      await runGitCommand({ cwd, args })
    },

    async checkout(branch) {
      await runGitCommand({ cwd: repoRoot, args: ["checkout", branch] })
    },

    async merge(input) {
      await runGitCommand({ cwd: repoRoot, args: buildMergeArgs(input) })
    },

    async commitAll({ cwd, message }) {
      await runGitCommand({ cwd, args: ["add", "-A"] })
      await runGitCommand({ cwd, args: ["commit", "-m", message] })
    },
  }
}
