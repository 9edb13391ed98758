import { mkdir, mkdtemp, realpath, rm, symlink } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, describe, expect, it, vi } from "vitest"
import { catchError } from "../test-utils/catch-error"

vi.mock("../git/exec", () => {
  return {
    runGitCommand: vi.fn(),
  }
})

import { runGitCommand } from "../git/exec"
import {
  canonicalizePath,
  ensurePathInsideRoot,
  featureNameToWorktreePath,
  getConfigFilePath,
  getInitHookPath,
  getLogsDirectoryPath,
  getRegistryFilePath,
  getWorktreeRootPath,
  isSamePath,
  resolveRepoContext,
} from "./paths"

const mockedRunGitCommand = vi.mocked(runGitCommand)

const gitResult = ({
  stdout = "",
  stderr = "",
  exitCode = 0,
}: {
  readonly stdout?: string
  readonly stderr?: string
  readonly exitCode?: number
}) => {
  return {
    stdout,
    stderr,
    exitCode,
  }
}

const tempDirs = new Set<string>()

afterEach(async () => {
  mockedRunGitCommand.mockReset()
  await Promise.all(
    [...tempDirs].map(async (dir) => {
      await rm(dir, { recursive: true, force: true })
    }),
  )
  tempDirs.clear()
})

describe("resolveRepoContext", () => {
  it("resolves the main repository root from a linked worktree", async () => {
    mockedRunGitCommand.mockImplementation(async ({ args }) => {
      if (args.join(" ") === "rev-parse --show-toplevel") {
        return gitResult({ stdout: "/repo/.wt/worktrees/login\n" })
      }
      if (args.join(" ") === "rev-parse --path-format=absolute --git-common-dir") {
        return gitResult({ stdout: "/repo/.git\n" })
      }
      throw new Error(`unexpected git args: ${args.join(" ")}`)
    })

    const context = await resolveRepoContext("/repo/.wt/worktrees/login/src")

    expect(context).toEqual({
      repoRoot: "/repo",
      currentWorktreeRoot: "/repo/.wt/worktrees/login",
      gitCommonDir: "/repo/.git",
    })
  })

  it("rejects bare repositories", async () => {
    mockedRunGitCommand.mockImplementation(async ({ args }) => {
      if (args.join(" ") === "rev-parse --show-toplevel") {
        return gitResult({ stderr: "fatal: this operation must be run in a work tree", exitCode: 128 })
      }
      if (args.join(" ") === "rev-parse --is-bare-repository") {
        return gitResult({ stdout: "true\n" })
      }
      throw new Error(`unexpected git args: ${args.join(" ")}`)
    })

    await expect(resolveRepoContext("/srv/repo.git")).rejects.toMatchObject({
      code: "NOT_GIT_REPOSITORY",
      message: "Bare repositories are not supported; run inside a repository with a working tree",
    })
  })

  it("rejects directories outside any repository", async () => {
    mockedRunGitCommand.mockResolvedValue(gitResult({ stderr: "fatal: not a git repository", exitCode: 128 }))

    await expect(resolveRepoContext("/tmp/elsewhere")).rejects.toMatchObject({
      code: "NOT_GIT_REPOSITORY",
      message: "Current directory is not inside a Git repository",
    })
  })
})

describe("metadata paths", () => {
  it("keeps config, registry, hooks and logs under .wt", () => {
    expect(getConfigFilePath("/repo")).toBe("/repo/.wt/wt.json")
    expect(getRegistryFilePath("/repo")).toBe("/repo/.wt/state.json")
    expect(getInitHookPath("/repo")).toBe("/repo/.wt/hooks/init.sh")
    expect(getLogsDirectoryPath("/repo")).toBe("/repo/.wt/logs")
  })

  it("resolves the worktree root relative to the repository unless absolute", () => {
    expect(getWorktreeRootPath("/repo", ".wt/worktrees")).toBe("/repo/.wt/worktrees")
    expect(getWorktreeRootPath("/repo", "../trees")).toBe("/trees")
    expect(getWorktreeRootPath("/repo", "/var/trees/")).toBe("/var/trees")
  })

  it("places feature worktrees directly under the root", () => {
    expect(featureNameToWorktreePath({ worktreeRoot: "/repo/.wt/worktrees", featureName: "my-feature" })).toBe(
      "/repo/.wt/worktrees/my-feature",
    )
    expect(
      catchError(() => featureNameToWorktreePath({ worktreeRoot: "/repo/.wt/worktrees", featureName: "." })),
    ).toMatchObject({ code: "INVALID_FEATURE_NAME" })
    expect(
      catchError(() => featureNameToWorktreePath({ worktreeRoot: "/repo/.wt/worktrees", featureName: ".." })),
    ).toMatchObject({ code: "USAGE_ERROR" })
  })

  it("rejects paths that escape the root", () => {
    expect(ensurePathInsideRoot({ rootPath: "/repo", path: "/repo/a/b" })).toBe("/repo/a/b")
    expect(
      catchError(() => ensurePathInsideRoot({ rootPath: "/repo", path: "/repository" })),
    ).toMatchObject({ code: "USAGE_ERROR" })
  })
})

describe("canonicalizePath", () => {
  it("resolves symlinked directories, including missing children", async () => {
    const root = await realpath(await mkdtemp(join(tmpdir(), "wt-flow-paths-")))
    tempDirs.add(root)
    await mkdir(join(root, "real", "trees"), { recursive: true })
    await symlink(join(root, "real"), join(root, "alias"))

    expect(await canonicalizePath(join(root, "alias", "trees"))).toBe(join(root, "real", "trees"))
    expect(await canonicalizePath(join(root, "alias", "trees", "gone", "deeper"))).toBe(
      join(root, "real", "trees", "gone", "deeper"),
    )
    expect(await isSamePath(join(root, "alias", "trees"), join(root, "real", "trees"))).toBe(true)
    expect(await isSamePath(join(root, "alias"), join(root, "real", "trees"))).toBe(false)
  })
})
