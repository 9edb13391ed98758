import { writeFile } from "node:fs/promises"
import { join } from "node:path"
import { afterEach, describe, expect, it } from "vitest"
import { createGitRepository } from "../git/repository"
import { attachBareRemote, cleanupRepoFixtures, commitFile, createRepoFixture, runGit } from "../test-utils/repo-fixture"
import { createRecord } from "./registry"
import {
  collectRecordStatus,
  collectRegistryStatus,
  collectRemoteOnlyBranches,
  readWorktreeSettings,
} from "./worktree-state"

const setupWorktree = async () => {
  const repoRoot = await createRepoFixture()
  const path = join(repoRoot, ".wt", "worktrees", "login")
  await runGit(repoRoot, ["worktree", "add", "-b", "feature/login", path, "main"])
  const record = createRecord({ featureName: "login", branch: "feature/login", path, base: "main" })
  return { repoRoot, path, record, git: createGitRepository(repoRoot) }
}

afterEach(async () => {
  await cleanupRepoFixtures()
})

describe("collectRecordStatus", () => {
  it("reports a fresh worktree as clean, merged and without upstream", async () => {
    const { git, record } = await setupWorktree()

    const status = await collectRecordStatus({ git, record, fallbackBase: "develop" })

    expect(status.exists).toBe(true)
    expect(status.dirty).toBe(false)
    expect(status.ahead).toBeNull()
    expect(status.behind).toBeNull()
    expect(status.merged).toBe(true)
    expect(status.lastCommitAt).toBeInstanceOf(Date)
  })

  it("reports dirty and unmerged work", async () => {
    const { git, path, record } = await setupWorktree()
    await commitFile({ cwd: path, file: "login.txt", content: "login\n", message: "add login" })
    await writeFile(join(path, "notes.txt"), "wip\n", "utf8")

    const status = await collectRecordStatus({ git, record, fallbackBase: "main" })

    expect(status.dirty).toBe(true)
    expect(status.merged).toBe(false)
  })

  it("uses the fallback base when the record has none", async () => {
    const { git, path, record } = await setupWorktree()
    await commitFile({ cwd: path, file: "login.txt", content: "login\n", message: "add login" })

    const status = await collectRecordStatus({ git, record: { ...record, base: "" }, fallbackBase: "feature/login" })

    expect(status.merged).toBe(true)
  })

  it("projects a missing path without probing git", async () => {
    const { git, repoRoot } = await setupWorktree()
    const record = createRecord({
      featureName: "gone",
      branch: "feature/gone",
      path: join(repoRoot, ".wt", "worktrees", "gone"),
      base: "main",
    })

    const [status] = await collectRegistryStatus({ git, registry: { worktrees: [record] }, fallbackBase: "main" })

    expect(status).toEqual({
      record,
      exists: false,
      dirty: null,
      ahead: null,
      behind: null,
      lastCommitAt: null,
      merged: null,
    })
  })
})

describe("collectRemoteOnlyBranches", () => {
  it("lists remote branches without a managed worktree", async () => {
    const repoRoot = await createRepoFixture()
    await attachBareRemote(repoRoot)
    await runGit(repoRoot, ["push", "origin", "main:release"])
    const record = createRecord({ featureName: "release", branch: "release", path: join(repoRoot, "x"), base: "main" })

    const branches = await collectRemoteOnlyBranches({
      git: createGitRepository(repoRoot),
      registry: { worktrees: [record] },
      remote: "origin",
    })

    expect(branches).toEqual([{ remote: "origin", branch: "main" }])
  })
})

describe("readWorktreeSettings", () => {
  it("returns null without a settings file", async () => {
    const { path } = await setupWorktree()

    expect(await readWorktreeSettings(path)).toBeNull()
  })

  it("reads the settings object", async () => {
    const { path } = await setupWorktree()
    await writeFile(join(path, ".wt.json"), '{"port": 3001}\n', "utf8")

    expect(await readWorktreeSettings(path)).toEqual({
      path: join(path, ".wt.json"),
      valid: true,
      values: { port: 3001 },
    })
  })

  it("reports malformed JSON and non-object documents", async () => {
    const { path } = await setupWorktree()
    await writeFile(join(path, ".wt.json"), '"port"\n', "utf8")

    expect(await readWorktreeSettings(path)).toEqual({
      path: join(path, ".wt.json"),
      valid: false,
      reason: "expected a JSON object",
    })

    await writeFile(join(path, ".wt.json"), "{", "utf8")

    expect(await readWorktreeSettings(path)).toMatchObject({ valid: false })
  })
})
