import { access, readFile, stat, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { afterEach, describe, expect, it } from "vitest"
import { DEFAULT_CONFIG } from "../config/types"
import { cleanupRepoFixtures, createTempDirectory } from "../test-utils/repo-fixture"
import { buildIgnoreEntries, initializeRepository } from "./init"

afterEach(async () => {
  await cleanupRepoFixtures()
})

const readConfig = async (repoRoot: string): Promise<unknown> => {
  return JSON.parse(await readFile(join(repoRoot, ".wt", "wt.json"), "utf8"))
}

describe("buildIgnoreEntries", () => {
  it("ignores the worktrees dir only when it sits under .wt", () => {
    expect(buildIgnoreEntries({ repoRoot: "/repo", worktreesDir: ".wt/worktrees" })).toEqual([
      "state.json",
      "logs/",
      "worktrees/",
    ])
    expect(buildIgnoreEntries({ repoRoot: "/repo", worktreesDir: "../trees" })).toEqual(["state.json", "logs/"])
  })
})

describe("initializeRepository", () => {
  it("writes defaults with the current branch as base", async () => {
    const repoRoot = await createTempDirectory()

    const result = await initializeRepository({
      repoRoot,
      currentBranch: "main",
      overrides: {},
      hook: false,
      force: false,
    })

    expect(result.alreadyInitialized).toBe(false)
    expect(result.hookPath).toBeNull()
    expect(await readConfig(repoRoot)).toEqual({ ...DEFAULT_CONFIG, baseBranch: "main" })
    expect(await readFile(join(repoRoot, ".wt", ".gitignore"), "utf8")).toBe("state.json\nlogs/\nworktrees/\n")
    expect((await stat(join(repoRoot, ".wt", "worktrees"))).isDirectory()).toBe(true)
    expect(JSON.parse(await readFile(join(repoRoot, ".wt", "state.json"), "utf8"))).toEqual({ worktrees: [] })
  })

  it("is a no-op when already initialized without overrides", async () => {
    const repoRoot = await createTempDirectory()
    await initializeRepository({ repoRoot, currentBranch: "main", overrides: { remote: "upstream" }, hook: false, force: false })

    const result = await initializeRepository({ repoRoot, currentBranch: "other", overrides: {}, hook: false, force: false })

    expect(result.alreadyInitialized).toBe(true)
    expect(result.config.remote).toBe("upstream")
    expect(result.config.baseBranch).toBe("main")
  })

  it("merges overrides into the existing config", async () => {
    const repoRoot = await createTempDirectory()
    await initializeRepository({ repoRoot, currentBranch: "main", overrides: { remote: "upstream" }, hook: false, force: false })

    const result = await initializeRepository({
      repoRoot,
      currentBranch: "main",
      overrides: { branchPrefix: "", initCommand: "make setup" },
      hook: false,
      force: false,
    })

    expect(result.config).toEqual({
      ...DEFAULT_CONFIG,
      baseBranch: "main",
      remote: "upstream",
      branchPrefix: "",
      initCommand: "make setup",
    })
  })

  it("resets to defaults with force", async () => {
    const repoRoot = await createTempDirectory()
    await initializeRepository({ repoRoot, currentBranch: "main", overrides: { remote: "upstream" }, hook: false, force: false })

    const result = await initializeRepository({ repoRoot, currentBranch: "trunk", overrides: {}, hook: false, force: true })

    expect(result.config).toEqual({ ...DEFAULT_CONFIG, baseBranch: "trunk" })
  })

  it("rejects an empty base branch override", async () => {
    const repoRoot = await createTempDirectory()

    await expect(
      initializeRepository({ repoRoot, currentBranch: "main", overrides: { baseBranch: " " }, hook: false, force: false }),
    ).rejects.toMatchObject({ code: "INVALID_CONFIG" })
    await expect(access(join(repoRoot, ".wt", "wt.json"))).rejects.toMatchObject({ code: "ENOENT" })
  })

  it("creates an executable hook template and keeps an edited one", async () => {
    const repoRoot = await createTempDirectory()

    const result = await initializeRepository({ repoRoot, currentBranch: "main", overrides: {}, hook: true, force: false })
    const hookPath = join(repoRoot, ".wt", "hooks", "init.sh")

    expect(result.hookPath).toBe(hookPath)
    expect((await stat(hookPath)).mode & 0o111).not.toBe(0)
    expect(await readFile(hookPath, "utf8")).toContain("#!/bin/sh\n")

    await writeFile(hookPath, "#!/bin/sh\necho custom\n", "utf8")
    await initializeRepository({ repoRoot, currentBranch: "main", overrides: {}, hook: true, force: false })

    expect(await readFile(hookPath, "utf8")).toBe("#!/bin/sh\necho custom\n")
  })

  it("appends only missing ignore entries", async () => {
    const repoRoot = await createTempDirectory()
    await initializeRepository({ repoRoot, currentBranch: "main", overrides: {}, hook: false, force: false })
    await writeFile(join(repoRoot, ".wt", ".gitignore"), "state.json\n*.tmp", "utf8")

    await initializeRepository({ repoRoot, currentBranch: "main", overrides: {}, hook: false, force: false })

    expect(await readFile(join(repoRoot, ".wt", ".gitignore"), "utf8")).toBe("state.json\n*.tmp\nlogs/\nworktrees/\n")
  })
})
