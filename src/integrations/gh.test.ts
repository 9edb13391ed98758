import { describe, expect, it, vi } from "vitest"
import { buildPullRequestArgs, createPullRequest, ensureGhAvailable, type GhCommandRunner } from "./gh"

describe("buildPullRequestArgs", () => {
  it("fills title and body from commits when no title is given", () => {
    expect(buildPullRequestArgs({ base: "main", head: "feature/login", draft: false })).toEqual([
      "pr",
      "create",
      "--base",
      "main",
      "--head",
      "feature/login",
      "--fill",
    ])
  })

  it("passes title, body and draft", () => {
    expect(
      buildPullRequestArgs({ base: "develop", head: "feature/x", title: "Add x", body: "Details", draft: true }),
    ).toEqual(["pr", "create", "--base", "develop", "--head", "feature/x", "--title", "Add x", "--body", "Details", "--draft"])
  })
})

describe("createPullRequest", () => {
  it("returns the last line printed by gh", async () => {
    const runGh = vi.fn<GhCommandRunner>(async () => ({
      exitCode: 0,
      stdout: "Creating pull request for feature/login into main\n\nhttps://github.com/example/repo/pull/7\n",
      stderr: "",
    }))

    const url = await createPullRequest({
      cwd: "/repo/login",
      base: "main",
      head: "feature/login",
      draft: false,
      runGh,
    })

    expect(url).toBe("https://github.com/example/repo/pull/7")
    expect(runGh).toHaveBeenCalledWith({
      cwd: "/repo/login",
      args: ["pr", "create", "--base", "main", "--head", "feature/login", "--fill"],
    })
  })

  it("throws COMMAND_FAILED with gh stderr", async () => {
    const runGh: GhCommandRunner = async () => ({
      exitCode: 1,
      stdout: "",
      stderr: "a pull request already exists",
    })

    await expect(
      createPullRequest({ cwd: "/repo", base: "main", head: "feature/x", draft: false, runGh }),
    ).rejects.toMatchObject({
      code: "COMMAND_FAILED",
      details: { stderr: "a pull request already exists" },
    })
  })
})

describe("ensureGhAvailable", () => {
  it("throws DEPENDENCY_MISSING when gh --version fails", async () => {
    const runGh: GhCommandRunner = async () => ({ exitCode: 127, stdout: "", stderr: "" })

    await expect(ensureGhAvailable({ cwd: "/repo", runGh })).rejects.toMatchObject({
      code: "DEPENDENCY_MISSING",
      exitCode: 3,
    })
  })

  it("passes when gh answers", async () => {
    const runGh: GhCommandRunner = async () => ({ exitCode: 0, stdout: "gh version 2.0.0", stderr: "" })

    await expect(ensureGhAvailable({ cwd: "/repo", runGh })).resolves.toBeUndefined()
  })
})
