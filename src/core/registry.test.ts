import { mkdir, readFile, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { afterEach, describe, expect, it } from "vitest"
import { catchError } from "../test-utils/catch-error"
import { cleanupRepoFixtures, createTempDirectory } from "../test-utils/repo-fixture"
import {
  addRecord,
  createRecord,
  EMPTY_REGISTRY,
  findByBranch,
  findByFeatureName,
  findByPath,
  loadRegistry,
  removeRecordByPath,
  saveRegistry,
} from "./registry"

afterEach(async () => {
  await cleanupRepoFixtures()
})

const loginRecord = createRecord({
  featureName: "login",
  branch: "feature/login",
  path: "/repo/.wt/worktrees/login",
  base: "main",
  now: new Date("2026-03-01T10:00:00.000Z"),
})

const searchRecord = createRecord({
  featureName: "search",
  branch: "feature/search",
  path: "/repo/.wt/worktrees/search",
  base: "develop",
  now: new Date("2026-03-02T09:30:00.000Z"),
})

describe("loadRegistry", () => {
  it("returns an empty registry when the file does not exist", async () => {
    const root = await createTempDirectory()

    expect(await loadRegistry(join(root, ".wt", "state.json"))).toEqual(EMPTY_REGISTRY)
  })

  it("round-trips every recorded field", async () => {
    const root = await createTempDirectory()
    const path = join(root, ".wt", "state.json")
    const registry = addRecord(addRecord(EMPTY_REGISTRY, loginRecord), searchRecord)

    await saveRegistry(registry, path)

    expect(await loadRegistry(path)).toEqual(registry)
    expect(JSON.parse(await readFile(path, "utf8"))).toEqual({
      worktrees: [
        {
          featureName: "login",
          branch: "feature/login",
          path: "/repo/.wt/worktrees/login",
          base: "main",
          createdAt: "2026-03-01T10:00:00.000Z",
        },
        {
          featureName: "search",
          branch: "feature/search",
          path: "/repo/.wt/worktrees/search",
          base: "develop",
          createdAt: "2026-03-02T09:30:00.000Z",
        },
      ],
    })
  })

  it("defaults optional fields and ignores unknown ones", async () => {
    const root = await createTempDirectory()
    const path = join(root, "state.json")
    await writeFile(
      path,
      JSON.stringify({
        version: 7,
        worktrees: [{ featureName: "x", branch: "feature/x", path: "/repo/x", note: "extra" }],
      }),
      "utf8",
    )

    expect(await loadRegistry(path)).toEqual({
      worktrees: [{ featureName: "x", branch: "feature/x", path: "/repo/x", base: "", createdAt: "" }],
    })
  })

  it("treats a document without worktrees as empty", async () => {
    const root = await createTempDirectory()
    const path = join(root, "state.json")
    await writeFile(path, "{}\n", "utf8")

    expect(await loadRegistry(path)).toEqual(EMPTY_REGISTRY)
  })

  it("fails loudly on malformed documents", async () => {
    const root = await createTempDirectory()
    await mkdir(join(root, "cases"))
    const cases: ReadonlyArray<[string, string]> = [
      ["broken.json", "{ not json"],
      ["array.json", "[]"],
      ["worktrees.json", JSON.stringify({ worktrees: {} })],
      ["record.json", JSON.stringify({ worktrees: [{ featureName: "x", branch: "feature/x" }] })],
    ]

    for (const [name, content] of cases) {
      const path = join(root, "cases", name)
      await writeFile(path, content, "utf8")
      await expect(loadRegistry(path)).rejects.toMatchObject({ code: "INVALID_REGISTRY", exitCode: 1 })
    }
  })
})

describe("registry mutations", () => {
  it("looks records up by feature name, branch and path", () => {
    const registry = addRecord(addRecord(EMPTY_REGISTRY, loginRecord), searchRecord)

    expect(findByFeatureName(registry, "search")).toBe(searchRecord)
    expect(findByBranch(registry, "feature/login")).toBe(loginRecord)
    expect(findByPath(registry, "/repo/.wt/worktrees/search")).toBe(searchRecord)
    expect(findByFeatureName(registry, "missing")).toBeUndefined()
  })

  it("rejects duplicate feature names and paths", () => {
    const registry = addRecord(EMPTY_REGISTRY, loginRecord)

    expect(catchError(() => addRecord(registry, { ...searchRecord, featureName: "login" }))).toMatchObject({
      code: "WORKTREE_EXISTS",
    })
    expect(catchError(() => addRecord(registry, { ...searchRecord, path: loginRecord.path }))).toMatchObject({
      code: "WORKTREE_EXISTS",
    })
  })

  it("removes records by path without touching the original", () => {
    const registry = addRecord(addRecord(EMPTY_REGISTRY, loginRecord), searchRecord)

    const next = removeRecordByPath(registry, loginRecord.path)

    expect(next.worktrees).toEqual([searchRecord])
    expect(registry.worktrees).toHaveLength(2)
  })
})
