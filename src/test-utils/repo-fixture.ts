import { mkdtemp, realpath, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { execa } from "execa"

const fixtureRoots = new Set<string>()

export const runGit = async (cwd: string, args: readonly string[]): Promise<string> => {
  const result = await execa("git", [...args], { cwd, reject: false })
  if ((result.exitCode ?? 0) !== 0) {
    throw new Error(`git failed in ${cwd}: git ${args.join(" ")}\n${result.stderr}`)
  }
  return result.stdout
}

export const createTempDirectory = async (prefix = "wt-flow-test-"): Promise<string> => {
  const directory = await realpath(await mkdtemp(join(tmpdir(), prefix)))
  fixtureRoots.add(directory)
  return directory
}

/**
 * Creates a repository on `main` with one commit. The returned path is
 * canonical, so it compares equal to paths git reports.
 */
export const createRepoFixture = async ({
  prefix = "wt-flow-repo-",
  setup,
}: {
  readonly prefix?: string
  readonly setup?: ((repoRoot: string) => Promise<void> | void) | undefined
} = {}): Promise<string> => {
  const repoRoot = await createTempDirectory(prefix)
  await runGit(repoRoot, ["init", "-b", "main"])
  await runGit(repoRoot, ["config", "user.name", "test-user"])
  await runGit(repoRoot, ["config", "user.email", "test@example.com"])
  await runGit(repoRoot, ["config", "commit.gpgsign", "false"])
  await writeFile(join(repoRoot, "README.md"), "# test\n", "utf8")
  await runGit(repoRoot, ["add", "."])
  await runGit(repoRoot, ["commit", "-m", "initial"])
  if (setup !== undefined) {
    await setup(repoRoot)
  }
  return repoRoot
}

/** Adds a local bare repository as `origin` and pushes `main` to it. */
export const attachBareRemote = async (repoRoot: string, remoteName = "origin"): Promise<string> => {
  const remoteRoot = await createTempDirectory("wt-flow-remote-")
  await runGit(remoteRoot, ["init", "--bare", "-b", "main"])
  await runGit(repoRoot, ["remote", "add", remoteName, remoteRoot])
  await runGit(repoRoot, ["push", "-u", remoteName, "main"])
  return remoteRoot
}

export const commitFile = async ({
  cwd,
  file,
  content,
  message,
}: {
  readonly cwd: string
  readonly file: string
  readonly content: string
  readonly message: string
}): Promise<void> => {
  await writeFile(join(cwd, file), content, "utf8")
  await runGit(cwd, ["add", file])
  await runGit(cwd, ["commit", "-m", message])
}

export const cleanupRepoFixtures = async (): Promise<void> => {
  const roots = [...fixtureRoots]
  try {
    const results = await Promise.allSettled(
      roots.map(async (repoRoot) => {
        await rm(repoRoot, { recursive: true, force: true })
      }),
    )
    const errors = results
      .filter((result): result is PromiseRejectedResult => result.status === "rejected")
      .map((result) => result.reason)
    if (errors.length > 0) {
      throw new AggregateError(errors, "Failed to clean up some repo fixtures")
    }
  } finally {
    fixtureRoots.clear()
  }
}
