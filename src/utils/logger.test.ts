import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { createLogger, LogLevel } from "./logger"

const ENV_KEYS = ["WT_DEBUG", "WT_VERBOSE"] as const

const envBackup = new Map<string, string | undefined>()

beforeEach(() => {
  for (const key of ENV_KEYS) {
    envBackup.set(key, process.env[key])
    delete process.env[key]
  }
})

afterEach(() => {
  for (const key of ENV_KEYS) {
    const value = envBackup.get(key)
    if (value === undefined) {
      delete process.env[key]
    } else {
      process.env[key] = value
    }
  }
  envBackup.clear()
})

const createSinks = () => {
  const stdout: string[] = []
  const stderr: string[] = []
  return {
    stdout,
    stderr,
    sinks: {
      stdout: (line: string) => stdout.push(line),
      stderr: (line: string) => stderr.push(line),
    },
  }
}

describe("createLogger", () => {
  it("resolves default level from environment variables", () => {
    expect(createLogger().level).toBe(LogLevel.WARN)

    process.env.WT_VERBOSE = "true"
    expect(createLogger().level).toBe(LogLevel.INFO)

    process.env.WT_DEBUG = "true"
    expect(createLogger().level).toBe(LogLevel.DEBUG)
  })

  it("applies level filtering and writes only success to stdout", () => {
    const { stdout, stderr, sinks } = createSinks()
    const logger = createLogger({ level: LogLevel.WARN, prefix: "[wt]", ...sinks })

    logger.error("failed")
    logger.warn("watch out")
    logger.info("info message")
    logger.debug("debug message")
    logger.success("done")

    expect(stderr).toHaveLength(2)
    expect(stderr[0]).toContain("[wt] Error: failed")
    expect(stderr[1]).toContain("[wt] Warning: watch out")
    expect(stdout).toHaveLength(1)
    expect(stdout[0]).toContain("[wt] done")
  })

  it("prints progress at INFO level", () => {
    const { stderr, sinks } = createSinks()
    const logger = createLogger({ level: LogLevel.INFO, ...sinks })

    logger.info("Removing worktree")
    logger.debug("hidden")

    expect(stderr).toHaveLength(1)
    expect(stderr[0]).toContain("Removing worktree")
  })

  it("prints stack trace only in debug mode", () => {
    const { stderr, sinks } = createSinks()
    const error = new Error("boom")
    error.stack = "mock-stack"

    createLogger({ level: LogLevel.ERROR, ...sinks }).error("failed", error)
    expect(stderr).toHaveLength(1)

    process.env.WT_DEBUG = "true"
    createLogger({ level: LogLevel.ERROR, ...sinks }).error("failed", error)
    expect(stderr).toHaveLength(3)
    expect(stderr[2]).toContain("mock-stack")
  })

  it("inherits prefix, level and sinks in child logger", () => {
    const { stderr, sinks } = createSinks()
    const parent = createLogger({ level: LogLevel.DEBUG, prefix: "[root]", ...sinks })
    const child = parent.createChild("[child]")

    child.debug("trace")

    expect(child.level).toBe(LogLevel.DEBUG)
    expect(child.prefix).toBe("[root] [child]")
    expect(stderr).toHaveLength(1)
    expect(stderr[0]).toContain("[root] [child] [DEBUG] trace")
  })
})
