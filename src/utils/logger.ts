import chalk from "chalk"

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

type LineSink = (line: string) => void

type LoggerOptions = {
  readonly level?: LogLevel
  readonly prefix?: string
  readonly stdout?: LineSink
  readonly stderr?: LineSink
}

export type Logger = {
  readonly level: LogLevel
  readonly prefix: string
  error: (message: string, error?: Error) => void
  warn: (message: string) => void
  info: (message: string) => void
  debug: (message: string) => void
  success: (message: string) => void
  createChild: (suffix: string) => Logger
}

const isDebugEnv = (): boolean => {
  return process.env.WT_DEBUG === "true"
}

const resolveDefaultLogLevel = (): LogLevel => {
  if (isDebugEnv()) {
    return LogLevel.DEBUG
  }
  if (process.env.WT_VERBOSE === "true") {
    return LogLevel.INFO
  }
  return LogLevel.WARN
}

const formatMessage = (prefix: string, message: string): string => {
  return prefix ? `${prefix} ${message}` : message
}

/**
 * Progress and warnings go to stderr so stdout stays parseable
 * (`cd "$(wt path foo)"`, `--json`); only `success` writes to stdout.
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
  const level = options.level ?? resolveDefaultLogLevel()
  const prefix = options.prefix ?? ""
  const stdout = options.stdout ?? ((line: string): void => console.log(line))
  const stderr = options.stderr ?? ((line: string): void => console.error(line))

  const build = (nextPrefix: string, nextLevel: LogLevel): Logger => {
    const resolvedPrefix = nextPrefix

    return {
      level: nextLevel,
      prefix: resolvedPrefix,
      error(message: string, error?: Error): void {
        if (nextLevel >= LogLevel.ERROR) {
          stderr(chalk.red(formatMessage(resolvedPrefix, `Error: ${message}`)))
          if (error?.stack !== undefined && isDebugEnv()) {
            stderr(chalk.gray(error.stack))
          }
        }
      },
      warn(message: string): void {
        if (nextLevel >= LogLevel.WARN) {
          stderr(chalk.yellow(formatMessage(resolvedPrefix, `Warning: ${message}`)))
        }
      },
      info(message: string): void {
        if (nextLevel >= LogLevel.INFO) {
          stderr(chalk.dim(formatMessage(resolvedPrefix, message)))
        }
      },
      debug(message: string): void {
        if (nextLevel >= LogLevel.DEBUG) {
          stderr(chalk.gray(formatMessage(resolvedPrefix, `[DEBUG] ${message}`)))
        }
      },
      success(message: string): void {
        stdout(chalk.green(formatMessage(resolvedPrefix, message)))
      },
      createChild(suffix: string): Logger {
        const childPrefix = resolvedPrefix ? `${resolvedPrefix} ${suffix}` : suffix
        return build(childPrefix, nextLevel)
      },
    }
  }

  return build(prefix, level)
}
