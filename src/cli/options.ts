import type { ArgsDef } from "citty"
import { createCliError } from "../core/errors"

type OptionValueKind = "boolean" | "value"

type OptionSpec = {
  readonly kind: OptionValueKind
  readonly allowEmptyValue: boolean
}

export type OptionSpecs = {
  readonly longOptions: Map<string, OptionSpec>
  readonly shortOptions: Map<string, OptionSpec>
}

// an empty branch prefix is a valid setting
const optionNamesAllowEmptyValue = new Set(["branchPrefix", "branch-prefix"])

export const toKebabCase = (value: string): string => {
  return value.replace(/[A-Z]/g, (match) => `-${match.toLowerCase()}`)
}

const toOptionSpec = (kind: OptionValueKind, optionName: string): OptionSpec => {
  return {
    kind,
    allowEmptyValue: optionNamesAllowEmptyValue.has(optionName),
  }
}

export const buildOptionSpecs = (argsDef: Readonly<ArgsDef>): OptionSpecs => {
  const longOptions = new Map<string, OptionSpec>()
  const shortOptions = new Map<string, OptionSpec>()

  for (const [argName, arg] of Object.entries(argsDef)) {
    if (arg.type === "positional") {
      continue
    }

    const valueKind: OptionValueKind = arg.type === "boolean" ? "boolean" : "value"
    const kebabName = toKebabCase(argName)
    longOptions.set(argName, toOptionSpec(valueKind, argName))
    longOptions.set(kebabName, toOptionSpec(valueKind, kebabName))

    const aliases =
      "alias" in arg ? (Array.isArray(arg.alias) ? arg.alias : typeof arg.alias === "string" ? [arg.alias] : []) : []

    for (const alias of aliases) {
      if (alias.length === 1) {
        shortOptions.set(alias, toOptionSpec(valueKind, alias))
        continue
      }
      longOptions.set(alias, toOptionSpec(valueKind, alias))
    }
  }

  return { longOptions, shortOptions }
}

const throwMissingValue = (option: string): never => {
  throw createCliError("USAGE_ERROR", { message: `Missing value for option: ${option}` })
}

/**
 * Rejects unknown options and value options without a value before citty
 * gets to parse them. `--no-<name>` is accepted for every boolean `<name>`.
 */
export const validateRawOptions = (args: readonly string[], optionSpecs: OptionSpecs): void => {
  for (let index = 0; index < args.length; index += 1) {
    const token = args[index]
    if (typeof token !== "string") {
      continue
    }
    if (token === "--") {
      break
    }
    if (!token.startsWith("-") || token === "-") {
      continue
    }

    if (token.startsWith("--")) {
      const value = token.slice(2)
      const separatorIndex = value.indexOf("=")
      const rawOptionName = separatorIndex >= 0 ? value.slice(0, separatorIndex) : value
      const directOptionSpec = optionSpecs.longOptions.get(rawOptionName)
      const negatedSpec = rawOptionName.startsWith("no-")
        ? optionSpecs.longOptions.get(rawOptionName.slice(3))
        : undefined
      const optionSpec = directOptionSpec ?? (negatedSpec?.kind === "boolean" ? negatedSpec : undefined)
      if (optionSpec === undefined) {
        throw createCliError("USAGE_ERROR", { message: `Unknown option: --${rawOptionName}` })
      }

      if (optionSpec.kind === "value") {
        if (separatorIndex >= 0) {
          if (value.length === separatorIndex + 1 && optionSpec.allowEmptyValue !== true) {
            throwMissingValue(`--${rawOptionName}`)
          }
        } else {
          const nextToken = args[index + 1]
          if (typeof nextToken !== "string" || nextToken.startsWith("-")) {
            throwMissingValue(`--${rawOptionName}`)
          } else if (nextToken.length === 0 && optionSpec.allowEmptyValue !== true) {
            throwMissingValue(`--${rawOptionName}`)
          }
          index += 1
        }
      }
      continue
    }

    const shortFlags = token.slice(1)
    for (let flagIndex = 0; flagIndex < shortFlags.length; flagIndex += 1) {
      const option = shortFlags[flagIndex]
      if (typeof option !== "string" || option.length === 0) {
        continue
      }
      const optionSpec = optionSpecs.shortOptions.get(option)
      if (optionSpec === undefined) {
        throw createCliError("USAGE_ERROR", { message: `Unknown option: -${option}` })
      }
      if (optionSpec.kind === "value") {
        if (flagIndex < shortFlags.length - 1) {
          break
        }
        const nextToken = args[index + 1]
        if (typeof nextToken !== "string" || nextToken.length === 0 || nextToken.startsWith("-")) {
          throwMissingValue(`-${option}`)
        }
        index += 1
        break
      }
    }
  }
}

export const getPositionals = (args: { readonly _: unknown[] }): string[] => {
  return args._.filter((value): value is string => typeof value === "string")
}

/** First token that is not an option; the command name when present. */
export const findCommandToken = (args: readonly string[]): string | undefined => {
  for (const token of args) {
    if (token === "--") {
      return undefined
    }
    if (token.startsWith("-") !== true) {
      return token
    }
  }
  return undefined
}

/** Every value given for the named long options, in order; empty values included. */
export const collectOptionValues = ({
  args,
  optionNames,
}: {
  readonly args: readonly string[]
  readonly optionNames: ReadonlyArray<string>
}): string[] => {
  const values: string[] = []
  const optionNameSet = new Set(optionNames)

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index]
    if (typeof token !== "string") {
      continue
    }
    if (token === "--") {
      break
    }
    if (!token.startsWith("--")) {
      continue
    }

    const eqIndex = token.indexOf("=")
    const rawName = eqIndex >= 0 ? token.slice(2, eqIndex) : token.slice(2)
    if (optionNameSet.has(rawName) !== true) {
      continue
    }
    if (eqIndex >= 0) {
      values.push(token.slice(eqIndex + 1))
      continue
    }
    const nextToken = args[index + 1]
    if (typeof nextToken === "string") {
      values.push(nextToken)
      index += 1
    }
  }

  return values
}

/**
 * Tri-state boolean flag: `true` for `--<name>`, `false` for `--no-<name>`,
 * `undefined` when neither appears. The last occurrence wins.
 */
export const readBooleanFlag = (args: readonly string[], name: string): boolean | undefined => {
  let value: boolean | undefined
  for (const token of args) {
    if (token === "--") {
      break
    }
    if (token === `--${name}`) {
      value = true
    } else if (token === `--no-${name}`) {
      value = false
    }
  }
  return value
}

export const readStringOption = (parsedArgsRecord: Record<string, unknown>, key: string): string | undefined => {
  const value = parsedArgsRecord[key]
  if (typeof value === "string") {
    return value
  }
  return undefined
}

export const ensureArgumentCount = ({
  command,
  args,
  min,
  max,
}: {
  readonly command: string
  readonly args: readonly string[]
  readonly min: number
  readonly max: number
}): void => {
  if (args.length < min || args.length > max) {
    throw createCliError("USAGE_ERROR", {
      message:
        min === max
          ? `${command} expects ${String(min)} positional argument(s), received ${String(args.length)}`
          : `${command} expects ${String(min)}-${String(max)} positional argument(s), received ${String(args.length)}`,
      details: { command, args },
    })
  }
}

export const readRequiredArgument = ({
  command,
  args,
  name,
}: {
  readonly command: string
  readonly args: readonly string[]
  readonly name: string
}): string => {
  ensureArgumentCount({ command, args, min: 1, max: 1 })
  const [value] = args
  if (value === undefined || value.trim().length === 0) {
    throw createCliError("USAGE_ERROR", {
      message: `${command} requires <${name}>`,
      details: { command },
    })
  }
  return value
}
