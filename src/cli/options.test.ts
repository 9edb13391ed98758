import type { ArgsDef } from "citty"
import { describe, expect, it } from "vitest"
import { catchError } from "../test-utils/catch-error"
import {
  buildOptionSpecs,
  collectOptionValues,
  ensureArgumentCount,
  findCommandToken,
  readBooleanFlag,
  readRequiredArgument,
  toKebabCase,
  validateRawOptions,
} from "./options"

const argsDef = {
  command: { type: "positional", required: false },
  json: { type: "boolean" },
  base: { type: "string", alias: "b" },
  push: { type: "boolean" },
  branchPrefix: { type: "string" },
  dryRun: { type: "boolean", alias: "n" },
} satisfies ArgsDef

const specs = buildOptionSpecs(argsDef)

const validationMessage = (args: string[]): unknown => {
  const error = catchError(() => validateRawOptions(args, specs))
  return error instanceof Error ? error.message : error
}

describe("toKebabCase", () => {
  it("converts camelCase option names", () => {
    expect(toKebabCase("strictInit")).toBe("strict-init")
    expect(toKebabCase("json")).toBe("json")
  })
})

describe("validateRawOptions", () => {
  it("accepts long, kebab, short and negated forms", () => {
    expect(() =>
      validateRawOptions(["new", "alpha", "--base", "main", "--no-push", "--dry-run", "-n", "--json"], specs),
    ).not.toThrow()
    expect(() => validateRawOptions(["-nb", "main"], specs)).not.toThrow()
    expect(() => validateRawOptions(["--base=main"], specs)).not.toThrow()
  })

  it("rejects unknown options", () => {
    expect(validationMessage(["--nope"])).toBe("Unknown option: --nope")
    expect(validationMessage(["-x"])).toBe("Unknown option: -x")
    expect(validationMessage(["--no-base", "main"])).toBe("Unknown option: --no-base")
  })

  it("requires a value for value options", () => {
    expect(validationMessage(["--base"])).toBe("Missing value for option: --base")
    expect(validationMessage(["--base", "--json"])).toBe("Missing value for option: --base")
    expect(validationMessage(["--base="])).toBe("Missing value for option: --base")
    expect(validationMessage(["-b"])).toBe("Missing value for option: -b")
  })

  it("allows an empty branch prefix", () => {
    expect(() => validateRawOptions(["--branch-prefix="], specs)).not.toThrow()
    expect(() => validateRawOptions(["--branch-prefix", ""], specs)).not.toThrow()
  })

  it("stops at the option terminator", () => {
    expect(() => validateRawOptions(["--", "--nope"], specs)).not.toThrow()
  })

  it("reports the usage error code", () => {
    expect(catchError(() => validateRawOptions(["--nope"], specs))).toMatchObject({ code: "USAGE_ERROR", exitCode: 2 })
  })
})

describe("raw argument readers", () => {
  it("finds the first non-option token", () => {
    expect(findCommandToken(["--json", "list", "--all"])).toBe("list")
    expect(findCommandToken(["--json"])).toBeUndefined()
    expect(findCommandToken(["--", "list"])).toBeUndefined()
  })

  it("collects every value of an option, empty ones included", () => {
    expect(
      collectOptionValues({
        args: ["init", "--branch-prefix=", "--branchPrefix", "topic/"],
        optionNames: ["branchPrefix", "branch-prefix"],
      }),
    ).toEqual(["", "topic/"])
  })

  it("reads a tri-state flag where the last occurrence wins", () => {
    expect(readBooleanFlag(["--push"], "push")).toBe(true)
    expect(readBooleanFlag(["--push", "--no-push"], "push")).toBe(false)
    expect(readBooleanFlag(["--json"], "push")).toBeUndefined()
    expect(readBooleanFlag(["--", "--push"], "push")).toBeUndefined()
  })
})

describe("positional arguments", () => {
  it("checks the argument count", () => {
    expect(
      catchError(() => ensureArgumentCount({ command: "path", args: ["a", "b"], min: 0, max: 1 })),
    ).toMatchObject({ code: "USAGE_ERROR", message: "path expects 0-1 positional argument(s), received 2" })
  })

  it("requires a non-blank argument", () => {
    expect(readRequiredArgument({ command: "new", args: ["alpha"], name: "feature" })).toBe("alpha")
    expect(catchError(() => readRequiredArgument({ command: "new", args: [" "], name: "feature" }))).toMatchObject({
      message: "new requires <feature>",
    })
  })
})
