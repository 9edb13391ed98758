import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises"
import { dirname } from "node:path"
import { hasErrorCode } from "./errors"

let atomicWriteSequence = 0

const nextAtomicWriteSuffix = (): string => {
  atomicWriteSequence += 1
  return `${String(process.pid)}-${process.hrtime.bigint().toString(36)}-${String(atomicWriteSequence)}`
}

export type JsonDocument =
  | {
      readonly path: string
      readonly exists: false
    }
  | {
      readonly path: string
      readonly exists: true
      readonly valid: true
      readonly value: unknown
    }
  | {
      readonly path: string
      readonly exists: true
      readonly valid: false
      readonly reason: string
    }

/** Missing files are reported through `exists`; read errors other than ENOENT propagate. */
export const readJsonDocument = async (path: string): Promise<JsonDocument> => {
  let content: string
  try {
    content = await readFile(path, "utf8")
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return { path, exists: false }
    }
    throw error
  }

  try {
    const value: unknown = JSON.parse(content)
    return { path, exists: true, valid: true, value }
  } catch (error) {
    return {
      path,
      exists: true,
      valid: false,
      reason: error instanceof Error ? error.message : String(error),
    }
  }
}

export const writeJsonAtomically = async ({
  filePath,
  payload,
  ensureDir = false,
}: {
  readonly filePath: string
  readonly payload: Record<string, unknown>
  readonly ensureDir?: boolean
}): Promise<void> => {
  if (ensureDir) {
    await mkdir(dirname(filePath), { recursive: true })
  }
  const tmpPath = `${filePath}.tmp-${nextAtomicWriteSuffix()}`
  try {
    await writeFile(tmpPath, `${JSON.stringify(payload, null, 2)}\n`, "utf8")
    await rename(tmpPath, filePath)
  } catch (error) {
    await rm(tmpPath, { force: true }).catch(() => undefined)
    throw error
  }
}

export const isJsonObject = (value: unknown): value is Record<string, unknown> => {
  return value !== null && typeof value === "object" && Array.isArray(value) !== true
}
