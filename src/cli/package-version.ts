import { hasErrorCode } from "../core/errors"
import { isJsonObject } from "../core/json-storage"

type RequireLike = (id: string) => unknown

// src/cli/ during development, dist/ once bundled
const CANDIDATE_PATHS = ["../package.json", "../../package.json"] as const

const readVersionField = (candidatePath: string, manifest: unknown): string => {
  if (isJsonObject(manifest) && typeof manifest.version === "string" && manifest.version.length > 0) {
    return manifest.version
  }
  throw new Error(`No version field in ${candidatePath}`)
}

export const loadPackageVersion = (requireFn: RequireLike): string => {
  let lastNotFound: unknown

  for (const candidatePath of CANDIDATE_PATHS) {
    let manifest: unknown
    try {
      manifest = requireFn(candidatePath)
    } catch (error) {
      if (hasErrorCode(error, "MODULE_NOT_FOUND")) {
        lastNotFound = error
        continue
      }
      throw error
    }
    return readVersionField(candidatePath, manifest)
  }

  throw lastNotFound ?? new Error(`Unable to resolve package version from candidates: ${CANDIDATE_PATHS.join(", ")}`)
}
