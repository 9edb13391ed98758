import { createCliError } from "./errors"

const FEATURE_NAME_PATTERN = /^[a-z0-9._-]+$/
const RESERVED_NAMES = new Set([".", ".."])

const ensureValidFeatureName = (candidate: string, original: string): string => {
  if (FEATURE_NAME_PATTERN.test(candidate) !== true || RESERVED_NAMES.has(candidate)) {
    throw createCliError("INVALID_FEATURE_NAME", {
      message: `Invalid feature name: '${original}'`,
      details: { featureName: original, normalized: candidate },
    })
  }
  return candidate
}

/** `"  My Feature "` becomes `"my-feature"`. */
export const normalizeFeatureName = (raw: string): string => {
  const normalized = raw.trim().toLowerCase().replace(/\s+/g, "-")
  return ensureValidFeatureName(normalized, raw)
}

/**
 * Feature name for an existing branch: the configured prefix is stripped and
 * any character outside `[a-z0-9._-]` collapses to `-`, so `bugfix/Login`
 * becomes `bugfix-login`.
 */
export const deriveFeatureNameFromBranch = ({
  branch,
  branchPrefix,
}: {
  readonly branch: string
  readonly branchPrefix: string
}): string => {
  const stripped =
    branchPrefix.length > 0 && branch.startsWith(branchPrefix) && branch.length > branchPrefix.length
      ? branch.slice(branchPrefix.length)
      : branch
  const sanitized = stripped
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, "-")
    .replace(/^-+|-+$/g, "")
  return ensureValidFeatureName(sanitized, branch)
}
