import { describe, expect, it } from "vitest"
import { catchError } from "../test-utils/catch-error"
import { deriveFeatureNameFromBranch, normalizeFeatureName } from "./feature-name"

describe("normalizeFeatureName", () => {
  it("lowercases, trims and joins whitespace with dashes", () => {
    expect(normalizeFeatureName("My Feature")).toBe("my-feature")
    expect(normalizeFeatureName("  Login   Page\t")).toBe("login-page")
    expect(normalizeFeatureName("v1.2_fix")).toBe("v1.2_fix")
  })

  it("rejects names outside the allowed alphabet", () => {
    for (const raw of ["feat/one", "", "   ", "emoji-✨", ".", ".."]) {
      expect(catchError(() => normalizeFeatureName(raw))).toMatchObject({ code: "INVALID_FEATURE_NAME" })
    }
  })
})

describe("deriveFeatureNameFromBranch", () => {
  it("strips the configured prefix", () => {
    expect(deriveFeatureNameFromBranch({ branch: "feature/login", branchPrefix: "feature/" })).toBe("login")
  })

  it("sanitizes branches that do not carry the prefix", () => {
    expect(deriveFeatureNameFromBranch({ branch: "bugfix/Login", branchPrefix: "feature/" })).toBe("bugfix-login")
    expect(deriveFeatureNameFromBranch({ branch: "release-2.0", branchPrefix: "" })).toBe("release-2.0")
  })

  it("keeps the full branch when it equals the prefix", () => {
    expect(deriveFeatureNameFromBranch({ branch: "feature/", branchPrefix: "feature/" })).toBe("feature")
  })

  it("rejects branches with nothing usable", () => {
    expect(
      catchError(() => deriveFeatureNameFromBranch({ branch: "///", branchPrefix: "feature/" })),
    ).toMatchObject({ code: "INVALID_FEATURE_NAME" })
  })
})
