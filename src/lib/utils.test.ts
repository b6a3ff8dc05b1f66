import { describe, expect, it } from "vitest"
import { fit, generateUniqueId, truncate } from "./utils"

describe("generateUniqueId", () => {
  it("produces alphanumeric ids of the requested length", () => {
    expect(generateUniqueId()).toMatch(/^[A-Za-z0-9]{12}$/)
    expect(generateUniqueId(5)).toMatch(/^[A-Za-z0-9]{5}$/)
  })

  it("does not repeat itself", () => {
    const ids = new Set(Array.from({ length: 50 }, () => generateUniqueId()))
    expect(ids.size).toBe(50)
  })
})

describe("truncate", () => {
  it("leaves short text alone", () => {
    expect(truncate("Users", 10)).toBe("Users")
    expect(truncate("Users", 5)).toBe("Users")
  })

  it("ends cut text with an ellipsis", () => {
    expect(truncate("Create Account", 10)).toBe("Create ...")
  })

  it("cuts without an ellipsis when there is no room for one", () => {
    expect(truncate("Create", 3)).toBe("Cre")
    expect(truncate("Create", 0)).toBe("")
    expect(truncate("Create", -2)).toBe("")
  })
})

describe("fit", () => {
  it("pads to the width", () => {
    expect(fit("ab", 4)).toBe("ab  ")
  })

  it("cuts to the width", () => {
    expect(fit("abcdefgh", 6)).toBe("abc...")
  })

  it("is empty for a non-positive width", () => {
    expect(fit("ab", 0)).toBe("")
  })
})
