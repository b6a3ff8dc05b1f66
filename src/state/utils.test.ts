import { describe, expect, it, vi } from "vitest"
import { z } from "zod"

import { zHistoryEntry } from "@/types"
import { zParse } from "./utils"

describe("zParse", () => {
  const entry = { id: "h1", method: "GET", url: "https://api.test/users", status: 200, timestamp: "2024-03-10T12:00:00Z" }

  it("returns parsed data for valid input", () => {
    expect(zParse(zHistoryEntry, entry)).toEqual(entry)
  })

  it("throws a ZodError for invalid input", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {})
    expect(() => zParse(zHistoryEntry, { ...entry, status: -1 })).toThrow(z.ZodError)
    error.mockRestore()
  })

  it("logs the formatted error before rethrowing", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {})
    expect(() => zParse(zHistoryEntry, { ...entry, timestamp: "yesterday" })).toThrow()
    expect(error).toHaveBeenCalledTimes(1)
    error.mockRestore()
  })
})
