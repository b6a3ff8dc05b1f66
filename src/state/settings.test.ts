import { afterEach, describe, expect, it, vi } from "vitest"
import { z } from "zod"

import { defaultSettings, parseSettings } from "./settings"

describe("parseSettings", () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it("fills in every default", () => {
    const settings = defaultSettings()
    expect(settings.history).toEqual({ limit: 100, sortBy: "timestamp", sortOrder: "desc", timeoutMs: 5000 })
    expect(settings.keymap.next).toEqual(["j", "down"])
    expect(settings.keymap.top).toEqual(["g"])
    expect(settings.keymap.first).toEqual(["home"])
  })

  it("keeps defaults next to partial overrides", () => {
    const settings = parseSettings({ history: { limit: 20 }, keymap: { next: ["n"] } })
    expect(settings.history.limit).toBe(20)
    expect(settings.history.sortBy).toBe("timestamp")
    expect(settings.keymap.next).toEqual(["n"])
    expect(settings.keymap.prev).toEqual(["k", "up"])
  })

  it("warns about keys bound to two actions", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
    parseSettings({ keymap: { refresh: ["j"] } })
    expect(warn).toHaveBeenCalledWith('[Settings] key "j" is bound to both "next" and "refresh"; "next" wins')
  })

  it("rejects values of the wrong shape", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {})
    expect(() => parseSettings({ history: { limit: "many" } })).toThrow(z.ZodError)
    expect(() => parseSettings({ history: { timeoutMs: 0 } })).toThrow(z.ZodError)
    expect(() => parseSettings({ keymap: { next: [""] } })).toThrow(z.ZodError)
    expect(error).toHaveBeenCalledTimes(3)
  })

  it("caps the query timeout at the largest timer delay", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {})
    expect(parseSettings({ history: { timeoutMs: 2_147_483_647 } }).history.timeoutMs).toBe(2_147_483_647)
    expect(() => parseSettings({ history: { timeoutMs: 2_147_483_648 } })).toThrow(z.ZodError)
    expect(error).toHaveBeenCalledTimes(1)
  })
})
