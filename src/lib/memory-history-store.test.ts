import { describe, expect, it, vi } from "vitest"
import { z } from "zod"

import { historyEntry } from "@/test/builders"
import type { HistoryQueryOptions } from "@/types"
import { createMemoryHistoryStore } from "./memory-history-store"

const options: HistoryQueryOptions = { limit: 100, sortBy: "timestamp", sortOrder: "desc" }

const seed = () => [
  historyEntry("h1", "GET", "https://api.test/users", 200, "2024-03-10T09:00:00Z", { requestName: "List Users" }),
  historyEntry("h2", "POST", "https://api.test/login", 401, "2024-03-10T11:00:00Z"),
  historyEntry("h3", "get", "https://api.test/health", 503, "2024-03-10T10:00:00Z"),
]

describe("createMemoryHistoryStore", () => {
  it("lists newest first by default", async () => {
    const store = createMemoryHistoryStore(seed())
    const listed = await store.list(options)
    expect(listed.map((e) => e.id)).toEqual(["h2", "h3", "h1"])
  })

  it("orders timestamps with fractional seconds by time", async () => {
    const store = createMemoryHistoryStore([
      historyEntry("whole", "GET", "https://api.test/a", 200, "2024-03-10T12:00:00Z"),
      historyEntry("fraction", "GET", "https://api.test/b", 200, "2024-03-10T12:00:00.500Z"),
    ])
    expect((await store.list(options)).map((e) => e.id)).toEqual(["fraction", "whole"])
    expect((await store.list({ ...options, sortOrder: "asc" })).map((e) => e.id)).toEqual(["whole", "fraction"])
  })

  it("sorts by any field in either order", async () => {
    const store = createMemoryHistoryStore(seed())
    const listed = await store.list({ ...options, sortBy: "status", sortOrder: "asc" })
    expect(listed.map((e) => e.status)).toEqual([200, 401, 503])
  })

  it("filters by method without regard to case", async () => {
    const store = createMemoryHistoryStore(seed())
    const listed = await store.list({ ...options, method: "GET" })
    expect(listed.map((e) => e.id)).toEqual(["h3", "h1"])
  })

  it("filters by status range", async () => {
    const store = createMemoryHistoryStore(seed())
    const listed = await store.list({ ...options, statusMin: 400, statusMax: 499 })
    expect(listed.map((e) => e.id)).toEqual(["h2"])
  })

  it("applies the limit after sorting", async () => {
    const store = createMemoryHistoryStore(seed())
    const listed = await store.list({ ...options, limit: 2 })
    expect(listed.map((e) => e.id)).toEqual(["h2", "h3"])
  })

  it("searches url, method and request name", async () => {
    const store = createMemoryHistoryStore(seed())
    expect((await store.search("LOGIN", options)).map((e) => e.id)).toEqual(["h2"])
    expect((await store.search("list users", options)).map((e) => e.id)).toEqual(["h1"])
    expect((await store.search("post", options)).map((e) => e.id)).toEqual(["h2"])
  })

  it("combines search with filters", async () => {
    const store = createMemoryHistoryStore(seed())
    const found = await store.search("api.test", { ...options, statusMin: 500, statusMax: 599 })
    expect(found.map((e) => e.id)).toEqual(["h3"])
  })

  it("rejects when the signal is already aborted", async () => {
    const store = createMemoryHistoryStore(seed())
    const controller = new AbortController()
    controller.abort(new Error("cancelled"))
    await expect(store.list(options, controller.signal)).rejects.toThrow("cancelled")
  })

  it("adds and clears entries", async () => {
    const store = createMemoryHistoryStore()
    store.add(historyEntry("h9", "DELETE", "https://api.test/users/1", 204, "2024-03-10T12:00:00Z"))
    expect(store.size()).toBe(1)
    store.clear()
    expect(await store.list(options)).toEqual([])
  })

  it("validates what it is given", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {})
    const store = createMemoryHistoryStore()
    expect(() => store.add(historyEntry("bad", "GET", "https://api.test", -1, "2024-03-10T12:00:00Z"))).toThrow(
      z.ZodError,
    )
    expect(store.size()).toBe(0)
    error.mockRestore()
  })
})
