import { describe, expect, it } from "vitest"

import { zCollection, zFolder } from "@/types/collections"

describe("zCollection", () => {
  it("fills in empty children and request defaults", () => {
    const parsed = zCollection.parse({
      id: "c1",
      name: "Accounts",
      requests: [{ id: "r1", name: "List Users" }],
    })
    expect(parsed).toEqual({
      id: "c1",
      name: "Accounts",
      folders: [],
      requests: [{ id: "r1", name: "List Users", method: "GET", url: "" }],
      sockets: [],
    })
  })

  it("parses nested folders", () => {
    const parsed = zCollection.parse({
      id: "c1",
      name: "Accounts",
      folders: [{ id: "f1", name: "Auth", folders: [{ id: "f2", name: "Tokens", sockets: [{ id: "s1", name: "Feed" }] }] }],
    })
    const tokens = parsed.folders[0]?.folders[0]
    expect(tokens?.name).toBe("Tokens")
    expect(tokens?.sockets).toEqual([{ id: "s1", name: "Feed", endpoint: "" }])
    expect(tokens?.folders).toEqual([])
  })

  it("rejects a folder without a name", () => {
    expect(zFolder.safeParse({ id: "f1" }).success).toBe(false)
  })
})
