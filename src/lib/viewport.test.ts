import { describe, expect, it } from "vitest"

import {
  adjustOffset,
  clampViewport,
  jumpToBottom,
  moveCursor,
  moveViewport,
  sectionHeights,
  visibleHeight,
} from "./viewport"

describe("moveCursor", () => {
  it("stays inside the list", () => {
    expect(moveCursor(0, -1, 5)).toBe(0)
    expect(moveCursor(4, 1, 5)).toBe(4)
    expect(moveCursor(2, 1, 5)).toBe(3)
  })

  it("is 0 for an empty list", () => {
    expect(moveCursor(3, 1, 0)).toBe(0)
    expect(moveCursor(0, -1, 0)).toBe(0)
  })
})

describe("adjustOffset", () => {
  it("scrolls down to reveal the cursor", () => {
    expect(adjustOffset(5, 0, 3)).toBe(3)
  })

  it("scrolls up to reveal the cursor", () => {
    expect(adjustOffset(1, 3, 3)).toBe(1)
  })

  it("keeps the offset when the cursor is visible", () => {
    expect(adjustOffset(2, 1, 3)).toBe(1)
  })

  it("treats a zero height as one row", () => {
    expect(adjustOffset(2, 0, 0)).toBe(2)
  })
})

describe("moveViewport", () => {
  it("moves the cursor and scrolls with it", () => {
    expect(moveViewport({ cursor: 2, offset: 0 }, 1, 10, 3)).toEqual({ cursor: 3, offset: 1 })
  })
})

describe("jumpToBottom", () => {
  it("puts the cursor on the last item", () => {
    expect(jumpToBottom({ cursor: 0, offset: 0 }, 10, 4)).toEqual({ cursor: 9, offset: 6 })
  })

  it("leaves an empty list alone", () => {
    const viewport = { cursor: 0, offset: 0 }
    expect(jumpToBottom(viewport, 0, 4)).toBe(viewport)
  })
})

describe("clampViewport", () => {
  it("pulls the cursor back after the list shrank", () => {
    expect(clampViewport({ cursor: 8, offset: 6 }, 3, 5)).toEqual({ cursor: 2, offset: 2 })
  })

  it("resets an empty list", () => {
    expect(clampViewport({ cursor: 4, offset: 2 }, 0, 5)).toEqual({ cursor: 0, offset: 0 })
  })
})

describe("sectionHeights", () => {
  it("gives history 30% of the rows left after chrome", () => {
    expect(sectionHeights(24)).toEqual({ collections: 14, history: 5 })
    expect(sectionHeights(12)).toEqual({ collections: 5, history: 2 })
  })

  it("keeps at least one row per section", () => {
    expect(sectionHeights(5)).toEqual({ collections: 1, history: 1 })
    expect(sectionHeights(0)).toEqual({ collections: 1, history: 1 })
  })

  it("looks up one section", () => {
    expect(visibleHeight(24, "history")).toBe(5)
    expect(visibleHeight(24, "collections")).toBe(14)
  })
})
