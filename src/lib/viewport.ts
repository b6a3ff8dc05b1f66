import { clamp } from "es-toolkit"

import type { ViewMode, Viewport } from "@/types"

export const initialViewport = (): Viewport => ({ cursor: 0, offset: 0 })

/**
 * Cursor moved by `delta` and kept inside the list. Always 0 for an empty list.
 */
export function moveCursor(cursor: number, delta: number, itemCount: number): number {
  if (itemCount <= 0) {
    return 0
  }
  return clamp(cursor + delta, 0, itemCount - 1)
}

/**
 * Offset that keeps `cursor` inside a window of `visibleHeight` rows.
 */
export function adjustOffset(cursor: number, offset: number, visibleHeight: number): number {
  const height = Math.max(1, visibleHeight)
  if (cursor < offset) {
    return cursor
  }
  if (cursor >= offset + height) {
    return cursor - height + 1
  }
  return offset
}

export function moveViewport(viewport: Viewport, delta: number, itemCount: number, visibleHeight: number): Viewport {
  const cursor = moveCursor(viewport.cursor, delta, itemCount)
  return { cursor, offset: adjustOffset(cursor, viewport.offset, visibleHeight) }
}

export const jumpToTop = (): Viewport => ({ cursor: 0, offset: 0 })

export function jumpToBottom(viewport: Viewport, itemCount: number, visibleHeight: number): Viewport {
  if (itemCount <= 0) {
    return viewport
  }
  const cursor = itemCount - 1
  return { cursor, offset: adjustOffset(cursor, viewport.offset, visibleHeight) }
}

/**
 * Re-establish the cursor/offset invariants after the list under the viewport changed.
 */
export function clampViewport(viewport: Viewport, itemCount: number, visibleHeight: number): Viewport {
  const cursor = moveCursor(viewport.cursor, 0, itemCount)
  const offset = adjustOffset(cursor, Math.min(viewport.offset, cursor), visibleHeight)
  return { cursor, offset }
}

export interface SectionHeights {
  collections: number
  history: number
}

/**
 * Rows available to each list inside a box of `height` lines: two border lines, the search bar
 * and one header per section are taken first, then history gets 30% of the rest.
 */
export function sectionHeights(height: number): SectionHeights {
  const inner = height - 2
  const available = Math.max(2, inner - 3)
  const history = Math.max(1, Math.floor((available * 3) / 10))
  const collections = Math.max(1, available - history)
  return { collections, history }
}

export const visibleHeight = (height: number, mode: ViewMode): number => sectionHeights(height)[mode]
