import type { HistoryEntry, NavigatorState, TreeItem } from "@/types"
import { fit, truncate } from "./utils"
import { sectionHeights } from "./viewport"

const METHOD_BADGES: Record<string, string> = {
  GET: " GET ",
  POST: " POST",
  PUT: " PUT ",
  PATCH: "PATCH",
  DELETE: " DEL ",
  HEAD: " HEAD",
  OPTIONS: " OPT ",
  WS: " WS  ",
}

/**
 * Five column method label
 */
export function methodBadge(method: string): string {
  const upper = method.toUpperCase()
  return METHOD_BADGES[upper] ?? ` ${upper.slice(0, 4).padEnd(4)}`
}

const MINUTE = 60_000
const HOUR = 60 * MINUTE
const DAY = 24 * HOUR

export function formatTimeAgo(timestamp: string, now: Date): string {
  const then = new Date(timestamp)
  const diff = now.getTime() - then.getTime()
  if (diff < MINUTE) {
    return "just now"
  }
  if (diff < HOUR) {
    return `${Math.floor(diff / MINUTE)}m ago`
  }
  if (diff < DAY) {
    return `${Math.floor(diff / HOUR)}h ago`
  }
  if (diff < 7 * DAY) {
    return `${Math.floor(diff / DAY)}d ago`
  }
  return then.toLocaleDateString("en-US", { month: "short", day: "numeric", timeZone: "UTC" })
}

const itemIcon = (item: TreeItem): string => {
  switch (item.kind) {
    case "collection":
      return "▣ "
    case "folder":
      return "▢ "
    case "request":
      return `${methodBadge(item.method)} `
    case "socket":
      return `${methodBadge("WS")} `
  }
}

export function renderTreeItem(item: TreeItem, selected: boolean, width: number): string {
  const marker = selected ? "→" : " "
  const indent = "  ".repeat(item.level)
  const indicator = item.expandable ? (item.expanded ? "▼ " : "▶ ") : "  "
  const prefix = marker + indent + indicator + itemIcon(item)
  return fit(prefix + truncate(item.name, width - prefix.length), width)
}

const stripScheme = (url: string) => url.replace(/^https?:\/\//, "")

export function renderHistoryEntry(entry: HistoryEntry, selected: boolean, width: number, now: Date): string {
  const prefix = `${selected ? "▶" : " "} ${methodBadge(entry.method)} `
  const suffix = ` ${entry.status} ${formatTimeAgo(entry.timestamp, now)}`
  const url = truncate(stripScheme(entry.url), Math.max(10, width - prefix.length - suffix.length))
  return fit(prefix + url + suffix, width)
}

export function renderSearchBar(state: NavigatorState, width: number): string {
  const history = state.viewMode === "history"
  const query = history ? state.history.search : state.collections.search
  if (!state.searching && query === "") {
    return fit("/ search...", width)
  }

  let content = `/ ${query}${state.searching ? "▌" : ""}`
  if (query !== "" && !state.searching) {
    const count = history ? state.history.entries.length : state.collections.display.length
    const feedback = count === 0 ? " (No matches)" : ` (${count} result${count === 1 ? "" : "s"})`
    if (content.length + feedback.length <= width) {
      content += feedback
    }
  }
  return fit(content, width)
}

export function renderHistoryHeader(state: NavigatorState): string {
  const { history } = state
  let header = state.viewMode === "history" ? "History" : "History (H)"
  const filters = [history.methodFilter, history.statusFilter].filter((f) => f !== "")
  if (filters.length > 0) {
    header += ` [${filters.join(",")}]`
  }
  if (history.stale) {
    header += " (stale)"
  }
  return header
}

export const renderCollectionsHeader = (state: NavigatorState): string =>
  state.viewMode === "collections" ? "Collections" : "Collections (C)"

const center = (text: string, width: number) => fit(" ".repeat(Math.max(0, Math.floor((width - text.length) / 2))) + text, width)

function historyEmptyMessage(state: NavigatorState): string {
  const { history } = state
  if (history.methodFilter !== "" || history.statusFilter !== "") {
    return "No matching entries (m:method s:status x:clear)"
  }
  return history.available ? "No history entries" : "History not available"
}

function windowed<T>(rows: T[], offset: number, height: number, render: (row: T, index: number) => string) {
  const lines: string[] = []
  for (let i = offset; i < rows.length && lines.length < height; i++) {
    const row = rows[i]
    if (row !== undefined) {
      lines.push(render(row, i))
    }
  }
  return lines
}

const padLines = (lines: string[], height: number, width: number) => {
  while (lines.length < height) {
    lines.push(" ".repeat(width))
  }
  return lines
}

/**
 * Plain text lines of the whole sidebar: border, search bar, history section, collections section.
 * Empty until the first resize.
 */
export function renderNavigator(state: NavigatorState, now: Date = new Date()): string[] {
  if (state.width <= 0 || state.height <= 0) {
    return []
  }
  const inner = Math.max(1, state.width - 2)
  const heights = sectionHeights(state.height)
  const { collections, history } = state

  const historyLines =
    history.entries.length === 0
      ? [center(historyEmptyMessage(state), inner)]
      : windowed(history.entries, history.viewport.offset, heights.history, (entry, i) =>
          renderHistoryEntry(entry, i === history.viewport.cursor, inner, now),
        )

  const treeLines = windowed(collections.display, collections.viewport.offset, heights.collections, (item, i) =>
    renderTreeItem(item, i === collections.viewport.cursor, inner),
  )

  const body = [
    renderSearchBar(state, inner),
    fit(renderHistoryHeader(state), inner),
    ...padLines(historyLines, heights.history, inner),
    fit(renderCollectionsHeader(state), inner),
    ...padLines(treeLines, heights.collections, inner),
  ]

  return [`╭${"─".repeat(inner)}╮`, ...body.map((line) => `│${line}│`), `╰${"─".repeat(inner)}╯`]
}
