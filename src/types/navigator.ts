import type { Collection, ExpansionState, RequestDefinition, SocketDefinition, TreeItem } from "./collections"
import type { AppError } from "./errors"
import type { HistoryEntry, HistoryMethodFilter, HistoryStatusFilter, HistoryStore } from "./history"

export type NamedKey =
  | "up"
  | "down"
  | "left"
  | "right"
  | "enter"
  | "escape"
  | "backspace"
  | "delete"
  | "home"
  | "end"
  // clear-all input (ctrl+u)
  | "clear"
  | "space"

export type KeyInput = { kind: "named"; name: NamedKey } | { kind: "char"; char: string }

export type InboundMessage =
  | { type: "resize"; width: number; height: number }
  | { type: "focus" }
  | { type: "blur" }
  | { type: "key"; key: KeyInput }

export type OutboundMessage =
  | { type: "request-selected"; request: RequestDefinition }
  | { type: "socket-selected"; socket: SocketDefinition }
  | { type: "history-entry-selected"; entry: HistoryEntry }

/**
 * Deferred work returned by `update`. The store executes it; `update` itself never does I/O.
 */
export type NavigatorEffect =
  | { type: "emit"; message: OutboundMessage }
  | { type: "query-history" }

export type ViewMode = "collections" | "history"

/**
 * Cursor index and first visible row of one list
 */
export interface Viewport {
  cursor: number
  offset: number
}

export interface CollectionsViewState {
  collections: Collection[]
  expanded: ExpansionState
  /**
   * Flattened tree, rebuilt on every data or expansion change
   */
  items: TreeItem[]
  /**
   * `items` after the text filter. Same array as `items` when the filter is empty.
   */
  display: TreeItem[]
  search: string
  viewport: Viewport
}

export interface HistoryViewState {
  entries: HistoryEntry[]
  search: string
  methodFilter: HistoryMethodFilter
  statusFilter: HistoryStatusFilter
  viewport: Viewport
  /**
   * Whether a store is attached at all
   */
  available: boolean
  /**
   * Set when the last query failed and `entries` are from an earlier one
   */
  stale: boolean
  error: AppError | null
}

export interface NavigatorState {
  focused: boolean
  width: number
  height: number
  viewMode: ViewMode
  searching: boolean
  chordPending: boolean
  collections: CollectionsViewState
  history: HistoryViewState
}

export interface NavigatorStateApi {
  /**
   * Process one inbound message to completion, including any history query it triggers
   * @returns The outbound message the caller should deliver, if any
   */
  dispatch(message: InboundMessage): Promise<OutboundMessage | null>

  /**
   * Replace the data set. Expansion is kept, the collections cursor goes back to the top.
   */
  setCollections(collections: Collection[]): void

  /**
   * Append a request to a collection (the first one, or a new "Default" one, when not given)
   * and put the cursor on it
   * @returns false when the request is missing
   */
  addRequest(request: RequestDefinition | null | undefined, collectionId?: string): boolean

  /**
   * Remove a request wherever it lives
   * @returns The collection that held it
   */
  deleteRequest(requestId: string): Collection | null

  getOrCreateCollection(name: string): Collection

  expandAt(index: number): void
  collapseAt(index: number): void
  setCursor(index: number): void

  getSelectedItem(): TreeItem | null
  getSelectedCollection(): Collection | null
  visibleItemCount(): number

  /**
   * Attach (and load from) or detach the history store. A query still running against the
   * previous store is dropped when it finishes.
   */
  setHistoryStore(store: HistoryStore | null): Promise<void>

  /**
   * Re-run the history query with the current filters
   */
  refreshHistory(): Promise<void>
}

export interface NavigatorStateSlice {
  navigatorState: NavigatorState
  navigatorApi: NavigatorStateApi
}
