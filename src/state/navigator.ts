import { type Draft, produce } from "immer"

import {
  containsFolder,
  containsRequest,
  containsSocket,
  createCollection,
  DefaultCollectionName,
  removeRequestRecursive,
} from "@/lib/collections"
import { cycleMethodFilter, cycleStatusFilter } from "@/lib/history-query"
import { resolveAction } from "@/lib/keymap"
import { filterTreeItems, flattenCollections, toggleExpand } from "@/lib/tree"
import {
  adjustOffset,
  clampViewport,
  initialViewport,
  jumpToBottom,
  jumpToTop,
  moveViewport,
  visibleHeight,
} from "@/lib/viewport"
import type {
  Collection,
  HistoryQueryResult,
  InboundMessage,
  KeyInput,
  NavigatorAction,
  NavigatorEffect,
  NavigatorSettings,
  NavigatorState,
  OutboundMessage,
  RequestDefinition,
  TreeItem,
} from "@/types"

type NavigatorDraft = Draft<NavigatorState>

const QueryHistory: NavigatorEffect = { type: "query-history" }

const emit = (message: OutboundMessage): NavigatorEffect => ({
  type: "emit",
  message,
})

export function createNavigatorState(collections: Collection[] = []): NavigatorState {
  const items = flattenCollections(collections, {})
  return {
    focused: false,
    width: 0,
    height: 0,
    viewMode: "collections",
    searching: false,
    chordPending: false,
    collections: {
      collections,
      expanded: {},
      items,
      display: items,
      search: "",
      viewport: initialViewport(),
    },
    history: {
      entries: [],
      search: "",
      methodFilter: "",
      statusFilter: "",
      viewport: initialViewport(),
      available: false,
      stale: false,
      error: null,
    },
  }
}

// --- Selectors ---

export const selectDisplayItems = (state: NavigatorState): TreeItem[] => state.collections.display

export function selectItem(state: NavigatorState): TreeItem | null {
  const { display, viewport } = state.collections
  return display[viewport.cursor] ?? null
}

function findOwner(collections: Collection[], item: TreeItem): Collection | undefined {
  switch (item.kind) {
    case "collection":
      return item.collection
    case "folder":
      return collections.find((c) => containsFolder(c, item.id))
    case "request":
      return collections.find((c) => containsRequest(c, item.id))
    case "socket":
      return collections.find((c) => containsSocket(c, item.id))
  }
}

/**
 * Collection owning the row under the cursor. Falls back to the first collection.
 */
export function selectCollection(state: NavigatorState): Collection | null {
  const { collections } = state.collections
  const item = selectItem(state)
  const owner = item ? findOwner(collections, item) : undefined
  return owner ?? collections[0] ?? null
}

// --- Draft helpers ---

const collectionsHeight = (draft: NavigatorDraft) => visibleHeight(draft.height, "collections")
const historyHeight = (draft: NavigatorDraft) => visibleHeight(draft.height, "history")

/**
 * Re-run the text filter over the current items. A non-empty filter puts the cursor back on top.
 */
function refilter(draft: NavigatorDraft) {
  const view = draft.collections
  view.display = filterTreeItems(view.items, view.search)
  view.viewport =
    view.search === "" ? clampViewport(view.viewport, view.display.length, collectionsHeight(draft)) : jumpToTop()
}

/**
 * Flatten again after the data or the expansion changed. The cursor stays where it was.
 */
function rebuildTree(draft: NavigatorDraft) {
  const view = draft.collections
  const items = flattenCollections(view.collections, view.expanded)
  view.items = items
  view.display = filterTreeItems(items, view.search)
  view.viewport = clampViewport(view.viewport, view.display.length, collectionsHeight(draft))
}

function setExpansion(draft: NavigatorDraft, prev: NavigatorState, index: number, expand: boolean) {
  const item = prev.collections.display[index]
  if (!item || !item.expandable || item.expanded === expand) {
    return
  }
  draft.collections.expanded = toggleExpand(prev.collections.expanded, item.id, expand)
  rebuildTree(draft)
}

function moveCollections(draft: NavigatorDraft, delta: number) {
  const view = draft.collections
  view.viewport = moveViewport(view.viewport, delta, view.display.length, collectionsHeight(draft))
}

function moveHistory(draft: NavigatorDraft, delta: number) {
  const view = draft.history
  view.viewport = moveViewport(view.viewport, delta, view.entries.length, historyHeight(draft))
}

// --- Key handling ---

/**
 * Containers open or close, leaves are handed out as a selection.
 */
function activateTreeItem(draft: NavigatorDraft, prev: NavigatorState, index: number): NavigatorEffect | null {
  const item = prev.collections.display[index]
  if (!item) {
    return null
  }
  switch (item.kind) {
    case "collection":
    case "folder":
      setExpansion(draft, prev, index, !item.expanded)
      return null
    case "request":
      return emit({ type: "request-selected", request: item.request })
    case "socket":
      return emit({ type: "socket-selected", socket: item.socket })
  }
}

function handleCollectionsAction(
  draft: NavigatorDraft,
  prev: NavigatorState,
  action: NavigatorAction | null,
): NavigatorEffect | null {
  const view = draft.collections
  const cursor = prev.collections.viewport.cursor

  switch (action) {
    case "next":
      moveCollections(draft, 1)
      return null
    case "prev":
      moveCollections(draft, -1)
      return null
    case "expand":
      setExpansion(draft, prev, cursor, true)
      return null
    case "collapse":
      setExpansion(draft, prev, cursor, false)
      return null
    case "search":
      draft.searching = true
      view.search = ""
      refilter(draft)
      return null
    case "toggleView":
      draft.viewMode = "history"
      return QueryHistory
    case "bottom":
      view.viewport = jumpToBottom(view.viewport, view.display.length, collectionsHeight(draft))
      return null
    case "first":
      view.viewport = jumpToTop()
      return null
    case "activate":
      return activateTreeItem(draft, prev, cursor)
    case "cancel":
      if (view.search !== "") {
        view.search = ""
        view.display = view.items
        view.viewport = jumpToTop()
      }
      return null
    case "showCollections":
    case "refresh":
    case "cycleMethod":
    case "cycleStatus":
    case "clearFilters":
    case "top":
    case null:
      return null
  }
}

function handleHistoryAction(
  draft: NavigatorDraft,
  prev: NavigatorState,
  action: NavigatorAction | null,
): NavigatorEffect | null {
  const view = draft.history

  switch (action) {
    case "next":
      moveHistory(draft, 1)
      return null
    case "prev":
      moveHistory(draft, -1)
      return null
    case "search":
      draft.searching = true
      view.search = ""
      return null
    case "toggleView":
    case "showCollections":
      draft.viewMode = "collections"
      return null
    case "bottom":
      view.viewport = jumpToBottom(view.viewport, view.entries.length, historyHeight(draft))
      return null
    case "first":
      view.viewport = jumpToTop()
      return null
    case "activate": {
      const entry = prev.history.entries[prev.history.viewport.cursor]
      return entry ? emit({ type: "history-entry-selected", entry }) : null
    }
    case "cancel":
      if (view.search !== "") {
        view.search = ""
        view.viewport = jumpToTop()
        return QueryHistory
      }
      draft.viewMode = "collections"
      return null
    case "refresh":
      view.viewport = jumpToTop()
      return QueryHistory
    case "cycleMethod":
      view.methodFilter = cycleMethodFilter(view.methodFilter)
      view.viewport = jumpToTop()
      return QueryHistory
    case "cycleStatus":
      view.statusFilter = cycleStatusFilter(view.statusFilter)
      view.viewport = jumpToTop()
      return QueryHistory
    case "clearFilters":
      view.methodFilter = ""
      view.statusFilter = ""
      view.search = ""
      view.viewport = jumpToTop()
      return QueryHistory
    case "expand":
    case "collapse":
    case "top":
    case null:
      return null
  }
}

/**
 * Apply the edited query text: filter the tree in place, or ask for a new history query.
 */
function applySearch(draft: NavigatorDraft): NavigatorEffect | null {
  if (draft.viewMode === "history") {
    draft.history.viewport = jumpToTop()
    return QueryHistory
  }
  refilter(draft)
  return null
}

function editSearch(draft: NavigatorDraft, edit: (text: string) => string): NavigatorEffect | null {
  const view = draft.viewMode === "history" ? draft.history : draft.collections
  const text = edit(view.search)
  if (text === view.search) {
    return null
  }
  view.search = text
  return applySearch(draft)
}

const dropLastCharacter = (text: string) => Array.from(text).slice(0, -1).join("")

/**
 * While the query is being edited every character is text, including the navigation letters.
 */
function handleSearchInput(draft: NavigatorDraft, key: KeyInput): NavigatorEffect | null {
  if (key.kind === "char") {
    return editSearch(draft, (text) => text + key.char)
  }
  switch (key.name) {
    case "escape":
      draft.searching = false
      return null
    case "enter":
      draft.searching = false
      return applySearch(draft)
    case "backspace":
    case "delete":
      return editSearch(draft, dropLastCharacter)
    case "clear":
      return editSearch(draft, () => "")
    case "space":
      return editSearch(draft, (text) => `${text} `)
    default:
      return null
  }
}

function handleKey(
  draft: NavigatorDraft,
  prev: NavigatorState,
  key: KeyInput,
  settings: NavigatorSettings,
): NavigatorEffect | null {
  if (prev.searching) {
    return handleSearchInput(draft, key)
  }

  const action = resolveAction(settings.keymap, key)
  draft.chordPending = false

  if (action === "top") {
    if (!prev.chordPending) {
      draft.chordPending = true
    } else if (prev.viewMode === "history") {
      draft.history.viewport = jumpToTop()
    } else {
      draft.collections.viewport = jumpToTop()
    }
    return null
  }

  return prev.viewMode === "history"
    ? handleHistoryAction(draft, prev, action)
    : handleCollectionsAction(draft, prev, action)
}

function route(
  draft: NavigatorDraft,
  prev: NavigatorState,
  message: InboundMessage,
  settings: NavigatorSettings,
): NavigatorEffect | null {
  switch (message.type) {
    case "resize":
      draft.width = message.width
      draft.height = message.height
      draft.collections.viewport = clampViewport(
        draft.collections.viewport,
        draft.collections.display.length,
        collectionsHeight(draft),
      )
      draft.history.viewport = clampViewport(draft.history.viewport, draft.history.entries.length, historyHeight(draft))
      return null
    case "focus":
      draft.focused = true
      return null
    case "blur":
      draft.focused = false
      return null
    case "key":
      // unfocused: keys are dropped without touching anything
      return prev.focused ? handleKey(draft, prev, message.key, settings) : null
  }
}

/**
 * One step of the navigator: the next state plus the deferred effect the caller has to run.
 */
export function update(
  state: NavigatorState,
  message: InboundMessage,
  settings: NavigatorSettings,
): [NavigatorState, NavigatorEffect | null] {
  let effect: NavigatorEffect | null = null
  const next = produce(state, (draft) => {
    effect = route(draft, state, message, settings)
  })
  return [next, effect]
}

/**
 * Take in the outcome of a history query. A failure keeps the previous entries and marks them stale.
 */
export function receiveHistory(state: NavigatorState, result: HistoryQueryResult): NavigatorState {
  return produce(state, (draft) => {
    const view = draft.history
    if (result.ok) {
      view.entries = result.entries
      view.stale = false
      view.error = null
    } else {
      view.stale = true
      view.error = result.error
    }
    view.viewport = clampViewport(view.viewport, view.entries.length, historyHeight(draft))
  })
}

export function setHistoryAvailable(state: NavigatorState, available: boolean): NavigatorState {
  return produce(state, (draft) => {
    draft.history.available = available
    if (!available) {
      draft.history.entries = []
      draft.history.stale = false
      draft.history.error = null
      draft.history.viewport = initialViewport()
    }
  })
}

// --- Explicit operations ---

export function setCollections(state: NavigatorState, collections: Collection[]): NavigatorState {
  return produce(state, (draft) => {
    draft.collections.collections = collections
    draft.collections.viewport = initialViewport()
    rebuildTree(draft)
  })
}

/**
 * @returns the next state and whether the request was added
 */
export function addRequest(
  state: NavigatorState,
  request: RequestDefinition | null | undefined,
  collectionId?: string,
): [NavigatorState, boolean] {
  if (!request) {
    return [state, false]
  }
  const { collections } = state.collections
  const index = collectionId === undefined ? 0 : collections.findIndex((c) => c.id === collectionId)
  if (index < 0) {
    return [state, false]
  }

  const next = produce(state, (draft) => {
    const view = draft.collections
    let target = view.collections[index]
    if (!target) {
      target = createCollection(DefaultCollectionName)
      view.collections.push(target)
    }
    target.requests.push(request)
    view.expanded = toggleExpand(state.collections.expanded, target.id, true)
    rebuildTree(draft)

    const position = view.display.findIndex((item) => item.kind === "request" && item.id === request.id)
    if (position >= 0) {
      view.viewport = {
        cursor: position,
        offset: adjustOffset(position, view.viewport.offset, collectionsHeight(draft)),
      }
    }
  })
  return [next, true]
}

/**
 * @returns the next state and the collection the request was removed from
 */
export function deleteRequest(state: NavigatorState, requestId: string): [NavigatorState, Collection | null] {
  const index = state.collections.collections.findIndex((c) => containsRequest(c, requestId))
  if (index < 0) {
    return [state, null]
  }
  const next = produce(state, (draft) => {
    const owner = draft.collections.collections[index]
    if (owner) {
      removeRequestRecursive(owner, requestId)
    }
    rebuildTree(draft)
  })
  return [next, next.collections.collections[index] ?? null]
}

export function getOrCreateCollection(state: NavigatorState, name: string): [NavigatorState, Collection] {
  const existing = state.collections.collections.find((c) => c.name === name)
  if (existing) {
    return [state, existing]
  }
  const collection = createCollection(name)
  const next = produce(state, (draft) => {
    draft.collections.collections.push(collection)
    rebuildTree(draft)
  })
  return [next, next.collections.collections[next.collections.collections.length - 1] ?? collection]
}

export const expandAt = (state: NavigatorState, index: number): NavigatorState =>
  produce(state, (draft) => setExpansion(draft, state, index, true))

export const collapseAt = (state: NavigatorState, index: number): NavigatorState =>
  produce(state, (draft) => setExpansion(draft, state, index, false))

/**
 * Put the collections cursor on `index`. Indexes outside the display list are ignored.
 */
export function setCursor(state: NavigatorState, index: number): NavigatorState {
  if (!Number.isInteger(index) || index < 0 || index >= state.collections.display.length) {
    return state
  }
  return produce(state, (draft) => {
    const view = draft.collections
    view.viewport = { cursor: index, offset: adjustOffset(index, view.viewport.offset, collectionsHeight(draft)) }
  })
}
