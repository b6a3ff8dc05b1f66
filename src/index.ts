export { createCollection, createFolder, createRequest, createSocket, parseCollections } from "@/lib/collections"
export { createMemoryHistoryStore, type MemoryHistoryStore } from "@/lib/memory-history-store"
export { keyLabel, resolveAction, toKeyInput } from "@/lib/keymap"
export {
  formatTimeAgo,
  methodBadge,
  renderHistoryEntry,
  renderNavigator,
  renderSearchBar,
  renderTreeItem,
} from "@/lib/render"
export { filterTreeItems, flattenCollections } from "@/lib/tree"
export { sectionHeights } from "@/lib/viewport"
export * from "@/state"
export * from "@/types"
