import type { Collection, Container, ExpansionState, Folder, RequestDefinition, SocketDefinition, TreeItem } from "@/types"

// --- Expansion state ---

export const isExpanded = (expanded: ExpansionState, id: string): boolean => expanded[id] === true

/**
 * Returns a new expansion map with `id` set to `expand`. The input is left untouched.
 */
export function toggleExpand(expanded: ExpansionState, id: string, expand: boolean): ExpansionState {
  return { ...expanded, [id]: expand }
}

// --- Flattening ---

const hasChildren = (node: Container): boolean =>
  node.folders.length > 0 || node.requests.length > 0 || node.sockets.length > 0

const requestItem = (request: RequestDefinition, level: number): TreeItem => ({
  kind: "request",
  id: request.id,
  name: request.name,
  level,
  expandable: false,
  expanded: false,
  method: request.method,
  request,
})

const socketItem = (socket: SocketDefinition, level: number): TreeItem => ({
  kind: "socket",
  id: socket.id,
  name: socket.name,
  level,
  expandable: false,
  expanded: false,
  socket,
})

function appendChildren(items: TreeItem[], node: Container, level: number, expanded: ExpansionState) {
  for (const folder of node.folders) {
    appendFolder(items, folder, level, expanded)
  }
  for (const request of node.requests) {
    items.push(requestItem(request, level))
  }
  for (const socket of node.sockets) {
    items.push(socketItem(socket, level))
  }
}

function appendFolder(items: TreeItem[], folder: Folder, level: number, expanded: ExpansionState) {
  const open = isExpanded(expanded, folder.id)
  items.push({
    kind: "folder",
    id: folder.id,
    name: folder.name,
    level,
    expandable: hasChildren(folder),
    expanded: open,
    folder,
  })
  if (open) {
    appendChildren(items, folder, level + 1, expanded)
  }
}

/**
 * Pre-order display list of the forest. Children of a node are only visited when the node is
 * expanded, so the cost follows the number of visible rows.
 */
export function flattenCollections(roots: readonly Collection[], expanded: ExpansionState): TreeItem[] {
  const items: TreeItem[] = []
  for (const collection of roots) {
    const open = isExpanded(expanded, collection.id)
    items.push({
      kind: "collection",
      id: collection.id,
      name: collection.name,
      level: 0,
      expandable: hasChildren(collection),
      expanded: open,
      collection,
    })
    if (open) {
      appendChildren(items, collection, 1, expanded)
    }
  }
  return items
}

// --- Filtering ---

function matchesTreeItem(item: TreeItem, needle: string): boolean {
  if (item.name.toLowerCase().includes(needle)) {
    return true
  }
  switch (item.kind) {
    case "request":
      return item.method.toLowerCase().includes(needle) || item.request.url.toLowerCase().includes(needle)
    case "socket":
      return item.socket.endpoint.toLowerCase().includes(needle)
    case "collection":
    case "folder":
      return false
  }
}

/**
 * Case-insensitive substring filter over names, request methods and URLs, and socket endpoints.
 *
 * Matches are kept in tree order and nothing else is pulled in: a nested request that matches is
 * listed without its folder or collection.
 *
 * @returns `items` itself when the query is empty
 */
export function filterTreeItems(items: TreeItem[], query: string): TreeItem[] {
  if (query === "") {
    return items
  }
  const needle = query.toLowerCase()
  return items.filter((item) => matchesTreeItem(item, needle))
}
