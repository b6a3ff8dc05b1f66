import { zParse } from "@/state/utils"
import {
  type Collection,
  type Container,
  type Folder,
  type RequestDefinition,
  type SocketDefinition,
  zCollections,
} from "@/types"
import { generateUniqueId } from "./utils"

export const DefaultCollectionName = "Default"

export const createCollection = (name: string, init: Partial<Omit<Collection, "id" | "name">> = {}): Collection => ({
  id: generateUniqueId(),
  name,
  folders: [],
  requests: [],
  sockets: [],
  ...init,
})

export const createFolder = (name: string, init: Partial<Omit<Folder, "id" | "name">> = {}): Folder => ({
  id: generateUniqueId(),
  name,
  folders: [],
  requests: [],
  sockets: [],
  ...init,
})

export const createRequest = (name: string, method = "GET", url = ""): RequestDefinition => ({
  id: generateUniqueId(),
  name,
  method: method.toUpperCase(),
  url,
})

export const createSocket = (name: string, endpoint = ""): SocketDefinition => ({
  id: generateUniqueId(),
  name,
  endpoint,
})

/**
 * Validate a collections document (for example a parsed JSON file)
 */
export const parseCollections = (data: unknown): Collection[] => zParse(zCollections, data)

export function containsFolder(container: Container, folderId: string): boolean {
  return container.folders.some((f) => f.id === folderId || containsFolder(f, folderId))
}

export function containsRequest(container: Container, requestId: string): boolean {
  return (
    container.requests.some((r) => r.id === requestId) || container.folders.some((f) => containsRequest(f, requestId))
  )
}

export function containsSocket(container: Container, socketId: string): boolean {
  return (
    container.sockets.some((s) => s.id === socketId) || container.folders.some((f) => containsSocket(f, socketId))
  )
}

/**
 * Removes a request from `container` or any folder below it. Mutates, so call it on a draft.
 * @returns whether something was removed
 */
export function removeRequestRecursive(container: Container, requestId: string): boolean {
  const index = container.requests.findIndex((r) => r.id === requestId)
  if (index >= 0) {
    container.requests.splice(index, 1)
    return true
  }
  return container.folders.some((f) => removeRequestRecursive(f, requestId))
}
