import { z } from "zod"

/*
  collections -> folders (nested) -> requests / sockets

  The navigator only reads these. Expansion lives outside of them, keyed by id.
 */

export const zRequestDefinition = z.object({
  /**
   * Stable identifier for the request
   */
  id: z.string(),
  /**
   * Display name in the tree
   */
  name: z.string(),
  /**
   * HTTP method, shown as a badge and matched by the tree filter
   */
  method: z.string().default("GET"),
  url: z.string().default(""),
  description: z.string().optional(),
})
export type RequestDefinition = z.infer<typeof zRequestDefinition>

export const zSocketDefinition = z.object({
  id: z.string(),
  name: z.string(),
  /**
   * WebSocket endpoint (ws:// or wss://)
   */
  endpoint: z.string().default(""),
})
export type SocketDefinition = z.infer<typeof zSocketDefinition>

export const zFolder = z.object({
  id: z.string(),
  name: z.string(),
  get folders(): z.ZodDefault<z.ZodArray<typeof zFolder>> {
    return z.array(zFolder).default([])
  },
  requests: z.array(zRequestDefinition).default([]),
  sockets: z.array(zSocketDefinition).default([]),
})
export type Folder = z.infer<typeof zFolder>

export const zCollection = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().optional(),
  folders: z.array(zFolder).default([]),
  requests: z.array(zRequestDefinition).default([]),
  sockets: z.array(zSocketDefinition).default([]),
})
export type Collection = z.infer<typeof zCollection>

export const zCollections = z.array(zCollection)

/**
 * Anything that can hold folders, requests and sockets
 */
export type Container = Collection | Folder

export type TreeItemKind = "collection" | "folder" | "request" | "socket"

interface TreeItemBase {
  id: string
  name: string
  /**
   * Nesting depth, 0 for collections
   */
  level: number
  expandable: boolean
  expanded: boolean
}

/**
 * A display row of the collections tree. Exactly one back-reference, matching `kind`.
 */
export type TreeItem =
  | (TreeItemBase & { kind: "collection"; collection: Collection })
  | (TreeItemBase & { kind: "folder"; folder: Folder })
  | (TreeItemBase & { kind: "request"; method: string; request: RequestDefinition })
  | (TreeItemBase & { kind: "socket"; socket: SocketDefinition })

/**
 * Open/closed flag per node id. Absent means collapsed.
 */
export type ExpansionState = Readonly<Record<string, boolean>>
