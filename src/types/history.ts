import { z } from "zod"

import type { AppError } from "./errors"

export const zHistoryEntry = z.object({
  id: z.string(),
  method: z.string(),
  url: z.string(),
  /**
   * Response status code, 0 when the request never got a response
   */
  status: z.number().int().min(0),
  timestamp: z.iso.datetime(),
  requestName: z.string().optional(),
  /**
   * Round trip in milliseconds
   */
  durationMs: z.number().int().min(0).optional(),
})
export type HistoryEntry = z.infer<typeof zHistoryEntry>

export const zHistorySortField = z.enum(["timestamp", "status", "method", "url"])
export type HistorySortField = z.infer<typeof zHistorySortField>

export const zSortOrder = z.enum(["asc", "desc"])
export type SortOrder = z.infer<typeof zSortOrder>

export const zHistoryQueryOptions = z.object({
  limit: z.number().int().positive(),
  sortBy: zHistorySortField,
  sortOrder: zSortOrder,
  method: z.string().optional(),
  statusMin: z.number().int().optional(),
  statusMax: z.number().int().optional(),
  /**
   * Free-text term. Only used by `search`; the adapter moves it there.
   */
  search: z.string().optional(),
})
export type HistoryQueryOptions = z.infer<typeof zHistoryQueryOptions>

/**
 * Read side of the external history log. Both calls reject on failure.
 */
export interface HistoryStore {
  list(options: HistoryQueryOptions, signal?: AbortSignal): Promise<HistoryEntry[]>
  search(text: string, options: HistoryQueryOptions, signal?: AbortSignal): Promise<HistoryEntry[]>
}

export type HistoryQueryResult = { ok: true; entries: HistoryEntry[] } | { ok: false; error: AppError }

export const HistoryMethodFilters = ["", "GET", "POST", "PUT", "PATCH", "DELETE", "HEAD", "OPTIONS"] as const
export type HistoryMethodFilter = (typeof HistoryMethodFilters)[number]

export const HistoryStatusFilters = ["", "2xx", "3xx", "4xx", "5xx"] as const
export type HistoryStatusFilter = (typeof HistoryStatusFilters)[number]
