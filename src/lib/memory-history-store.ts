import { orderBy } from "es-toolkit"

import { zParse } from "@/state/utils"
import { type HistoryEntry, type HistoryQueryOptions, type HistoryStore, zHistoryEntry } from "@/types"

export interface MemoryHistoryStore extends HistoryStore {
  add(entry: HistoryEntry): void
  clear(): void
  size(): number
}

const throwIfAborted = (signal?: AbortSignal) => {
  if (signal?.aborted) {
    throw signal.reason
  }
}

function matchesOptions(entry: HistoryEntry, options: HistoryQueryOptions): boolean {
  if (options.method && entry.method.toUpperCase() !== options.method.toUpperCase()) {
    return false
  }
  if (options.statusMin !== undefined && entry.status < options.statusMin) {
    return false
  }
  if (options.statusMax !== undefined && entry.status > options.statusMax) {
    return false
  }
  return true
}

function matchesText(entry: HistoryEntry, needle: string): boolean {
  return [entry.url, entry.method, entry.requestName ?? ""].some((field) => field.toLowerCase().includes(needle))
}

/**
 * History log kept in memory. Handy for embedding the navigator without a database, and in tests.
 */
export function createMemoryHistoryStore(initial: HistoryEntry[] = []): MemoryHistoryStore {
  let entries: HistoryEntry[] = initial.map((e) => zParse(zHistoryEntry, e))

  const select = (options: HistoryQueryOptions, predicate: (entry: HistoryEntry) => boolean) => {
    const matching = entries.filter((e) => matchesOptions(e, options) && predicate(e))
    // timestamps may carry fractional seconds, so compare them as instants
    const criterion =
      options.sortBy === "timestamp" ? (e: HistoryEntry) => Date.parse(e.timestamp) : options.sortBy
    return orderBy(matching, [criterion], [options.sortOrder]).slice(0, options.limit)
  }

  return {
    async list(options, signal) {
      throwIfAborted(signal)
      return select(options, () => true)
    },

    async search(text, options, signal) {
      throwIfAborted(signal)
      const needle = text.toLowerCase()
      return select(options, (e) => matchesText(e, needle))
    },

    add(entry) {
      entries = [...entries, zParse(zHistoryEntry, entry)]
    },

    clear() {
      entries = []
    },

    size() {
      return entries.length
    },
  }
}
