import {
  createAppError,
  type HistoryMethodFilter,
  HistoryMethodFilters,
  type HistoryQueryOptions,
  type HistoryQueryResult,
  type HistorySettings,
  type HistoryStatusFilter,
  HistoryStatusFilters,
  type HistoryStore,
  toAppError,
} from "@/types"

export interface HistoryFilters {
  search: string
  methodFilter: HistoryMethodFilter
  statusFilter: HistoryStatusFilter
}

const STATUS_RANGES: Record<Exclude<HistoryStatusFilter, "">, { statusMin: number; statusMax: number }> = {
  "2xx": { statusMin: 200, statusMax: 299 },
  "3xx": { statusMin: 300, statusMax: 399 },
  "4xx": { statusMin: 400, statusMax: 499 },
  "5xx": { statusMin: 500, statusMax: 599 },
}

export const statusRange = (filter: HistoryStatusFilter) => (filter === "" ? null : STATUS_RANGES[filter])

const nextInCycle = <T>(values: readonly T[], current: T): T => {
  const index = values.indexOf(current)
  return values[(index + 1) % values.length] ?? values[0]
}

export const cycleMethodFilter = (current: HistoryMethodFilter): HistoryMethodFilter =>
  nextInCycle(HistoryMethodFilters, current)

export const cycleStatusFilter = (current: HistoryStatusFilter): HistoryStatusFilter =>
  nextInCycle(HistoryStatusFilters, current)

export function buildQueryOptions(settings: HistorySettings, filters: HistoryFilters): HistoryQueryOptions {
  const options: HistoryQueryOptions = {
    limit: settings.limit,
    sortBy: settings.sortBy,
    sortOrder: settings.sortOrder,
  }
  if (filters.methodFilter !== "") {
    options.method = filters.methodFilter
  }
  const range = statusRange(filters.statusFilter)
  if (range) {
    options.statusMin = range.statusMin
    options.statusMax = range.statusMax
  }
  if (filters.search !== "") {
    options.search = filters.search
  }
  return options
}

/**
 * Runs one list or search call against the store, bounded by `timeoutMs`.
 *
 * Never rejects. A failed or timed out call comes back as `{ ok: false }` and the caller keeps
 * whatever it showed before.
 */
export async function queryHistory(
  store: HistoryStore,
  options: HistoryQueryOptions,
  { timeoutMs }: { timeoutMs: number },
): Promise<HistoryQueryResult> {
  const controller = new AbortController()
  const timer = setTimeout(() => {
    controller.abort(createAppError("Timeout", `history query exceeded ${timeoutMs}ms`))
  }, timeoutMs)
  const expired = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true })
  })

  const { search, ...rest } = options
  try {
    const pending = search ? store.search(search, rest, controller.signal) : store.list(rest, controller.signal)
    const entries = await Promise.race([pending, expired])
    return { ok: true, entries }
  } catch (e) {
    const error = toAppError(e)
    console.debug(`[HistoryQuery] ${search ? "search" : "list"} failed, keeping previous entries: ${error.message}`)
    return { ok: false, error }
  } finally {
    clearTimeout(timer)
  }
}
