import { z } from "zod"

import { zHistorySortField, zSortOrder } from "./history"

export const NavigatorActions = [
  "next",
  "prev",
  "expand",
  "collapse",
  "search",
  "toggleView",
  "showCollections",
  "bottom",
  "top",
  "first",
  "activate",
  "cancel",
  "refresh",
  "cycleMethod",
  "cycleStatus",
  "clearFilters",
] as const
export type NavigatorAction = (typeof NavigatorActions)[number]

const keys = (...defaults: string[]) => z.array(z.string().min(1)).default(defaults)

/**
 * Action -> keys. Single characters match typed characters, longer names match named keys.
 */
export const zKeymap = z.object({
  next: keys("j", "down"),
  prev: keys("k", "up"),
  expand: keys("l", "right"),
  collapse: keys("h", "left"),
  search: keys("/"),
  toggleView: keys("H"),
  showCollections: keys("C"),
  bottom: keys("G", "end"),
  // chord: the key has to be pressed twice in a row
  top: keys("g"),
  first: keys("home"),
  activate: keys("enter"),
  cancel: keys("escape"),
  refresh: keys("r"),
  cycleMethod: keys("m"),
  cycleStatus: keys("s"),
  clearFilters: keys("x"),
})
export type Keymap = z.infer<typeof zKeymap>

/**
 * History query behavior
 */
export const zHistorySettings = z.object({
  // maximum number of entries loaded per query
  limit: z.number().int().positive().default(100),
  sortBy: zHistorySortField.default("timestamp"),
  sortOrder: zSortOrder.default("desc"),
  // hard upper bound for a single store call; timers clamp anything above 2^31-1 ms
  timeoutMs: z.number().int().positive().max(2_147_483_647).default(5000),
})
export type HistorySettings = z.infer<typeof zHistorySettings>

export const zNavigatorSettings = z.object({
  history: zHistorySettings.prefault({}),
  keymap: zKeymap.prefault({}),
})
export type NavigatorSettings = z.infer<typeof zNavigatorSettings>
export type NavigatorSettingsInput = z.input<typeof zNavigatorSettings>
