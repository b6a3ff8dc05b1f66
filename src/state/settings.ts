/**
 * @module settings
 * @description Navigator settings: history query bounds and the key map
 */

import { type NavigatorAction, NavigatorActions, type NavigatorSettings, zNavigatorSettings } from "@/types"
import { zParse } from "./utils"

const warnOnSharedKeys = (settings: NavigatorSettings) => {
  const owners = new Map<string, NavigatorAction>()
  for (const action of NavigatorActions) {
    for (const key of settings.keymap[action]) {
      const owner = owners.get(key)
      if (owner) {
        console.warn(`[Settings] key "${key}" is bound to both "${owner}" and "${action}"; "${owner}" wins`)
        continue
      }
      owners.set(key, action)
    }
  }
}

/**
 * Parse user settings over the defaults. Missing sections and keys fall back to their defaults.
 * @throws ZodError when a value has the wrong shape
 */
export function parseSettings(input: unknown = {}): NavigatorSettings {
  const settings = zParse(zNavigatorSettings, input)
  warnOnSharedKeys(settings)
  return settings
}

export const defaultSettings = (): NavigatorSettings => parseSettings({})
