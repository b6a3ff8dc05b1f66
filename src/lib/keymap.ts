import { type KeyInput, type Keymap, type NamedKey, type NavigatorAction, NavigatorActions } from "@/types"

const NAMED_KEYS: ReadonlySet<string> = new Set<NamedKey>([
  "up",
  "down",
  "left",
  "right",
  "enter",
  "escape",
  "backspace",
  "delete",
  "home",
  "end",
  "clear",
  "space",
])

const isNamedKey = (value: string): value is NamedKey => NAMED_KEYS.has(value)

/**
 * "down" -> named key, anything else -> typed text
 */
export function toKeyInput(value: string): KeyInput {
  if (isNamedKey(value)) {
    return { kind: "named", name: value }
  }
  return { kind: "char", char: value }
}

export const keyLabel = (key: KeyInput): string => (key.kind === "named" ? key.name : key.char)

/**
 * First action whose bindings include the key, in `NavigatorActions` order.
 */
export function resolveAction(keymap: Keymap, key: KeyInput): NavigatorAction | null {
  const label = keyLabel(key)
  for (const action of NavigatorActions) {
    if (keymap[action].includes(label)) {
      return action
    }
  }
  return null
}
