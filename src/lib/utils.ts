import { getRandomValues } from "node:crypto"

const ALPHA = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789"

/**
 * Random id of `length` characters from A-Za-z0-9
 */
export const generateUniqueId = (length: number = 12): string => {
  const bytes = getRandomValues(new Uint8Array(length))
  return Array.from(bytes, (b) => ALPHA[b % ALPHA.length]).join("")
}

/**
 * Cuts `text` to `width` characters, ending in "..." when there is room for it
 */
export function truncate(text: string, width: number): string {
  if (width <= 0) {
    return ""
  }
  if (text.length <= width) {
    return text
  }
  if (width < 4) {
    return text.slice(0, width)
  }
  return `${text.slice(0, width - 3)}...`
}

/**
 * Pads or cuts `text` to exactly `width` characters
 */
export const fit = (text: string, width: number): string => truncate(text, width).padEnd(Math.max(0, width))
