/**
 * Well-defined error kinds for the navigator.
 */
export type ErrorKind =
  // History store call ran past its deadline
  | "Timeout"
  // History store call rejected
  | "StoreError"

/**
 * Main error structure for the navigator.
 */
export interface AppError {
  /** The classification of the error. */
  kind: ErrorKind
  /** Human-readable description of the error. */
  message: string
  /**
   * Optional contextual key/value data that can help diagnose the issue.
   */
  context?: Record<string, string>
  /**
   * ISO 8601 timestamp of when the error was recorded.
   */
  timestamp: string
}

export function isAppError(value: unknown): value is AppError {
  if (typeof value !== "object" || value === null) {
    return false
  }
  return (
    "kind" in value &&
    typeof value.kind === "string" &&
    "message" in value &&
    typeof value.message === "string" &&
    "timestamp" in value &&
    typeof value.timestamp === "string"
  )
}

export function createAppError(kind: ErrorKind, message: string, context?: Record<string, string>): AppError {
  return {
    kind,
    message,
    ...(context ? { context } : {}),
    timestamp: new Date().toISOString(),
  }
}

/**
 * Converts anything thrown into an AppError, keeping AppErrors as they are.
 */
export function toAppError(error: unknown, fallbackKind: ErrorKind = "StoreError"): AppError {
  if (isAppError(error)) {
    return error
  }
  if (error instanceof Error) {
    return createAppError(error.name === "TimeoutError" ? "Timeout" : fallbackKind, error.message)
  }
  return createAppError(fallbackKind, String(error))
}
