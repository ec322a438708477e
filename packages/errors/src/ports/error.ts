export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error: type names, wire names, offending values.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable, lowercase code for programmatic handling */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /**
   * `true` if the same call may succeed once the caller changes something
   * outside the failed operation (e.g. registers a missing transcoding).
   * Nothing in this project retries on its own.
   */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (unknown data on the wire),
   * `false` for programmer errors and misconfiguration (duplicate
   * registrations, values the transcoder was never taught).
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs and transport.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
