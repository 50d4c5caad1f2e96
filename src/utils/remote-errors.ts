/**
 * Typed failures of calls to the remote collection service.
 *
 * The transport translates every failed response into a `RemoteFailure`
 * once, so retry policy and user-facing mapping switch on `kind` instead
 * of inspecting messages.
 */
export type RemoteFailure =
  | { kind: 'rate-limited'; status: 429; retryAfterSeconds: number | null }
  | { kind: 'server-unavailable'; status: number }
  | { kind: 'client-rejected'; status: number }
  | { kind: 'network-unreachable'; status: null }

export type RemoteFailureKind = RemoteFailure['kind']

export class RemoteCallError extends Error {
  readonly failure: RemoteFailure

  constructor(failure: RemoteFailure, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'RemoteCallError'
    this.failure = failure
  }

  get kind(): RemoteFailureKind {
    return this.failure.kind
  }

  get status(): number | null {
    return this.failure.status
  }
}

/**
 * Thrown by the executor once the retry budget is spent. `lastError` is the
 * error of the final attempt, so the failure kind survives the wrap.
 */
export class RetriesExhaustedError extends Error {
  readonly attempts: number
  readonly lastError: RemoteCallError

  constructor(label: string, attempts: number, lastError: RemoteCallError) {
    super(
      `${label} failed after ${attempts} attempts: ${lastError.message}`,
      { cause: lastError },
    )
    this.name = 'RetriesExhaustedError'
    this.attempts = attempts
    this.lastError = lastError
  }

  get kind(): RemoteFailureKind {
    return this.lastError.kind
  }

  get status(): number | null {
    return this.lastError.status
  }
}

/**
 * The collection's version token no longer matches the expected one: an
 * external actor modified it.
 */
export class VersionConflictError extends Error {
  readonly expectedVersion: string
  readonly currentVersion: string | null

  constructor(expectedVersion: string, currentVersion: string | null) {
    super(
      `Collection version changed from ${expectedVersion} to ${currentVersion ?? 'unknown'}`,
    )
    this.name = 'VersionConflictError'
    this.expectedVersion = expectedVersion
    this.currentVersion = currentVersion
  }
}

/**
 * Every occurrence of an identity was removed but re-inserting a retained
 * occurrence failed; the collection is now missing that item.
 */
export class ReaddFailedError extends Error {
  readonly identity: string
  readonly position: number

  constructor(identity: string, position: number, cause: unknown) {
    super(
      `Removed all occurrences of ${identity} but re-adding it at position ${position} failed`,
      { cause },
    )
    this.name = 'ReaddFailedError'
    this.identity = identity
    this.position = position
  }
}

/**
 * Returns the remote failure behind an error, looking through
 * `RetriesExhaustedError` and `ReaddFailedError` wrappers.
 */
export function getRemoteFailure(error: unknown): RemoteFailure | null {
  if (error instanceof RemoteCallError) return error.failure
  if (error instanceof RetriesExhaustedError) return error.lastError.failure
  if (error instanceof ReaddFailedError) return getRemoteFailure(error.cause)
  return null
}

/**
 * Maps an HTTP status to a remote failure.
 *
 * @param retryAfterHeader - Raw `Retry-After` value; only integer seconds are honoured
 */
export function failureFromStatus(
  status: number,
  retryAfterHeader?: string | null,
): RemoteFailure {
  if (status === 429) {
    return {
      kind: 'rate-limited',
      status: 429,
      retryAfterSeconds: parseRetryAfter(retryAfterHeader),
    }
  }
  if (status >= 500) {
    return { kind: 'server-unavailable', status }
  }
  return { kind: 'client-rejected', status }
}

/**
 * Parses a `Retry-After` value as whole seconds. Anything that is not a
 * non-negative integer is ignored so the caller falls back to backoff.
 */
export function parseRetryAfter(value: string | null | undefined): number | null {
  if (value == null) return null
  const trimmed = value.trim()
  if (!/^\d+$/.test(trimmed)) return null
  return Number.parseInt(trimmed, 10)
}
