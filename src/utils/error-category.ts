import {
  getRemoteFailure,
  VersionConflictError,
} from '@utils/remote-errors.js'

export type ErrorCategory =
  | 'rate-limit'
  | 'authentication'
  | 'server'
  | 'network'
  | 'client'
  | 'conflict'
  | 'unknown'

const USER_MESSAGES: Record<ErrorCategory, string> = {
  'rate-limit':
    'Spotify API rate limit reached. Please try again in a few minutes.',
  authentication: 'Your Spotify session has expired. Please log in again.',
  server:
    'Spotify services are temporarily unavailable. Please try again later.',
  network: 'Unable to connect to Spotify. Check your internet connection.',
  client: 'Invalid request. Please check your input and try again.',
  conflict:
    'This playlist has been modified since you loaded it. Please refresh the page and try again.',
  unknown: 'An unexpected error occurred. Please try again.',
}

/**
 * Maps any error raised by a reconciliation run to a user-facing category.
 */
export function categorizeError(error: unknown): ErrorCategory {
  if (error instanceof VersionConflictError) return 'conflict'

  const failure = getRemoteFailure(error)
  if (!failure) return 'unknown'

  switch (failure.kind) {
    case 'rate-limited':
      return 'rate-limit'
    case 'server-unavailable':
      return 'server'
    case 'network-unreachable':
      return 'network'
    case 'client-rejected':
      return failure.status === 401 ? 'authentication' : 'client'
  }
}

export function getUserFriendlyMessage(category: ErrorCategory): string {
  return USER_MESSAGES[category]
}

/**
 * Whether the error means the remote API itself cannot be reached, as
 * opposed to rejecting this particular request.
 */
export function isRemoteUnavailable(category: ErrorCategory): boolean {
  return category === 'network' || category === 'server'
}

/**
 * HTTP status the API answers with for each category.
 */
export function statusForCategory(category: ErrorCategory): number {
  switch (category) {
    case 'rate-limit':
      return 429
    case 'authentication':
      return 401
    case 'client':
      return 400
    case 'conflict':
      return 409
    case 'server':
    case 'network':
      return 503
    case 'unknown':
      return 500
  }
}
