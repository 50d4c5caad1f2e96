import type { PlaylistError } from '@schemas/playlists/playlists.schema.js'
import {
  categorizeError,
  getUserFriendlyMessage,
  isRemoteUnavailable,
  statusForCategory,
} from '@utils/error-category.js'
import { VersionConflictError } from '@utils/remote-errors.js'

const ERROR_NAMES: Record<number, string> = {
  400: 'Bad Request',
  401: 'Unauthorized',
  409: 'Conflict',
  429: 'Too Many Requests',
  503: 'Service Unavailable',
}

/**
 * Builds the reply for a failed reconciliation run, or returns null for
 * errors that are not remote failures and belong to the global handler.
 */
export function toReconcileErrorResponse(error: unknown): PlaylistError | null {
  const category = categorizeError(error)
  if (category === 'unknown') return null

  const statusCode = statusForCategory(category)
  return {
    statusCode,
    code: `PLAYLIST_${category.toUpperCase().replace('-', '_')}`,
    error: ERROR_NAMES[statusCode] ?? 'Error',
    message: getUserFriendlyMessage(category),
    category,
    offline: isRemoteUnavailable(category),
    ...(error instanceof VersionConflictError
      ? { currentSnapshotId: error.currentVersion }
      : {}),
  }
}
