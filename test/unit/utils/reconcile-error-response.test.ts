import { toReconcileErrorResponse } from '@utils/reconcile-error-response.js'
import {
  RemoteCallError,
  RetriesExhaustedError,
  VersionConflictError,
} from '@utils/remote-errors.js'
import { describe, expect, it } from 'vitest'

describe('reconcile-error-response', () => {
  it('should answer a version conflict with 409 and the current snapshot', () => {
    expect(
      toReconcileErrorResponse(
        new VersionConflictError('snapshot-1', 'snapshot-2'),
      ),
    ).toEqual({
      statusCode: 409,
      code: 'PLAYLIST_CONFLICT',
      error: 'Conflict',
      message:
        'This playlist has been modified since you loaded it. Please refresh the page and try again.',
      category: 'conflict',
      offline: false,
      currentSnapshotId: 'snapshot-2',
    })
  })

  it('should answer exhausted rate-limit retries with 429', () => {
    const error = new RetriesExhaustedError(
      'fetch page',
      6,
      new RemoteCallError(
        { kind: 'rate-limited', status: 429, retryAfterSeconds: 1 },
        'HTTP 429',
      ),
    )

    expect(toReconcileErrorResponse(error)).toEqual({
      statusCode: 429,
      code: 'PLAYLIST_RATE_LIMIT',
      error: 'Too Many Requests',
      message:
        'Spotify API rate limit reached. Please try again in a few minutes.',
      category: 'rate-limit',
      offline: false,
    })
  })

  it('should answer an unreachable remote with 503', () => {
    const response = toReconcileErrorResponse(
      new RemoteCallError({ kind: 'network-unreachable', status: null }, 'x'),
    )

    expect(response?.statusCode).toBe(503)
    expect(response?.code).toBe('PLAYLIST_NETWORK')
    expect(response?.error).toBe('Service Unavailable')
    expect(response?.offline).toBe(true)
  })

  it('should leave unknown errors to the global handler', () => {
    expect(toReconcileErrorResponse(new Error('boom'))).toBeNull()
  })
})
