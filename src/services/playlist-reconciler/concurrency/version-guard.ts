import {
  getRemoteFailure,
  VersionConflictError,
} from '@utils/remote-errors.js'
import type { RemoteDeps } from '../types.js'
import type { ExecutionTracker } from '../utils/execution-tracker.js'

export interface VersionCheck {
  matches: boolean
  currentToken: string
}

/**
 * Reads the collection's current version token and compares it with the
 * one the caller last observed.
 */
export async function checkVersion(
  deps: RemoteDeps,
  collectionId: string,
  expectedToken: string,
): Promise<VersionCheck> {
  const currentToken = await deps.executor.execute(
    `check version of ${collectionId}`,
    () => deps.remote.getVersionToken(collectionId),
  )
  return { matches: currentToken === expectedToken, currentToken }
}

/**
 * Like {@link checkVersion}, but throws on mismatch.
 *
 * @throws {VersionConflictError} When the collection was modified externally
 */
export async function assertVersion(
  deps: RemoteDeps,
  collectionId: string,
  expectedToken: string,
): Promise<string> {
  const { matches, currentToken } = await checkVersion(
    deps,
    collectionId,
    expectedToken,
  )
  if (!matches) {
    deps.logger.error(
      `Playlist snapshot changed from ${expectedToken} to ${currentToken}. Aborting to prevent data loss.`,
    )
    throw new VersionConflictError(expectedToken, currentToken)
  }
  return currentToken
}

export type GuardResult = 'passed' | 'conflict' | 'unverifiable'

/**
 * Gate run before every live step. On a mismatch the conflict is recorded
 * on the tracker; if the token cannot be read at all the failure is
 * recorded as the step's error. Either way the caller must stop.
 */
export async function guardStep(
  deps: RemoteDeps,
  collectionId: string,
  tracker: ExecutionTracker,
  step: number,
  positions: number[],
): Promise<GuardResult> {
  try {
    const { matches, currentToken } = await checkVersion(
      deps,
      collectionId,
      tracker.version,
    )
    if (matches) return 'passed'

    deps.logger.error(
      `Playlist snapshot changed from ${tracker.version} to ${currentToken}. Aborting to prevent data loss.`,
    )
    tracker.recordConflict(step, tracker.version, currentToken)
    return 'conflict'
  } catch (error) {
    if (!getRemoteFailure(error)) throw error
    deps.logger.error(
      { error },
      `Could not verify playlist version before step ${step + 1}`,
    )
    tracker.recordError(step, 'api-error', error, positions)
    return 'unverifiable'
  }
}
