/**
 * Playlist Reconciler Types
 *
 * Dependency interfaces shared by the reconciler's fetching, guard and
 * execution modules. Each handler function receives a deps object.
 */

import type { CollectionRemote } from '@root/types/remote.types.js'
import type { FastifyBaseLogger } from 'fastify'
import type { RateLimitedExecutor } from './executor/rate-limited-executor.js'

/**
 * Base deps: every remote call goes through the executor
 */
export interface RemoteDeps {
  remote: CollectionRemote
  executor: RateLimitedExecutor
  logger: FastifyBaseLogger
}

/**
 * Execution deps - used by the dedup and sort executors
 */
export interface ExecutionDeps extends RemoteDeps {
  /** Read back the identity at a position before removing it */
  verifyPositions: boolean
}
