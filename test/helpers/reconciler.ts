import type { Snapshot } from '@root/types/collection.types.js'
import type { RemoteItem } from '@root/types/remote.types.js'
import {
  DEFAULT_EXECUTOR_OPTIONS,
  type ExecutorOptions,
  RateLimitedExecutor,
} from '@services/playlist-reconciler/executor/rate-limited-executor.js'
import { toCollectionItem } from '@services/playlist-reconciler/fetching/item-keys.js'
import type { ExecutionDeps } from '@services/playlist-reconciler/types.js'
import type { FastifyBaseLogger } from 'fastify'
import { vi } from 'vitest'
import { createMockLogger } from '../mocks/logger.js'
import type { MemoryCollectionRemote } from '../mocks/memory-remote.js'

export const COLLECTION_ID = 'test-playlist'

/**
 * Executor that never sleeps: throttle and backoff waits are recorded on
 * the returned `sleep` spy instead.
 */
export function createTestExecutor(
  options: Partial<ExecutorOptions> = {},
  log: FastifyBaseLogger = createMockLogger(),
) {
  const sleep = vi.fn(async (_ms: number) => {})
  const executor = new RateLimitedExecutor(
    {
      ...DEFAULT_EXECUTOR_OPTIONS,
      minIntervalMs: 0,
      jitter: false,
      ...options,
    },
    { log, sleep },
  )
  return { executor, sleep }
}

export function createTestDeps(
  remote: MemoryCollectionRemote,
  overrides: Partial<ExecutionDeps> = {},
): ExecutionDeps {
  const logger = overrides.logger ?? createMockLogger()
  return {
    remote,
    executor: createTestExecutor({ maxRetries: 2 }, logger).executor,
    logger,
    verifyPositions: true,
    ...overrides,
  }
}

/**
 * Snapshot of remote items as the fetcher would build it.
 */
export function snapshotOf(
  items: RemoteItem[],
  versionToken = 'snapshot-1',
): Snapshot {
  return {
    collectionId: COLLECTION_ID,
    name: 'Test Playlist',
    items: items.map((item, position) => toCollectionItem(item, position)),
    versionToken,
    fetchedAt: '2024-01-01T00:00:00.000Z',
  }
}
