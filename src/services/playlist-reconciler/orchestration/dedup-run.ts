import type { DedupReport } from '@root/types/reconcile.types.js'
import { getRemoteFailure } from '@utils/remote-errors.js'
import { assertVersion } from '../concurrency/version-guard.js'
import { executeDedupPlan } from '../dedup/dedup-executor.js'
import { findDuplicateGroups } from '../dedup/duplicate-detector.js'
import { planDedup } from '../dedup/removal-planner.js'
import { fetchAll } from '../fetching/collection-fetcher.js'
import type { ExecutionDeps, RemoteDeps } from '../types.js'
import { createDedupReport, dryRunOutcome } from '../utils/report-builder.js'

export interface RunOptions {
  dryRun: boolean
  /** Version token the caller last saw; the run refuses to start on mismatch */
  expectedVersion?: string
}

/**
 * Reads the item count after a live run. The run itself already
 * succeeded, so a failure here only blanks the count.
 */
async function readFinalItemCount(
  deps: RemoteDeps,
  collectionId: string,
): Promise<number | null> {
  try {
    const info = await deps.executor.execute(
      `read final state of ${collectionId}`,
      () => deps.remote.getCollectionInfo(collectionId),
    )
    return info.totalCount
  } catch (error) {
    if (!getRemoteFailure(error)) throw error
    deps.logger.warn({ error }, 'Could not read final playlist state')
    return null
  }
}

/**
 * Fetches a collection, plans the removal of every duplicate, and applies
 * the plan unless this is a dry run.
 *
 * @throws {VersionConflictError} When `expectedVersion` is stale, or the collection changed while being read
 * @throws {RemoteCallError | RetriesExhaustedError} When the collection cannot be read
 */
export async function runDeduplication(
  deps: ExecutionDeps,
  collectionId: string,
  options: RunOptions,
): Promise<DedupReport> {
  const { logger } = deps

  if (options.expectedVersion !== undefined) {
    await assertVersion(deps, collectionId, options.expectedVersion)
  }

  const snapshot = await fetchAll(deps, collectionId)
  const groups = findDuplicateGroups(snapshot.items)
  const plan = planDedup(snapshot, groups, logger)

  logger.info(
    `Found ${groups.length} duplicate groups; planned ${plan.steps.length} steps (${plan.uniqueIdentityRemovals.length} position-specific, ${Object.keys(plan.sharedIdentityRemovals).length} remove-all + re-add)`,
  )

  if (options.dryRun || plan.steps.length === 0) {
    if (options.dryRun) logger.info('Dry run: no changes sent')
    return createDedupReport(
      snapshot,
      groups,
      plan,
      dryRunOutcome(snapshot.versionToken),
      {
        dryRun: options.dryRun,
        finalItemCount: options.dryRun ? null : snapshot.items.length,
      },
    )
  }

  const outcome = await executeDedupPlan(
    deps,
    collectionId,
    plan.steps,
    snapshot.versionToken,
  )

  if (outcome.conflict) {
    logger.warn(
      `Deduplication stopped by a concurrent modification after ${outcome.applied} removals`,
    )
  } else {
    logger.info(
      `Removed ${outcome.applied} duplicates with ${outcome.errors.length} errors`,
    )
  }

  const finalItemCount = await readFinalItemCount(deps, collectionId)
  return createDedupReport(snapshot, groups, plan, outcome, {
    dryRun: false,
    finalItemCount,
  })
}
