import type { SortReport } from '@root/types/reconcile.types.js'
import { assertVersion } from '../concurrency/version-guard.js'
import { fetchAll } from '../fetching/collection-fetcher.js'
import { executeSortMoves } from '../sort/sort-executor.js'
import { planSort } from '../sort/sort-planner.js'
import type { RemoteDeps } from '../types.js'
import { createSortReport, dryRunOutcome } from '../utils/report-builder.js'
import type { RunOptions } from './dedup-run.js'

export interface SortRunOptions extends RunOptions {
  /** Newest first when true */
  descending: boolean
}

/**
 * Fetches a collection and reorders it by release date.
 *
 * @throws {VersionConflictError} When `expectedVersion` is stale, or the collection changed while being read
 */
export async function runSort(
  deps: RemoteDeps,
  collectionId: string,
  options: SortRunOptions,
): Promise<SortReport> {
  const { logger } = deps

  if (options.expectedVersion !== undefined) {
    await assertVersion(deps, collectionId, options.expectedVersion)
  }

  const snapshot = await fetchAll(deps, collectionId)
  const plan = planSort(snapshot, options.descending)

  logger.info(
    `Sorting ${snapshot.items.length} tracks ${options.descending ? 'newest' : 'oldest'} first: ${plan.moves.length} moves`,
  )

  if (options.dryRun || plan.moves.length === 0) {
    return createSortReport(snapshot, plan, dryRunOutcome(snapshot.versionToken), {
      dryRun: options.dryRun,
      descending: options.descending,
    })
  }

  const outcome = await executeSortMoves(
    deps,
    collectionId,
    plan.moves,
    snapshot.versionToken,
  )

  logger.info(
    `Applied ${outcome.applied} of ${plan.moves.length} moves${outcome.conflict ? ' before a concurrent modification stopped the sort' : ''}`,
  )

  return createSortReport(snapshot, plan, outcome, {
    dryRun: false,
    descending: options.descending,
  })
}
