import type {
  DuplicateGroup,
  Snapshot,
} from '@root/types/collection.types.js'
import type {
  DedupPlan,
  DedupReport,
  ExecutionOutcome,
  SortPlan,
  SortPreviewItem,
  SortReport,
} from '@root/types/reconcile.types.js'
import {
  countUniqueKeys,
  summarizeGroup,
} from '../dedup/duplicate-detector.js'
import { replayMoves } from '../sort/sort-planner.js'

const PREVIEW_LENGTH = 10

/** Outcome used for dry runs, where nothing is sent */
export function dryRunOutcome(version: string): ExecutionOutcome {
  return {
    applied: 0,
    errors: [],
    skipped: [],
    conflict: null,
    finalVersion: version,
  }
}

export function createDedupReport(
  snapshot: Snapshot,
  groups: readonly DuplicateGroup[],
  plan: DedupPlan,
  outcome: ExecutionOutcome,
  options: { dryRun: boolean; finalItemCount: number | null },
): DedupReport {
  const duplicatesFound = groups.reduce(
    (total, group) => total + group.occurrences.length - 1,
    0,
  )

  return {
    collectionId: snapshot.collectionId,
    playlistName: snapshot.name,
    dryRun: options.dryRun,
    totalItems: snapshot.items.length,
    uniqueItems: countUniqueKeys(snapshot.items),
    duplicatesFound,
    itemsRemoved: outcome.applied,
    duplicateGroups: groups.map(summarizeGroup),
    removalStrategy: {
      positionSpecific: plan.uniqueIdentityRemovals.length,
      removeAllReadd: Object.values(plan.sharedIdentityRemovals).reduce(
        (total, removals) => total + removals.length,
        0,
      ),
    },
    plannedSteps: plan.steps,
    errors: outcome.errors,
    skipped: outcome.skipped,
    warnings: plan.warnings,
    conflict: outcome.conflict,
    initialVersion: snapshot.versionToken,
    finalVersion: outcome.finalVersion,
    finalItemCount: options.finalItemCount,
  }
}

/**
 * Builds the sort report. The preview shows the first items of the order
 * the collection is in after the moves that were applied; on a dry run
 * every planned move counts as applied.
 */
export function createSortReport(
  snapshot: Snapshot,
  plan: SortPlan,
  outcome: ExecutionOutcome,
  options: { dryRun: boolean; descending: boolean },
): SortReport {
  const appliedMoves = options.dryRun
    ? plan.moves
    : plan.moves.slice(0, outcome.applied)
  const order = replayMoves(
    snapshot.items.map((item) => item.position),
    appliedMoves,
  )

  const preview: SortPreviewItem[] = order
    .slice(0, PREVIEW_LENGTH)
    .map((originalPosition, position) => {
      const item = snapshot.items[originalPosition]
      return {
        position,
        name: item.name,
        artists: item.artists,
        releaseDate: item.sortKey,
      }
    })

  return {
    collectionId: snapshot.collectionId,
    playlistName: snapshot.name,
    dryRun: options.dryRun,
    descending: options.descending,
    totalItems: snapshot.items.length,
    movesPlanned: plan.moves.length,
    moveCount: outcome.applied,
    errors: outcome.errors,
    skipped: outcome.skipped,
    conflict: outcome.conflict,
    initialVersion: snapshot.versionToken,
    finalVersion: outcome.finalVersion,
    preview,
  }
}
