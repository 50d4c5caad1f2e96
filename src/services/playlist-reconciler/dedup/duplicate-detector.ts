import type {
  CollectionItem,
  DuplicateGroup,
} from '@root/types/collection.types.js'
import type {
  DuplicateGroupSummary,
  RemovalCandidate,
} from '@root/types/reconcile.types.js'

/**
 * Groups items by dedup key and keeps the groups with more than one
 * occurrence, in order of each key's first appearance. Occurrences are
 * ordered by position, so the first one is always the keeper.
 */
export function findDuplicateGroups(
  items: readonly CollectionItem[],
): DuplicateGroup[] {
  const byKey = new Map<string, CollectionItem[]>()

  for (const item of items) {
    if (item.dedupKey === null || item.identity === null) continue
    const occurrences = byKey.get(item.dedupKey)
    if (occurrences) {
      occurrences.push(item)
    } else {
      byKey.set(item.dedupKey, [item])
    }
  }

  const groups: DuplicateGroup[] = []
  for (const [dedupKey, occurrences] of byKey) {
    if (occurrences.length > 1) {
      groups.push({
        dedupKey,
        occurrences: [...occurrences].sort((a, b) => a.position - b.position),
      })
    }
  }
  return groups
}

/**
 * Number of distinct dedup keys among available items.
 */
export function countUniqueKeys(items: readonly CollectionItem[]): number {
  const keys = new Set<string>()
  for (const item of items) {
    if (item.dedupKey !== null && item.identity !== null) keys.add(item.dedupKey)
  }
  return keys.size
}

/**
 * How often each identity occurs across the whole snapshot, keepers and
 * non-duplicates included.
 */
export function countIdentities(
  items: readonly CollectionItem[],
): Map<string, number> {
  const counts = new Map<string, number>()
  for (const item of items) {
    if (item.identity === null) continue
    counts.set(item.identity, (counts.get(item.identity) ?? 0) + 1)
  }
  return counts
}

/**
 * Every non-keeper occurrence, group by group.
 */
export function collectRemovalCandidates(
  groups: readonly DuplicateGroup[],
): RemovalCandidate[] {
  const candidates: RemovalCandidate[] = []
  for (const group of groups) {
    for (const occurrence of group.occurrences.slice(1)) {
      if (occurrence.identity === null) continue
      candidates.push({
        position: occurrence.position,
        identity: occurrence.identity,
        dedupKey: group.dedupKey,
        name: occurrence.name,
        artists: occurrence.artists,
      })
    }
  }
  return candidates
}

export interface ClassifiedRemovals {
  /** Identity occurs once in the snapshot; ordered by descending position */
  unique: RemovalCandidate[]
  /** Identity occurs more than once; keyed by identity in first-seen order */
  shared: Map<string, RemovalCandidate[]>
}

/**
 * Splits removal candidates by how their identity can be addressed
 * remotely. Each candidate is judged on its own, so a group may
 * contribute to both classes.
 */
export function classifyRemovals(
  candidates: readonly RemovalCandidate[],
  identityCounts: ReadonlyMap<string, number>,
): ClassifiedRemovals {
  const unique: RemovalCandidate[] = []
  const shared = new Map<string, RemovalCandidate[]>()

  for (const candidate of candidates) {
    if ((identityCounts.get(candidate.identity) ?? 0) > 1) {
      const batch = shared.get(candidate.identity)
      if (batch) {
        batch.push(candidate)
      } else {
        shared.set(candidate.identity, [candidate])
      }
    } else {
      unique.push(candidate)
    }
  }

  unique.sort((a, b) => b.position - a.position)
  return { unique, shared }
}

export function summarizeGroup(group: DuplicateGroup): DuplicateGroupSummary {
  const keeper = group.occurrences[0]
  const identities = group.occurrences.flatMap((occurrence) =>
    occurrence.identity === null ? [] : [occurrence.identity],
  )
  return {
    name: keeper.name,
    artists: keeper.artists,
    count: group.occurrences.length,
    positions: group.occurrences.map((occurrence) => occurrence.position),
    albums: group.occurrences.map((occurrence) => occurrence.album),
    identities,
    hasSharedIdentities: new Set(identities).size < identities.length,
  }
}
