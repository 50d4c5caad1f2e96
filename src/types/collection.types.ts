/**
 * One entry of a fetched collection.
 *
 * `identity`, `dedupKey` and `sortKey` are null for entries whose
 * underlying track is unavailable (removed from the catalogue, or a
 * local file without metadata). Such entries keep their position and are
 * simulated like any other, but never join a duplicate group.
 */
export interface CollectionItem {
  position: number
  identity: string | null
  dedupKey: string | null
  sortKey: string | null
  name: string
  artists: string[]
  album: string | null
  releaseDate: string | null
}

/**
 * Immutable planning baseline: the collection as read once at the start of
 * an operation, plus the version token captured with it.
 */
export interface Snapshot {
  collectionId: string
  name: string
  items: readonly CollectionItem[]
  versionToken: string
  fetchedAt: string
}

export interface DuplicateGroup {
  dedupKey: string
  /** Ordered by position; the first entry is the keeper */
  occurrences: CollectionItem[]
}

export type RemoveAtOp = {
  type: 'removeAt'
  identity: string
  positions: number[]
}

export type RemoveAllOccurrencesOp = {
  type: 'removeAllOccurrences'
  identity: string
}

export type InsertAtOp = {
  type: 'insertAt'
  identity: string
  position: number
}

export type ReorderRangeOp = {
  type: 'reorderRange'
  start: number
  insertBefore: number
  length: number
}

export type MutationOp =
  | RemoveAtOp
  | RemoveAllOccurrencesOp
  | InsertAtOp
  | ReorderRangeOp

export type MutationOpType = MutationOp['type']
