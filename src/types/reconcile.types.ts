import type { RemoteFailureKind } from '@utils/remote-errors.js'

/**
 * A non-keeper occurrence of a duplicate group, described by its snapshot
 * position.
 */
export interface RemovalCandidate {
  position: number
  identity: string
  dedupKey: string
  name: string
  artists: string[]
}

/** Position-specific removal of an identity that occurs once in the snapshot */
export interface RemoveAtStep {
  kind: 'removeAt'
  identity: string
  /** Position in the simulated collection at the moment the step runs */
  position: number
  removal: RemovalCandidate
}

/** Batch removal of an identity that occurs more than once in the snapshot */
export interface RemoveAllReaddStep {
  kind: 'removeAllReadd'
  identity: string
  /** Simulated positions of every occurrence before the step runs */
  currentPositions: number[]
  /** Ascending positions at which retained occurrences are re-inserted */
  insertPositions: number[]
  removals: RemovalCandidate[]
}

export type DedupStep = RemoveAtStep | RemoveAllReaddStep

export interface SortMove {
  start: number
  insertBefore: number
  length: number
  /** Snapshot position of the moved item */
  originalPosition: number
  name: string
}

export interface DedupPlan {
  steps: DedupStep[]
  uniqueIdentityRemovals: RemovalCandidate[]
  sharedIdentityRemovals: Record<string, RemovalCandidate[]>
  /** Identity layout predicted after every step has been applied */
  predictedOrder: (string | null)[]
  warnings: string[]
}

export interface SortPlan {
  moves: SortMove[]
  /** Snapshot positions in the order they end up after every move */
  targetOrder: number[]
  /** `permutation[snapshotPosition]` is the item's final position */
  permutation: number[]
}

export type StepErrorKind =
  | 'api-error'
  | 'readd-failed'
  | 'identity-mismatch'
  | 'position-not-found'

export interface StepError {
  step: number
  kind: StepErrorKind
  message: string
  positions: number[]
  failure?: RemoteFailureKind
}

export type SkipReason = 'version-conflict' | 'plan-invalidated'

export interface SkippedStep {
  step: number
  reason: SkipReason
  positions: number[]
}

export interface ConflictInfo {
  atStep: number
  expectedVersion: string
  currentVersion: string | null
}

export interface DuplicateGroupSummary {
  name: string
  artists: string[]
  count: number
  positions: number[]
  albums: (string | null)[]
  identities: string[]
  hasSharedIdentities: boolean
}

export interface ExecutionOutcome {
  applied: number
  errors: StepError[]
  skipped: SkippedStep[]
  conflict: ConflictInfo | null
  finalVersion: string
}

export interface DedupReport {
  collectionId: string
  playlistName: string
  dryRun: boolean
  totalItems: number
  uniqueItems: number
  duplicatesFound: number
  itemsRemoved: number
  duplicateGroups: DuplicateGroupSummary[]
  removalStrategy: {
    positionSpecific: number
    removeAllReadd: number
  }
  plannedSteps: DedupStep[]
  errors: StepError[]
  skipped: SkippedStep[]
  warnings: string[]
  conflict: ConflictInfo | null
  initialVersion: string
  finalVersion: string
  /** Null on a dry run, where nothing is read back */
  finalItemCount: number | null
}

export interface SortPreviewItem {
  position: number
  name: string
  artists: string[]
  releaseDate: string | null
}

export interface SortReport {
  collectionId: string
  playlistName: string
  dryRun: boolean
  descending: boolean
  totalItems: number
  movesPlanned: number
  moveCount: number
  errors: StepError[]
  skipped: SkippedStep[]
  conflict: ConflictInfo | null
  initialVersion: string
  finalVersion: string
  preview: SortPreviewItem[]
}
