import { z } from 'zod'
import { ErrorSchema } from '../common/error.schema.js'

const PlaylistReferenceSchema = z
  .string()
  .min(1)
  .describe('Spotify playlist URL or 22-character playlist id')

const SnapshotIdSchema = z
  .string()
  .min(1)
  .describe('Snapshot id the client last saw; the run is refused if it changed')

export const DeduplicateBodySchema = z.object({
  playlist: PlaylistReferenceSchema,
  dryRun: z.boolean().default(false),
  snapshotId: SnapshotIdSchema.optional(),
})

export const SortBodySchema = z.object({
  playlist: PlaylistReferenceSchema,
  order: z.enum(['newest', 'oldest']),
  dryRun: z.boolean().default(false),
  snapshotId: SnapshotIdSchema.optional(),
})

const StepErrorSchema = z.object({
  step: z.number(),
  kind: z.enum([
    'api-error',
    'readd-failed',
    'identity-mismatch',
    'position-not-found',
  ]),
  message: z.string(),
  positions: z.array(z.number()),
  failure: z
    .enum([
      'rate-limited',
      'server-unavailable',
      'client-rejected',
      'network-unreachable',
    ])
    .optional(),
})

const SkippedStepSchema = z.object({
  step: z.number(),
  reason: z.enum(['version-conflict', 'plan-invalidated']),
  positions: z.array(z.number()),
})

const ConflictSchema = z
  .object({
    atStep: z.number(),
    expectedVersion: z.string(),
    currentVersion: z.string().nullable(),
  })
  .nullable()

const RemovalCandidateSchema = z.object({
  position: z.number(),
  identity: z.string(),
  dedupKey: z.string(),
  name: z.string(),
  artists: z.array(z.string()),
})

const DedupStepSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('removeAt'),
    identity: z.string(),
    position: z.number(),
    removal: RemovalCandidateSchema,
  }),
  z.object({
    kind: z.literal('removeAllReadd'),
    identity: z.string(),
    currentPositions: z.array(z.number()),
    insertPositions: z.array(z.number()),
    removals: z.array(RemovalCandidateSchema),
  }),
])

export const DedupReportSchema = z.object({
  collectionId: z.string(),
  playlistName: z.string(),
  dryRun: z.boolean(),
  totalItems: z.number(),
  uniqueItems: z.number(),
  duplicatesFound: z.number(),
  itemsRemoved: z.number(),
  duplicateGroups: z.array(
    z.object({
      name: z.string(),
      artists: z.array(z.string()),
      count: z.number(),
      positions: z.array(z.number()),
      albums: z.array(z.string().nullable()),
      identities: z.array(z.string()),
      hasSharedIdentities: z.boolean(),
    }),
  ),
  removalStrategy: z.object({
    positionSpecific: z.number(),
    removeAllReadd: z.number(),
  }),
  plannedSteps: z.array(DedupStepSchema),
  errors: z.array(StepErrorSchema),
  skipped: z.array(SkippedStepSchema),
  warnings: z.array(z.string()),
  conflict: ConflictSchema,
  initialVersion: z.string(),
  finalVersion: z.string(),
  finalItemCount: z.number().nullable(),
})

export const SortReportSchema = z.object({
  collectionId: z.string(),
  playlistName: z.string(),
  dryRun: z.boolean(),
  descending: z.boolean(),
  totalItems: z.number(),
  movesPlanned: z.number(),
  moveCount: z.number(),
  errors: z.array(StepErrorSchema),
  skipped: z.array(SkippedStepSchema),
  conflict: ConflictSchema,
  initialVersion: z.string(),
  finalVersion: z.string(),
  preview: z.array(
    z.object({
      position: z.number(),
      name: z.string(),
      artists: z.array(z.string()),
      releaseDate: z.string().nullable(),
    }),
  ),
})

export const PlaylistErrorSchema = ErrorSchema.extend({
  category: z
    .enum([
      'rate-limit',
      'authentication',
      'server',
      'network',
      'client',
      'conflict',
      'unknown',
    ])
    .optional(),
  offline: z
    .boolean()
    .optional()
    .describe('True when Spotify itself could not be reached'),
  currentSnapshotId: z.string().nullable().optional(),
})

export type DeduplicateBody = z.infer<typeof DeduplicateBodySchema>
export type SortBody = z.infer<typeof SortBodySchema>
export type DedupReportResponse = z.infer<typeof DedupReportSchema>
export type SortReportResponse = z.infer<typeof SortReportSchema>
export type PlaylistError = z.infer<typeof PlaylistErrorSchema>
