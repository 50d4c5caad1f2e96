import { z } from 'zod'

// Only the fields requested through the `fields` query parameter
export const SpotifyPlaylistInfoSchema = z.object({
  name: z.string(),
  snapshot_id: z.string(),
  tracks: z.object({
    total: z.number().int().nonnegative(),
  }),
})

export const SpotifySnapshotSchema = z.object({
  snapshot_id: z.string(),
})

const SpotifyTrackSchema = z.object({
  uri: z.string(),
  name: z.string().nullable().optional(),
  artists: z
    .array(z.object({ name: z.string() }))
    .nullable()
    .optional(),
  album: z
    .object({
      name: z.string().nullable().optional(),
      release_date: z.string().nullable().optional(),
      release_date_precision: z
        .enum(['year', 'month', 'day'])
        .nullable()
        .optional(),
    })
    .nullable()
    .optional(),
})

export const SpotifyPlaylistItemSchema = z.object({
  track: SpotifyTrackSchema.nullable(),
})

export const SpotifyPlaylistTracksPageSchema = z.object({
  items: z.array(SpotifyPlaylistItemSchema),
  next: z.string().nullable(),
  total: z.number().int().nonnegative(),
})

export type SpotifyPlaylistInfo = z.infer<typeof SpotifyPlaylistInfoSchema>
export type SpotifyPlaylistItem = z.infer<typeof SpotifyPlaylistItemSchema>
export type SpotifyPlaylistTracksPage = z.infer<
  typeof SpotifyPlaylistTracksPageSchema
>
