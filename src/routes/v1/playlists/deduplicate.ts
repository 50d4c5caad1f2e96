import {
  type DedupReportResponse,
  DedupReportSchema,
  type DeduplicateBody,
  DeduplicateBodySchema,
  type PlaylistError,
  PlaylistErrorSchema,
} from '@schemas/playlists/playlists.schema.js'
import { extractPlaylistId } from '@utils/playlist-link.js'
import { toReconcileErrorResponse } from '@utils/reconcile-error-response.js'
import type { FastifyPluginAsync } from 'fastify'

export const deduplicateRoute: FastifyPluginAsync = async (fastify) => {
  fastify.post<{
    Body: DeduplicateBody
    Reply: DedupReportResponse | PlaylistError
  }>(
    '/deduplicate',
    {
      schema: {
        summary: 'Remove duplicate tracks',
        operationId: 'deduplicatePlaylist',
        description:
          'Removes every repeated track (same name and artists) from a playlist, keeping the first occurrence. With dryRun the plan is returned without changing the playlist.',
        body: DeduplicateBodySchema,
        response: {
          200: DedupReportSchema,
          400: PlaylistErrorSchema,
          401: PlaylistErrorSchema,
          409: PlaylistErrorSchema,
          429: PlaylistErrorSchema,
          503: PlaylistErrorSchema,
        },
        tags: ['Playlists'],
      },
    },
    async (request, reply) => {
      const { playlist, dryRun, snapshotId } = request.body

      const playlistId = extractPlaylistId(playlist)
      if (!playlistId) {
        return reply.badRequest(
          'Invalid playlist URL format. Please use a valid Spotify playlist URL (e.g., https://open.spotify.com/playlist/...)',
        )
      }

      try {
        const report = await fastify.playlistReconciler.deduplicate(
          request.accessToken,
          playlistId,
          { dryRun, expectedVersion: snapshotId },
        )
        return reply.send(report)
      } catch (error) {
        const response = toReconcileErrorResponse(error)
        if (!response) throw error
        request.log.warn(
          { error, playlistId },
          `Deduplication failed: ${response.category}`,
        )
        return reply.code(response.statusCode).send(response)
      }
    },
  )
}
