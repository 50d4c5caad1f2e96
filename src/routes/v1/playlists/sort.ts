import {
  type SortReportResponse,
  SortReportSchema,
  type SortBody,
  SortBodySchema,
  type PlaylistError,
  PlaylistErrorSchema,
} from '@schemas/playlists/playlists.schema.js'
import { extractPlaylistId } from '@utils/playlist-link.js'
import { toReconcileErrorResponse } from '@utils/reconcile-error-response.js'
import type { FastifyPluginAsync } from 'fastify'

export const sortRoute: FastifyPluginAsync = async (fastify) => {
  fastify.post<{
    Body: SortBody
    Reply: SortReportResponse | PlaylistError
  }>(
    '/sort',
    {
      schema: {
        summary: 'Sort tracks by release date',
        operationId: 'sortPlaylist',
        description:
          'Reorders a playlist by album release date, newest or oldest first. Tracks with the same date keep their relative order. With dryRun the resulting order is previewed without changing the playlist.',
        body: SortBodySchema,
        response: {
          200: SortReportSchema,
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
      const { playlist, order, dryRun, snapshotId } = request.body

      const playlistId = extractPlaylistId(playlist)
      if (!playlistId) {
        return reply.badRequest(
          'Invalid playlist URL format. Please use a valid Spotify playlist URL (e.g., https://open.spotify.com/playlist/...)',
        )
      }

      try {
        const report = await fastify.playlistReconciler.sortByReleaseDate(
          request.accessToken,
          playlistId,
          {
            descending: order === 'newest',
            dryRun,
            expectedVersion: snapshotId,
          },
        )
        return reply.send(report)
      } catch (error) {
        const response = toReconcileErrorResponse(error)
        if (!response) throw error
        request.log.warn(
          { error, playlistId },
          `Sort failed: ${response.category}`,
        )
        return reply.code(response.statusCode).send(response)
      }
    },
  )
}
