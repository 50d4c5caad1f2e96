import type {
  DedupReportResponse,
  PlaylistError,
  SortReportResponse,
} from '@schemas/playlists/playlists.schema.js'
import { HttpResponse, http } from 'msw'
import { beforeEach, describe, expect, it } from 'vitest'
import { build } from '../../../helpers/app.js'
import {
  MemoryCollectionRemote,
  track,
  uri,
} from '../../../mocks/memory-remote.js'
import {
  createSpotifyPlaylistHandlers,
  SPOTIFY_API_URL,
  TEST_ACCESS_TOKEN,
} from '../../../mocks/spotify-api-handlers.js'
import { server } from '../../../setup/msw-setup.js'

const PLAYLIST_ID = '0123456789abcdefABCDEF'
const PLAYLIST_URL = `https://open.spotify.com/playlist/${PLAYLIST_ID}?si=share`
const AUTH_HEADERS = { authorization: `Bearer ${TEST_ACCESS_TOKEN}` }

describe('Playlist routes', () => {
  let playlist: MemoryCollectionRemote

  beforeEach(() => {
    playlist = new MemoryCollectionRemote(
      [
        track('u1', 'Alpha', ['X'], '2001'),
        track('u2', 'Beta', ['Y'], '2010'),
        track('u1', 'Alpha', ['X'], '2001'),
        track('u3', 'Beta', ['Y'], '1995'),
        track('u4', 'Gamma', ['Z'], '2020'),
      ],
      'Mixtape',
    )
    server.use(...createSpotifyPlaylistHandlers({ [PLAYLIST_ID]: playlist }))
  })

  describe('POST /v1/playlists/deduplicate', () => {
    it('should require a bearer token', async (ctx) => {
      const app = await build(ctx)

      const response = await app.inject({
        method: 'POST',
        url: '/v1/playlists/deduplicate',
        payload: { playlist: PLAYLIST_URL },
      })

      expect(response.statusCode).toBe(401)
      expect(response.json<PlaylistError>().message).toBe(
        'A Spotify access token is required in the Authorization header.',
      )
      expect(playlist.calls).toEqual([])
    })

    it('should reject links that are not Spotify playlists', async (ctx) => {
      const app = await build(ctx)

      const response = await app.inject({
        method: 'POST',
        url: '/v1/playlists/deduplicate',
        headers: AUTH_HEADERS,
        payload: { playlist: 'https://example.com/not-a-playlist' },
      })

      expect(response.statusCode).toBe(400)
      expect(response.json<PlaylistError>().message).toBe(
        'Invalid playlist URL format. Please use a valid Spotify playlist URL (e.g., https://open.spotify.com/playlist/...)',
      )
    })

    it('should reject a body without a playlist', async (ctx) => {
      const app = await build(ctx)

      const response = await app.inject({
        method: 'POST',
        url: '/v1/playlists/deduplicate',
        headers: AUTH_HEADERS,
        payload: { dryRun: true },
      })

      expect(response.statusCode).toBe(400)
    })

    it('should report duplicates without touching the playlist on a dry run', async (ctx) => {
      const app = await build(ctx)

      const response = await app.inject({
        method: 'POST',
        url: '/v1/playlists/deduplicate',
        headers: AUTH_HEADERS,
        payload: { playlist: PLAYLIST_URL, dryRun: true },
      })

      expect(response.statusCode).toBe(200)
      const body = response.json<DedupReportResponse>()
      expect(body).toMatchObject({
        collectionId: PLAYLIST_ID,
        playlistName: 'Mixtape',
        dryRun: true,
        totalItems: 5,
        uniqueItems: 3,
        duplicatesFound: 2,
        itemsRemoved: 0,
        finalItemCount: null,
        initialVersion: 'snapshot-1',
      })
      expect(playlist.mutationCalls).toEqual([])
    })

    it('should remove duplicates and keep first occurrences', async (ctx) => {
      const app = await build(ctx)

      const response = await app.inject({
        method: 'POST',
        url: '/v1/playlists/deduplicate',
        headers: AUTH_HEADERS,
        payload: { playlist: PLAYLIST_ID, snapshotId: 'snapshot-1' },
      })

      expect(response.statusCode).toBe(200)
      const body = response.json<DedupReportResponse>()
      expect(body.itemsRemoved).toBe(2)
      expect(body.finalItemCount).toBe(3)
      expect(body.errors).toEqual([])
      expect(playlist.identities).toEqual([uri('u1'), uri('u2'), uri('u4')])
    })

    it('should answer 409 when the playlist changed since the client loaded it', async (ctx) => {
      const app = await build(ctx)
      playlist.externalEdit((items) => items.slice(0, 4))

      const response = await app.inject({
        method: 'POST',
        url: '/v1/playlists/deduplicate',
        headers: AUTH_HEADERS,
        payload: { playlist: PLAYLIST_URL, snapshotId: 'snapshot-1' },
      })

      expect(response.statusCode).toBe(409)
      expect(response.json<PlaylistError>()).toEqual({
        statusCode: 409,
        code: 'PLAYLIST_CONFLICT',
        error: 'Conflict',
        message:
          'This playlist has been modified since you loaded it. Please refresh the page and try again.',
        category: 'conflict',
        offline: false,
        currentSnapshotId: 'snapshot-2',
      })
      expect(playlist.mutationCalls).toEqual([])
    })

    it('should answer 401 when Spotify rejects the token', async (ctx) => {
      const app = await build(ctx)

      const response = await app.inject({
        method: 'POST',
        url: '/v1/playlists/deduplicate',
        headers: { authorization: 'Bearer expired-token' },
        payload: { playlist: PLAYLIST_URL },
      })

      expect(response.statusCode).toBe(401)
      expect(response.json<PlaylistError>()).toMatchObject({
        code: 'PLAYLIST_AUTHENTICATION',
        category: 'authentication',
        message: 'Your Spotify session has expired. Please log in again.',
      })
    })

    it('should answer 503 when Spotify keeps failing', async (ctx) => {
      const app = await build(ctx)
      server.use(
        http.get(`${SPOTIFY_API_URL}/playlists/${PLAYLIST_ID}`, () =>
          HttpResponse.json(
            { error: { status: 503, message: 'Service unavailable' } },
            { status: 503 },
          ),
        ),
      )

      const response = await app.inject({
        method: 'POST',
        url: '/v1/playlists/deduplicate',
        headers: AUTH_HEADERS,
        payload: { playlist: PLAYLIST_URL, dryRun: true },
      })

      expect(response.statusCode).toBe(503)
      expect(response.json<PlaylistError>()).toMatchObject({
        code: 'PLAYLIST_SERVER',
        category: 'server',
        offline: true,
      })
    })
  })

  describe('POST /v1/playlists/sort', () => {
    it('should preview the newest-first order on a dry run', async (ctx) => {
      const app = await build(ctx)

      const response = await app.inject({
        method: 'POST',
        url: '/v1/playlists/sort',
        headers: AUTH_HEADERS,
        payload: { playlist: PLAYLIST_URL, order: 'newest', dryRun: true },
      })

      expect(response.statusCode).toBe(200)
      const body = response.json<SortReportResponse>()
      expect(body.descending).toBe(true)
      expect(body.moveCount).toBe(0)
      expect(body.preview.map((item) => item.releaseDate)).toEqual([
        '2020-01-01',
        '2010-01-01',
        '2001-01-01',
        '2001-01-01',
        '1995-01-01',
      ])
      expect(playlist.mutationCalls).toEqual([])
    })

    it('should sort the playlist oldest first', async (ctx) => {
      const app = await build(ctx)

      const response = await app.inject({
        method: 'POST',
        url: '/v1/playlists/sort',
        headers: AUTH_HEADERS,
        payload: { playlist: PLAYLIST_URL, order: 'oldest' },
      })

      expect(response.statusCode).toBe(200)
      const body = response.json<SortReportResponse>()
      expect(body.moveCount).toBe(body.movesPlanned)
      expect(body.skipped).toEqual([])
      expect(playlist.identities).toEqual([
        uri('u3'),
        uri('u1'),
        uri('u1'),
        uri('u2'),
        uri('u4'),
      ])
    })

    it('should reject an unknown order', async (ctx) => {
      const app = await build(ctx)

      const response = await app.inject({
        method: 'POST',
        url: '/v1/playlists/sort',
        headers: AUTH_HEADERS,
        payload: { playlist: PLAYLIST_URL, order: 'shuffled' },
      })

      expect(response.statusCode).toBe(400)
      expect(playlist.calls).toEqual([])
    })
  })
})
