import { extractPlaylistId } from '@utils/playlist-link.js'
import { describe, expect, it } from 'vitest'

const PLAYLIST_ID = 'AbCdEfGhIjKlMnOpQrStUv'

describe('playlist-link', () => {
  describe('extractPlaylistId', () => {
    it('should extract the id from a playlist URL', () => {
      expect(
        extractPlaylistId(`https://open.spotify.com/playlist/${PLAYLIST_ID}`),
      ).toBe(PLAYLIST_ID)
    })

    it('should ignore query parameters', () => {
      expect(
        extractPlaylistId(
          `https://open.spotify.com/playlist/${PLAYLIST_ID}?si=abc123`,
        ),
      ).toBe(PLAYLIST_ID)
    })

    it('should accept a bare 22-character id', () => {
      expect(extractPlaylistId(`  ${PLAYLIST_ID} `)).toBe(PLAYLIST_ID)
    })

    it('should reject other links and ids', () => {
      expect(
        extractPlaylistId(`https://open.spotify.com/album/${PLAYLIST_ID}`),
      ).toBeNull()
      expect(extractPlaylistId('short-id')).toBeNull()
      expect(extractPlaylistId('')).toBeNull()
    })
  })
})
