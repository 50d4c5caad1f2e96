const PLAYLIST_URL_PATTERN = /https:\/\/open\.spotify\.com\/playlist\/([a-zA-Z0-9]+)/
const PLAYLIST_ID_PATTERN = /^[a-zA-Z0-9]{22}$/

/**
 * Extracts a playlist id from a Spotify playlist URL, or accepts a bare
 * 22-character id as-is.
 *
 * @example
 * extractPlaylistId('https://open.spotify.com/playlist/37i9dQZF1DXcBWIGoYBM5M?si=abc')
 * // '37i9dQZF1DXcBWIGoYBM5M'
 *
 * @returns The playlist id, or null for anything else
 */
export function extractPlaylistId(link: string): string | null {
  const trimmed = link.trim()

  const match = PLAYLIST_URL_PATTERN.exec(trimmed)
  if (match) {
    return match[1]
  }

  if (PLAYLIST_ID_PATTERN.test(trimmed)) {
    return trimmed
  }

  return null
}
