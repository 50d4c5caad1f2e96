import type { SpotifyPlaylistItem } from '@root/schemas/spotify/spotify-api.schema.js'
import type { RemoteItem } from '@root/types/remote.types.js'

export const SPOTIFY_API_TIMEOUT_MS = 10000
export const SPOTIFY_MAX_PAGE_SIZE = 100

const TRACK_FIELDS =
  'track(uri,name,artists(name),album(name,release_date,release_date_precision))'

export const PAGE_FIELDS = `items(${TRACK_FIELDS}),next,total`
export const ITEM_URI_FIELDS = 'items(track(uri))'
export const INFO_FIELDS = 'name,snapshot_id,tracks.total'
export const SNAPSHOT_FIELDS = 'snapshot_id'

/**
 * Converts a playlist entry to the remote item shape. Entries whose track
 * is gone carry no identity.
 */
export function toRemoteItem(item: SpotifyPlaylistItem): RemoteItem {
  const track = item.track
  if (!track) {
    return {
      identity: null,
      name: '',
      artists: [],
      album: null,
      releaseDate: null,
      releaseDatePrecision: null,
    }
  }

  return {
    identity: track.uri,
    name: track.name ?? '',
    artists: (track.artists ?? []).map((artist) => artist.name),
    album: track.album?.name ?? null,
    releaseDate: track.album?.release_date || null,
    releaseDatePrecision: track.album?.release_date_precision ?? null,
  }
}

/**
 * First characters of a response body, for error messages.
 */
export function summarizeBody(body: string, limit = 200): string {
  const trimmed = body.trim()
  return trimmed.length > limit ? `${trimmed.slice(0, limit)}...` : trimmed
}
