import type { CollectionItem } from '@root/types/collection.types.js'
import type { RemoteItem } from '@root/types/remote.types.js'

const KEY_SEPARATOR = '|||'

/**
 * Duplicate-detection key: the lowercased, trimmed name followed by the
 * lowercased, trimmed artist names in sorted order. Artist order and
 * letter case therefore never distinguish two tracks.
 *
 * @returns The key, or null for entries without a name
 */
export function buildDedupKey(name: string, artists: string[]): string | null {
  const normalizedName = name.toLowerCase().trim()
  if (!normalizedName) return null

  const normalizedArtists = artists
    .map((artist) => artist.toLowerCase().trim())
    .sort()

  return [normalizedName, ...normalizedArtists].join(KEY_SEPARATOR)
}

/**
 * Pads a release date to day precision: `2019` becomes `2019-01-01` and
 * `2019-07` becomes `2019-07-01`. When the remote does not report a
 * precision it is inferred from the string length.
 */
export function normalizeReleaseDate(
  releaseDate: string | null,
  precision: RemoteItem['releaseDatePrecision'],
): string | null {
  if (!releaseDate) return null

  const effective =
    precision ??
    (releaseDate.length === 4
      ? 'year'
      : releaseDate.length === 7
        ? 'month'
        : 'day')

  switch (effective) {
    case 'year':
      return `${releaseDate}-01-01`
    case 'month':
      return `${releaseDate}-01`
    case 'day':
      return releaseDate
  }
}

export function toCollectionItem(
  remote: RemoteItem,
  position: number,
): CollectionItem {
  const available = remote.identity !== null
  return {
    position,
    identity: remote.identity,
    dedupKey: available ? buildDedupKey(remote.name, remote.artists) : null,
    sortKey: available
      ? normalizeReleaseDate(remote.releaseDate, remote.releaseDatePrecision)
      : null,
    name: remote.name,
    artists: remote.artists,
    album: remote.album,
    releaseDate: remote.releaseDate,
  }
}
