import {
  SpotifyPlaylistInfoSchema,
  SpotifyPlaylistTracksPageSchema,
  SpotifySnapshotSchema,
} from '@root/schemas/spotify/spotify-api.schema.js'
import type {
  CollectionInfo,
  CollectionPage,
  CollectionRemote,
} from '@root/types/remote.types.js'
import { failureFromStatus, RemoteCallError } from '@utils/remote-errors.js'
import type { FastifyBaseLogger } from 'fastify'
import { z } from 'zod'
import {
  INFO_FIELDS,
  ITEM_URI_FIELDS,
  PAGE_FIELDS,
  SNAPSHOT_FIELDS,
  SPOTIFY_API_TIMEOUT_MS,
  SPOTIFY_MAX_PAGE_SIZE,
  summarizeBody,
  toRemoteItem,
} from './helpers.js'

const ItemUriPageSchema = z.object({
  items: z.array(
    z.object({ track: z.object({ uri: z.string() }).nullable() }),
  ),
})

const SpotifyErrorBodySchema = z.object({
  error: z.object({ message: z.string() }),
})

export interface SpotifyApiClientOptions {
  baseUrl: string
  accessToken: string
  log: FastifyBaseLogger
  timeoutMs?: number
  pageSize?: number
}

interface RequestInit {
  method: 'GET' | 'POST' | 'PUT' | 'DELETE'
  body?: unknown
}

/**
 * Spotify Web API transport for one user's access token.
 *
 * Makes exactly one HTTP request per call and never retries: every
 * non-2xx response and every network failure is thrown as a
 * `RemoteCallError` for the executor to classify.
 */
export class SpotifyApiClient implements CollectionRemote {
  private readonly baseUrl: string
  private readonly accessToken: string
  private readonly log: FastifyBaseLogger
  private readonly timeoutMs: number
  private readonly pageSize: number

  constructor(options: SpotifyApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.accessToken = options.accessToken
    this.log = options.log
    this.timeoutMs = options.timeoutMs ?? SPOTIFY_API_TIMEOUT_MS
    this.pageSize = Math.min(
      options.pageSize ?? SPOTIFY_MAX_PAGE_SIZE,
      SPOTIFY_MAX_PAGE_SIZE,
    )
  }

  async getCollectionInfo(collectionId: string): Promise<CollectionInfo> {
    const url = this.playlistUrl(collectionId)
    url.searchParams.set('fields', INFO_FIELDS)
    const info = await this.request(SpotifyPlaylistInfoSchema, url)
    return {
      name: info.name,
      versionToken: info.snapshot_id,
      totalCount: info.tracks.total,
    }
  }

  /**
   * @param cursor - The `next` URL of the previous page, or null for the first page
   */
  async fetchPage(
    collectionId: string,
    cursor: string | null,
  ): Promise<CollectionPage> {
    const url = cursor ? new URL(cursor) : this.tracksUrl(collectionId)
    if (!cursor) {
      url.searchParams.set('limit', String(this.pageSize))
      url.searchParams.set('offset', '0')
      url.searchParams.set('fields', PAGE_FIELDS)
    }

    const page = await this.request(SpotifyPlaylistTracksPageSchema, url)
    return {
      items: page.items.map(toRemoteItem),
      nextCursor: page.next,
      totalCount: page.total,
    }
  }

  async getVersionToken(collectionId: string): Promise<string> {
    const url = this.playlistUrl(collectionId)
    url.searchParams.set('fields', SNAPSHOT_FIELDS)
    const { snapshot_id } = await this.request(SpotifySnapshotSchema, url)
    return snapshot_id
  }

  async itemAt(collectionId: string, position: number): Promise<string | null> {
    const url = this.tracksUrl(collectionId)
    url.searchParams.set('limit', '1')
    url.searchParams.set('offset', String(position))
    url.searchParams.set('fields', ITEM_URI_FIELDS)
    const page = await this.request(ItemUriPageSchema, url)
    return page.items[0]?.track?.uri ?? null
  }

  async removeAt(
    collectionId: string,
    identity: string,
    positions: number[],
  ): Promise<string> {
    const { snapshot_id } = await this.request(
      SpotifySnapshotSchema,
      this.tracksUrl(collectionId),
      {
        method: 'DELETE',
        body: { tracks: [{ uri: identity, positions }] },
      },
    )
    return snapshot_id
  }

  async removeAllOccurrences(
    collectionId: string,
    identity: string,
  ): Promise<string> {
    const { snapshot_id } = await this.request(
      SpotifySnapshotSchema,
      this.tracksUrl(collectionId),
      { method: 'DELETE', body: { tracks: [{ uri: identity }] } },
    )
    return snapshot_id
  }

  async insertAt(
    collectionId: string,
    identity: string,
    position: number,
  ): Promise<string> {
    const { snapshot_id } = await this.request(
      SpotifySnapshotSchema,
      this.tracksUrl(collectionId),
      { method: 'POST', body: { uris: [identity], position } },
    )
    return snapshot_id
  }

  async reorderRange(
    collectionId: string,
    start: number,
    insertBefore: number,
    length: number,
  ): Promise<string> {
    const { snapshot_id } = await this.request(
      SpotifySnapshotSchema,
      this.tracksUrl(collectionId),
      {
        method: 'PUT',
        body: {
          range_start: start,
          insert_before: insertBefore,
          range_length: length,
        },
      },
    )
    return snapshot_id
  }

  private playlistUrl(collectionId: string): URL {
    return new URL(
      `${this.baseUrl}/playlists/${encodeURIComponent(collectionId)}`,
    )
  }

  private tracksUrl(collectionId: string): URL {
    return new URL(
      `${this.baseUrl}/playlists/${encodeURIComponent(collectionId)}/tracks`,
    )
  }

  private async request<T>(
    schema: z.ZodType<T>,
    url: URL,
    init: RequestInit = { method: 'GET' },
  ): Promise<T> {
    const description = `${init.method} ${url.pathname}`

    let response: Response
    try {
      response = await fetch(url.toString(), {
        method: init.method,
        headers: {
          Authorization: `Bearer ${this.accessToken}`,
          Accept: 'application/json',
          ...(init.body !== undefined
            ? { 'Content-Type': 'application/json' }
            : {}),
        },
        body: init.body !== undefined ? JSON.stringify(init.body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      })
    } catch (error) {
      this.log.debug({ error }, `${description} did not reach Spotify`)
      throw new RemoteCallError(
        { kind: 'network-unreachable', status: null },
        `${description} failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      )
    }

    if (!response.ok) {
      const body = await response.text()
      const failure = failureFromStatus(
        response.status,
        response.headers.get('Retry-After'),
      )
      throw new RemoteCallError(
        failure,
        `${description} returned ${response.status}: ${extractErrorMessage(body) || response.statusText}`,
      )
    }

    const parsed = schema.safeParse(parseJson(await response.text()))
    if (!parsed.success) {
      this.log.warn(
        { issues: parsed.error.issues },
        `Unexpected response shape from ${description}`,
      )
      throw new RemoteCallError(
        { kind: 'server-unavailable', status: 502 },
        `${description} returned an unexpected response`,
        { cause: parsed.error },
      )
    }
    return parsed.data
  }
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body)
  } catch {
    return undefined
  }
}

function extractErrorMessage(body: string): string {
  if (!body) return ''
  const parsed = SpotifyErrorBodySchema.safeParse(parseJson(body))
  return parsed.success ? parsed.data.error.message : summarizeBody(body)
}
