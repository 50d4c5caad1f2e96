import type { CollectionRemote } from '@root/types/remote.types.js'
import type { DedupReport, SortReport } from '@root/types/reconcile.types.js'
import { createServiceLogger } from '@utils/logger.js'
import { SpotifyApiClient } from '@utils/spotify/index.js'
import type { FastifyBaseLogger, FastifyInstance } from 'fastify'
import {
  type ExecutionDeps,
  RateLimitedExecutor,
  type RunOptions,
  runDeduplication,
  runSort,
  type SortRunOptions,
} from './playlist-reconciler/index.js'

export type RemoteFactory = (accessToken: string) => CollectionRemote

export class PlaylistReconcilerService {
  private readonly log: FastifyBaseLogger
  /** Shared by every run so the throttle spans all outbound calls */
  private readonly executor: RateLimitedExecutor
  private readonly createRemote: RemoteFactory

  constructor(
    readonly baseLog: FastifyBaseLogger,
    private readonly fastify: FastifyInstance,
    createRemote?: RemoteFactory,
  ) {
    this.log = createServiceLogger(baseLog, 'PLAYLIST_RECONCILER')
    this.executor = new RateLimitedExecutor(
      {
        minIntervalMs: this.config.requestIntervalMs,
        maxRetries: this.config.maxRetries,
        baseDelayMs: this.config.retryBaseDelayMs,
        maxDelayMs: this.config.retryMaxDelayMs,
        jitter: this.config.retryJitter,
      },
      { log: createServiceLogger(baseLog, 'SPOTIFY_EXECUTOR') },
    )
    this.createRemote =
      createRemote ??
      ((accessToken) =>
        new SpotifyApiClient({
          baseUrl: this.config.spotifyApiUrl,
          accessToken,
          log: createServiceLogger(baseLog, 'SPOTIFY_API'),
          timeoutMs: this.config.requestTimeoutMs,
          pageSize: this.config.pageSize,
        }))
  }

  private get config() {
    return this.fastify.config
  }

  private deps(accessToken: string): ExecutionDeps {
    return {
      remote: this.createRemote(accessToken),
      executor: this.executor,
      logger: this.log,
      verifyPositions: this.config.verifyPositions,
    }
  }

  async deduplicate(
    accessToken: string,
    playlistId: string,
    options: RunOptions,
  ): Promise<DedupReport> {
    this.log.info(
      `Removing duplicates from playlist ${playlistId}${options.dryRun ? ' (dry run)' : ''}`,
    )
    return runDeduplication(this.deps(accessToken), playlistId, options)
  }

  async sortByReleaseDate(
    accessToken: string,
    playlistId: string,
    options: SortRunOptions,
  ): Promise<SortReport> {
    this.log.info(
      `Sorting playlist ${playlistId} by release date${options.dryRun ? ' (dry run)' : ''}`,
    )
    return runSort(this.deps(accessToken), playlistId, options)
  }
}
