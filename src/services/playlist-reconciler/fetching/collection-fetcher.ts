import type { Snapshot } from '@root/types/collection.types.js'
import type { CollectionPage, RemoteItem } from '@root/types/remote.types.js'
import { VersionConflictError } from '@utils/remote-errors.js'
import type { RemoteDeps } from '../types.js'
import { toCollectionItem } from './item-keys.js'

/**
 * Reads the whole collection, page by page, into an immutable snapshot.
 *
 * The version token is read before the first page and again after the
 * last; if they differ the collection changed mid-read and the fetch
 * fails rather than returning a mixed snapshot. Any remote failure the
 * executor gives up on propagates, so no partial result is ever returned.
 *
 * @throws {VersionConflictError} When the collection changed while being read
 */
export async function fetchAll(
  deps: RemoteDeps,
  collectionId: string,
  now: () => Date = () => new Date(),
): Promise<Snapshot> {
  const { remote, executor, logger } = deps

  const info = await executor.execute(`fetch info for ${collectionId}`, () =>
    remote.getCollectionInfo(collectionId),
  )

  logger.info(
    `Playlist "${info.name}" (${info.totalCount} tracks, snapshot ${info.versionToken})`,
  )

  const remoteItems: RemoteItem[] = []
  let cursor: string | null = null
  let pageCount = 0

  do {
    const pageCursor: string | null = cursor
    const page: CollectionPage = await executor.execute(
      `fetch page ${pageCount + 1} of ${collectionId}`,
      () => remote.fetchPage(collectionId, pageCursor),
    )
    remoteItems.push(...page.items)
    cursor = page.nextCursor
    pageCount++

    logger.debug(
      `Fetched ${page.items.length} items, total so far: ${remoteItems.length} of ${page.totalCount}`,
    )
  } while (cursor !== null)

  const versionAfter = await executor.execute(
    `read version of ${collectionId}`,
    () => remote.getVersionToken(collectionId),
  )
  if (versionAfter !== info.versionToken) {
    logger.warn(
      `Playlist ${collectionId} changed while it was being read (${info.versionToken} -> ${versionAfter})`,
    )
    throw new VersionConflictError(info.versionToken, versionAfter)
  }

  logger.info(
    `Fetched ${remoteItems.length} tracks from playlist in ${pageCount} pages`,
  )

  return {
    collectionId,
    name: info.name,
    items: remoteItems.map((item, position) => toCollectionItem(item, position)),
    versionToken: info.versionToken,
    fetchedAt: now().toISOString(),
  }
}
