import { fetchAll } from '@services/playlist-reconciler/fetching/collection-fetcher.js'
import {
  RemoteCallError,
  RetriesExhaustedError,
  VersionConflictError,
} from '@utils/remote-errors.js'
import { describe, expect, it } from 'vitest'
import { COLLECTION_ID, createTestDeps } from '../../../helpers/reconciler.js'
import {
  MemoryCollectionRemote,
  track,
  unavailableTrack,
  uri,
} from '../../../mocks/memory-remote.js'

const fixedNow = () => new Date('2024-05-01T12:00:00.000Z')

function fiveItemRemote() {
  return new MemoryCollectionRemote(
    [
      track('a', 'One'),
      track('b', 'Two'),
      unavailableTrack('Gone'),
      track('d', 'Four'),
      track('e', 'Five'),
    ],
    'Road Trip',
    2,
  )
}

describe('fetchAll', () => {
  it('should follow the cursor and keep server order', async () => {
    const remote = fiveItemRemote()

    const snapshot = await fetchAll(createTestDeps(remote), COLLECTION_ID, fixedNow)

    expect(snapshot.collectionId).toBe(COLLECTION_ID)
    expect(snapshot.name).toBe('Road Trip')
    expect(snapshot.versionToken).toBe('snapshot-1')
    expect(snapshot.fetchedAt).toBe('2024-05-01T12:00:00.000Z')
    expect(snapshot.items.map((item) => item.identity)).toEqual([
      uri('a'),
      uri('b'),
      null,
      uri('d'),
      uri('e'),
    ])
    expect(snapshot.items.map((item) => item.position)).toEqual([
      0, 1, 2, 3, 4,
    ])
    expect(
      remote.calls
        .filter((call) => call.method === 'fetchPage')
        .map((call) => call.args[1]),
    ).toEqual([null, '2', '4'])
  })

  it('should read the version before and after paging', async () => {
    const remote = fiveItemRemote()

    await fetchAll(createTestDeps(remote), COLLECTION_ID, fixedNow)

    expect(remote.calls[0].method).toBe('getCollectionInfo')
    expect(remote.calls[remote.calls.length - 1].method).toBe(
      'getVersionToken',
    )
  })

  it('should fail when the collection changes while it is read', async () => {
    const remote = fiveItemRemote()
    let pages = 0
    remote.beforeCall = (method) => {
      if (method === 'fetchPage' && ++pages === 2) {
        remote.externalEdit((items) => items.slice(1))
      }
    }

    const result = fetchAll(createTestDeps(remote), COLLECTION_ID, fixedNow)

    await expect(result).rejects.toBeInstanceOf(VersionConflictError)
    await expect(result).rejects.toMatchObject({
      expectedVersion: 'snapshot-1',
      currentVersion: 'snapshot-2',
    })
  })

  it('should propagate a client rejection without a partial result', async () => {
    const remote = fiveItemRemote()
    remote.failNext('fetchPage', { kind: 'client-rejected', status: 404 })

    await expect(
      fetchAll(createTestDeps(remote), COLLECTION_ID),
    ).rejects.toBeInstanceOf(RemoteCallError)
  })

  it('should give up once the executor exhausts its retries', async () => {
    const remote = fiveItemRemote()
    remote.failNext('fetchPage', { kind: 'server-unavailable', status: 500 }, 3)

    await expect(
      fetchAll(createTestDeps(remote), COLLECTION_ID),
    ).rejects.toBeInstanceOf(RetriesExhaustedError)
  })

  it('should recover when a page fails transiently', async () => {
    const remote = fiveItemRemote()
    remote.failNext('fetchPage', { kind: 'rate-limited', status: 429, retryAfterSeconds: 1 })

    const snapshot = await fetchAll(createTestDeps(remote), COLLECTION_ID)

    expect(snapshot.items).toHaveLength(5)
  })

  it('should return an empty snapshot for an empty collection', async () => {
    const remote = new MemoryCollectionRemote([])

    const snapshot = await fetchAll(createTestDeps(remote), COLLECTION_ID)

    expect(snapshot.items).toEqual([])
  })
})
