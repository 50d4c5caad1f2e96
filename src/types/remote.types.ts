/**
 * Raw entry as returned by a remote page, before keys are derived.
 */
export interface RemoteItem {
  identity: string | null
  name: string
  artists: string[]
  album: string | null
  releaseDate: string | null
  releaseDatePrecision: 'year' | 'month' | 'day' | null
}

export interface CollectionPage {
  items: RemoteItem[]
  nextCursor: string | null
  totalCount: number
}

export interface CollectionInfo {
  name: string
  versionToken: string
  totalCount: number
}

/**
 * Contract of an ordered remote collection service.
 *
 * Every mutation resolves to the collection's new version token. Failures
 * are thrown as `RemoteCallError` so the executor can classify them.
 */
export interface CollectionRemote {
  getCollectionInfo(collectionId: string): Promise<CollectionInfo>
  fetchPage(collectionId: string, cursor: string | null): Promise<CollectionPage>
  getVersionToken(collectionId: string): Promise<string>
  itemAt(collectionId: string, position: number): Promise<string | null>
  removeAt(
    collectionId: string,
    identity: string,
    positions: number[],
  ): Promise<string>
  removeAllOccurrences(collectionId: string, identity: string): Promise<string>
  insertAt(
    collectionId: string,
    identity: string,
    position: number,
  ): Promise<string>
  reorderRange(
    collectionId: string,
    start: number,
    insertBefore: number,
    length: number,
  ): Promise<string>
}
