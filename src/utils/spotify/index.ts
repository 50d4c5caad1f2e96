export { SpotifyApiClient, type SpotifyApiClientOptions } from './api-client.js'
export {
  SPOTIFY_API_TIMEOUT_MS,
  SPOTIFY_MAX_PAGE_SIZE,
  toRemoteItem,
} from './helpers.js'
