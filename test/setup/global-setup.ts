/**
 * Global test setup
 */

export async function setup(): Promise<void> {
  process.env.NODE_ENV = 'test'
  process.env.logLevel = 'silent'
  process.env.port = '3004'
  process.env.spotifyApiUrl = 'https://api.spotify.com/v1'
  // Outbound calls are mocked, so throttling and backoff only slow tests down
  process.env.requestIntervalMs = '0'
  process.env.retryBaseDelayMs = '1'
  process.env.retryMaxDelayMs = '5'
  process.env.retryJitter = 'false'
}
