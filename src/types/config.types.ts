import type { LogDestination } from '@utils/logger.js'

export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

export interface Config {
  baseUrl: string
  port: number
  logLevel: LogLevel
  logDestination: LogDestination
  closeGraceDelay: number
  rateLimitMax: number
  // Spotify Web API
  spotifyApiUrl: string
  requestTimeoutMs: number
  // Outbound throttling and retries
  requestIntervalMs: number
  retryBaseDelayMs: number
  retryMaxDelayMs: number
  maxRetries: number
  retryJitter: boolean
  pageSize: number
  verifyPositions: boolean
}
