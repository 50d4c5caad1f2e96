import { RemoteCallError } from '@utils/remote-errors.js'
import type { FastifyRequest } from 'fastify'
import { describe, expect, it, vi } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'

// Mock dependencies before importing the module
vi.mock('dotenv', () => ({
  config: vi.fn(),
}))

vi.mock('rotating-file-stream', () => ({
  createStream: vi.fn(() => ({
    write: vi.fn(),
    end: vi.fn(),
  })),
}))

const {
  createErrorSerializer,
  createLoggerConfig,
  createRequestSerializer,
  createServiceLogger,
  validLogLevels,
} = await import('@utils/logger.js')

const mockRequest = (url: string) =>
  ({
    method: 'POST',
    url,
    headers: { host: 'localhost:3004' },
    ip: '127.0.0.1',
    socket: { remotePort: 54321 },
  }) as unknown as FastifyRequest

describe('logger', () => {
  describe('validLogLevels', () => {
    it('should export all valid pino log levels', () => {
      expect(validLogLevels).toEqual([
        'fatal',
        'error',
        'warn',
        'info',
        'debug',
        'trace',
        'silent',
      ])
    })
  })

  describe('createServiceLogger', () => {
    it('should create a child logger with uppercased service prefix', () => {
      const mockParentLogger = createMockLogger()
      createServiceLogger(mockParentLogger, 'spotify_executor')

      expect(mockParentLogger.child).toHaveBeenCalledWith(
        {},
        { msgPrefix: '[SPOTIFY_EXECUTOR] ' },
      )
    })
  })

  describe('error serializer', () => {
    const serialize = createErrorSerializer()

    it('should serialize primitive errors with a type', () => {
      expect(serialize('string error')).toEqual({
        message: 'string error',
        type: 'StringError',
      })
      expect(serialize(404)).toEqual({ message: '404', type: 'NumberError' })
      expect(serialize(false)).toEqual({
        message: 'false',
        type: 'BooleanError',
      })
    })

    it('should pass null and undefined through', () => {
      expect(serialize(null)).toBeNull()
      expect(serialize(undefined)).toBeUndefined()
    })

    it('should keep the stack of errors without a status', () => {
      const error = new Error('Test error')
      const result = serialize(error)

      expect(result).toMatchObject({
        message: 'Test error',
        name: 'Error',
        type: 'Error',
        stack: error.stack,
      })
    })

    it('should include the failure kind and drop the stack for 4xx remote errors', () => {
      const error = new RemoteCallError(
        { kind: 'client-rejected', status: 404 },
        'Playlist not found',
      )

      expect(serialize(error)).toEqual({
        message: 'Playlist not found',
        name: 'RemoteCallError',
        status: 404,
        kind: 'client-rejected',
        type: 'RemoteCallError',
        failure: { kind: 'client-rejected', status: 404 },
      })
    })

    it('should serialize the cause chain', () => {
      const error = new Error('outer', { cause: new TypeError('inner') })
      const result = serialize(error)

      expect(result).toMatchObject({
        message: 'outer',
        cause: { message: 'inner', type: 'TypeError' },
      })
    })
  })

  describe('request serializer', () => {
    const serialize = createRequestSerializer()

    it('should serialize basic request information', () => {
      expect(serialize(mockRequest('/v1/playlists/sort'))).toEqual({
        method: 'POST',
        url: '/v1/playlists/sort',
        host: 'localhost:3004',
        remoteAddress: '127.0.0.1',
        remotePort: 54321,
      })
    })

    it('should redact tokens in the query string', () => {
      expect(
        serialize(mockRequest('/callback?code=abc123&state=xyz')).url,
      ).toBe('/callback?code=[REDACTED]&state=xyz')
      expect(
        serialize(mockRequest('/v1/playlists/sort?access_token=abc123')).url,
      ).toBe('/v1/playlists/sort?access_token=[REDACTED]')
      expect(serialize(mockRequest('/health?TOKEN=abc123')).url).toBe(
        '/health?token=[REDACTED]',
      )
    })
  })

  describe('createLoggerConfig', () => {
    it('should log to the terminal through pino-pretty', () => {
      const config = createLoggerConfig('terminal')

      expect(config).toMatchObject({
        level: 'info',
        transport: { target: 'pino-pretty' },
      })
      expect(config.serializers?.err).toBeTypeOf('function')
      expect(config.serializers?.req).toBeTypeOf('function')
    })
  })
})
