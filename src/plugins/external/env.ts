import env from '@fastify/env'
import type { Config } from '@root/types/config.types.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

const schema = {
  type: 'object',
  required: ['port'],
  properties: {
    baseUrl: {
      type: 'string',
      default: 'http://localhost',
    },
    port: {
      type: 'number',
      default: 3004,
    },
    logLevel: {
      type: 'string',
      enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
      default: 'info',
    },
    logDestination: {
      type: 'string',
      enum: ['terminal', 'file', 'both'],
      default: 'terminal',
    },
    closeGraceDelay: {
      type: 'number',
      default: 10000,
    },
    rateLimitMax: {
      type: 'number',
      default: 100,
    },
    spotifyApiUrl: {
      type: 'string',
      default: 'https://api.spotify.com/v1',
    },
    requestTimeoutMs: {
      type: 'number',
      minimum: 1,
      default: 10000,
    },
    requestIntervalMs: {
      type: 'number',
      minimum: 0,
      default: 333,
    },
    retryBaseDelayMs: {
      type: 'number',
      minimum: 0,
      default: 1000,
    },
    retryMaxDelayMs: {
      type: 'number',
      minimum: 0,
      default: 60000,
    },
    maxRetries: {
      type: 'number',
      minimum: 0,
      default: 5,
    },
    retryJitter: {
      type: 'boolean',
      default: true,
    },
    pageSize: {
      type: 'number',
      minimum: 1,
      maximum: 100,
      default: 100,
    },
    verifyPositions: {
      type: 'boolean',
      default: true,
    },
  },
}

declare module 'fastify' {
  interface FastifyInstance {
    config: Config
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(env, {
      confKey: 'config',
      schema,
      dotenv: {
        path: './.env',
        debug: process.env.NODE_ENV === 'development',
      },
      data: process.env,
    })

    if (fastify.config.retryBaseDelayMs > fastify.config.retryMaxDelayMs) {
      throw new Error(
        `retryBaseDelayMs (${fastify.config.retryBaseDelayMs}) must not exceed retryMaxDelayMs (${fastify.config.retryMaxDelayMs})`,
      )
    }
  },
  {
    name: 'config',
  },
)
