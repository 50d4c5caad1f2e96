import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyRequest {
    /** Spotify access token of the caller, set for every /v1/ request */
    accessToken: string
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    fastify.decorateRequest('accessToken', '')
  },
  {
    name: 'access-token',
  },
)
