import { extractBearerToken } from '@utils/bearer-token.js'
import type { FastifyInstance } from 'fastify'

/**
 * Every `/v1` route acts on the caller's Spotify account, so each request
 * must carry the caller's access token.
 */
export default async function (fastify: FastifyInstance) {
  fastify.addHook('onRequest', async (request, reply) => {
    const token = extractBearerToken(request.headers.authorization)
    if (!token) {
      return reply.unauthorized(
        'A Spotify access token is required in the Authorization header.',
      )
    }

    request.accessToken = token
  })
}
