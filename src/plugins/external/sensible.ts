import sensible from '@fastify/sensible'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

/**
 * HTTP error helpers (`reply.badRequest`, `reply.unauthorized`, ...).
 *
 * @see {@link https://github.com/fastify/fastify-sensible}
 */
export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(sensible)
  },
  {
    name: 'sensible',
  },
)
