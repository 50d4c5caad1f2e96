import {
  type HealthCheckResponse,
  HealthCheckResponseSchema,
} from '@schemas/health/health.schema.js'
import type { FastifyPluginAsync } from 'fastify'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get<{
    Reply: HealthCheckResponse
  }>(
    '/health',
    {
      schema: {
        summary: 'Health check endpoint',
        operationId: 'getHealth',
        description:
          'Returns the health status of the application. Used by container health checks. Does not require authentication.',
        response: {
          200: HealthCheckResponseSchema,
        },
        tags: ['System'],
      },
    },
    async (_request, reply) => {
      return reply.status(200).send({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        uptimeSeconds: Math.floor(process.uptime()),
      })
    },
  )
}

export default plugin
