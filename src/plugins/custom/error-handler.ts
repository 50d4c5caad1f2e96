import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import { toReconcileErrorResponse } from '@utils/reconcile-error-response.js'
import type { FastifyError, FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

/**
 * Global error handler plugin.
 *
 * Remote failures that reach it are answered with their category's status
 * and message; everything else keeps its own status code, and 5xx details
 * never leave the server.
 */
async function errorHandler(fastify: FastifyInstance) {
  fastify.setErrorHandler((err: FastifyError, request, reply) => {
    // Avoid logging query/params to prevent leaking tokens
    const requestInfo = {
      id: request.id,
      method: request.method,
      path: request.url.split('?')[0],
      route: request.routeOptions?.url,
    }

    const remote = err.statusCode ? null : toReconcileErrorResponse(err)
    if (remote) {
      request.log.warn({ err, request: requestInfo }, 'Spotify request failed')
      reply.code(remote.statusCode)
      return remote
    }

    const statusCode = err.statusCode ?? 500
    if (statusCode === 401) {
      request.log.warn({ request: requestInfo }, 'Authentication required')
    } else if (statusCode >= 500) {
      request.log.error(
        { err, request: requestInfo },
        'Internal server error occurred',
      )
    } else {
      request.log.warn({ err, request: requestInfo }, 'Client error occurred')
    }

    reply.code(statusCode)
    const isServerError = statusCode >= 500
    const payload: ErrorResponse = {
      statusCode,
      code: err.code || 'GENERIC_ERROR',
      error: isServerError
        ? 'Internal Server Error'
        : 'error' in err && typeof err.error === 'string'
          ? err.error
          : 'Client Error',
      message: isServerError
        ? 'Internal Server Error'
        : err.message || 'An error occurred',
    }
    return payload
  })
}

export default fp(errorHandler, {
  name: 'error-handler',
})
