import path from 'node:path'
import { fileURLToPath } from 'node:url'
import fastifyAutoload from '@fastify/autoload'
import type { FastifyInstance, FastifyPluginOptions } from 'fastify'

const srcDir = path.dirname(fileURLToPath(import.meta.url))

/**
 * Loads external plugins (config, rate limiting, HTTP helpers), then the
 * custom plugins that build the reconciler service, then the routes.
 */
export default async function serviceApp(
  fastify: FastifyInstance,
  opts: FastifyPluginOptions,
) {
  // Load external plugins
  await fastify.register(fastifyAutoload, {
    dir: path.join(srcDir, 'plugins/external'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })

  // Load custom plugins
  await fastify.register(fastifyAutoload, {
    dir: path.join(srcDir, 'plugins/custom'),
    options: {
      ...opts,
      timeout: 30000,
    },
  })

  // Load routes
  await fastify.register(fastifyAutoload, {
    dir: path.join(srcDir, 'routes'),
    autoHooks: true,
    cascadeHooks: true,
    options: {
      ...opts,
      timeout: 30000,
    },
  })
}
