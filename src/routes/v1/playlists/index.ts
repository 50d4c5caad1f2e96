import type { FastifyPluginAsync } from 'fastify'
import { deduplicateRoute } from './deduplicate.js'
import { sortRoute } from './sort.js'

const playlistsPlugin: FastifyPluginAsync = async (fastify) => {
  await fastify.register(deduplicateRoute)
  await fastify.register(sortRoute)
}

export default playlistsPlugin
