import { PlaylistReconcilerService } from '@services/playlist-reconciler.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    playlistReconciler: PlaylistReconcilerService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const service = new PlaylistReconcilerService(fastify.log, fastify)
    fastify.decorate('playlistReconciler', service)
  },
  {
    name: 'playlist-reconciler',
    dependencies: ['config'],
  },
)
