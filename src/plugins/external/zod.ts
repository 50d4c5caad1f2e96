import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'
import {
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod'

/**
 * Route schemas are zod schemas: bodies are parsed with them and replies
 * serialized through them.
 */
export default fp(
  async (fastify: FastifyInstance) => {
    fastify.setValidatorCompiler(validatorCompiler)
    fastify.setSerializerCompiler(serializerCompiler)
  },
  {
    name: 'zod-compilers',
  },
)
