import { ErrorSchema } from '@schemas/common/error.schema.js'
import {
  type TokenQuery,
  TokenQuerySchema,
  type TokenResponse,
  TokenResponseSchema,
} from '@schemas/token/token.schema.js'
import { errorMessage } from '@root/types/errors.js'
import type { FastifyPluginAsync } from 'fastify'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get<{
    Querystring: TokenQuery
    Reply: TokenResponse
  }>(
    '/token',
    {
      schema: {
        summary: 'Derive transaction token',
        operationId: 'getTransactionToken',
        description:
          'Derives the transaction token the poller would send for a request path. With force=true the key material is fetched again first.',
        querystring: TokenQuerySchema,
        response: {
          200: TokenResponseSchema,
          400: ErrorSchema,
          502: ErrorSchema,
        },
        tags: ['System'],
      },
    },
    async (request, reply) => {
      const { path, method, force } = request.query
      try {
        if (force) {
          await fastify.tokens.forceRefresh()
        }

        return {
          token: await fastify.tokens.issue(path, method),
          header: fastify.config.tokenHeaderName,
          version: fastify.tokens.version,
        }
      } catch (error) {
        request.log.warn({ error }, 'Failed to derive transaction token')
        return reply.badGateway(
          `Could not load key material: ${errorMessage(error)}`,
        )
      }
    },
  )
}

export default plugin
