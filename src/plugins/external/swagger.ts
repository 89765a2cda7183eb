import fastifySwagger from '@fastify/swagger'
import { APP_VERSION } from '@utils/version.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'
import {
  jsonSchemaTransform,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod'

const createOpenapiConfig = (fastify: FastifyInstance) => {
  const { host, port } = fastify.config.listen
  const displayHost = host.includes(':') ? `[${host}]` : host

  return {
    openapi: {
      info: {
        title: 'xitter-notify API',
        description:
          'Control API for the notification poller: targets, subscriptions, delivery status',
        version: APP_VERSION,
      },
      servers: [
        {
          url: `http://${displayHost}:${port}`,
          description: 'Listen address',
        },
      ],
      tags: [
        {
          name: 'Targets',
          description: 'Tracked accounts',
        },
        {
          name: 'Subscriptions',
          description: 'Push endpoints receiving notifications',
        },
        {
          name: 'Status',
          description: 'Poll and delivery status',
        },
        {
          name: 'System',
          description: 'Health and diagnostics',
        },
      ],
    },
    hideUntagged: true,
    transform: jsonSchemaTransform,
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    // Set up Zod validators
    fastify.setValidatorCompiler(validatorCompiler)
    fastify.setSerializerCompiler(serializerCompiler)

    /**
     * Register Swagger; the document is served by the /openapi.json route
     * @see {@link https://github.com/fastify/fastify-swagger}
     */
    await fastify.register(fastifySwagger, createOpenapiConfig(fastify))
  },
  {
    name: 'swagger',
    dependencies: ['config'],
  },
)
