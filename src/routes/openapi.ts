import type { FastifyPluginAsync } from 'fastify'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get('/openapi.json', async () => fastify.swagger())
}

export default plugin
