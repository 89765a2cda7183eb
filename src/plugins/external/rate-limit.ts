import fastifyRateLimit from '@fastify/rate-limit'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

/**
 * Per-IP rate limiter. The global limit applies to every route; routes that
 * register or remove targets set tighter limits in their own config.
 *
 * @see {@link https://github.com/fastify/fastify-rate-limit}
 */
export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(fastifyRateLimit, {
      max: fastify.config.rateLimitMax,
      timeWindow: '1 minute',
    })
  },
  {
    name: 'rate-limit',
    dependencies: ['config'],
  },
)
