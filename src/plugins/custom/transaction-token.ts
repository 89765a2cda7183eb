import { SiteKeyStrategy } from '@services/transaction-token/site-key-strategy.js'
import { TokenGenerator } from '@services/transaction-token/token-generator.js'
import { USER_AGENT } from '@utils/version.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    tokens: TokenGenerator
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const log = fastify.log.child({ plugin: 'transaction-token' })
    const strategy = new SiteKeyStrategy({
      baseUrl: fastify.config.platformBaseUrl,
      metaName: fastify.config.tokenKeyMetaName,
      markerRel: fastify.config.tokenMarkerRel,
      ttlMs: fastify.config.tokenKeyTtlSeconds * 1000,
      requestTimeoutMs: fastify.config.platformRequestTimeoutMs,
      userAgent: USER_AGENT,
      log,
    })

    // Key material is fetched lazily by the first issue() call
    fastify.decorate('tokens', new TokenGenerator(strategy, log))
  },
  {
    name: 'transaction-token',
    dependencies: ['config'],
  },
)
