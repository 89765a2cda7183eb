import env from '@fastify/env'
import type { Config } from '@root/types/config.types.js'
import { parseListenAddr } from '@utils/listen-addr.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

const positiveInteger = (defaultValue?: number) => ({
  type: 'integer',
  minimum: 1,
  ...(defaultValue === undefined ? {} : { default: defaultValue }),
})

const schema = {
  type: 'object',
  required: ['listenAddr', 'dbPath', 'pollInterval', 'maxConcurrent'],
  properties: {
    // System Config
    listenAddr: {
      type: 'string',
      minLength: 1,
    },
    dbPath: {
      type: 'string',
      minLength: 1,
    },
    logLevel: {
      type: 'string',
      enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
      default: 'info',
    },
    closeGraceDelay: positiveInteger(20000),
    rateLimitMax: positiveInteger(500),
    registerRateLimit: positiveInteger(5),
    unregisterRateLimit: positiveInteger(10),
    // Poller Config
    pollingEnabled: {
      type: 'boolean',
      default: true,
    },
    pollInterval: positiveInteger(),
    maxConcurrent: positiveInteger(),
    pollJitterRatio: {
      type: 'number',
      minimum: 0,
      maximum: 1,
      default: 0.1,
    },
    schedulerTickMs: positiveInteger(1000),
    pollShutdownTimeoutMs: positiveInteger(10000),
    // Dispatch Config
    dispatchEnabled: {
      type: 'boolean',
      default: true,
    },
    dispatchConcurrency: positiveInteger(10),
    dispatchMaxAttempts: positiveInteger(5),
    dispatchBaseDelayMs: positiveInteger(5000),
    dispatchMaxDelayMs: positiveInteger(300000),
    dispatchTimeoutMs: positiveInteger(10000),
    dispatchSweepSeconds: positiveInteger(5),
    dispatchDrainTimeoutMs: positiveInteger(5000),
    // Platform Config
    platformBaseUrl: {
      type: 'string',
      default: 'https://x.com',
    },
    platformBearerToken: {
      type: 'string',
      default: '',
    },
    platformBadgePath: {
      type: 'string',
      default: '/i/api/2/badge_count/badge_count.json',
    },
    platformNotificationsPath: {
      type: 'string',
      default: '/i/api/graphql/NotificationsTimeline',
    },
    platformRequestTimeoutMs: positiveInteger(15000),
    badgeCheckEnabled: {
      type: 'boolean',
      default: true,
    },
    // Transaction Token Config
    tokenHeaderName: {
      type: 'string',
      default: 'x-client-transaction-id',
    },
    tokenKeyTtlSeconds: positiveInteger(43200),
    tokenKeyMetaName: {
      type: 'string',
      default: 'site-verification',
    },
    tokenMarkerRel: {
      type: 'string',
      default: 'verification-marker',
    },
  },
}

declare module 'fastify' {
  interface FastifyInstance {
    config: Config
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(env, {
      confKey: 'config',
      schema,
      dotenv: {
        path: './.env',
        debug: process.env.NODE_ENV === 'development',
      },
      data: process.env,
    })

    // Derived values are checked here; a failure aborts startup
    fastify.config.listen = parseListenAddr(fastify.config.listenAddr)

    try {
      new URL(fastify.config.platformBaseUrl)
    } catch (error) {
      throw new Error(
        `Invalid platformBaseUrl "${fastify.config.platformBaseUrl}"`,
        { cause: error },
      )
    }

    if (fastify.config.dispatchBaseDelayMs > fastify.config.dispatchMaxDelayMs) {
      throw new Error('dispatchBaseDelayMs must not exceed dispatchMaxDelayMs')
    }

    // Shutdown runs the poll stop and then the dispatch drain before exit
    const shutdownMs =
      fastify.config.pollShutdownTimeoutMs +
      fastify.config.dispatchDrainTimeoutMs
    if (fastify.config.closeGraceDelay <= shutdownMs) {
      throw new Error(
        `closeGraceDelay must exceed pollShutdownTimeoutMs + dispatchDrainTimeoutMs (${shutdownMs})`,
      )
    }
  },
  {
    name: 'config',
  },
)
