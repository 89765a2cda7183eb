/**
 * Database Service
 *
 * Durable state of the notifier on better-sqlite3 through knex. Exposed to
 * the application by the 'database' plugin as `fastify.db`.
 *
 * Responsible for:
 * - Tracked targets, their credentials, cursors and poll bookkeeping
 * - Subscriptions and their signing secrets
 * - Seen items, the dedup record behind exactly-once notification
 * - The persistent notification event queue used by the dispatcher
 *
 * Query methods live in ./database/methods and are attached to the
 * prototype below; their signatures are declared in ./database/types.
 */
import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import type { Config } from '@root/types/config.types.js'
import type BetterSqlite3 from 'better-sqlite3'
import type { FastifyBaseLogger } from 'fastify'
import knex, { type Knex } from 'knex'
import { migrationSource } from '../../migrations/source.js'
import * as notificationEventMethods from './database/methods/notification-events.js'
import * as seenItemMethods from './database/methods/seen-items.js'
import * as subscriptionMethods from './database/methods/subscriptions.js'
import * as targetMethods from './database/methods/targets.js'
import './database/types/notification-event-methods.js'
import './database/types/seen-item-methods.js'
import './database/types/subscription-methods.js'
import './database/types/target-methods.js'

export class DatabaseService {
  public readonly knex: Knex

  private constructor(
    public readonly log: FastifyBaseLogger,
    config: Pick<Config, 'dbPath'>,
  ) {
    this.knex = knex(DatabaseService.createKnexConfig(config.dbPath, log))
  }

  /**
   * Opens the database and applies pending migrations.
   *
   * @throws when the file cannot be opened or a migration fails
   */
  static async create(
    log: FastifyBaseLogger,
    config: Pick<Config, 'dbPath'>,
  ): Promise<DatabaseService> {
    if (config.dbPath !== ':memory:') {
      fs.mkdirSync(dirname(resolve(config.dbPath)), { recursive: true })
    }

    const service = new DatabaseService(log, config)
    try {
      const [batch, applied] = await service.knex.migrate.latest({
        migrationSource,
      })
      if (applied.length > 0) {
        log.info(`Applied ${applied.length} migration(s) in batch ${batch}`)
      }
    } catch (error) {
      await service.close()
      throw error
    }
    return service
  }

  /**
   * Knex configuration for better-sqlite3.
   *
   * A single pooled connection serializes writers; WAL lets readers proceed
   * while a transaction is open.
   */
  private static createKnexConfig(
    dbPath: string,
    log: FastifyBaseLogger,
  ): Knex.Config {
    return {
      client: 'better-sqlite3',
      connection: {
        filename: dbPath,
      },
      useNullAsDefault: true,
      pool: {
        min: 1,
        max: 1,
        afterCreate: (
          conn: BetterSqlite3.Database,
          done: (err: Error | null, conn: BetterSqlite3.Database) => void,
        ) => {
          conn.pragma('journal_mode = WAL')
          conn.pragma('foreign_keys = ON')
          done(null, conn)
        },
      },
      log: {
        warn: (message: string) => log.warn(message),
        error: (message: string | Error) => {
          log.error(message instanceof Error ? message.message : message)
        },
        debug: (message: string) => log.debug(message),
      },
      debug: false,
    }
  }

  /**
   * Closes the database connection
   *
   * Should be called during application shutdown to properly clean up resources.
   */
  async close(): Promise<void> {
    await this.knex.destroy()
  }

  /**
   * Runs a trivial query, used by the health check.
   */
  async ping(): Promise<boolean> {
    try {
      await this.knex.raw('select 1')
      return true
    } catch (error) {
      this.log.warn({ error }, 'Database ping failed')
      return false
    }
  }

  /** Current time as stored in timestamp columns */
  get timestamp(): string {
    return new Date().toISOString()
  }

  /**
   * Normalizes the result of `.returning('id')`, which is either an array of
   * ids or an array of `{ id }` rows depending on the driver.
   */
  extractId(result: unknown[]): number {
    const first = result[0]
    const id =
      typeof first === 'object' && first !== null && 'id' in first
        ? first.id
        : first
    if (typeof id !== 'number' && typeof id !== 'string') {
      throw new Error('Insert returned no id')
    }
    return Number(id)
  }

  /**
   * Parses a JSON column value. Already-parsed values pass through.
   */
  safeJsonParse(value: unknown, field: string): unknown {
    if (typeof value !== 'string') return value
    try {
      return JSON.parse(value)
    } catch (error) {
      this.log.warn({ error, field }, 'Malformed JSON column')
      return null
    }
  }

  /** Converts a stored timestamp, keeping null */
  toDate(value: string | null | undefined): Date | null {
    return value ? new Date(value) : null
  }
}

Object.assign(
  DatabaseService.prototype,
  targetMethods,
  subscriptionMethods,
  seenItemMethods,
  notificationEventMethods,
)
