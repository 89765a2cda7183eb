import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import type BetterSqlite3 from 'better-sqlite3'
import dotenv from 'dotenv'
import type { Knex } from 'knex'
import { migrationSource } from './source.js'

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)
const projectRoot = resolve(__dirname, '..')

// Load environment variables before anything else
dotenv.config({ path: resolve(projectRoot, '.env') })

function ensureDbDirectory(dbPath: string): string {
  if (dbPath === ':memory:') return dbPath
  const dbDirectory = dirname(resolve(dbPath))
  try {
    if (!fs.existsSync(dbDirectory)) {
      fs.mkdirSync(dbDirectory, { recursive: true })
    }
    return dbPath
  } catch (err) {
    console.error('Failed to create database directory:', err)
    process.exit(1)
  }
}

/**
 * Connection settings for the migration scripts. The running service
 * builds its own equivalent in DatabaseService.
 */
const config: { [key: string]: Knex.Config } = {
  development: {
    client: 'better-sqlite3',
    connection: {
      filename: ensureDbDirectory(
        process.env.dbPath || resolve(projectRoot, 'data', 'db', 'notify.db'),
      ),
    },
    useNullAsDefault: true,
    migrations: { migrationSource },
    pool: {
      afterCreate: (
        conn: BetterSqlite3.Database,
        done: (err: Error | null, conn: BetterSqlite3.Database) => void,
      ) => {
        conn.pragma('journal_mode = WAL')
        conn.pragma('foreign_keys = ON')
        done(null, conn)
      },
    },
  },
}

export default config
