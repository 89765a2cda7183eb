import knex from 'knex'
import config from './knexfile.js'

/**
 * Applies pending migrations to the database named by `dbPath`.
 *
 * The service migrates on startup too, this script is for preparing a
 * database ahead of time.
 */
async function migrate() {
  const db = knex(config.development)

  try {
    await db.migrate.latest()
    console.log('Migrations completed successfully')
  } catch (err) {
    console.error('Error running migrations:', err)
    process.exitCode = 1
  } finally {
    await db.destroy()
  }
}

void migrate()
