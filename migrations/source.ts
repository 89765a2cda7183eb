import type { Knex } from 'knex'
import * as initialSchema from './migrations/001_initial_schema.js'

interface Migration {
  name: string
  module: Knex.Migration
}

/** Ordered list of schema migrations. Append new ones at the end. */
const migrations: Migration[] = [
  { name: '001_initial_schema', module: initialSchema },
]

/**
 * Migration source backed by static imports, so migrations resolve the same
 * way from sources, from tests and from the compiled build.
 */
export const migrationSource: Knex.MigrationSource<Migration> = {
  getMigrations: async () => migrations,
  getMigrationName: (migration) => migration.name,
  getMigration: async (migration) => migration.module,
}
