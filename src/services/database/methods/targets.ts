import { PersistenceError } from '@root/types/errors.js'
import type {
  Target,
  TargetCreate,
  TargetPollRecord,
  TargetUpsertResult,
} from '@root/types/target.types.js'
import type { DatabaseService } from '@services/database.service.js'

interface TargetRow {
  id: number
  handle: string
  auth_token: string
  csrf_token: string
  cursor: string | null
  next_poll_at: string | null
  last_polled_at: string | null
  consecutive_failures: number
  last_error: string | null
  created_at: string
  updated_at: string
}

function mapTarget(db: DatabaseService, row: TargetRow): Target {
  return {
    id: row.id,
    handle: row.handle,
    auth_token: row.auth_token,
    csrf_token: row.csrf_token,
    cursor: row.cursor,
    next_poll_at: db.toDate(row.next_poll_at),
    last_polled_at: db.toDate(row.last_polled_at),
    consecutive_failures: row.consecutive_failures,
    last_error: row.last_error,
    created_at: row.created_at,
    updated_at: row.updated_at,
  }
}

/**
 * Registers a target, or replaces the credentials of the target that already
 * uses this handle. Cursor and schedule of an existing target are kept.
 *
 * @returns The stored target and whether it was newly created
 */
export async function upsertTarget(
  this: DatabaseService,
  data: TargetCreate,
): Promise<TargetUpsertResult> {
  try {
    return await this.knex.transaction(async (trx) => {
      const now = this.timestamp
      const existing: TargetRow | undefined = await trx('targets')
        .where({ handle: data.handle })
        .first()

      if (existing) {
        await trx('targets').where({ id: existing.id }).update({
          auth_token: data.auth_token,
          csrf_token: data.csrf_token,
          updated_at: now,
        })
        return {
          target: mapTarget(this, {
            ...existing,
            auth_token: data.auth_token,
            csrf_token: data.csrf_token,
            updated_at: now,
          }),
          created: false,
        }
      }

      const result = await trx('targets')
        .insert({
          handle: data.handle,
          auth_token: data.auth_token,
          csrf_token: data.csrf_token,
          consecutive_failures: 0,
          created_at: now,
          updated_at: now,
        })
        .returning('id')

      return {
        target: {
          id: this.extractId(result),
          ...data,
          cursor: null,
          next_poll_at: null,
          last_polled_at: null,
          consecutive_failures: 0,
          last_error: null,
          created_at: now,
          updated_at: now,
        },
        created: true,
      }
    })
  } catch (error) {
    this.log.error({ error, handle: data.handle }, 'Error upserting target')
    throw new PersistenceError('Failed to save target', { cause: error })
  }
}

/**
 * Retrieves a target by id.
 */
export async function getTarget(
  this: DatabaseService,
  id: number,
): Promise<Target | undefined> {
  const row: TargetRow | undefined = await this.knex('targets')
    .where({ id })
    .first()
  return row ? mapTarget(this, row) : undefined
}

/**
 * Retrieves every tracked target ordered by id.
 */
export async function getAllTargets(this: DatabaseService): Promise<Target[]> {
  try {
    const rows: TargetRow[] = await this.knex('targets').orderBy('id', 'asc')
    return rows.map((row) => mapTarget(this, row))
  } catch (error) {
    this.log.error({ error }, 'Error loading targets')
    throw new PersistenceError('Failed to load targets', { cause: error })
  }
}

/**
 * Deletes a target. Its subscriptions and their events go with it through
 * the foreign key cascade; seen items stay.
 *
 * @returns True when a target was deleted
 */
export async function deleteTarget(
  this: DatabaseService,
  id: number,
): Promise<boolean> {
  try {
    const deleted = await this.knex('targets').where({ id }).delete()
    return deleted > 0
  } catch (error) {
    this.log.error({ error, targetId: id }, 'Error deleting target')
    throw new PersistenceError(`Failed to delete target ${id}`, {
      cause: error,
    })
  }
}

export async function countTargets(this: DatabaseService): Promise<number> {
  const result: { count?: number | string } | undefined = await this.knex(
    'targets',
  )
    .count({ count: '*' })
    .first()
  return Number(result?.count ?? 0)
}

/**
 * Writes the schedule bookkeeping of one poll attempt. The cursor is not
 * touched here; it only moves inside recordIfNew.
 */
export async function recordPollResult(
  this: DatabaseService,
  targetId: number,
  record: TargetPollRecord,
): Promise<void> {
  try {
    await this.knex('targets').where({ id: targetId }).update({
      last_polled_at: record.last_polled_at.toISOString(),
      next_poll_at: record.next_poll_at.toISOString(),
      consecutive_failures: record.consecutive_failures,
      last_error: record.last_error,
      updated_at: this.timestamp,
    })
  } catch (error) {
    this.log.error({ error, targetId }, 'Error recording poll result')
    throw new PersistenceError(
      `Failed to record poll result for target ${targetId}`,
      { cause: error },
    )
  }
}
