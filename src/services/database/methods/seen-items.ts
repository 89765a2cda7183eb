import { PersistenceError } from '@root/types/errors.js'
import type { PlatformItem } from '@root/types/platform.types.js'
import type { DatabaseService } from '@services/database.service.js'
import { compareItemIds, maxItemId } from '@utils/item-id.js'

/** SQLite caps bound parameters per statement; stay well below it */
const CHUNK_SIZE = 200

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size))
  }
  return chunks
}

/**
 * Records the items not yet seen for a target and advances its cursor, all
 * in one transaction.
 *
 * Items already recorded are skipped by the (target_id, item_id) primary
 * key. The cursor moves to the newest inserted id only when that id is
 * greater than the stored cursor, so it never goes backwards. Duplicate ids
 * within `items` count once.
 *
 * @returns The inserted items in input order
 * @throws PersistenceError when the transaction fails; nothing is written
 */
export async function recordIfNew(
  this: DatabaseService,
  targetId: number,
  items: PlatformItem[],
): Promise<PlatformItem[]> {
  if (items.length === 0) return []

  try {
    return await this.knex.transaction(async (trx) => {
      const unique = new Map<string, PlatformItem>()
      for (const item of items) {
        if (!unique.has(item.id)) unique.set(item.id, item)
      }

      const existing = new Set<string>()
      for (const ids of chunk([...unique.keys()], CHUNK_SIZE)) {
        const rows: Array<{ item_id: string }> = await trx('seen_items')
          .where({ target_id: targetId })
          .whereIn('item_id', ids)
          .select('item_id')
        for (const row of rows) existing.add(row.item_id)
      }

      const inserted = [...unique.values()].filter(
        (item) => !existing.has(item.id),
      )
      if (inserted.length === 0) return []

      const firstSeenAt = this.timestamp
      for (const batch of chunk(inserted, CHUNK_SIZE)) {
        await trx('seen_items')
          .insert(
            batch.map((item) => ({
              target_id: targetId,
              item_id: item.id,
              first_seen_at: firstSeenAt,
            })),
          )
          .onConflict(['target_id', 'item_id'])
          .ignore()
      }

      const newest = maxItemId(inserted.map((item) => item.id))
      const target: { cursor: string | null } | undefined = await trx(
        'targets',
      )
        .where({ id: targetId })
        .first('cursor')

      if (
        target &&
        newest !== null &&
        (target.cursor === null || compareItemIds(newest, target.cursor) > 0)
      ) {
        await trx('targets')
          .where({ id: targetId })
          .update({ cursor: newest, updated_at: firstSeenAt })
      }

      return inserted
    })
  } catch (error) {
    this.log.error({ error, targetId }, 'Error recording seen items')
    throw new PersistenceError(
      `Failed to record seen items for target ${targetId}`,
      { cause: error },
    )
  }
}

export async function countSeenItems(
  this: DatabaseService,
  targetId: number,
): Promise<number> {
  const result: { count?: number | string } | undefined = await this.knex(
    'seen_items',
  )
    .where({ target_id: targetId })
    .count({ count: '*' })
    .first()
  return Number(result?.count ?? 0)
}
