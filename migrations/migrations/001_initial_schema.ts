import type { Knex } from 'knex'

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('targets', (table) => {
    // AUTOINCREMENT so deleted ids are never handed out again
    table.increments('id').primary()
    table.string('handle').notNullable().unique()
    table.string('auth_token').notNullable()
    table.string('csrf_token').notNullable()
    table.string('cursor').nullable()
    table.timestamp('next_poll_at').nullable()
    table.timestamp('last_polled_at').nullable()
    table.integer('consecutive_failures').notNullable().defaultTo(0)
    table.text('last_error').nullable()
    table.timestamp('created_at').defaultTo(knex.fn.now())
    table.timestamp('updated_at').defaultTo(knex.fn.now())
  })

  await knex.schema.createTable('subscriptions', (table) => {
    table.increments('id').primary()
    table
      .integer('target_id')
      .notNullable()
      .references('id')
      .inTable('targets')
      .onDelete('CASCADE')
    table.string('endpoint').notNullable()
    table.string('secret').notNullable()
    table.timestamp('created_at').defaultTo(knex.fn.now())
    table.index('target_id')
  })

  // No foreign key: rows outlive their target
  await knex.schema.createTable('seen_items', (table) => {
    table.integer('target_id').notNullable()
    table.string('item_id').notNullable()
    table.timestamp('first_seen_at').defaultTo(knex.fn.now())
    table.primary(['target_id', 'item_id'])
  })

  await knex.schema.createTable('notification_events', (table) => {
    table.increments('id').primary()
    table
      .integer('subscription_id')
      .notNullable()
      .references('id')
      .inTable('subscriptions')
      .onDelete('CASCADE')
    table.integer('target_id').notNullable()
    table.string('item_id').notNullable()
    table.json('payload').notNullable()
    table
      .enum('status', ['pending', 'delivered', 'failed'])
      .notNullable()
      .defaultTo('pending')
    table.integer('attempts').notNullable().defaultTo(0)
    table.timestamp('next_retry_at').nullable()
    table.text('last_error').nullable()
    table.timestamp('delivered_at').nullable()
    table.timestamp('created_at').defaultTo(knex.fn.now())
    table.timestamp('updated_at').defaultTo(knex.fn.now())
    table.unique(['subscription_id', 'item_id'])
    table.index(['status', 'next_retry_at'])
  })
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('notification_events')
  await knex.schema.dropTableIfExists('seen_items')
  await knex.schema.dropTableIfExists('subscriptions')
  await knex.schema.dropTableIfExists('targets')
}
