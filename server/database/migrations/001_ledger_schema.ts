// =============================================================
// File: server/database/migrations/001_ledger_schema.ts
// Description: Creates the ledger store:
//              vendors, stock_lots, sales, returns, payments,
//              change_requests, document_sequences.
//              Written with the portable schema builder so the
//              same migration runs on PostgreSQL and SQLite.
// =============================================================

import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  // ============================================================
  // document_sequences
  // Row-locked counters. stock_lot orders FIFO ties,
  // ledger_entry orders same-day ledger rows.
  // ============================================================
  await knex.schema.createTable('document_sequences', (t) => {
    t.string('name', 50).primary();
    t.integer('last_value').notNullable().defaultTo(0);
  });
  await knex('document_sequences').insert([
    { name: 'stock_lot', last_value: 0 },
    { name: 'ledger_entry', last_value: 0 },
  ]);

  // ============================================================
  // vendors
  // ============================================================
  await knex.schema.createTable('vendors', (t) => {
    t.increments('id').primary();
    t.string('name', 200).notNullable();
    t.string('contact', 10).notNullable();
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.index(['name'], 'idx_vendors_name');
  });

  // ============================================================
  // stock_lots
  // One row per intake (or return re-entry). remaining only
  // ever decreases; exhausted lots stay for cost history.
  // ============================================================
  await knex.schema.createTable('stock_lots', (t) => {
    t.increments('id').primary();
    t.integer('seq').notNullable().unique();
    t.string('fruit', 100).notNullable();
    t.integer('quantity').notNullable();
    t.decimal('cost_price', 15, 4).notNullable().defaultTo(0);
    t.date('intake_date').notNullable();
    t.integer('remaining').notNullable();
    t.string('source', 20).notNullable().defaultTo('intake');
    t.integer('return_id');
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());

    t.check('quantity >= 0', {}, 'chk_stock_lots_quantity');
    t.check('remaining >= 0 AND remaining <= quantity', {}, 'chk_stock_lots_remaining');
    t.check('cost_price >= 0', {}, 'chk_stock_lots_cost');
    t.check(`source IN ('intake', 'return')`, {}, 'chk_stock_lots_source');
    t.index(['fruit', 'intake_date', 'seq'], 'idx_stock_lots_fifo');
  });

  // ============================================================
  // sales
  // ============================================================
  await knex.schema.createTable('sales', (t) => {
    t.increments('id').primary();
    t.integer('entry_seq').notNullable();
    t.date('transaction_date').notNullable();
    t.integer('vendor_id').notNullable().references('id').inTable('vendors');
    t.string('fruit', 100).notNullable();
    t.integer('boxes').notNullable();
    t.decimal('price_per_box', 15, 2).notNullable();
    t.decimal('total_price', 15, 2).notNullable();
    t.decimal('box_deposit_per_box', 15, 2).notNullable().defaultTo(0);
    t.decimal('box_deposit_collected', 15, 2).notNullable().defaultTo(0);
    t.text('note').notNullable().defaultTo('');
    t.string('created_by', 100);
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.timestamp('updated_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());

    t.check('boxes > 0', {}, 'chk_sales_boxes');
    t.check('price_per_box >= 0', {}, 'chk_sales_price');
    t.check('box_deposit_per_box >= 0', {}, 'chk_sales_deposit');
    t.index(['vendor_id'], 'idx_sales_vendor');
    t.index(['transaction_date'], 'idx_sales_date');
  });

  // ============================================================
  // returns
  // ============================================================
  await knex.schema.createTable('returns', (t) => {
    t.increments('id').primary();
    t.integer('entry_seq').notNullable();
    t.date('transaction_date').notNullable();
    t.integer('vendor_id').notNullable().references('id').inTable('vendors');
    t.string('fruit', 100).notNullable();
    t.integer('boxes_returned').notNullable();
    t.decimal('box_deposit_per_box', 15, 2).notNullable().defaultTo(0);
    t.decimal('box_deposit_refunded', 15, 2).notNullable().defaultTo(0);
    t.text('note').notNullable().defaultTo('');
    t.string('created_by', 100);
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());

    t.check('boxes_returned > 0', {}, 'chk_returns_boxes');
    t.index(['vendor_id'], 'idx_returns_vendor');
    t.index(['transaction_date'], 'idx_returns_date');
  });

  // ============================================================
  // payments
  // ============================================================
  await knex.schema.createTable('payments', (t) => {
    t.increments('id').primary();
    t.integer('entry_seq').notNullable();
    t.date('transaction_date').notNullable();
    t.integer('vendor_id').notNullable().references('id').inTable('vendors');
    t.decimal('amount', 15, 2).notNullable();
    t.text('note').notNullable().defaultTo('');
    t.string('created_by', 100);
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());

    t.check('amount > 0', {}, 'chk_payments_amount');
    t.index(['vendor_id'], 'idx_payments_vendor');
    t.index(['transaction_date'], 'idx_payments_date');
  });

  // ============================================================
  // change_requests
  // Proposed sale edits. Snapshots are JSON text so both
  // dialects store them identically.
  // ============================================================
  await knex.schema.createTable('change_requests', (t) => {
    t.increments('id').primary();
    t.integer('sale_id').notNullable().references('id').inTable('sales');
    t.string('change_type', 30).notNullable().defaultTo('edit_sale');
    t.string('requested_by', 100).notNullable();
    t.string('requester_name', 200).notNullable();
    t.text('current_data').notNullable();
    t.text('requested_data').notNullable();
    t.string('status', 20).notNullable().defaultTo('pending');
    t.text('note').notNullable().defaultTo('');
    t.string('reviewed_by', 100);
    t.timestamp('reviewed_at', { useTz: true });
    t.text('admin_comment');
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());

    t.check(`status IN ('pending', 'approved', 'rejected')`, {}, 'chk_change_requests_status');
    t.index(['status'], 'idx_change_requests_status');
    t.index(['requested_by'], 'idx_change_requests_requester');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('change_requests');
  await knex.schema.dropTableIfExists('payments');
  await knex.schema.dropTableIfExists('returns');
  await knex.schema.dropTableIfExists('sales');
  await knex.schema.dropTableIfExists('stock_lots');
  await knex.schema.dropTableIfExists('vendors');
  await knex.schema.dropTableIfExists('document_sequences');
}
