// =============================================================
// File: server/services/inventory.service.ts
// Module: Stock Engine
// Description: Per-fruit inventory held as dated lots.
//   - addLot()          → new lot on intake or return, never merged
//   - currentStock()    → remaining boxes per fruit
//   - reduceFifo()      → locked, all-or-nothing depletion,
//                         oldest intake_date first, seq tie-break
//   - weightedAvgCost() → Σ(quantity × cost) / Σ(quantity)
//
// Valuation is NOT FIFO: the average spans every lot ever taken
// in (exhausted ones included), so it does not move with the
// order boxes leave the shelf. Physical depletion is FIFO.
//
// Sale, return and change-request services call in here with
// their own transaction.
// =============================================================

import type { Knex } from 'knex';
import { BaseService } from './base.service';
import { InsufficientStockError } from '../lib/errors';
import { moduleLogger } from '../lib/logger';
import { parseNum, round4, toDateString, toTimestamp, today } from '../lib/format';
import {
  normalizeFruit,
  requireDate,
  requireNonNegativeAmount,
  requireNonNegativeInt,
  requirePositiveInt,
} from '../lib/validation';
import { SEQUENCES } from '../../shared/constants';
import type {
  DepletionLayer,
  FifoDepletion,
  StockLot,
  StockLotSource,
  StockSnapshot,
} from '../../shared/types';

const log = moduleLogger('inventory');

// ────────────────────────────────────────────────────────────
// Interfaces
// ────────────────────────────────────────────────────────────

export interface AddLotInput {
  fruit: string;
  quantity: number;
  cost_price: number;
  intake_date?: string;
  source?: StockLotSource;
  return_id?: number | null;
}

export interface LotFilters {
  fruit?: string;
  include_exhausted?: boolean;
}

interface StockLotRow {
  id: number;
  seq: number | string;
  fruit: string;
  quantity: number | string;
  cost_price: number | string;
  intake_date: unknown;
  remaining: number | string;
  source: StockLotSource;
  return_id: number | null;
  created_at: unknown;
}

// ────────────────────────────────────────────────────────────
// Service
// ────────────────────────────────────────────────────────────

class InventoryService extends BaseService<StockLotRow, StockLot> {
  constructor() {
    super('stock_lots');
  }

  protected toEntity(row: StockLotRow): StockLot {
    return {
      id: row.id,
      seq: parseNum(row.seq),
      fruit: row.fruit,
      quantity: parseNum(row.quantity),
      cost_price: parseNum(row.cost_price),
      intake_date: toDateString(row.intake_date),
      remaining: parseNum(row.remaining),
      source: row.source,
      return_id: row.return_id ?? null,
      created_at: toTimestamp(row.created_at),
    };
  }

  // ──────────────────────────────────────────────────────────
  // Intake
  // ──────────────────────────────────────────────────────────

  async addLot(input: AddLotInput, trx?: Knex.Transaction): Promise<StockLot> {
    const fruit = normalizeFruit(input.fruit);
    const quantity = requireNonNegativeInt(input.quantity, 'quantity');
    const costPrice = requireNonNegativeAmount(input.cost_price, 'cost_price');
    const intakeDate = input.intake_date ? requireDate(input.intake_date, 'intake_date') : today();

    const lot = await this.inTransaction('add stock lot', async (db) => {
      const seq = await this.nextSequence(db, SEQUENCES.STOCK_LOT);
      return this.insertRow(db, {
        seq,
        fruit,
        quantity,
        cost_price: round4(costPrice),
        intake_date: intakeDate,
        remaining: quantity,
        source: input.source ?? 'intake',
        return_id: input.return_id ?? null,
      });
    }, trx);

    log.info(
      { lotId: lot.id, seq: lot.seq, fruit, quantity, costPrice: lot.cost_price, source: lot.source },
      'Stock lot added'
    );
    return lot;
  }

  // ──────────────────────────────────────────────────────────
  // Stock queries
  // ──────────────────────────────────────────────────────────

  /** Remaining boxes per fruit; fruits at zero are left out. */
  async currentStock(db?: Knex): Promise<StockSnapshot> {
    const run = async (conn: Knex) => {
      const rows: { fruit: string; remaining: unknown }[] = await conn('stock_lots')
        .select('fruit')
        .sum<{ remaining: string }, { fruit: string; remaining: unknown }[]>({ remaining: 'remaining' })
        .groupBy('fruit')
        .havingRaw('SUM(remaining) > 0')
        .orderBy('fruit', 'asc');

      const stock: StockSnapshot = {};
      for (const row of rows) {
        stock[row.fruit] = parseNum(row.remaining);
      }
      return stock;
    };
    return db ? run(db) : this.read('current stock', run);
  }

  async listFruits(): Promise<string[]> {
    const stock = await this.currentStock();
    return Object.keys(stock).sort();
  }

  async availableQuantity(fruit: string, db?: Knex): Promise<number> {
    const key = normalizeFruit(fruit);
    const run = async (conn: Knex) => {
      const row = await conn('stock_lots').where({ fruit: key }).sum({ remaining: 'remaining' }).first();
      return parseNum(row?.remaining);
    };
    return db ? run(db) : this.read('available quantity', run);
  }

  /** Lots in FIFO order. */
  async listLots(filters: LotFilters = {}): Promise<StockLot[]> {
    const fruit = filters.fruit ? normalizeFruit(filters.fruit) : undefined;

    return this.read('list stock lots', async (db) => {
      let query = db('stock_lots');
      if (fruit) query = query.where({ fruit });
      if (!filters.include_exhausted) query = query.where('remaining', '>', 0);

      const rows: StockLotRow[] = await query
        .select('*')
        .orderBy('fruit', 'asc')
        .orderBy('intake_date', 'asc')
        .orderBy('seq', 'asc');
      return rows.map((row) => this.toEntity(row));
    });
  }

  // ──────────────────────────────────────────────────────────
  // CORE: FIFO depletion
  // Candidate lots are read FOR UPDATE, so a concurrent sale of
  // the same fruit waits here and then sees the reduced balance.
  // The shortfall check runs on those locked rows, before any
  // write; every update happens inside the transaction, so a
  // failure part-way leaves all lots as they were.
  // ──────────────────────────────────────────────────────────

  async reduceFifo(fruit: string, quantity: number, trx?: Knex.Transaction): Promise<FifoDepletion> {
    const key = normalizeFruit(fruit);
    requirePositiveInt(quantity, 'quantity');

    return this.inTransaction('reduce stock', async (db) => {
      const rows: StockLotRow[] = await db('stock_lots')
        .where({ fruit: key })
        .andWhere('remaining', '>', 0)
        .orderBy('intake_date', 'asc')
        .orderBy('seq', 'asc')
        .forUpdate();

      const lots = rows.map((row) => this.toEntity(row));
      const available = lots.reduce((sum, lot) => sum + lot.remaining, 0);
      if (quantity > available) {
        throw new InsufficientStockError(key, quantity, available);
      }

      let left = quantity;
      const layers: DepletionLayer[] = [];

      for (const lot of lots) {
        if (left <= 0) break;
        const take = Math.min(lot.remaining, left);
        const after = lot.remaining - take;

        // Guarded on the value just read, for backends without row locks
        const updated = await db('stock_lots')
          .where({ id: lot.id, remaining: lot.remaining })
          .update({ remaining: after });
        if (updated !== 1) {
          throw new Error(`Stock lot ${lot.id} changed during depletion`);
        }

        layers.push({
          lot_id: lot.id,
          seq: lot.seq,
          intake_date: lot.intake_date,
          quantity: take,
          remaining_after: after,
        });
        left -= take;
      }

      log.debug({ fruit: key, quantity, layers }, 'FIFO depletion applied');
      return { fruit: key, quantity, layers };
    }, trx);
  }

  // ──────────────────────────────────────────────────────────
  // Valuation
  // ──────────────────────────────────────────────────────────

  /**
   * Σ(quantity × cost_price) / Σ(quantity) over every lot of the fruit
   * taken in on or before `asOfDate` (all lots when omitted). 0 with no lots.
   * Returned unrounded; callers round after multiplying out.
   */
  async weightedAvgCost(fruit: string, asOfDate?: string, db?: Knex): Promise<number> {
    const key = normalizeFruit(fruit);
    const asOf = asOfDate ? requireDate(asOfDate, 'as_of_date') : undefined;

    const run = async (conn: Knex) => {
      let query = conn('stock_lots').where({ fruit: key });
      if (asOf) query = query.andWhere('intake_date', '<=', asOf);

      const row = await query
        .select(
          conn.raw('COALESCE(SUM(quantity * cost_price), 0) as total_value'),
          conn.raw('COALESCE(SUM(quantity), 0) as total_quantity')
        )
        .first();

      const totalQuantity = parseNum(row?.total_quantity);
      return totalQuantity > 0 ? parseNum(row?.total_value) / totalQuantity : 0;
    };
    return db ? run(db) : this.read('weighted average cost', run);
  }

  /** weightedAvgCost for every fruit in one pass. */
  async weightedAvgCosts(asOfDate?: string, db?: Knex): Promise<Map<string, number>> {
    const asOf = asOfDate ? requireDate(asOfDate, 'as_of_date') : undefined;

    const run = async (conn: Knex) => {
      let query = conn('stock_lots');
      if (asOf) query = query.where('intake_date', '<=', asOf);

      const rows: { fruit: string; total_value: unknown; total_quantity: unknown }[] = await query
        .select(
          'fruit',
          conn.raw('COALESCE(SUM(quantity * cost_price), 0) as total_value'),
          conn.raw('COALESCE(SUM(quantity), 0) as total_quantity')
        )
        .groupBy('fruit');

      const costs = new Map<string, number>();
      for (const row of rows) {
        const totalQuantity = parseNum(row.total_quantity);
        costs.set(row.fruit, totalQuantity > 0 ? parseNum(row.total_value) / totalQuantity : 0);
      }
      return costs;
    };
    return db ? run(db) : this.read('weighted average costs', run);
  }
}

export const inventoryService = new InventoryService();
