// =============================================================
// File: server/services/sale.service.ts
// Module: Transaction Operations: Sales
// Description:
//   - sell(): vendor check, FIFO depletion and the sale row in
//     one transaction; totals are always computed here
//   - getSale() / listSales(): reads, joined with vendor names
//   - applySnapshot(): overwrite a sale's editable fields and
//     recompute its totals (used by change-request approval)
//   - directEdit(): privileged edit that skips the change-request
//     audit trail; off unless ALLOW_DIRECT_SALE_EDIT is set
//
// Editing a sale never touches stock lots. Changing boxes or
// fruit after the fact does not reconcile inventory.
// =============================================================

import type { Knex } from 'knex';
import { BaseService } from './base.service';
import { inventoryService } from './inventory.service';
import { vendorService } from './vendor.service';
import { config } from '../config';
import { requireAdmin } from '../lib/authz';
import { ForbiddenError, InsufficientStockError, NotFoundError, ValidationError } from '../lib/errors';
import { moduleLogger } from '../lib/logger';
import { parseNum, round2, toDateString, toTimestamp, today } from '../lib/format';
import {
  normalizeFruit,
  requireDate,
  requireId,
  requireNonNegativeAmount,
  requirePositiveInt,
} from '../lib/validation';
import { SEQUENCES } from '../../shared/constants';
import type { Actor, Sale, SaleEdit, SaleSnapshot, SaleWithVendor } from '../../shared/types';

const log = moduleLogger('sales');

// ────────────────────────────────────────────────────────────
// Interfaces
// ────────────────────────────────────────────────────────────

export interface SellInput {
  transaction_date?: string;
  vendor_id: number;
  fruit: string;
  boxes: number;
  price_per_box: number;
  box_deposit_per_box?: number;
  note?: string;
}

export interface SaleFilters {
  from?: string;
  to?: string;
  vendor_id?: number;
}

export interface SalePolicy {
  allowDirectEdit: boolean;
  defaultBoxDeposit: number;
}

interface SaleRow {
  id: number;
  entry_seq: number | string;
  transaction_date: unknown;
  vendor_id: number;
  fruit: string;
  boxes: number | string;
  price_per_box: number | string;
  total_price: number | string;
  box_deposit_per_box: number | string;
  box_deposit_collected: number | string;
  note: string | null;
  created_by: string | null;
  created_at: unknown;
  updated_at: unknown;
}

interface SaleWithVendorRow extends SaleRow {
  vendor_name: string;
}

const SNAPSHOT_FIELDS: (keyof SaleSnapshot)[] = [
  'transaction_date',
  'fruit',
  'boxes',
  'price_per_box',
  'box_deposit_per_box',
  'note',
];

// ────────────────────────────────────────────────────────────
// Snapshot helpers
// ────────────────────────────────────────────────────────────

export function snapshotOf(sale: Sale): SaleSnapshot {
  return {
    transaction_date: sale.transaction_date,
    fruit: sale.fruit,
    boxes: sale.boxes,
    price_per_box: sale.price_per_box,
    box_deposit_per_box: sale.box_deposit_per_box,
    note: sale.note,
  };
}

/** Validate a complete snapshot, normalizing fruit and note. Amounts are kept to two places. */
export function validateSnapshot(snapshot: SaleSnapshot): SaleSnapshot {
  return {
    transaction_date: requireDate(snapshot.transaction_date, 'transaction_date'),
    fruit: normalizeFruit(snapshot.fruit),
    boxes: requirePositiveInt(snapshot.boxes, 'boxes'),
    price_per_box: round2(requireNonNegativeAmount(snapshot.price_per_box, 'price_per_box')),
    box_deposit_per_box: round2(requireNonNegativeAmount(snapshot.box_deposit_per_box, 'box_deposit_per_box')),
    note: (snapshot.note ?? '').trim(),
  };
}

/** Lay a partial edit over a snapshot; fields left out keep their value. */
export function mergeSaleEdit(current: SaleSnapshot, edit: SaleEdit): SaleSnapshot {
  const merged: SaleSnapshot = { ...current };
  if (edit.transaction_date !== undefined) merged.transaction_date = edit.transaction_date;
  if (edit.fruit !== undefined) merged.fruit = edit.fruit;
  if (edit.boxes !== undefined) merged.boxes = edit.boxes;
  if (edit.price_per_box !== undefined) merged.price_per_box = edit.price_per_box;
  if (edit.box_deposit_per_box !== undefined) merged.box_deposit_per_box = edit.box_deposit_per_box;
  if (edit.note !== undefined) merged.note = edit.note;
  return validateSnapshot(merged);
}

export function changedFields(current: SaleSnapshot, requested: SaleSnapshot): (keyof SaleSnapshot)[] {
  return SNAPSHOT_FIELDS.filter((field) => String(current[field]) !== String(requested[field]));
}

// ────────────────────────────────────────────────────────────
// Service
// ────────────────────────────────────────────────────────────

export class SaleService extends BaseService<SaleRow, Sale> {
  private readonly policy: SalePolicy;

  constructor(policy: Partial<SalePolicy> = {}) {
    super('sales');
    this.policy = {
      allowDirectEdit: policy.allowDirectEdit ?? config.ledger.allowDirectSaleEdit,
      defaultBoxDeposit: policy.defaultBoxDeposit ?? config.ledger.defaultBoxDeposit,
    };
  }

  protected toEntity(row: SaleRow): Sale {
    return {
      id: row.id,
      entry_seq: parseNum(row.entry_seq),
      transaction_date: toDateString(row.transaction_date),
      vendor_id: row.vendor_id,
      fruit: row.fruit,
      boxes: parseNum(row.boxes),
      price_per_box: parseNum(row.price_per_box),
      total_price: parseNum(row.total_price),
      box_deposit_per_box: parseNum(row.box_deposit_per_box),
      box_deposit_collected: parseNum(row.box_deposit_collected),
      note: row.note ?? '',
      created_by: row.created_by ?? null,
      created_at: toTimestamp(row.created_at),
      updated_at: toTimestamp(row.updated_at),
    };
  }

  // ──────── SELL ────────
  // Stock is checked, depleted and the sale written under one
  // transaction. The depletion re-checks on locked lots, so a
  // sale that raced past the first check still fails cleanly.

  async sell(input: SellInput, actor: Actor): Promise<Sale> {
    const vendorId = requireId(input.vendor_id, 'vendor_id');
    const fruit = normalizeFruit(input.fruit);
    const boxes = requirePositiveInt(input.boxes, 'boxes');
    // Totals are computed from the stored (rounded) per-box amounts
    const price = round2(requireNonNegativeAmount(input.price_per_box, 'price_per_box'));
    const deposit = round2(
      requireNonNegativeAmount(input.box_deposit_per_box ?? this.policy.defaultBoxDeposit, 'box_deposit_per_box')
    );
    const date = input.transaction_date ? requireDate(input.transaction_date, 'transaction_date') : today();

    const sale = await this.inTransaction('record sale', async (trx) => {
      await vendorService.requireVendor(trx, vendorId);

      const available = await inventoryService.availableQuantity(fruit, trx);
      if (boxes > available) {
        throw new InsufficientStockError(fruit, boxes, available);
      }

      await inventoryService.reduceFifo(fruit, boxes, trx);

      const entrySeq = await this.nextSequence(trx, SEQUENCES.LEDGER_ENTRY);
      return this.insertRow(trx, {
        entry_seq: entrySeq,
        transaction_date: date,
        vendor_id: vendorId,
        fruit,
        boxes,
        price_per_box: price,
        total_price: round2(boxes * price),
        box_deposit_per_box: deposit,
        box_deposit_collected: round2(boxes * deposit),
        note: (input.note ?? '').trim(),
        created_by: actor.userId,
      });
    });

    log.info({ saleId: sale.id, vendorId, fruit, boxes, total: sale.total_price }, 'Sale recorded');
    return sale;
  }

  // ──────── READS ────────

  async getSale(id: number): Promise<Sale> {
    requireId(id, 'sale_id');
    const sale = await this.read('get sale', (db) => this.getById(id, db));
    if (!sale) throw new NotFoundError('Sale', id);
    return sale;
  }

  /** Sale row under a lock, for writers. */
  async lockSale(trx: Knex.Transaction, id: number): Promise<Sale> {
    const row: SaleRow | undefined = await trx('sales').where({ id }).forUpdate().first();
    if (!row) throw new NotFoundError('Sale', id);
    return this.toEntity(row);
  }

  /** Sales in a date range, newest first, with vendor names. */
  async listSales(filters: SaleFilters = {}): Promise<SaleWithVendor[]> {
    const from = filters.from ? requireDate(filters.from, 'from') : undefined;
    const to = filters.to ? requireDate(filters.to, 'to') : undefined;
    if (from && to && from > to) {
      throw new ValidationError('from must not be after to');
    }

    return this.read('list sales', async (db) => {
      let query = db('sales as s').join('vendors as v', 's.vendor_id', 'v.id');
      if (from) query = query.where('s.transaction_date', '>=', from);
      if (to) query = query.where('s.transaction_date', '<=', to);
      if (filters.vendor_id) query = query.where('s.vendor_id', filters.vendor_id);

      const rows: SaleWithVendorRow[] = await query
        .select('s.*', 'v.name as vendor_name')
        .orderBy('s.transaction_date', 'desc')
        .orderBy('s.entry_seq', 'desc');

      return rows.map((row) => ({ ...this.toEntity(row), vendor_name: row.vendor_name }));
    });
  }

  // ──────── EDITS ────────

  /**
   * Overwrite the editable fields of a sale. Totals are recomputed from
   * boxes, price and deposit; stored totals are never carried over.
   */
  async applySnapshot(trx: Knex.Transaction, saleId: number, snapshot: SaleSnapshot): Promise<Sale> {
    const values = validateSnapshot(snapshot);
    const [row]: SaleRow[] = await trx('sales')
      .where({ id: saleId })
      .update({
        transaction_date: values.transaction_date,
        fruit: values.fruit,
        boxes: values.boxes,
        price_per_box: values.price_per_box,
        total_price: round2(values.boxes * values.price_per_box),
        box_deposit_per_box: values.box_deposit_per_box,
        box_deposit_collected: round2(values.boxes * values.box_deposit_per_box),
        note: values.note,
        updated_at: trx.fn.now(),
      })
      .returning('*');

    if (!row) throw new NotFoundError('Sale', saleId);
    return this.toEntity(row);
  }

  /**
   * Edit a sale without a change request. Leaves no audit record and
   * does not reconcile stock; the approval workflow is the audited path.
   */
  async directEdit(saleId: number, edit: SaleEdit, actor: Actor): Promise<Sale> {
    if (!this.policy.allowDirectEdit) {
      throw new ForbiddenError('Direct sale edits are disabled; submit a change request instead');
    }
    requireAdmin(actor, 'edit a sale directly');
    requireId(saleId, 'sale_id');

    const { before, after } = await this.inTransaction('direct sale edit', async (trx) => {
      const current = await this.lockSale(trx, saleId);
      const requested = mergeSaleEdit(snapshotOf(current), edit);
      const updated = await this.applySnapshot(trx, saleId, requested);
      return { before: current, after: updated };
    });

    log.warn(
      {
        saleId,
        editor: actor.userId,
        fields: changedFields(snapshotOf(before), snapshotOf(after)),
      },
      'Sale edited directly, outside the change-request workflow'
    );
    return after;
  }
}

export const saleService = new SaleService();
