// =============================================================
// File: server/services/sales-return.service.ts
// Module: Transaction Operations: Returns
// Description: Boxes coming back from a vendor. The return row
//   and a fresh stock lot are written in one transaction. The
//   lot is costed at the fruit's weighted average taken BEFORE
//   it is added, so it does not pull the average towards itself.
//   No stock check: returns always succeed quantity-wise.
// =============================================================

import { BaseService } from './base.service';
import { inventoryService } from './inventory.service';
import { vendorService } from './vendor.service';
import { config } from '../config';
import { ValidationError } from '../lib/errors';
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
import type { Actor, SaleReturn } from '../../shared/types';

const log = moduleLogger('returns');

export interface RecordReturnInput {
  transaction_date?: string;
  vendor_id: number;
  fruit: string;
  boxes_returned: number;
  box_deposit_per_box?: number;
  note?: string;
}

export interface ReturnFilters {
  vendor_id?: number;
  from?: string;
  to?: string;
}

interface ReturnRow {
  id: number;
  entry_seq: number | string;
  transaction_date: unknown;
  vendor_id: number;
  fruit: string;
  boxes_returned: number | string;
  box_deposit_per_box: number | string;
  box_deposit_refunded: number | string;
  note: string | null;
  created_by: string | null;
  created_at: unknown;
}

class SalesReturnService extends BaseService<ReturnRow, SaleReturn> {
  constructor() {
    super('returns');
  }

  protected toEntity(row: ReturnRow): SaleReturn {
    return {
      id: row.id,
      entry_seq: parseNum(row.entry_seq),
      transaction_date: toDateString(row.transaction_date),
      vendor_id: row.vendor_id,
      fruit: row.fruit,
      boxes_returned: parseNum(row.boxes_returned),
      box_deposit_per_box: parseNum(row.box_deposit_per_box),
      box_deposit_refunded: parseNum(row.box_deposit_refunded),
      note: row.note ?? '',
      created_by: row.created_by ?? null,
      created_at: toTimestamp(row.created_at),
    };
  }

  async recordReturn(input: RecordReturnInput, actor: Actor): Promise<SaleReturn> {
    const vendorId = requireId(input.vendor_id, 'vendor_id');
    const fruit = normalizeFruit(input.fruit);
    const boxes = requirePositiveInt(input.boxes_returned, 'boxes_returned');
    const deposit = round2(
      requireNonNegativeAmount(input.box_deposit_per_box ?? config.ledger.defaultBoxDeposit, 'box_deposit_per_box')
    );
    const date = input.transaction_date ? requireDate(input.transaction_date, 'transaction_date') : today();

    const { record, lotId, unitCost } = await this.inTransaction('record return', async (trx) => {
      await vendorService.requireVendor(trx, vendorId);

      const averageCost = await inventoryService.weightedAvgCost(fruit, undefined, trx);

      const entrySeq = await this.nextSequence(trx, SEQUENCES.LEDGER_ENTRY);
      const saved = await this.insertRow(trx, {
        entry_seq: entrySeq,
        transaction_date: date,
        vendor_id: vendorId,
        fruit,
        boxes_returned: boxes,
        box_deposit_per_box: deposit,
        box_deposit_refunded: round2(boxes * deposit),
        note: (input.note ?? '').trim(),
        created_by: actor.userId,
      });

      const lot = await inventoryService.addLot({
        fruit,
        quantity: boxes,
        cost_price: averageCost,
        intake_date: date,
        source: 'return',
        return_id: saved.id,
      }, trx);

      return { record: saved, lotId: lot.id, unitCost: lot.cost_price };
    });

    log.info({ returnId: record.id, vendorId, fruit, boxes, lotId, unitCost }, 'Return recorded');
    return record;
  }

  async listReturns(filters: ReturnFilters = {}): Promise<SaleReturn[]> {
    const from = filters.from ? requireDate(filters.from, 'from') : undefined;
    const to = filters.to ? requireDate(filters.to, 'to') : undefined;
    if (from && to && from > to) {
      throw new ValidationError('from must not be after to');
    }

    return this.read('list returns', async (db) => {
      let query = db('returns');
      if (filters.vendor_id) query = query.where('vendor_id', filters.vendor_id);
      if (from) query = query.where('transaction_date', '>=', from);
      if (to) query = query.where('transaction_date', '<=', to);

      const rows: ReturnRow[] = await query
        .select('*')
        .orderBy('transaction_date', 'desc')
        .orderBy('entry_seq', 'desc');
      return rows.map((row) => this.toEntity(row));
    });
  }
}

export const salesReturnService = new SalesReturnService();
