import { BaseService } from './base.service';
import { vendorService } from './vendor.service';
import { moduleLogger } from '../lib/logger';
import { parseNum, round2, toDateString, toTimestamp, today } from '../lib/format';
import { requireDate, requireId, requirePositiveAmount } from '../lib/validation';
import { DEFAULT_RECENT_LIMIT, SEQUENCES } from '../../shared/constants';
import type { Actor, Payment } from '../../shared/types';

const log = moduleLogger('payments');

export interface RecordPaymentInput {
  transaction_date?: string;
  vendor_id: number;
  amount: number;
  note?: string;
}

export interface PaymentFilters {
  vendor_id?: number;
  limit?: number;
}

interface PaymentRow {
  id: number;
  entry_seq: number | string;
  transaction_date: unknown;
  vendor_id: number;
  amount: number | string;
  note: string | null;
  created_by: string | null;
  created_at: unknown;
}

class PaymentService extends BaseService<PaymentRow, Payment> {
  constructor() {
    super('payments');
  }

  protected toEntity(row: PaymentRow): Payment {
    return {
      id: row.id,
      entry_seq: parseNum(row.entry_seq),
      transaction_date: toDateString(row.transaction_date),
      vendor_id: row.vendor_id,
      amount: parseNum(row.amount),
      note: row.note ?? '',
      created_by: row.created_by ?? null,
      created_at: toTimestamp(row.created_at),
    };
  }

  /** Cash received from a vendor. Only reduces net due; deposits are separate. */
  async recordPayment(input: RecordPaymentInput, actor: Actor): Promise<Payment> {
    const vendorId = requireId(input.vendor_id, 'vendor_id');
    // Checked after rounding: an amount that rounds to 0.00 is not a payment
    const amount = requirePositiveAmount(round2(input.amount), 'amount');
    const date = input.transaction_date ? requireDate(input.transaction_date, 'transaction_date') : today();

    const payment = await this.inTransaction('record payment', async (trx) => {
      await vendorService.requireVendor(trx, vendorId);
      const entrySeq = await this.nextSequence(trx, SEQUENCES.LEDGER_ENTRY);
      return this.insertRow(trx, {
        entry_seq: entrySeq,
        transaction_date: date,
        vendor_id: vendorId,
        amount,
        note: (input.note ?? '').trim(),
        created_by: actor.userId,
      });
    });

    log.info({ paymentId: payment.id, vendorId, amount: payment.amount }, 'Payment recorded');
    return payment;
  }

  /** Most recent payments first. */
  async listPayments(filters: PaymentFilters = {}): Promise<Payment[]> {
    const limit = filters.limit ?? DEFAULT_RECENT_LIMIT;

    return this.read('list payments', async (db) => {
      let query = db('payments');
      if (filters.vendor_id) query = query.where('vendor_id', filters.vendor_id);

      const rows: PaymentRow[] = await query
        .select('*')
        .orderBy('transaction_date', 'desc')
        .orderBy('entry_seq', 'desc')
        .limit(limit);
      return rows.map((row) => this.toEntity(row));
    });
  }
}

export const paymentService = new PaymentService();
