// =============================================================
// File: server/services/reports.service.ts
// Module: Reporting
// Description: Read-only aggregation over the ledger store.
//   1. Vendor summary: sales, COGS, profit, dues, deposits
//   2. Daily summary: one day's sales, payments and returns
//   3. Vendor ledger: chronological rows with running balances
//   4. Sales report: sales in a date range
//   5. Dashboard: stock on hand, total dues, pending requests
//
//   COGS = Σ sold boxes × weighted average cost of the fruit.
//   Nothing in here writes.
// =============================================================

import type { Knex } from 'knex';
import { ServiceBase } from './base.service';
import { changeRequestService } from './change-request.service';
import { inventoryService } from './inventory.service';
import { saleService } from './sale.service';
import { vendorService } from './vendor.service';
import { NotFoundError } from '../lib/errors';
import { parseCount, parseNum, round2, toDateString } from '../lib/format';
import { requireDate, requireId } from '../lib/validation';
import type {
  DailySummary,
  DashboardSummary,
  LedgerEntryType,
  SalesReport,
  VendorLedgerRow,
  VendorSummaryRow,
} from '../../shared/types';

interface FruitSalesRow {
  vendor_id: number;
  fruit: string;
  boxes: unknown;
  total_sales: unknown;
  deposits: unknown;
}

interface VendorAmountRow {
  vendor_id: number;
  amount: unknown;
}

interface LedgerEvent {
  date: string;
  seq: number;
  type: LedgerEntryType;
  fruit: string | null;
  qty: number;
  amount: number;
  deposit: number;
  note: string;
}

function sumBy<T>(rows: T[], pick: (row: T) => number): number {
  return rows.reduce((total, row) => total + pick(row), 0);
}

function margin(profit: number, totalSales: number): number {
  return totalSales > 0 ? round2((profit * 100) / totalSales) : 0;
}

function toAmountMap(rows: VendorAmountRow[]): Map<number, number> {
  return new Map(rows.map((row) => [row.vendor_id, parseNum(row.amount)]));
}

class ReportsService extends ServiceBase {
  // ═══════════════════════════════════════════════════════════
  // 1. VENDOR SUMMARY
  // ═══════════════════════════════════════════════════════════

  async vendorSummary(): Promise<VendorSummaryRow[]> {
    return this.read('vendor summary', async (db) => {
      const vendors = await vendorService.allVendors(db);
      const costs = await inventoryService.weightedAvgCosts(undefined, db);

      const salesRows: FruitSalesRow[] = await db('sales')
        .select('vendor_id', 'fruit')
        .sum({ boxes: 'boxes', total_sales: 'total_price', deposits: 'box_deposit_collected' })
        .groupBy('vendor_id', 'fruit');

      const paymentRows: VendorAmountRow[] = await db('payments')
        .select('vendor_id')
        .sum({ amount: 'amount' })
        .groupBy('vendor_id');

      const refundRows: VendorAmountRow[] = await db('returns')
        .select('vendor_id')
        .sum({ amount: 'box_deposit_refunded' })
        .groupBy('vendor_id');

      const payments = toAmountMap(paymentRows);
      const refunds = toAmountMap(refundRows);

      return vendors.map((vendor) => {
        const sales = salesRows.filter((row) => row.vendor_id === vendor.id);
        const totalSales = round2(sumBy(sales, (row) => parseNum(row.total_sales)));
        const cogs = round2(sumBy(sales, (row) => parseNum(row.boxes) * (costs.get(row.fruit) ?? 0)));
        const profit = round2(totalSales - cogs);
        const paid = round2(payments.get(vendor.id) ?? 0);
        const collected = round2(sumBy(sales, (row) => parseNum(row.deposits)));
        const refunded = round2(refunds.get(vendor.id) ?? 0);

        return {
          vendor_id: vendor.id,
          vendor_name: vendor.name,
          total_sales: totalSales,
          cogs,
          profit,
          profit_margin: margin(profit, totalSales),
          payments: paid,
          net_due: round2(totalSales - paid),
          deposits_collected: collected,
          deposits_refunded: refunded,
          net_deposits_held: round2(collected - refunded),
        };
      });
    });
  }

  // ═══════════════════════════════════════════════════════════
  // 2. DAILY SUMMARY
  // ═══════════════════════════════════════════════════════════

  async dailySummary(date: string): Promise<DailySummary> {
    const day = requireDate(date, 'date');

    return this.read('daily summary', async (db) => {
      const costs = await inventoryService.weightedAvgCosts(undefined, db);

      const salesRows: { fruit: string; boxes: unknown; total_sales: unknown; deposits: unknown; entries: unknown }[] =
        await db('sales')
          .where('transaction_date', day)
          .select('fruit')
          .sum({ boxes: 'boxes', total_sales: 'total_price', deposits: 'box_deposit_collected' })
          .count({ entries: '*' })
          .groupBy('fruit');

      const payments = await db('payments')
        .where('transaction_date', day)
        .sum({ amount: 'amount' })
        .count({ entries: '*' })
        .first();

      const returns = await db('returns')
        .where('transaction_date', day)
        .sum({ boxes: 'boxes_returned', refunded: 'box_deposit_refunded' })
        .count({ entries: '*' })
        .first();

      const totalSales = round2(sumBy(salesRows, (row) => parseNum(row.total_sales)));
      const cogs = round2(sumBy(salesRows, (row) => parseNum(row.boxes) * (costs.get(row.fruit) ?? 0)));

      return {
        date: day,
        total_sales: totalSales,
        boxes_sold: sumBy(salesRows, (row) => parseNum(row.boxes)),
        payments_received: round2(parseNum(payments?.amount)),
        boxes_returned: parseNum(returns?.boxes),
        deposits_collected: round2(sumBy(salesRows, (row) => parseNum(row.deposits))),
        deposits_refunded: round2(parseNum(returns?.refunded)),
        cogs,
        profit: round2(totalSales - cogs),
        num_transactions:
          sumBy(salesRows, (row) => parseCount(row.entries)) +
          parseCount(payments?.entries) +
          parseCount(returns?.entries),
      };
    });
  }

  // ═══════════════════════════════════════════════════════════
  // 3. VENDOR LEDGER
  // Date ascending; same-day rows in the order they were
  // recorded (entry_seq is shared by sales, payments, returns).
  // ═══════════════════════════════════════════════════════════

  async vendorLedger(vendorId: number): Promise<VendorLedgerRow[]> {
    requireId(vendorId, 'vendor_id');

    return this.read('vendor ledger', async (db) => {
      const vendor = await vendorService.getById(vendorId, db);
      if (!vendor) throw new NotFoundError('Vendor', vendorId);

      const events = await this.ledgerEvents(db, vendorId);
      events.sort((a, b) => (a.date === b.date ? a.seq - b.seq : a.date < b.date ? -1 : 1));

      let runningDue = 0;
      let runningDeposits = 0;
      return events.map((event) => {
        runningDue = round2(runningDue + event.amount);
        runningDeposits = round2(runningDeposits + event.deposit);
        return {
          date: event.date,
          type: event.type,
          fruit: event.fruit,
          qty: event.qty,
          amount: event.amount,
          deposit: event.deposit,
          note: event.note,
          running_due: runningDue,
          running_deposits: runningDeposits,
        };
      });
    });
  }

  private async ledgerEvents(db: Knex, vendorId: number): Promise<LedgerEvent[]> {
    const sales: Record<string, unknown>[] = await db('sales')
      .where({ vendor_id: vendorId })
      .select('transaction_date', 'entry_seq', 'fruit', 'boxes', 'total_price', 'box_deposit_collected', 'note');
    const payments: Record<string, unknown>[] = await db('payments')
      .where({ vendor_id: vendorId })
      .select('transaction_date', 'entry_seq', 'amount', 'note');
    const returns: Record<string, unknown>[] = await db('returns')
      .where({ vendor_id: vendorId })
      .select('transaction_date', 'entry_seq', 'fruit', 'boxes_returned', 'box_deposit_refunded', 'note');

    return [
      ...sales.map((row): LedgerEvent => ({
        date: toDateString(row.transaction_date),
        seq: parseNum(row.entry_seq),
        type: 'SALE',
        fruit: String(row.fruit),
        qty: parseNum(row.boxes),
        amount: parseNum(row.total_price),
        deposit: parseNum(row.box_deposit_collected),
        note: String(row.note ?? ''),
      })),
      ...payments.map((row): LedgerEvent => ({
        date: toDateString(row.transaction_date),
        seq: parseNum(row.entry_seq),
        type: 'PAYMENT',
        fruit: null,
        qty: 0,
        amount: -parseNum(row.amount),
        deposit: 0,
        note: String(row.note ?? ''),
      })),
      ...returns.map((row): LedgerEvent => ({
        date: toDateString(row.transaction_date),
        seq: parseNum(row.entry_seq),
        type: 'RETURN',
        fruit: String(row.fruit),
        qty: -parseNum(row.boxes_returned),
        amount: 0,
        deposit: -parseNum(row.box_deposit_refunded),
        note: String(row.note ?? ''),
      })),
    ];
  }

  // ═══════════════════════════════════════════════════════════
  // 4. SALES REPORT
  // ═══════════════════════════════════════════════════════════

  async salesReport(range: { from: string; to: string }): Promise<SalesReport> {
    const from = requireDate(range.from, 'from');
    const to = requireDate(range.to, 'to');
    const sales = await saleService.listSales({ from, to });

    return {
      from,
      to,
      sales,
      total_boxes: sumBy(sales, (sale) => sale.boxes),
      total_sales: round2(sumBy(sales, (sale) => sale.total_price)),
      total_deposits: round2(sumBy(sales, (sale) => sale.box_deposit_collected)),
    };
  }

  // ═══════════════════════════════════════════════════════════
  // 5. DASHBOARD
  // ═══════════════════════════════════════════════════════════

  async dashboard(): Promise<DashboardSummary> {
    const stock = await inventoryService.currentStock();
    const summary = await this.vendorSummary();
    const counts = await changeRequestService.countByStatus();

    return {
      total_boxes_in_stock: Object.values(stock).reduce((total, boxes) => total + boxes, 0),
      stock,
      total_net_due: round2(sumBy(summary, (row) => row.net_due)),
      pending_requests: counts.pending,
    };
  }
}

export const reportsService = new ReportsService();
