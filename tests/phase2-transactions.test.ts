/**
 * PHASE 2: Transaction Operations
 * Vendors, sales, returns and payments against the ledger store.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { cleanAllData, getTestDb } from './setup';
import { addLot, clerkActor, createVendor, resetCounters } from './helpers/factory';
import { assertSaleTotals, assertStockMatchesLots } from './helpers/assertions';

import { vendorService } from '../server/services/vendor.service';
import { inventoryService } from '../server/services/inventory.service';
import { saleService } from '../server/services/sale.service';
import { salesReturnService } from '../server/services/sales-return.service';
import { paymentService } from '../server/services/payment.service';
import { InsufficientStockError, NotFoundError, ValidationError } from '../server/lib/errors';
import type { Vendor } from '../shared/types';

let vendor: Vendor;

beforeEach(async () => {
  await cleanAllData();
  resetCounters();
  vendor = await createVendor({ name: 'Green Valley Traders', contact: '9876543210' });
});

describe('Phase 2: Transaction Operations', () => {
  describe('2.1 Vendor registry', () => {
    it('should register a vendor with a trimmed name', async () => {
      const created = await vendorService.createVendor({ name: '  Sunrise Fruits ', contact: '9123456780' });
      expect(created.name).toBe('Sunrise Fruits');
      expect(created.contact).toBe('9123456780');

      const loaded = await vendorService.getVendor(created.id);
      expect(loaded).toEqual(created);
    });

    it('should reject a blank name and a contact that is not 10 digits', async () => {
      await expect(vendorService.createVendor({ name: ' ', contact: '9123456780' })).rejects.toThrow(
        'name is required'
      );
      await expect(vendorService.createVendor({ name: 'Short', contact: '12345' })).rejects.toThrow(
        'contact must be a 10-digit phone number'
      );
      await expect(vendorService.createVendor({ name: 'Letters', contact: '98765abcde' })).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    it('should list vendors by name', async () => {
      await vendorService.createVendor({ name: 'Apex Produce', contact: '9000000001' });
      const result = await vendorService.listVendors();
      expect(result.total).toBe(2);
      expect(result.data.map((v) => v.name)).toEqual(['Apex Produce', 'Green Valley Traders']);
    });

    it('should raise NotFound for an unknown vendor', async () => {
      await expect(vendorService.getVendor(9999)).rejects.toThrow('Vendor 9999 not found');
    });
  });

  describe('2.2 Sell', () => {
    beforeEach(async () => {
      await addLot('APPLE', 10, 500, '2025-04-01');
    });

    it('should record a sale with computed totals and the default deposit', async () => {
      const sale = await saleService.sell(
        { transaction_date: '2025-04-02', vendor_id: vendor.id, fruit: 'apple', boxes: 4, price_per_box: 650.5 },
        clerkActor
      );

      expect(sale.fruit).toBe('APPLE');
      expect(sale.boxes).toBe(4);
      expect(sale.total_price).toBe(2602);
      expect(sale.box_deposit_per_box).toBe(200);
      expect(sale.box_deposit_collected).toBe(800);
      expect(sale.created_by).toBe('clerk-1');
      expect(sale.entry_seq).toBe(1);
      assertSaleTotals(sale);

      expect(await inventoryService.availableQuantity('APPLE')).toBe(6);
      await assertStockMatchesLots('APPLE');
    });

    it('should derive totals from the per-box amounts as stored', async () => {
      const sale = await saleService.sell(
        {
          transaction_date: '2025-04-02',
          vendor_id: vendor.id,
          fruit: 'APPLE',
          boxes: 10,
          price_per_box: 7.125,
          box_deposit_per_box: 0.004,
        },
        clerkActor
      );

      expect(sale.price_per_box).toBe(7.13);
      expect(sale.total_price).toBe(71.3);
      expect(sale.box_deposit_per_box).toBe(0);
      expect(sale.box_deposit_collected).toBe(0);
      assertSaleTotals(sale);
      assertSaleTotals(await saleService.getSale(sale.id));
    });

    it('should honour an explicit zero deposit', async () => {
      const sale = await saleService.sell(
        {
          transaction_date: '2025-04-02',
          vendor_id: vendor.id,
          fruit: 'APPLE',
          boxes: 3,
          price_per_box: 700,
          box_deposit_per_box: 0,
        },
        clerkActor
      );
      expect(sale.total_price).toBe(2100);
      expect(sale.box_deposit_collected).toBe(0);
    });

    it('should reject a sale larger than stock and write nothing', async () => {
      await expect(
        saleService.sell({ vendor_id: vendor.id, fruit: 'APPLE', boxes: 11, price_per_box: 700 }, clerkActor)
      ).rejects.toBeInstanceOf(InsufficientStockError);

      expect(await inventoryService.availableQuantity('APPLE')).toBe(10);
      const count = await getTestDb()('sales').count({ total: '*' }).first();
      expect(Number(count?.total)).toBe(0);
    });

    it('should reject an unknown vendor without touching stock', async () => {
      await expect(
        saleService.sell({ vendor_id: 9999, fruit: 'APPLE', boxes: 1, price_per_box: 700 }, clerkActor)
      ).rejects.toBeInstanceOf(NotFoundError);
      expect(await inventoryService.availableQuantity('APPLE')).toBe(10);
    });

    it('should reject bad quantities and prices', async () => {
      await expect(
        saleService.sell({ vendor_id: vendor.id, fruit: 'APPLE', boxes: 0, price_per_box: 700 }, clerkActor)
      ).rejects.toThrow('boxes must be a positive whole number');
      await expect(
        saleService.sell({ vendor_id: vendor.id, fruit: 'APPLE', boxes: 1, price_per_box: -1 }, clerkActor)
      ).rejects.toThrow('price_per_box must be >= 0');
    });

    it('should list sales in a date range, newest first', async () => {
      const base = { vendor_id: vendor.id, fruit: 'APPLE', boxes: 1, price_per_box: 600 };
      await saleService.sell({ ...base, transaction_date: '2025-04-02' }, clerkActor);
      await saleService.sell({ ...base, transaction_date: '2025-04-05' }, clerkActor);
      await saleService.sell({ ...base, transaction_date: '2025-04-03' }, clerkActor);

      const sales = await saleService.listSales({ from: '2025-04-03', to: '2025-04-05' });
      expect(sales.map((s) => s.transaction_date)).toEqual(['2025-04-05', '2025-04-03']);
      expect(sales[0].vendor_name).toBe('Green Valley Traders');

      await expect(saleService.listSales({ from: '2025-04-05', to: '2025-04-01' })).rejects.toThrow(
        'from must not be after to'
      );
    });
  });

  describe('2.3 Returns', () => {
    it('should re-enter returned boxes at the average cost before the return', async () => {
      await addLot('APPLE', 10, 500, '2025-04-01');
      await addLot('APPLE', 5, 600, '2025-04-02');

      const record = await salesReturnService.recordReturn(
        { transaction_date: '2025-04-05', vendor_id: vendor.id, fruit: 'Apple', boxes_returned: 3 },
        clerkActor
      );

      expect(record.fruit).toBe('APPLE');
      expect(record.boxes_returned).toBe(3);
      expect(record.box_deposit_per_box).toBe(200);
      expect(record.box_deposit_refunded).toBe(600);

      const lots = await inventoryService.listLots({ fruit: 'APPLE' });
      const returned = lots[lots.length - 1];
      expect(returned.source).toBe('return');
      expect(returned.return_id).toBe(record.id);
      expect(returned.quantity).toBe(3);
      expect(returned.remaining).toBe(3);
      expect(returned.intake_date).toBe('2025-04-05');
      expect(returned.cost_price).toBe(533.3333);

      expect(await inventoryService.availableQuantity('APPLE')).toBe(18);
    });

    it('should cost a return of an unstocked fruit at zero', async () => {
      const record = await salesReturnService.recordReturn(
        { transaction_date: '2025-04-05', vendor_id: vendor.id, fruit: 'FIG', boxes_returned: 2, box_deposit_per_box: 150 },
        clerkActor
      );
      expect(record.box_deposit_refunded).toBe(300);

      const [lot] = await inventoryService.listLots({ fruit: 'FIG' });
      expect(lot.cost_price).toBe(0);
      expect(lot.remaining).toBe(2);
    });

    it('should reject a return from an unknown vendor and add no lot', async () => {
      await expect(
        salesReturnService.recordReturn({ vendor_id: 9999, fruit: 'FIG', boxes_returned: 1 }, clerkActor)
      ).rejects.toBeInstanceOf(NotFoundError);
      expect(await inventoryService.listLots({ fruit: 'FIG', include_exhausted: true })).toEqual([]);
    });

    it('should list returns in a date range, newest first', async () => {
      for (const date of ['2025-04-01', '2025-04-04', '2025-04-02']) {
        await salesReturnService.recordReturn(
          { transaction_date: date, vendor_id: vendor.id, fruit: 'FIG', boxes_returned: 1 },
          clerkActor
        );
      }

      const returns = await salesReturnService.listReturns({ vendor_id: vendor.id, from: '2025-04-02' });
      expect(returns.map((r) => r.transaction_date)).toEqual(['2025-04-04', '2025-04-02']);
    });

    it('should reject zero boxes', async () => {
      await expect(
        salesReturnService.recordReturn({ vendor_id: vendor.id, fruit: 'FIG', boxes_returned: 0 }, clerkActor)
      ).rejects.toThrow('boxes_returned must be a positive whole number');
    });
  });

  describe('2.4 Payments', () => {
    it('should record a payment rounded to two places', async () => {
      const payment = await paymentService.recordPayment(
        { transaction_date: '2025-04-03', vendor_id: vendor.id, amount: 1500.456, note: ' cash ' },
        clerkActor
      );
      expect(payment.amount).toBe(1500.46);
      expect(payment.note).toBe('cash');
      expect(payment.created_by).toBe('clerk-1');
    });

    it('should reject zero and negative amounts', async () => {
      await expect(paymentService.recordPayment({ vendor_id: vendor.id, amount: 0 }, clerkActor)).rejects.toThrow(
        'amount must be greater than zero'
      );
      await expect(
        paymentService.recordPayment({ vendor_id: vendor.id, amount: -5 }, clerkActor)
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('should reject an amount that rounds to zero before writing', async () => {
      await expect(
        paymentService.recordPayment({ vendor_id: vendor.id, amount: 0.001 }, clerkActor)
      ).rejects.toThrow('amount must be greater than zero');

      const count = await getTestDb()('payments').count({ total: '*' }).first();
      expect(Number(count?.total)).toBe(0);
    });

    it('should list the most recent payments first', async () => {
      for (const date of ['2025-04-01', '2025-04-03', '2025-04-02']) {
        await paymentService.recordPayment({ transaction_date: date, vendor_id: vendor.id, amount: 100 }, clerkActor);
      }

      const recent = await paymentService.listPayments({ vendor_id: vendor.id, limit: 2 });
      expect(recent.map((p) => p.transaction_date)).toEqual(['2025-04-03', '2025-04-02']);
    });
  });
});
