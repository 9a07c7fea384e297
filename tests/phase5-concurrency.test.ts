/**
 * PHASE 5: Concurrency
 * Parallel sales and reviews must never oversell a lot or apply a
 * request twice.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { cleanAllData, getTestDb } from './setup';
import { addLot, adminActor, clerkActor, createVendor, otherClerk, resetCounters } from './helpers/factory';
import { assertStockMatchesLots } from './helpers/assertions';

import { inventoryService } from '../server/services/inventory.service';
import { saleService } from '../server/services/sale.service';
import { changeRequestService } from '../server/services/change-request.service';
import { InsufficientStockError, InvalidStateTransitionError } from '../server/lib/errors';
import type { Vendor } from '../shared/types';

let vendor: Vendor;

beforeEach(async () => {
  await cleanAllData();
  resetCounters();
  vendor = await createVendor({ name: 'Parallel Produce' });
  await addLot('PEAR', 10, 100, '2025-07-01');
});

describe('Phase 5: Concurrency', () => {
  it('should let only one of two competing sales through', async () => {
    const order = { transaction_date: '2025-07-02', vendor_id: vendor.id, fruit: 'PEAR', boxes: 6, price_per_box: 150 };

    const results = await Promise.allSettled([
      saleService.sell(order, clerkActor),
      saleService.sell(order, otherClerk),
    ]);

    const fulfilled = results.filter((r) => r.status === 'fulfilled');
    const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0].reason).toBeInstanceOf(InsufficientStockError);

    expect(await inventoryService.availableQuantity('PEAR')).toBe(4);
    const count = await getTestDb()('sales').count({ total: '*' }).first();
    expect(Number(count?.total)).toBe(1);
  });

  it('should serve parallel sales that fit without losing boxes', async () => {
    const order = { transaction_date: '2025-07-02', vendor_id: vendor.id, fruit: 'PEAR', boxes: 3, price_per_box: 150 };

    const sales = await Promise.all([
      saleService.sell(order, clerkActor),
      saleService.sell(order, clerkActor),
      saleService.sell(order, otherClerk),
    ]);

    expect(new Set(sales.map((s) => s.entry_seq)).size).toBe(3);
    expect(await assertStockMatchesLots('PEAR')).toBe(1);
  });

  it('should apply a request only once when approved twice at the same time', async () => {
    const sale = await saleService.sell(
      { transaction_date: '2025-07-02', vendor_id: vendor.id, fruit: 'PEAR', boxes: 2, price_per_box: 150 },
      clerkActor
    );
    const request = await changeRequestService.submit(
      { sale_id: sale.id, requested: { boxes: 3 } },
      clerkActor
    );

    const results = await Promise.allSettled([
      changeRequestService.approve(request.id, adminActor),
      changeRequestService.approve(request.id, adminActor),
    ]);

    const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0].reason).toBeInstanceOf(InvalidStateTransitionError);

    const updated = await saleService.getSale(sale.id);
    expect(updated.boxes).toBe(3);
    expect(updated.total_price).toBe(450);
  });
});
