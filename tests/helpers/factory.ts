/**
 * Test data factories: vendors, stock lots and signed-in actors.
 * All factories return the created record for use in assertions.
 */

import { vendorService } from '../../server/services/vendor.service';
import { inventoryService } from '../../server/services/inventory.service';
import { authService } from '../../server/services/auth.service';
import type { Actor } from '../../shared/types';

// ── Counters for unique contacts ───────────────────────────────────

let counter = 0;
function nextContact(): string {
  counter += 1;
  return String(9800000000 + counter);
}

export function resetCounters() {
  counter = 0;
}

// ── Actors ─────────────────────────────────────────────────────────

export const adminActor: Actor = { userId: 'admin-1', displayName: 'Asha Admin', role: 'admin' };
export const clerkActor: Actor = { userId: 'clerk-1', displayName: 'Ravi Clerk', role: 'user' };
export const otherClerk: Actor = { userId: 'clerk-2', displayName: 'Meena Clerk', role: 'user' };

export function bearer(actor: Actor): string {
  return `Bearer ${authService.issueToken(actor)}`;
}

// ── Master data ────────────────────────────────────────────────────

export async function createVendor(overrides: { name?: string; contact?: string } = {}) {
  return vendorService.createVendor({
    name: overrides.name ?? `Vendor ${counter + 1}`,
    contact: overrides.contact ?? nextContact(),
  });
}

export async function addLot(fruit: string, quantity: number, costPrice: number, intakeDate: string) {
  return inventoryService.addLot({
    fruit,
    quantity,
    cost_price: costPrice,
    intake_date: intakeDate,
  });
}
