/**
 * PHASE 6: HTTP API
 * Routes behind bearer tokens, the JSON envelope and the mapping of
 * service errors to status codes. Requests go through fastify.inject;
 * no port is opened.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { cleanAllData } from './setup';
import { adminActor, bearer, clerkActor, otherClerk, resetCounters } from './helpers/factory';

import { buildServer } from '../server/app';

let server: FastifyInstance;
let clerk: string;
let admin: string;
let vendorId: number;
let saleId: number;

beforeAll(async () => {
  server = await buildServer();
  await server.ready();
  await cleanAllData();
  resetCounters();
  clerk = bearer(clerkActor);
  admin = bearer(adminActor);
});

afterAll(async () => {
  await server.close();
});

describe('Phase 6: HTTP API', () => {
  describe('6.1 Health and authentication', () => {
    it('should answer health checks without a token', async () => {
      const res = await server.inject({ method: 'GET', url: '/api/health' });
      expect(res.statusCode).toBe(200);
      expect(res.json().status).toBe('ok');

      const db = await server.inject({ method: 'GET', url: '/api/health/db' });
      expect(db.json()).toEqual({ status: 'ok', database: 'connected' });
    });

    it('should reject requests without a bearer token', async () => {
      const res = await server.inject({ method: 'GET', url: '/api/stock' });
      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({ success: false, error: 'Authentication required', code: 'UNAUTHORIZED' });
    });

    it('should reject a token signed with another secret', async () => {
      const res = await server.inject({
        method: 'GET',
        url: '/api/stock',
        headers: { authorization: 'Bearer not-a-real-token' },
      });
      expect(res.statusCode).toBe(401);
      expect(res.json().error).toBe('Invalid or expired token');
    });
  });

  describe('6.2 Vendors and stock', () => {
    it('should register a vendor', async () => {
      const res = await server.inject({
        method: 'POST',
        url: '/api/vendors',
        headers: { authorization: clerk },
        payload: { name: 'Api Traders', contact: '9876501234' },
      });
      expect(res.statusCode).toBe(201);
      const body = res.json();
      expect(body.success).toBe(true);
      expect(body.data.name).toBe('Api Traders');
      vendorId = body.data.id;
    });

    it('should reject a vendor body missing its contact', async () => {
      const res = await server.inject({
        method: 'POST',
        url: '/api/vendors',
        headers: { authorization: clerk },
        payload: { name: 'No Phone' },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().code).toBe('VALIDATION_ERROR');
    });

    it('should map service validation failures to 400', async () => {
      const res = await server.inject({
        method: 'POST',
        url: '/api/vendors',
        headers: { authorization: clerk },
        payload: { name: 'Bad Phone', contact: '123' },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        success: false,
        error: 'contact must be a 10-digit phone number',
        code: 'VALIDATION_ERROR',
      });
    });

    it('should return 404 for an unknown vendor', async () => {
      const res = await server.inject({
        method: 'GET',
        url: '/api/vendors/9999',
        headers: { authorization: clerk },
      });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ success: false, error: 'Vendor 9999 not found', code: 'NOT_FOUND' });
    });

    it('should take in a lot and report stock', async () => {
      const res = await server.inject({
        method: 'POST',
        url: '/api/stock',
        headers: { authorization: clerk },
        payload: { fruit: 'grape', quantity: 10, cost_price: 300, intake_date: '2025-07-01' },
      });
      expect(res.statusCode).toBe(201);
      expect(res.json().data.fruit).toBe('GRAPE');

      const stock = await server.inject({ method: 'GET', url: '/api/stock', headers: { authorization: clerk } });
      expect(stock.json()).toEqual({ success: true, data: { GRAPE: 10 } });

      const avg = await server.inject({
        method: 'GET',
        url: '/api/stock/grape/avg-cost',
        headers: { authorization: clerk },
      });
      expect(avg.json().data).toEqual({ fruit: 'GRAPE', weighted_avg_cost: 300 });
    });
  });

  describe('6.3 Sales and change requests', () => {
    it('should refuse to oversell with the shortfall in the details', async () => {
      const res = await server.inject({
        method: 'POST',
        url: '/api/sales',
        headers: { authorization: clerk },
        payload: { vendor_id: vendorId, fruit: 'GRAPE', boxes: 12, price_per_box: 400 },
      });
      expect(res.statusCode).toBe(409);
      expect(res.json()).toEqual({
        success: false,
        error: 'Insufficient stock for GRAPE. Available: 10, Requested: 12, Short by 2',
        code: 'INSUFFICIENT_STOCK',
        details: { fruit: 'GRAPE', requested: 12, available: 10, shortfall: 2 },
      });
    });

    it('should record a sale', async () => {
      const res = await server.inject({
        method: 'POST',
        url: '/api/sales',
        headers: { authorization: clerk },
        payload: { transaction_date: '2025-07-02', vendor_id: vendorId, fruit: 'GRAPE', boxes: 4, price_per_box: 400 },
      });
      expect(res.statusCode).toBe(201);
      const sale = res.json().data;
      expect(sale.total_price).toBe(1600);
      expect(sale.box_deposit_collected).toBe(800);
      expect(sale.created_by).toBe('clerk-1');
      saleId = sale.id;
    });

    it('should only let an administrator approve', async () => {
      const submitted = await server.inject({
        method: 'POST',
        url: '/api/change-requests',
        headers: { authorization: clerk },
        payload: { sale_id: saleId, requested: { boxes: 5 }, note: 'one more box' },
      });
      expect(submitted.statusCode).toBe(201);
      const requestId = submitted.json().data.id;

      const denied = await server.inject({
        method: 'POST',
        url: `/api/change-requests/${requestId}/approve`,
        headers: { authorization: clerk },
        payload: {},
      });
      expect(denied.statusCode).toBe(403);
      expect(denied.json().code).toBe('FORBIDDEN');

      const approved = await server.inject({
        method: 'POST',
        url: `/api/change-requests/${requestId}/approve`,
        headers: { authorization: admin },
        payload: {},
      });
      expect(approved.statusCode).toBe(200);
      expect(approved.json().data.status).toBe('approved');

      const again = await server.inject({
        method: 'POST',
        url: `/api/change-requests/${requestId}/approve`,
        headers: { authorization: admin },
        payload: {},
      });
      expect(again.statusCode).toBe(409);
      expect(again.json().code).toBe('INVALID_STATE_TRANSITION');

      const sale = await server.inject({ method: 'GET', url: `/api/sales/${saleId}`, headers: { authorization: clerk } });
      expect(sale.json().data.boxes).toBe(5);
      expect(sale.json().data.total_price).toBe(2000);
      expect(sale.json().data.box_deposit_collected).toBe(1000);
    });

    it('should require a rejection reason', async () => {
      const submitted = await server.inject({
        method: 'POST',
        url: '/api/change-requests',
        headers: { authorization: bearer(otherClerk) },
        payload: { sale_id: saleId, requested: { price_per_box: 420 } },
      });
      const requestId = submitted.json().data.id;

      const res = await server.inject({
        method: 'POST',
        url: `/api/change-requests/${requestId}/reject`,
        headers: { authorization: admin },
        payload: { reason: '' },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('Rejection reason required');

      const detail = await server.inject({
        method: 'GET',
        url: `/api/change-requests/${requestId}`,
        headers: { authorization: admin },
      });
      expect(detail.json().data.status).toBe('pending');
      expect(detail.json().data.changes).toEqual([{ field: 'price_per_box', current: 400, requested: 420 }]);

      const someoneElse = await server.inject({
        method: 'GET',
        url: `/api/change-requests/${requestId}`,
        headers: { authorization: clerk },
      });
      expect(someoneElse.statusCode).toBe(403);
      expect(someoneElse.json().code).toBe('FORBIDDEN');

      const own = await server.inject({
        method: 'GET',
        url: `/api/change-requests/${requestId}`,
        headers: { authorization: bearer(otherClerk) },
      });
      expect(own.statusCode).toBe(200);
      expect(own.json().data.requested_by).toBe('clerk-2');
    });

    it('should show regular users only their own requests', async () => {
      const mine = await server.inject({
        method: 'GET',
        url: '/api/change-requests',
        headers: { authorization: clerk },
      });
      expect(mine.json().data.map((r: { requested_by: string }) => r.requested_by)).toEqual(['clerk-1']);

      const all = await server.inject({
        method: 'GET',
        url: '/api/change-requests',
        headers: { authorization: admin },
      });
      expect(all.json().data).toHaveLength(2);

      const counts = await server.inject({
        method: 'GET',
        url: '/api/change-requests/counts',
        headers: { authorization: admin },
      });
      expect(counts.json().data).toEqual({ pending: 1, approved: 1, rejected: 0 });
    });

    it('should let an administrator edit a sale directly', async () => {
      const res = await server.inject({
        method: 'PUT',
        url: `/api/sales/${saleId}`,
        headers: { authorization: admin },
        payload: { note: 'weighed again' },
      });
      expect(res.statusCode).toBe(200);
      expect(res.json().data.note).toBe('weighed again');
    });
  });

  describe('6.4 Reports', () => {
    it('should serve the vendor summary and ledger', async () => {
      const summary = await server.inject({
        method: 'GET',
        url: '/api/reports/vendor-summary',
        headers: { authorization: clerk },
      });
      expect(summary.statusCode).toBe(200);
      expect(summary.json().data[0].total_sales).toBe(2000);
      expect(summary.json().data[0].cogs).toBe(1500);

      const ledger = await server.inject({
        method: 'GET',
        url: `/api/vendors/${vendorId}/ledger`,
        headers: { authorization: clerk },
      });
      expect(ledger.json().data).toHaveLength(1);
      expect(ledger.json().data[0].running_due).toBe(2000);
    });

    it('should require both ends of a sales report range', async () => {
      const res = await server.inject({
        method: 'GET',
        url: '/api/reports/sales?from=2025-07-01',
        headers: { authorization: clerk },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().code).toBe('VALIDATION_ERROR');
    });
  });
});
