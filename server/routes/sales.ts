import { FastifyInstance } from 'fastify';
import { authenticate, currentUser } from '../plugins/auth.plugin';
import { sendError } from '../lib/http';
import { saleService, SellInput } from '../services/sale.service';
import type { SaleEdit } from '../../shared/types';

const saleFields = {
  transaction_date: { type: 'string' },
  fruit: { type: 'string' },
  boxes: { type: 'integer' },
  price_per_box: { type: 'number' },
  box_deposit_per_box: { type: 'number' },
  note: { type: 'string' },
} as const;

export async function saleRoutes(server: FastifyInstance) {
  server.get<{ Querystring: { from?: string; to?: string; vendor_id?: number } }>(
    '/sales',
    {
      preHandler: [authenticate],
      schema: {
        querystring: {
          type: 'object',
          properties: {
            from: { type: 'string' },
            to: { type: 'string' },
            vendor_id: { type: 'integer', minimum: 1 },
          },
        },
      },
    },
    async (request, reply) => {
      try {
        const sales = await saleService.listSales(request.query);
        return { success: true, data: sales };
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );

  server.get<{ Params: { id: number } }>(
    '/sales/:id',
    {
      preHandler: [authenticate],
      schema: { params: { type: 'object', properties: { id: { type: 'integer', minimum: 1 } } } },
    },
    async (request, reply) => {
      try {
        const sale = await saleService.getSale(request.params.id);
        return { success: true, data: sale };
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );

  server.post<{ Body: SellInput }>(
    '/sales',
    {
      preHandler: [authenticate],
      schema: {
        body: {
          type: 'object',
          required: ['vendor_id', 'fruit', 'boxes', 'price_per_box'],
          properties: { ...saleFields, vendor_id: { type: 'integer' } },
        },
      },
    },
    async (request, reply) => {
      try {
        const sale = await saleService.sell(request.body, currentUser(request));
        return reply.code(201).send({ success: true, data: sale });
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );

  // Direct edit, outside the change-request workflow. Disabled unless
  // ALLOW_DIRECT_SALE_EDIT is set; admin only.
  server.put<{ Params: { id: number }; Body: SaleEdit }>(
    '/sales/:id',
    {
      preHandler: [authenticate],
      schema: {
        params: { type: 'object', properties: { id: { type: 'integer', minimum: 1 } } },
        body: { type: 'object', properties: saleFields },
      },
    },
    async (request, reply) => {
      try {
        const sale = await saleService.directEdit(request.params.id, request.body, currentUser(request));
        return { success: true, data: sale };
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );
}
