import { FastifyInstance } from 'fastify';
import { authenticate } from '../plugins/auth.plugin';
import { sendError } from '../lib/http';
import { vendorService } from '../services/vendor.service';
import { reportsService } from '../services/reports.service';

const idParams = {
  type: 'object',
  required: ['id'],
  properties: { id: { type: 'integer', minimum: 1 } },
} as const;

export async function vendorRoutes(server: FastifyInstance) {
  server.get<{ Querystring: { page?: number; limit?: number; search?: string } }>(
    '/vendors',
    {
      preHandler: [authenticate],
      schema: {
        querystring: {
          type: 'object',
          properties: {
            page: { type: 'integer', minimum: 1 },
            limit: { type: 'integer', minimum: 1, maximum: 500 },
            search: { type: 'string' },
          },
        },
      },
    },
    async (request, reply) => {
      try {
        const result = await vendorService.listVendors(request.query);
        return { success: true, ...result };
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );

  server.get<{ Params: { id: number } }>(
    '/vendors/:id',
    { preHandler: [authenticate], schema: { params: idParams } },
    async (request, reply) => {
      try {
        const vendor = await vendorService.getVendor(request.params.id);
        return { success: true, data: vendor };
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );

  server.get<{ Params: { id: number } }>(
    '/vendors/:id/ledger',
    { preHandler: [authenticate], schema: { params: idParams } },
    async (request, reply) => {
      try {
        const rows = await reportsService.vendorLedger(request.params.id);
        return { success: true, data: rows };
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );

  server.post<{ Body: { name: string; contact: string } }>(
    '/vendors',
    {
      preHandler: [authenticate],
      schema: {
        body: {
          type: 'object',
          required: ['name', 'contact'],
          properties: {
            name: { type: 'string' },
            contact: { type: 'string' },
          },
        },
      },
    },
    async (request, reply) => {
      try {
        const vendor = await vendorService.createVendor(request.body);
        return reply.code(201).send({ success: true, data: vendor });
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );
}
