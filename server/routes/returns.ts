import { FastifyInstance } from 'fastify';
import { authenticate, currentUser } from '../plugins/auth.plugin';
import { sendError } from '../lib/http';
import { salesReturnService, RecordReturnInput, ReturnFilters } from '../services/sales-return.service';

export async function returnRoutes(server: FastifyInstance) {
  server.get<{ Querystring: ReturnFilters }>(
    '/returns',
    {
      preHandler: [authenticate],
      schema: {
        querystring: {
          type: 'object',
          properties: {
            vendor_id: { type: 'integer', minimum: 1 },
            from: { type: 'string' },
            to: { type: 'string' },
          },
        },
      },
    },
    async (request, reply) => {
      try {
        const returns = await salesReturnService.listReturns(request.query);
        return { success: true, data: returns };
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );

  server.post<{ Body: RecordReturnInput }>(
    '/returns',
    {
      preHandler: [authenticate],
      schema: {
        body: {
          type: 'object',
          required: ['vendor_id', 'fruit', 'boxes_returned'],
          properties: {
            transaction_date: { type: 'string' },
            vendor_id: { type: 'integer' },
            fruit: { type: 'string' },
            boxes_returned: { type: 'integer' },
            box_deposit_per_box: { type: 'number' },
            note: { type: 'string' },
          },
        },
      },
    },
    async (request, reply) => {
      try {
        const record = await salesReturnService.recordReturn(request.body, currentUser(request));
        return reply.code(201).send({ success: true, data: record });
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );
}
