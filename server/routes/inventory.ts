import { FastifyInstance } from 'fastify';
import { authenticate } from '../plugins/auth.plugin';
import { sendError } from '../lib/http';
import { inventoryService } from '../services/inventory.service';

export async function inventoryRoutes(server: FastifyInstance) {
  // ──────── Stock on hand ────────

  server.get('/stock', { preHandler: [authenticate] }, async (request, reply) => {
    try {
      const stock = await inventoryService.currentStock();
      return { success: true, data: stock };
    } catch (error) {
      return sendError(reply, error);
    }
  });

  server.get('/stock/fruits', { preHandler: [authenticate] }, async (request, reply) => {
    try {
      const fruits = await inventoryService.listFruits();
      return { success: true, data: fruits };
    } catch (error) {
      return sendError(reply, error);
    }
  });

  server.get<{ Querystring: { fruit?: string; include_exhausted?: boolean } }>(
    '/stock/lots',
    {
      preHandler: [authenticate],
      schema: {
        querystring: {
          type: 'object',
          properties: {
            fruit: { type: 'string' },
            include_exhausted: { type: 'boolean' },
          },
        },
      },
    },
    async (request, reply) => {
      try {
        const lots = await inventoryService.listLots(request.query);
        return { success: true, data: lots };
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );

  server.get<{ Params: { fruit: string }; Querystring: { as_of?: string } }>(
    '/stock/:fruit/avg-cost',
    {
      preHandler: [authenticate],
      schema: {
        querystring: {
          type: 'object',
          properties: { as_of: { type: 'string' } },
        },
      },
    },
    async (request, reply) => {
      try {
        const { fruit } = request.params;
        const cost = await inventoryService.weightedAvgCost(fruit, request.query.as_of);
        return { success: true, data: { fruit: fruit.trim().toUpperCase(), weighted_avg_cost: cost } };
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );

  // ──────── Intake ────────

  server.post<{ Body: { fruit: string; quantity: number; cost_price: number; intake_date?: string } }>(
    '/stock',
    {
      preHandler: [authenticate],
      schema: {
        body: {
          type: 'object',
          required: ['fruit', 'quantity', 'cost_price'],
          properties: {
            fruit: { type: 'string' },
            quantity: { type: 'integer' },
            cost_price: { type: 'number' },
            intake_date: { type: 'string' },
          },
        },
      },
    },
    async (request, reply) => {
      try {
        const lot = await inventoryService.addLot({ ...request.body, source: 'intake' });
        return reply.code(201).send({ success: true, data: lot });
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );
}
