import { FastifyInstance } from 'fastify';
import { authenticate } from '../plugins/auth.plugin';
import { sendError } from '../lib/http';
import { today } from '../lib/format';
import { reportsService } from '../services/reports.service';

export async function reportRoutes(server: FastifyInstance) {
  server.get('/reports/vendor-summary', { preHandler: [authenticate] }, async (request, reply) => {
    try {
      const rows = await reportsService.vendorSummary();
      return { success: true, data: rows };
    } catch (error) {
      return sendError(reply, error);
    }
  });

  server.get<{ Querystring: { date?: string } }>(
    '/reports/daily',
    {
      preHandler: [authenticate],
      schema: { querystring: { type: 'object', properties: { date: { type: 'string' } } } },
    },
    async (request, reply) => {
      try {
        const summary = await reportsService.dailySummary(request.query.date ?? today());
        return { success: true, data: summary };
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );

  server.get<{ Querystring: { from: string; to: string } }>(
    '/reports/sales',
    {
      preHandler: [authenticate],
      schema: {
        querystring: {
          type: 'object',
          required: ['from', 'to'],
          properties: { from: { type: 'string' }, to: { type: 'string' } },
        },
      },
    },
    async (request, reply) => {
      try {
        const report = await reportsService.salesReport(request.query);
        return { success: true, data: report };
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );

  server.get('/reports/dashboard', { preHandler: [authenticate] }, async (request, reply) => {
    try {
      const dashboard = await reportsService.dashboard();
      return { success: true, data: dashboard };
    } catch (error) {
      return sendError(reply, error);
    }
  });
}
