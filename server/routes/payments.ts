import { FastifyInstance } from 'fastify';
import { authenticate, currentUser } from '../plugins/auth.plugin';
import { sendError } from '../lib/http';
import { paymentService, PaymentFilters, RecordPaymentInput } from '../services/payment.service';

export async function paymentRoutes(server: FastifyInstance) {
  server.get<{ Querystring: PaymentFilters }>(
    '/payments',
    {
      preHandler: [authenticate],
      schema: {
        querystring: {
          type: 'object',
          properties: {
            vendor_id: { type: 'integer', minimum: 1 },
            limit: { type: 'integer', minimum: 1, maximum: 500 },
          },
        },
      },
    },
    async (request, reply) => {
      try {
        const payments = await paymentService.listPayments(request.query);
        return { success: true, data: payments };
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );

  server.post<{ Body: RecordPaymentInput }>(
    '/payments',
    {
      preHandler: [authenticate],
      schema: {
        body: {
          type: 'object',
          required: ['vendor_id', 'amount'],
          properties: {
            transaction_date: { type: 'string' },
            vendor_id: { type: 'integer' },
            amount: { type: 'number' },
            note: { type: 'string' },
          },
        },
      },
    },
    async (request, reply) => {
      try {
        const payment = await paymentService.recordPayment(request.body, currentUser(request));
        return reply.code(201).send({ success: true, data: payment });
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );
}
