import { FastifyInstance } from 'fastify';
import { authenticate, currentUser } from '../plugins/auth.plugin';
import { isAdmin } from '../lib/authz';
import { sendError } from '../lib/http';
import { changeRequestService, SubmitChangeRequestInput } from '../services/change-request.service';
import type { ChangeRequestStatus } from '../../shared/types';

const idParams = {
  type: 'object',
  required: ['id'],
  properties: { id: { type: 'integer', minimum: 1 } },
} as const;

const snapshotFields = {
  transaction_date: { type: 'string' },
  fruit: { type: 'string' },
  boxes: { type: 'integer' },
  price_per_box: { type: 'number' },
  box_deposit_per_box: { type: 'number' },
  note: { type: 'string' },
} as const;

export async function changeRequestRoutes(server: FastifyInstance) {
  // ─── Queue ───

  server.get<{ Querystring: { status?: ChangeRequestStatus; limit?: number } }>(
    '/change-requests',
    {
      preHandler: [authenticate],
      schema: {
        querystring: {
          type: 'object',
          properties: {
            status: { type: 'string', enum: ['pending', 'approved', 'rejected'] },
            limit: { type: 'integer', minimum: 1, maximum: 500 },
          },
        },
      },
    },
    async (request, reply) => {
      try {
        const user = currentUser(request);
        // Regular users only see what they submitted
        const requests = await changeRequestService.listRequests({
          ...request.query,
          requested_by: isAdmin(user) ? undefined : user.userId,
        });
        return { success: true, data: requests };
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );

  server.get('/change-requests/counts', { preHandler: [authenticate] }, async (request, reply) => {
    try {
      const counts = await changeRequestService.countByStatus();
      return { success: true, data: counts };
    } catch (error) {
      return sendError(reply, error);
    }
  });

  server.get<{ Params: { id: number } }>(
    '/change-requests/:id',
    { preHandler: [authenticate], schema: { params: idParams } },
    async (request, reply) => {
      try {
        const detail = await changeRequestService.getRequest(request.params.id, currentUser(request));
        return { success: true, data: detail };
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );

  // ─── Submit ───

  server.post<{ Body: SubmitChangeRequestInput }>(
    '/change-requests',
    {
      preHandler: [authenticate],
      schema: {
        body: {
          type: 'object',
          required: ['sale_id', 'requested'],
          properties: {
            sale_id: { type: 'integer' },
            requested: { type: 'object', properties: snapshotFields },
            current: {
              type: 'object',
              required: ['transaction_date', 'fruit', 'boxes', 'price_per_box', 'box_deposit_per_box', 'note'],
              properties: snapshotFields,
            },
            note: { type: 'string' },
          },
        },
      },
    },
    async (request, reply) => {
      try {
        const created = await changeRequestService.submit(request.body, currentUser(request));
        return reply.code(201).send({ success: true, data: created });
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );

  // ─── Review ───

  server.post<{ Params: { id: number }; Body: { comment?: string } }>(
    '/change-requests/:id/approve',
    {
      preHandler: [authenticate],
      schema: {
        params: idParams,
        body: { type: 'object', properties: { comment: { type: 'string' } } },
      },
    },
    async (request, reply) => {
      try {
        const approved = await changeRequestService.approve(
          request.params.id,
          currentUser(request),
          request.body?.comment
        );
        return { success: true, data: approved };
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );

  server.post<{ Params: { id: number }; Body: { reason?: string } }>(
    '/change-requests/:id/reject',
    {
      preHandler: [authenticate],
      schema: {
        params: idParams,
        body: { type: 'object', properties: { reason: { type: 'string' } } },
      },
    },
    async (request, reply) => {
      try {
        const rejected = await changeRequestService.reject(
          request.params.id,
          currentUser(request),
          request.body?.reason ?? ''
        );
        return { success: true, data: rejected };
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );
}
