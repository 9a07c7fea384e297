import type { FastifyReply } from 'fastify';
import { AppError, InsufficientStockError } from './errors';

export interface ErrorBody {
  success: false;
  error: string;
  code: string;
  details?: Record<string, unknown>;
}

function errorBody(error: AppError): ErrorBody {
  const body: ErrorBody = { success: false, error: error.message, code: error.code };
  if (error instanceof InsufficientStockError) {
    body.details = {
      fruit: error.fruit,
      requested: error.requested,
      available: error.available,
      shortfall: error.shortfall,
    };
  }
  return body;
}

/** Route-level translation of service errors into the JSON error envelope. */
export function sendError(reply: FastifyReply, error: unknown) {
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      reply.log.error({ err: error }, error.message);
    }
    return reply.code(error.statusCode).send(errorBody(error));
  }

  reply.log.error({ err: error }, 'Unhandled error');
  return reply.code(500).send({ success: false, error: 'Internal server error', code: 'INTERNAL_ERROR' });
}
