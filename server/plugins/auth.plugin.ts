import { FastifyReply, FastifyRequest } from 'fastify';
import { authService } from '../services/auth.service';
import { UnauthorizedError } from '../lib/errors';
import type { Actor } from '../../shared/types';

declare module 'fastify' {
  interface FastifyRequest {
    user?: Actor;
  }
}

/**
 * Bearer-token check - use directly in preHandler
 * Usage: { preHandler: [authenticate] }
 */
export async function authenticate(request: FastifyRequest, reply: FastifyReply) {
  const authHeader = request.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return reply.code(401).send({ success: false, error: 'Authentication required', code: 'UNAUTHORIZED' });
  }

  try {
    request.user = authService.verifyToken(authHeader.substring(7));
  } catch (error) {
    const message = error instanceof UnauthorizedError ? error.message : 'Invalid or expired token';
    return reply.code(401).send({ success: false, error: message, code: 'UNAUTHORIZED' });
  }
}

/** The verified caller; handlers behind `authenticate` always have one. */
export function currentUser(request: FastifyRequest): Actor {
  if (!request.user) throw new UnauthorizedError();
  return request.user;
}
