// =============================================================
// File: server/app.ts
// Description: Fastify server construction with all route
//              registrations. Starting and stopping the process
//              lives in server/index.ts.
// =============================================================

import Fastify, { FastifyError } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import sensible from '@fastify/sensible';
import { initializeDb } from './database/connection';
import { loggerOptions } from './lib/logger';
import { sendError } from './lib/http';
import { healthRoutes } from './routes/health';
import { vendorRoutes } from './routes/vendors';
import { inventoryRoutes } from './routes/inventory';
import { saleRoutes } from './routes/sales';
import { returnRoutes } from './routes/returns';
import { paymentRoutes } from './routes/payments';
import { changeRequestRoutes } from './routes/change-requests';
import { reportRoutes } from './routes/reports';

export async function buildServer() {
  const server = Fastify({ logger: loggerOptions });

  // Plugins
  await server.register(cors, {
    origin: true,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  });
  await server.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });
  await server.register(sensible);

  // Action endpoints (approve, reject) are often posted with
  // Content-Type: application/json and no body at all.
  server.removeContentTypeParser('application/json');
  server.addContentTypeParser('application/json', { parseAs: 'string' }, (req, body, done) => {
    const text = String(body).trim();
    if (!text) {
      done(null, {});
      return;
    }
    try {
      done(null, JSON.parse(text));
    } catch {
      done(server.httpErrors.badRequest('Body is not valid JSON'), undefined);
    }
  });

  server.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.validation) {
      return reply.code(400).send({ success: false, error: error.message, code: 'VALIDATION_ERROR' });
    }
    if (error.statusCode && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ success: false, error: error.message, code: error.code ?? 'BAD_REQUEST' });
    }
    return sendError(reply, error);
  });

  await initializeDb();

  // Register routes
  await server.register(healthRoutes, { prefix: '/api' });
  await server.register(vendorRoutes, { prefix: '/api' });
  await server.register(inventoryRoutes, { prefix: '/api' });
  await server.register(saleRoutes, { prefix: '/api' });
  await server.register(returnRoutes, { prefix: '/api' });
  await server.register(paymentRoutes, { prefix: '/api' });
  await server.register(changeRequestRoutes, { prefix: '/api' });
  await server.register(reportRoutes, { prefix: '/api' });

  return server;
}
