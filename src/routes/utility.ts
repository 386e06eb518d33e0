/**
 * Utility endpoints (root, health) shared by every service.
 */

import type { FastifyInstance } from 'fastify';

export interface UtilityRoutesOptions {
  /** Human-readable service name for the root endpoint. */
  title: string;
}

export async function utilityRoutes(fastify: FastifyInstance, opts: UtilityRoutesOptions) {
  // GET / - Root endpoint
  fastify.get('/', { schema: { description: 'Service status' } }, async () => {
    return {
      status: 'ok',
      message: `${opts.title} is running`,
    };
  });

  // GET /health - Health check
  fastify.get('/health', { schema: { description: 'Liveness check' } }, async () => {
    return { status: 'ok' };
  });
}
