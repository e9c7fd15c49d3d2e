/**
 * Health routes
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { ObservationService } from '../../modules/observations/services/observation.service.js';

export const SERVICE_NAME = 'TradingView Webhook Receiver';

export async function registerHealthRoutes(
  app: FastifyInstance,
  service: ObservationService,
): Promise<void> {

  // Liveness only, never touches the store
  app.get('/', async () => ({
    status: 'online',
    service: SERVICE_NAME,
    endpoints: {
      webhook: '/webhook (POST)',
      health: '/health (GET)',
      latest: '/api/observations/latest (GET)',
      history: '/api/observations (GET)',
      summary: '/api/observations/summary (GET)',
      export: '/api/observations/latest.csv (GET)',
    },
  }));

  // Reports a failing database instead of raising
  app.get('/health', async (req: FastifyRequest, reply: FastifyReply) => {
    const report = await service.checkHealth();

    if (report.status === 'unhealthy') {
      req.log.warn({ error: report.error }, '[Health] Database check failed');
      return reply.status(503).send(report);
    }

    return reply.send(report);
  });
}
