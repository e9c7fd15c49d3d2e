/**
 * WEBHOOK ROUTES
 * ==============
 *
 * Single writer-facing surface. TradingView alert message:
 *   { "symbol": "{{ticker}}", "price": {{close}}, "atr": {{plot("ATR")}} }
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { WebhookResponse } from '../contracts/observation.types.js';
import type { ObservationService, WebhookPayload } from '../services/observation.service.js';

// Field rules live in the validator; anything that is not an object has no fields
const PayloadSchema = z.object({
  symbol: z.unknown(),
  price: z.unknown(),
  atr: z.unknown(),
});

function toPayload(body: unknown): WebhookPayload {
  const parsed = PayloadSchema.safeParse(body);
  return parsed.success ? parsed.data : {};
}

export async function registerWebhookRoutes(
  app: FastifyInstance,
  service: ObservationService,
): Promise<void> {

  // ═══════════════════════════════════════════════════════════════
  // POST /webhook
  // 400 on validation failure (nothing written), 500 on storage failure
  // ═══════════════════════════════════════════════════════════════
  app.post('/webhook', async (req: FastifyRequest<{
    Body: unknown
  }>, reply: FastifyReply) => {
    const data = await service.ingest(toPayload(req.body));

    req.log.info({ symbol: data.symbol, price: data.price, atr: data.atr }, '[Webhook] Observation stored');

    const response: WebhookResponse = {
      status: 'success',
      message: `Data for ${data.symbol} received and stored`,
      data,
    };
    return reply.send(response);
  });
}
