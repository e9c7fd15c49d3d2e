/**
 * OBSERVATION ROUTES
 * ==================
 *
 * Read-only views for the dashboard. Storage failures surface as 500s,
 * never as empty lists.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { ValidationError } from '../../../common/errors.js';
import type { ObservationListResponse, ObservationView } from '../contracts/observation.types.js';
import { exportFilename, toCsv } from '../services/observation.csv.js';
import type { ObservationService } from '../services/observation.service.js';

const LimitSchema = z
  .string()
  .trim()
  .regex(/^-?\d+$/)
  .transform(Number)
  .refine(n => Number.isSafeInteger(n));

// A repeated `limit` key arrives as an array and is rejected
function parseLimit(raw: unknown): number | undefined {
  if (raw === undefined || raw === '') return undefined;

  const limit = LimitSchema.safeParse(raw);
  if (!limit.success) {
    throw new ValidationError('invalid limit');
  }
  return limit.data;
}

function list(data: ObservationView[]): ObservationListResponse {
  return { ok: true, count: data.length, data };
}

export async function registerObservationRoutes(
  app: FastifyInstance,
  service: ObservationService,
): Promise<void> {

  // ═══════════════════════════════════════════════════════════════
  // GET /api/observations/latest
  // One row per symbol, most recently updated first
  // ═══════════════════════════════════════════════════════════════
  app.get('/api/observations/latest', async (_req: FastifyRequest, reply: FastifyReply) => {
    const rows = await service.getLatest();
    return reply.send(list(rows));
  });

  // ═══════════════════════════════════════════════════════════════
  // GET /api/observations/latest.csv
  // ═══════════════════════════════════════════════════════════════
  app.get('/api/observations/latest.csv', async (_req: FastifyRequest, reply: FastifyReply) => {
    const rows = await service.getLatest();

    return reply
      .header('content-type', 'text/csv; charset=utf-8')
      .header('content-disposition', `attachment; filename="${exportFilename(new Date())}"`)
      .send(toCsv(rows));
  });

  // ═══════════════════════════════════════════════════════════════
  // GET /api/observations/summary
  // ═══════════════════════════════════════════════════════════════
  app.get('/api/observations/summary', async (_req: FastifyRequest, reply: FastifyReply) => {
    const summary = await service.getSummary();
    return reply.send({ ok: true, data: summary });
  });

  // ═══════════════════════════════════════════════════════════════
  // GET /api/observations?limit=N
  // Full history, newest first. limit <= 0 means unbounded
  // ═══════════════════════════════════════════════════════════════
  app.get('/api/observations', async (req: FastifyRequest<{
    Querystring: { limit?: string | string[] }
  }>, reply: FastifyReply) => {
    const rows = await service.getHistory(parseLimit(req.query.limit));
    return reply.send(list(rows));
  });
}
