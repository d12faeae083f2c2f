import { Router } from 'express';
import { z } from 'zod';
import { EcgPayloadSchema, type EcgPayload, type EcgRecord } from '../types/ecg.js';
import type { EcgStore } from '../services/store.js';
import type { SseHub } from '../services/sse.js';

export type EcgBatchEvent = { userId?: string; records: EcgRecord[] };

export function toRecords(payload: EcgPayload, receivedAt: number): EcgRecord[] {
  if (Array.isArray(payload)) return payload.map((r) => ({ ...r, userId: undefined, receivedAt }));
  const userId = payload.user_id;
  return payload.data.map((r) => ({ ...r, userId, receivedAt }));
}

export function createEcgRouter(store: EcgStore, sse: SseHub<EcgBatchEvent>, now: () => number = Date.now) {
  const router = Router();

  // POST /api/ecg-data
  router.post('/', (req, res, next) => {
    try {
      const payload = EcgPayloadSchema.parse(req.body);
      const records = toRecords(payload, now());
      store.addMany(records);
      sse.broadcast('ecg', { userId: Array.isArray(payload) ? undefined : payload.user_id, records });
      return res.status(201).json({ ok: true, received: records.length });
    } catch (e) {
      return next(e);
    }
  });

  // GET /api/ecg-data/latest?userId=...
  router.get('/latest', (req, res) => {
    const userId = typeof req.query.userId === 'string' ? req.query.userId : undefined;
    const latest = store.latest(userId);
    if (!latest) return res.status(404).json({ error: 'NotFound' });
    return res.json(latest);
  });

  // GET /api/ecg-data/history?userId=...&limit=100
  router.get('/history', (req, res, next) => {
    try {
      const qp = z.object({
        userId: z.string().optional(),
        limit: z.coerce.number().int().positive().max(1000).optional()
      }).parse(req.query);

      return res.json(store.history(qp.userId, qp.limit ?? 100));
    } catch (e) {
      return next(e);
    }
  });

  // GET /api/ecg-data/stream (SSE)
  router.get('/stream', (req, res) => {
    const id = sse.open(res);
    req.on('close', () => sse.close(id));
  });

  return router;
}
