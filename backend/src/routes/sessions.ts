import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { StoreError, type TelemetryStore } from '../services/store.js';
import { SseHub, openEventStream, writeEvent } from '../services/sse.js';
import type { SessionEvent } from '../types/telemetry.js';

const ListQuery = z.object({
  deviceId: z.string().min(1).optional(),
});

const SamplesQuery = z.object({
  from: z.coerce.number().optional(),
  to: z.coerce.number().optional(),
  fromIndex: z.coerce.number().int().nonnegative().optional(),
  toIndex: z.coerce.number().int().nonnegative().optional(),
});

const StreamQuery = z.object({
  fromIndex: z.coerce.number().int().nonnegative().optional(),
});

const RenameBody = z.object({
  title: z.string().max(200).nullable(),
});

function requireSession(store: TelemetryStore, id: string) {
  const session = store.getSession(id);
  if (!session) throw new StoreError('SESSION_NOT_FOUND', `session ${id} not found`);
  return session;
}

// Resumes after the last delivered sample when the browser reconnects.
function resumeIndex(req: Request, fromIndex: number | undefined): number {
  const header = req.header('last-event-id');
  const lastId = header ? Number(header) : Number.NaN;
  if (Number.isInteger(lastId) && lastId >= 0) return lastId + 1;
  return fromIndex ?? 0;
}

async function follow(store: TelemetryStore, id: string, from: number, res: Response) {
  const abort = new AbortController();
  res.on('close', () => abort.abort());
  openEventStream(res);
  for await (const sample of store.tail(id, from, abort.signal)) {
    writeEvent(res, 'sample', sample, sample.index);
  }
  if (abort.signal.aborted) return;
  writeEvent(res, 'end', store.getSession(id));
  res.end();
}

export function sessionsRouter(store: TelemetryStore, hub: SseHub<SessionEvent>) {
  const router = Router();

  // GET /api/sessions?deviceId=...
  router.get('/', (req, res, next) => {
    try {
      const q = ListQuery.parse(req.query);
      return res.json(store.listSessions(q.deviceId));
    } catch (e) {
      return next(e);
    }
  });

  // DELETE /api/sessions
  router.delete('/', (_req, res) => {
    return res.json({ ok: true, deleted: store.purgeAll() });
  });

  // GET /api/sessions/events (SSE)
  router.get('/events', (_req, res) => {
    openEventStream(res);
    const id = hub.addClient(res);
    writeEvent(res, 'hello', { ok: true, openSessions: store.openCount() });
    res.on('close', () => hub.removeClient(id));
  });

  // GET /api/sessions/:id
  router.get('/:id', (req, res, next) => {
    try {
      return res.json(requireSession(store, req.params.id));
    } catch (e) {
      return next(e);
    }
  });

  // GET /api/sessions/:id/samples?from=&to=  |  ?fromIndex=&toIndex=
  router.get('/:id/samples', (req, res, next) => {
    try {
      const q = SamplesQuery.parse(req.query);
      const session = requireSession(store, req.params.id);
      const samples =
        q.from !== undefined || q.to !== undefined
          ? store.range(session.id, q.from ?? Number.NEGATIVE_INFINITY, q.to ?? Number.POSITIVE_INFINITY)
          : store.slice(session.id, q.fromIndex ?? 0, q.toIndex);
      return res.json({ session, samples });
    } catch (e) {
      return next(e);
    }
  });

  // GET /api/sessions/:id/stream?fromIndex=0 (SSE, follow live)
  router.get('/:id/stream', (req, res, next) => {
    try {
      const q = StreamQuery.parse(req.query);
      const session = requireSession(store, req.params.id);
      follow(store, session.id, resumeIndex(req, q.fromIndex), res).catch(next);
    } catch (e) {
      next(e);
    }
  });

  // POST /api/sessions/:id/stop
  router.post('/:id/stop', (req, res, next) => {
    try {
      return res.json(store.stop(req.params.id));
    } catch (e) {
      return next(e);
    }
  });

  // PATCH /api/sessions/:id  { title }
  router.patch('/:id', (req, res, next) => {
    try {
      const body = RenameBody.parse(req.body);
      return res.json(store.rename(req.params.id, body.title));
    } catch (e) {
      return next(e);
    }
  });

  // DELETE /api/sessions/:id
  router.delete('/:id', (req, res, next) => {
    try {
      if (!store.delete(req.params.id)) {
        throw new StoreError('SESSION_NOT_FOUND', `session ${req.params.id} not found`);
      }
      return res.json({ ok: true });
    } catch (e) {
      return next(e);
    }
  });

  return router;
}
