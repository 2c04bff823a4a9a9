import express, { type NextFunction, type Request, type Response } from 'express';
import type { Response as FetchResponse } from 'node-fetch';
import { Readable } from 'stream';
import type { Programme } from './epg/types';
import { UnknownChannelError } from './errors';
import { defaultFetch, type FetchFn } from './fetch';
import { createLogger, errorMessage } from './log';
import type { Channel } from './playlist/types';
import type { PresentationService } from './presentation/service';
import type { SyncOutcome, SyncReason } from './sync/scheduler';
import { buildTiles, renderGrid, renderPage, UNAVAILABLE_FRAGMENT } from './ui/channelGrid';

const log = createLogger('http');

export interface AppDeps {
  presentation: PresentationService;
  sync: { trigger(reason?: SyncReason): Promise<SyncOutcome> };
  pageTemplate: string;
  displayTimeZone: string;
  userAgent: string;
  fetch?: FetchFn;
}

const iso = (ms: number) => new Date(ms).toISOString();

export function programmeJson(p: Programme | undefined) {
  if (!p) return null;
  return {
    title: p.title,
    description: p.description ?? null,
    category: p.category ?? null,
    start: iso(p.start),
    end: iso(p.end),
  };
}

export function channelJson(ch: Channel) {
  return {
    id: ch.id,
    lcn: ch.lcn,
    name: ch.name,
    logo: ch.logo ?? null,
    kind: ch.kind,
    group: ch.group ?? null,
  };
}

type Handler = (req: Request, res: Response) => Promise<unknown> | unknown;

// Express 4 does not forward rejected promises to the error middleware
function route(fn: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve()
      .then(() => fn(req, res))
      .catch(next);
  };
}

function limitParam(raw: unknown, fallback: number, max: number): number {
  const n = typeof raw === 'string' ? parseInt(raw, 10) : NaN;
  if (!Number.isFinite(n) || n < 1) return fallback;
  return Math.min(n, max);
}

export function createApp(deps: AppDeps): express.Express {
  const { presentation } = deps;
  const fetchFn = deps.fetch || defaultFetch;
  const app = express();

  app.use((req: Request, res: Response, next: NextFunction) => {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Accept, Range');
    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  });
  app.use((req: Request, _res: Response, next: NextFunction) => {
    log.debug(req.method, req.url);
    next();
  });

  const gridFragment = (): string => {
    const grid = presentation.grid();
    if (!grid) return UNAVAILABLE_FRAGMENT;
    return renderGrid(buildTiles(grid.rows, grid.at, deps.displayTimeZone));
  };

  app.get('/', (_req: Request, res: Response) => {
    res.setHeader('content-type', 'text/html; charset=utf-8');
    res.setHeader('Cache-Control', 'no-store');
    res.send(renderPage(deps.pageTemplate, gridFragment()));
  });

  app.get('/grid', (_req: Request, res: Response) => {
    res.setHeader('content-type', 'text/html; charset=utf-8');
    res.setHeader('Cache-Control', 'no-store');
    res.send(gridFragment());
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).send('ok');
  });

  app.get('/api/health', (_req: Request, res: Response) => {
    res.json(presentation.health());
  });

  app.get('/api/channels', (_req: Request, res: Response) => {
    const channels = presentation.listChannels();
    if (!channels) {
      res.status(503).json({ error: 'no-data' });
      return;
    }
    res.json(channels.map(channelJson));
  });

  app.get('/api/channels/:id/now-next', (req: Request, res: Response) => {
    const found = presentation.nowNext(req.params.id);
    if (!found.found) throw new UnknownChannelError(found.channelId);
    const { result } = found;
    const body = {
      id: found.channel.id,
      at: iso(found.at),
      status: result.status === 'ok' ? 'ok' : 'no-guide-data',
      current: result.status === 'ok' ? programmeJson(result.current) : null,
      next: result.status === 'ok' ? programmeJson(result.next) : null,
      progress: result.status === 'ok' && result.progress !== undefined ? result.progress : null,
    };
    res.setHeader('Cache-Control', 'no-store');
    res.json(body);
  });

  app.get('/api/channels/:id/stream', (req: Request, res: Response) => {
    const found = presentation.resolveStream(req.params.id);
    if (!found.found) throw new UnknownChannelError(found.channelId);
    res.json({ id: found.channel.id, name: found.channel.name, kind: found.channel.kind, stream: found.stream });
  });

  app.get('/api/channels/:id/guide', (req: Request, res: Response) => {
    const found = presentation.schedule(req.params.id, limitParam(req.query.limit, 12, 100));
    if (!found.found) throw new UnknownChannelError(found.channelId);
    res.json({ id: found.channel.id, programmes: found.programmes.map(programmeJson) });
  });

  app.get('/api/channels/:id/relay', route(async (req: Request, res: Response) => {
    const found = presentation.resolveStream(req.params.id);
    if (!found.found) throw new UnknownChannelError(found.channelId);
    let upstream: FetchResponse;
    try {
      upstream = await fetchFn(found.original, {
        headers: { 'user-agent': deps.userAgent, accept: 'audio/*,*/*' },
      });
    } catch (e) {
      log.warn('Relay upstream failed', found.channel.id, errorMessage(e));
      res.status(502).json({ error: 'stream-unavailable', id: found.channel.id });
      return;
    }
    if (!upstream.ok) {
      log.warn('Relay upstream status', found.channel.id, upstream.status);
      res.status(502).json({ error: 'stream-unavailable', id: found.channel.id });
      return;
    }
    res.status(200);
    res.setHeader('Content-Type', upstream.headers.get('content-type') || 'audio/mpeg');
    res.setHeader('Cache-Control', 'no-cache');
    const length = upstream.headers.get('content-length');
    if (length) res.setHeader('Content-Length', length);
    const body = upstream.body;
    // fires on completion and on client disconnect
    res.on('close', () => {
      if (body instanceof Readable) body.destroy();
    });
    body.on('error', (e: Error) => {
      log.warn('Relay stream error', found.channel.id, e.message);
      res.destroy(e);
    });
    body.pipe(res);
  }));

  app.post('/api/sync', route(async (_req: Request, res: Response) => {
    const outcome = await deps.sync.trigger('manual');
    if (outcome.status === 'published') {
      res.json({
        status: 'published',
        syncedAt: iso(outcome.snapshot.syncedAt),
        channels: outcome.snapshot.channels.length,
        guideFailure: outcome.guideFailure ?? null,
      });
    } else if (outcome.status === 'failed') {
      res.status(502).json({ status: 'failed', failure: outcome.failure });
    } else {
      res.status(503).json({ status: 'abandoned' });
    }
  }));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'not-found' });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof UnknownChannelError) {
      res.status(404).json({ error: 'unknown-channel', id: err.channelId });
      return;
    }
    log.error('Request failed:', err);
    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(500).json({ error: 'internal' });
  });

  return app;
}
