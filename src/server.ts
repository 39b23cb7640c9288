import { createServer } from 'node:http';
import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import { WebSocket, WebSocketServer } from 'ws';
import { handleLinkConnection } from './ws/linkHandler.js';
import { logger } from './logger.js';
import { createLinkHistoryStore } from './storage/index.js';
import type { LinkHistoryRecord } from './storage/index.js';
import { loadConfig } from './config.js';
import { loadEnvironment } from './utils/env.js';
import { LinkRegistry } from './link/linkRegistry.js';
import type { StorageDriver } from './types.js';

loadEnvironment();

export class HttpError extends Error {
  statusCode: number;
  payload?: Record<string, unknown>;

  constructor(statusCode: number, message: string, payload?: Record<string, unknown>) {
    super(message);
    this.statusCode = statusCode;
    this.payload = payload;
  }
}

const DEFAULT_HISTORY_LIMIT = 50;
const MAX_HISTORY_LIMIT = 1_000;
const LINK_ID_PATTERN = /^[A-Za-z0-9_.:-]{1,64}$/;

export function parseHistoryLimit(raw: unknown): number {
  if (raw === undefined) return DEFAULT_HISTORY_LIMIT;
  const value = typeof raw === 'string' ? Number(raw) : NaN;
  if (!Number.isInteger(value) || value < 1 || value > MAX_HISTORY_LIMIT) {
    throw new HttpError(400, `limit must be an integer between 1 and ${MAX_HISTORY_LIMIT}`);
  }
  return value;
}

export function createApp(registry: LinkRegistry, historyStore: StorageDriver<LinkHistoryRecord>) {
  const app = express();
  app.use(helmet());
  if (process.env.NODE_ENV !== 'test') {
    app.use(morgan('dev'));
  }

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok', time: new Date().toISOString() });
  });

  app.get('/api/links', (_req, res) => {
    res.json({ links: registry.list() });
  });

  app.get('/api/links/history', async (req, res, next) => {
    try {
      const limit = parseHistoryLimit(req.query.limit);
      const rows = historyStore.readRecent
        ? await historyStore.readRecent(limit)
        : (await historyStore.readAll()).slice(-limit).reverse();
      res.json({ links: rows });
    } catch (error) {
      next(error);
    }
  });

  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof HttpError) {
      res.status(err.statusCode).json({ message: err.message, ...err.payload });
      return;
    }
    logger.error({ event: 'server_error', message: err.message });
    res.status(500).json({ message: err.message });
  });

  return app;
}

async function bootstrap() {
  const config = await loadConfig();
  const registry = new LinkRegistry();
  const historyStore = createLinkHistoryStore(config.storage.path, {
    retentionMs: config.storage.retentionDays * 24 * 60 * 60 * 1000,
    maxRows: config.storage.maxRows,
  });
  await historyStore.init();

  const app = createApp(registry, historyStore);
  const server = createServer(app);
  const linkWss = new WebSocketServer({ noServer: true });

  linkWss.on('connection', (ws, req) => {
    const url = new URL(req.url ?? '', 'http://localhost');
    const linkId = url.searchParams.get('linkId');
    const sendWsError = (message: string) => {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(JSON.stringify({ type: 'error', message }));
      }
      ws.close();
    };

    if (!linkId || !LINK_ID_PATTERN.test(linkId)) {
      sendWsError('linkId query param is required (letters, digits, _ . : -)');
      return;
    }
    if (registry.has(linkId)) {
      sendWsError(`link ${linkId} is already connected`);
      return;
    }

    try {
      handleLinkConnection(ws, linkId, { config, registry, historyStore });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ event: 'ws_handler_error', message });
      sendWsError(message);
    }
  });

  server.on('upgrade', (req, socket, head) => {
    const url = new URL(req.url ?? '', 'http://localhost');
    if (url.pathname === '/ws/link') {
      linkWss.handleUpgrade(req, socket, head, (ws) => linkWss.emit('connection', ws, req));
      return;
    }
    socket.write('HTTP/1.1 404 Not Found\r\n\r\n');
    socket.destroy();
  });

  const port = Number(process.env.TEST_SERVER_PORT ?? process.env.SERVER_PORT ?? process.env.PORT ?? 4100);
  server.listen(port, () => {
    logger.info({ event: 'server_started', port, mtu: config.link.mtu });
  });

  const shutdown = (signal: string) => {
    logger.info({ event: 'server_stopping', signal, links: registry.size });
    linkWss.clients.forEach((client) => client.close(1001, 'server shutting down'));
    server.close((error) => {
      if (error) {
        logger.error({ event: 'server_stop_error', message: error.message });
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

if (process.env.NODE_ENV !== 'test') {
  bootstrap().catch((error) => {
    console.error(error);
    process.exit(1);
  });
}
