import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import { logger } from '../logger.js';
import { LinkSession } from '../link/linkSession.js';
import type { LinkRegistry } from '../link/linkRegistry.js';
import type { LinkHistoryRecord } from '../storage/index.js';
import type { AppConfig, LinkError, StorageDriver } from '../types.js';

export interface LinkConnectionDeps {
  config: AppConfig;
  registry: LinkRegistry;
  historyStore?: StorageDriver<LinkHistoryRecord>;
}

export type LinkServerMessage =
  | { type: 'frame'; linkId: string; frameId: number; bytes: number; payload: string }
  | { type: 'mtu'; mtu: number }
  | { type: 'peer_message'; messageType: number; payload: string }
  | { type: 'link_error'; code: LinkError['code']; message: string }
  | { type: 'error'; message: string };

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/**
 * Bridges one gateway WebSocket carrying raw link bytes into a LinkSession.
 * Binary messages are link bytes in arrival order; text messages are not part of the link.
 */
export function handleLinkConnection(ws: WebSocket, linkId: string, deps: LinkConnectionDeps): LinkSession {
  const { config, registry, historyStore } = deps;
  const log = logger.child({ linkId });

  const sendJson = (payload: LinkServerMessage) => {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(payload));
    }
  };

  const session = new LinkSession(
    {
      linkId,
      mtu: config.link.mtu,
      maxPendingFrames: config.reassembly.maxPendingFrames,
      frameTimeoutMs: config.reassembly.frameTimeoutMs,
    },
    {
      onFrame: (frame) => {
        sendJson({
          type: 'frame',
          linkId,
          frameId: frame.frameId,
          bytes: frame.payload.length,
          payload: frame.payload.toString('base64'),
        });
      },
      onControl: (control) => {
        if (control.kind === 'mtu') {
          sendJson({ type: 'mtu', mtu: control.mtu });
        }
      },
      onMessage: (message) => {
        log.debug({ event: 'link_peer_message', messageType: message.type, bytes: message.length });
        sendJson({ type: 'peer_message', messageType: message.type, payload: message.payload.toString('base64') });
      },
      onError: (error) => {
        sendJson({ type: 'link_error', code: error.code, message: error.message });
      },
    }
  );
  registry.register(session);
  log.info({ event: 'link_opened', mtu: config.link.mtu });

  if (ws.readyState === WebSocket.OPEN) {
    ws.send(session.announceMtu(), { binary: true });
  }

  let sweepTimer: NodeJS.Timeout | null = null;
  if (config.reassembly.frameTimeoutMs > 0) {
    sweepTimer = setInterval(() => {
      session.sweep();
    }, config.reassembly.sweepIntervalMs);
    sweepTimer.unref();
  }

  let closed = false;
  const finish = () => {
    if (closed) return;
    closed = true;
    if (sweepTimer) {
      clearInterval(sweepTimer);
      sweepTimer = null;
    }
    const stats = session.close();
    registry.remove(linkId);
    if (!historyStore) return;
    const record: LinkHistoryRecord = { ...stats, closedAt: stats.closedAt ?? new Date().toISOString() };
    historyStore.append(record).catch((error: unknown) => {
      log.error({ event: 'link_history_error', message: error instanceof Error ? error.message : String(error) });
    });
  };

  ws.on('message', (data: RawData, isBinary: boolean) => {
    if (!isBinary) {
      sendJson({ type: 'error', message: 'link bytes must be sent as binary messages' });
      return;
    }
    try {
      session.feed(toBuffer(data));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error({ event: 'link_handler_error', message });
      sendJson({ type: 'error', message });
      ws.close(1011, 'link handler error');
      finish();
    }
  });

  ws.on('close', finish);

  ws.on('error', (err: Error) => {
    log.warn({ event: 'link_socket_error', message: err.message });
    finish();
  });

  return session;
}
