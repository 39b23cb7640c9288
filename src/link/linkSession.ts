import type { Logger } from 'pino';
import { MessageType } from '../types.js';
import type {
  ControlPayload,
  DiscardedFrame,
  LinkError,
  LinkErrorCode,
  LinkStats,
  Message,
  ReassembledFrame,
} from '../types.js';
import { logger as rootLogger } from '../logger.js';
import { encodeMtuControl, parseControl } from '../protocol/control.js';
import { parseSegment } from '../protocol/segment.js';
import { StreamDeframer } from './streamDeframer.js';
import { SegmentReassembler } from './segmentReassembler.js';

/**
 * A handler that throws aborts the rest of the current `feed`. The items it would have
 * dispatched are counted in `undeliveredItems` and the error is rethrown.
 */
export interface LinkHandlers {
  onFrame(frame: ReassembledFrame): void;
  onControl?(control: ControlPayload): void;
  /** Error, Ack and Info messages. */
  onMessage?(message: Message): void;
  onError?(error: LinkError): void;
}

export interface LinkSessionOptions {
  linkId: string;
  /** Local read size announced to the peer. */
  mtu: number;
  maxPendingFrames?: number;
  frameTimeoutMs?: number;
  now?: () => number;
  logger?: Logger;
}

function emptyErrorCounts(): Record<LinkErrorCode, number> {
  return {
    truncated: 0,
    unknown_type: 0,
    length_mismatch: 0,
    checksum_mismatch: 0,
    invalid_segment: 0,
    incomplete_frame_discarded: 0,
  };
}

/**
 * Receive pipeline for one link: bytes in, reassembled frames out.
 *
 * Everything runs synchronously inside `feed`; handlers are called before it returns.
 * One instance per connection, never shared.
 */
export class LinkSession {
  readonly linkId: string;
  readonly mtu: number;
  private readonly deframer = new StreamDeframer();
  private readonly reassembler: SegmentReassembler;
  private readonly log: Logger;
  private readonly openedAt: string;
  private closedAt: string | undefined;
  private bytesReceived = 0;
  private messages = 0;
  private undeliveredItems = 0;
  private pendingBytesAtClose = 0;
  private peerMtu: number | null = null;
  private readonly errors = emptyErrorCounts();

  constructor(options: LinkSessionOptions, private readonly handlers: LinkHandlers) {
    this.linkId = options.linkId;
    this.mtu = options.mtu;
    this.log = (options.logger ?? rootLogger).child({ linkId: options.linkId });
    this.openedAt = new Date(options.now?.() ?? Date.now()).toISOString();
    this.reassembler = new SegmentReassembler({
      maxPendingFrames: options.maxPendingFrames,
      frameTimeoutMs: options.frameTimeoutMs,
      now: options.now,
      onDiscard: (discarded) => this.handleDiscard(discarded),
    });
  }

  /** Control message to write to the peer once the channel is open. */
  announceMtu(): Buffer {
    return encodeMtuControl(this.mtu);
  }

  feed(chunk: Uint8Array): void {
    if (this.closedAt) {
      this.log.warn({ event: 'link_feed_after_close', bytes: chunk.length });
      return;
    }
    this.bytesReceived += chunk.length;
    const items = this.deframer.feed(chunk);
    for (let index = 0; index < items.length; index += 1) {
      const item = items[index];
      try {
        if (item.kind === 'error') {
          this.log.debug({ event: 'link_decode_error', code: item.error.code, reason: item.error.message });
          this.reportError(item.error);
          continue;
        }
        this.messages += 1;
        this.dispatch(item.message);
      } catch (error) {
        this.undeliveredItems += items.length - index - 1;
        throw error;
      }
    }
  }

  sweep(now?: number): number {
    return this.reassembler.sweep(now);
  }

  stats(): LinkStats {
    return {
      linkId: this.linkId,
      openedAt: this.openedAt,
      closedAt: this.closedAt,
      bytesReceived: this.bytesReceived,
      bytesFramed: this.deframer.consumedBytes,
      pendingBytes: this.closedAt ? this.pendingBytesAtClose : this.deframer.pendingBytes,
      messages: this.messages,
      undeliveredItems: this.undeliveredItems,
      framesCompleted: this.reassembler.stats().framesCompleted,
      framesPending: this.reassembler.pendingFrames,
      peerMtu: this.peerMtu,
      errors: { ...this.errors },
    };
  }

  /** Discards buffered bytes and unfinished frames. Safe to call more than once. */
  close(now?: number): LinkStats {
    if (!this.closedAt) {
      this.closedAt = new Date(now ?? Date.now()).toISOString();
      this.reassembler.clear();
      this.pendingBytesAtClose = this.deframer.reset();
      const stats = this.stats();
      this.log.info({
        event: 'link_closed',
        bytesReceived: stats.bytesReceived,
        framesCompleted: stats.framesCompleted,
        pendingBytes: stats.pendingBytes,
      });
    }
    return this.stats();
  }

  private dispatch(message: Message): void {
    switch (message.type) {
      case MessageType.Data: {
        const parsed = parseSegment(message.payload);
        if (!parsed.ok) {
          this.reportError(parsed.error);
          return;
        }
        const outcome = this.reassembler.addSegment(parsed.segment);
        if (outcome.status === 'rejected') {
          this.reportError(outcome.error);
        } else if (outcome.status === 'complete') {
          this.handlers.onFrame(outcome.frame);
        }
        return;
      }
      case MessageType.Control: {
        const control = parseControl(message.payload);
        if (control.kind === 'mtu' && this.peerMtu === null) {
          this.peerMtu = control.mtu;
          this.log.info({ event: 'link_peer_mtu', mtu: control.mtu });
        }
        this.handlers.onControl?.(control);
        return;
      }
      default:
        this.handlers.onMessage?.(message);
    }
  }

  private handleDiscard(discarded: DiscardedFrame): void {
    this.log.debug({
      event: 'frame_discarded',
      frameId: discarded.frameId,
      received: discarded.received,
      totalSegments: discarded.totalSegments,
      reason: discarded.reason,
    });
    this.reportError({
      ...discarded,
      message: `frame ${discarded.frameId} dropped with ${discarded.received}/${discarded.totalSegments} segments (${discarded.reason})`,
    });
  }

  private reportError(error: LinkError): void {
    this.errors[error.code] += 1;
    this.handlers.onError?.(error);
  }
}
