import type { DeframedItem } from '../types.js';
import { MESSAGE_CHECKSUM_BYTES, MESSAGE_HEADER_BYTES, decodeMessage } from '../protocol/messageCodec.js';

type DeframerMode =
  | { state: 'awaiting_header' }
  | { state: 'awaiting_payload'; type: number; length: number };

/**
 * Incremental message parser for one link.
 *
 * Accepts the link's bytes in whatever chunks the transport hands over and returns every
 * message (or decode error) completed by each chunk. The header's declared length is
 * trusted for framing, so a bad checksum costs one message and the next one still lines
 * up. A corrupted length field has no in-band recovery.
 */
export class StreamDeframer {
  private buffer: Buffer = Buffer.alloc(0);
  private mode: DeframerMode = { state: 'awaiting_header' };
  private consumed = 0;

  feed(chunk: Uint8Array): DeframedItem[] {
    if (chunk.length > 0) {
      this.buffer = this.buffer.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buffer, chunk]);
    }
    const items: DeframedItem[] = [];
    let offset = 0;

    while (true) {
      const available = this.buffer.length - offset;
      const mode = this.mode;
      if (mode.state === 'awaiting_header') {
        if (available < MESSAGE_HEADER_BYTES) break;
        this.mode = {
          state: 'awaiting_payload',
          type: this.buffer.readUInt8(offset),
          length: this.buffer.readUInt16BE(offset + 1),
        };
        continue;
      }

      const candidateBytes = MESSAGE_HEADER_BYTES + mode.length + MESSAGE_CHECKSUM_BYTES;
      if (available < candidateBytes) break;

      const candidate = this.buffer.subarray(offset, offset + candidateBytes);
      offset += candidateBytes;
      this.mode = { state: 'awaiting_header' };

      const result = decodeMessage(candidate);
      items.push(result.ok ? { kind: 'message', message: result.message } : { kind: 'error', error: result.error });
    }

    if (offset > 0) {
      this.consumed += offset;
      this.buffer = this.buffer.subarray(offset);
    }
    return items;
  }

  /** Bytes received but not yet part of a complete message. */
  get pendingBytes(): number {
    return this.buffer.length;
  }

  get consumedBytes(): number {
    return this.consumed;
  }

  /** Header of the message currently being collected, if one has been read. */
  get pendingHeader(): { type: number; length: number } | null {
    const mode = this.mode;
    if (mode.state === 'awaiting_header') return null;
    return { type: mode.type, length: mode.length };
  }

  /** Drops buffered bytes and returns how many were discarded. */
  reset(): number {
    const dropped = this.buffer.length;
    this.buffer = Buffer.alloc(0);
    this.mode = { state: 'awaiting_header' };
    return dropped;
  }
}
