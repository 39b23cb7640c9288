/**
 * Segment layout carried inside Data messages:
 * | frameId (2B, big endian) | segmentId (1B) | totalSegments (1B) | data |
 */
import { MessageType } from '../types.js';
import type { Segment, SegmentParseResult } from '../types.js';
import { MAX_PAYLOAD_BYTES, MESSAGE_OVERHEAD_BYTES, encodeMessage } from './messageCodec.js';

export const SEGMENT_HEADER_BYTES = 4;
export const MAX_SEGMENTS = 0xff;
export const MAX_FRAME_ID = 0xffff;

export function parseSegment(payload: Uint8Array): SegmentParseResult {
  if (payload.length < SEGMENT_HEADER_BYTES) {
    return {
      ok: false,
      error: {
        code: 'invalid_segment',
        message: `segment header needs ${SEGMENT_HEADER_BYTES} bytes, got ${payload.length}`,
      },
    };
  }
  const view = new DataView(payload.buffer, payload.byteOffset, payload.byteLength);
  return {
    ok: true,
    segment: {
      frameId: view.getUint16(0, false),
      segmentId: view.getUint8(2),
      totalSegments: view.getUint8(3),
      data: Buffer.from(payload.subarray(SEGMENT_HEADER_BYTES)),
    },
  };
}

export function encodeSegment(segment: Segment): Buffer {
  if (!Number.isInteger(segment.frameId) || segment.frameId < 0 || segment.frameId > MAX_FRAME_ID) {
    throw new RangeError(`frameId out of range: ${segment.frameId}`);
  }
  if (segment.totalSegments < 1 || segment.totalSegments > MAX_SEGMENTS) {
    throw new RangeError(`totalSegments out of range: ${segment.totalSegments}`);
  }
  if (segment.segmentId < 0 || segment.segmentId >= segment.totalSegments) {
    throw new RangeError(`segmentId ${segment.segmentId} outside 0..${segment.totalSegments - 1}`);
  }
  const buffer = Buffer.alloc(SEGMENT_HEADER_BYTES + segment.data.length);
  buffer.writeUInt16BE(segment.frameId, 0);
  buffer.writeUInt8(segment.segmentId, 2);
  buffer.writeUInt8(segment.totalSegments, 3);
  segment.data.copy(buffer, SEGMENT_HEADER_BYTES);
  return buffer;
}

/** Largest MTU for which a single Data message can still be encoded. */
const MAX_USEFUL_MTU = MAX_PAYLOAD_BYTES + MESSAGE_OVERHEAD_BYTES;

/**
 * Splits outgoing frames into Data messages no larger than the MTU.
 * Frame ids increase per frame and wrap after 65535.
 */
export class FrameSegmenter {
  readonly dataBytesPerSegment: number;
  private nextFrameId: number;

  constructor(mtu: number, firstFrameId = 0) {
    const overhead = MESSAGE_OVERHEAD_BYTES + SEGMENT_HEADER_BYTES;
    if (!Number.isInteger(mtu) || mtu <= overhead) {
      throw new RangeError(`mtu must be an integer above ${overhead}, got ${mtu}`);
    }
    this.dataBytesPerSegment = Math.min(mtu, MAX_USEFUL_MTU) - overhead;
    this.nextFrameId = firstFrameId & MAX_FRAME_ID;
  }

  get maxFrameBytes(): number {
    return this.dataBytesPerSegment * MAX_SEGMENTS;
  }

  segment(payload: Uint8Array): { frameId: number; messages: Buffer[] } {
    if (payload.length > this.maxFrameBytes) {
      throw new RangeError(`frame too large: ${payload.length} > ${this.maxFrameBytes}`);
    }
    const frameId = this.nextFrameId;
    this.nextFrameId = (this.nextFrameId + 1) & MAX_FRAME_ID;

    const totalSegments = Math.max(1, Math.ceil(payload.length / this.dataBytesPerSegment));
    const source = Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength);
    const messages: Buffer[] = [];
    for (let segmentId = 0; segmentId < totalSegments; segmentId += 1) {
      const start = segmentId * this.dataBytesPerSegment;
      const data = source.subarray(start, start + this.dataBytesPerSegment);
      messages.push(encodeMessage(MessageType.Data, encodeSegment({ frameId, segmentId, totalSegments, data })));
    }
    return { frameId, messages };
  }
}
