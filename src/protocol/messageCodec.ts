/**
 * Link message codec.
 *
 * | type (1B) | length (2B, big endian) | payload (length B) | checksum (1B) |
 *
 * The checksum is the XOR of every byte before it. A parity fold catches any single-bit
 * error but not flips that cancel out, e.g. the same bit flipped in two different bytes.
 */
import { MessageType } from '../types.js';
import type { DecodeError, DecodeErrorCode, DecodeResult } from '../types.js';

export const MESSAGE_HEADER_BYTES = 3; // type + length
export const MESSAGE_CHECKSUM_BYTES = 1;
export const MESSAGE_OVERHEAD_BYTES = MESSAGE_HEADER_BYTES + MESSAGE_CHECKSUM_BYTES;
export const MAX_PAYLOAD_BYTES = 0xffff;

const KNOWN_TYPES: ReadonlySet<number> = new Set([
  MessageType.Control,
  MessageType.Data,
  MessageType.Error,
  MessageType.Ack,
  MessageType.Info,
]);

export function isMessageType(value: number): value is MessageType {
  return KNOWN_TYPES.has(value);
}

export function xorChecksum(bytes: Uint8Array, start = 0, end = bytes.length): number {
  let sum = 0;
  for (let i = start; i < end; i += 1) {
    sum ^= bytes[i];
  }
  return sum;
}

export function encodeMessage(type: MessageType, payload: Uint8Array = Buffer.alloc(0)): Buffer {
  if (payload.length > MAX_PAYLOAD_BYTES) {
    throw new RangeError(`payload too large: ${payload.length} > ${MAX_PAYLOAD_BYTES}`);
  }
  const buffer = Buffer.alloc(MESSAGE_OVERHEAD_BYTES + payload.length);
  buffer.writeUInt8(type, 0);
  buffer.writeUInt16BE(payload.length, 1);
  buffer.set(payload, MESSAGE_HEADER_BYTES);
  const checksumOffset = MESSAGE_HEADER_BYTES + payload.length;
  buffer.writeUInt8(xorChecksum(buffer, 0, checksumOffset), checksumOffset);
  return buffer;
}

function fail(code: DecodeErrorCode, message: string, byteLength: number): DecodeResult {
  const error: DecodeError = { code, message, byteLength };
  return { ok: false, error };
}

/**
 * Decode exactly one message. Every byte of the input must belong to the message.
 */
export function decodeMessage(bytes: Uint8Array): DecodeResult {
  if (bytes.length < MESSAGE_OVERHEAD_BYTES) {
    return fail(
      'truncated',
      `expected at least ${MESSAGE_OVERHEAD_BYTES} bytes, got ${bytes.length}`,
      bytes.length
    );
  }
  const type = bytes[0];
  if (!isMessageType(type)) {
    return fail('unknown_type', `unknown message type 0x${type.toString(16).padStart(2, '0')}`, bytes.length);
  }
  const length = (bytes[1] << 8) | bytes[2];
  if (bytes.length !== length + MESSAGE_OVERHEAD_BYTES) {
    return fail(
      'length_mismatch',
      `declared payload ${length} bytes, frame holds ${bytes.length - MESSAGE_OVERHEAD_BYTES}`,
      bytes.length
    );
  }
  const checksumOffset = bytes.length - 1;
  const expected = xorChecksum(bytes, 0, checksumOffset);
  const checksum = bytes[checksumOffset];
  if (checksum !== expected) {
    return fail(
      'checksum_mismatch',
      `checksum 0x${checksum.toString(16).padStart(2, '0')} != 0x${expected.toString(16).padStart(2, '0')}`,
      bytes.length
    );
  }
  const payload = Buffer.from(bytes.subarray(MESSAGE_HEADER_BYTES, checksumOffset));
  return { ok: true, message: { type, length, payload, checksum } };
}
