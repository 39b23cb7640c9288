import { MessageType } from '../types.js';
import type { ControlPayload } from '../types.js';
import { encodeMessage } from './messageCodec.js';

export const MTU_CONTROL_BYTES = 2;

export function encodeMtuControl(mtu: number): Buffer {
  if (!Number.isInteger(mtu) || mtu < 0 || mtu > 0xffff) {
    throw new RangeError(`mtu out of range: ${mtu}`);
  }
  const payload = Buffer.alloc(MTU_CONTROL_BYTES);
  payload.writeUInt16BE(mtu, 0);
  return encodeMessage(MessageType.Control, payload);
}

// Only the MTU shape is defined; anything else goes to the caller untouched.
export function parseControl(payload: Buffer): ControlPayload {
  if (payload.length === MTU_CONTROL_BYTES) {
    return { kind: 'mtu', mtu: payload.readUInt16BE(0) };
  }
  return { kind: 'opaque', payload };
}
