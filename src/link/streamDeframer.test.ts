import { describe, expect, it } from 'vitest';
import { MessageType } from '../types.js';
import type { DeframedItem } from '../types.js';
import { encodeMessage } from '../protocol/messageCodec.js';
import { StreamDeframer } from './streamDeframer.js';

function describeItems(items: DeframedItem[]): string[] {
  return items.map((item) =>
    item.kind === 'message'
      ? `${MessageType[item.message.type]}:${item.message.payload.toString('hex')}`
      : `error:${item.error.code}`
  );
}

function feedInChunks(bytes: Buffer, sizes: number[]): DeframedItem[] {
  const deframer = new StreamDeframer();
  const items: DeframedItem[] = [];
  let offset = 0;
  let index = 0;
  while (offset < bytes.length) {
    const size = sizes[index % sizes.length];
    items.push(...deframer.feed(bytes.subarray(offset, offset + size)));
    offset += size;
    index += 1;
  }
  return items;
}

// Deterministic chunk sizes between 1 and 9 bytes.
function pseudoRandomSizes(count: number, seed: number): number[] {
  const sizes: number[] = [];
  let state = seed;
  for (let i = 0; i < count; i += 1) {
    state = (state * 48271) % 2147483647;
    sizes.push((state % 9) + 1);
  }
  return sizes;
}

describe('StreamDeframer', () => {
  const controlBytes = Buffer.from([0x01, 0x00, 0x02, 0x02, 0x00, 0x01]);

  it('reassembles a message split across reads', () => {
    const deframer = new StreamDeframer();
    expect(deframer.feed(controlBytes.subarray(0, 2))).toEqual([]);
    expect(deframer.feed(controlBytes.subarray(2, 4))).toEqual([]);
    const items = deframer.feed(controlBytes.subarray(4, 6));
    expect(describeItems(items)).toEqual(['Control:0200']);
    expect(items[0].kind === 'message' && items[0].message.checksum).toBe(0x01);
    expect(deframer.pendingBytes).toBe(0);
  });

  it('waits for the full header before reading the length', () => {
    const deframer = new StreamDeframer();
    deframer.feed(Buffer.from([0x02, 0x00]));
    expect(deframer.pendingHeader).toBeNull();
    expect(deframer.pendingBytes).toBe(2);
    deframer.feed(Buffer.from([0x05]));
    expect(deframer.pendingHeader).toEqual({ type: 0x02, length: 5 });
  });

  it('emits every message contained in one read', () => {
    const bytes = Buffer.concat([
      encodeMessage(MessageType.Info, Buffer.from('hi')),
      encodeMessage(MessageType.Ack),
      encodeMessage(MessageType.Error, Buffer.from([0x42])),
    ]);
    expect(describeItems(new StreamDeframer().feed(bytes))).toEqual(['Info:6869', 'Ack:', 'Error:42']);
  });

  it('yields the same items however the stream is chunked', () => {
    const corrupted = encodeMessage(MessageType.Data, Buffer.from([0x00, 0x01, 0x00, 0x01, 0x99]));
    corrupted[corrupted.length - 1] ^= 0xff;
    const bytes = Buffer.concat([
      encodeMessage(MessageType.Control, Buffer.from([0x01, 0x00])),
      encodeMessage(MessageType.Data, Buffer.alloc(300, 0x33)),
      encodeMessage(MessageType.Ack),
      corrupted,
      encodeMessage(MessageType.Info, Buffer.from('after')),
      Buffer.from([0x02, 0x00]),
    ]);

    const whole = describeItems(new StreamDeframer().feed(bytes));
    expect(whole).toEqual([
      'Control:0100',
      `Data:${'33'.repeat(300)}`,
      'Ack:',
      'error:checksum_mismatch',
      'Info:6166746572',
    ]);
    expect(describeItems(feedInChunks(bytes, [1]))).toEqual(whole);
    expect(describeItems(feedInChunks(bytes, [3]))).toEqual(whole);
    expect(describeItems(feedInChunks(bytes, [4, 1, 2]))).toEqual(whole);
    for (const seed of [1, 7, 42]) {
      expect(describeItems(feedInChunks(bytes, pseudoRandomSizes(64, seed)))).toEqual(whole);
    }
  });

  it('skips a message with a bad checksum and keeps the next one aligned', () => {
    const bad = Buffer.from([0x01, 0x00, 0x02, 0x02, 0x00, 0xfe]);
    const good = encodeMessage(MessageType.Info, Buffer.from([0x07]));
    const items = new StreamDeframer().feed(Buffer.concat([bad, good]));
    expect(describeItems(items)).toEqual(['error:checksum_mismatch', 'Info:07']);
    expect(items[0].kind === 'error' && items[0].error.byteLength).toBe(6);
  });

  it('advances past a candidate with an unknown type', () => {
    const unknown = Buffer.from([0x09, 0x00, 0x01, 0xaa, 0x09 ^ 0x01 ^ 0xaa]);
    const good = encodeMessage(MessageType.Ack);
    expect(describeItems(new StreamDeframer().feed(Buffer.concat([unknown, good])))).toEqual([
      'error:unknown_type',
      'Ack:',
    ]);
  });

  it('accounts for every byte it was given', () => {
    const deframer = new StreamDeframer();
    const bytes = Buffer.concat([encodeMessage(MessageType.Info, Buffer.from('abc')), Buffer.from([0x04, 0x00])]);
    deframer.feed(bytes);
    expect(deframer.consumedBytes).toBe(7);
    expect(deframer.pendingBytes).toBe(2);
    expect(deframer.consumedBytes + deframer.pendingBytes).toBe(bytes.length);
  });

  it('ignores empty reads', () => {
    const deframer = new StreamDeframer();
    expect(deframer.feed(Buffer.alloc(0))).toEqual([]);
    expect(deframer.pendingBytes).toBe(0);
  });

  it('drops buffered bytes on reset', () => {
    const deframer = new StreamDeframer();
    deframer.feed(Buffer.from([0x02, 0x00, 0x10, 0x01]));
    expect(deframer.reset()).toBe(4);
    expect(deframer.pendingHeader).toBeNull();
    expect(describeItems(deframer.feed(encodeMessage(MessageType.Ack)))).toEqual(['Ack:']);
  });
});
