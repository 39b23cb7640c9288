import { describe, expect, it, vi } from 'vitest';
import type { DiscardedFrame, Segment } from '../types.js';
import { SegmentReassembler } from './segmentReassembler.js';

const seg = (frameId: number, segmentId: number, totalSegments: number, data: number[] | string): Segment => ({
  frameId,
  segmentId,
  totalSegments,
  data: typeof data === 'string' ? Buffer.from(data) : Buffer.from(data),
});

describe('SegmentReassembler', () => {
  it('completes a frame once every segment arrived', () => {
    const reassembler = new SegmentReassembler({ frameTimeoutMs: 0 });
    const first = reassembler.addSegment(seg(1, 1, 2, [0xcc]));
    expect(first).toEqual({ status: 'pending', frameId: 1, received: 1, totalSegments: 2 });

    const second = reassembler.addSegment(seg(1, 0, 2, [0xaa, 0xbb]));
    expect(second.status).toBe('complete');
    if (second.status !== 'complete') return;
    expect(second.frame.frameId).toBe(1);
    expect([...second.frame.payload]).toEqual([0xaa, 0xbb, 0xcc]);
    expect(reassembler.has(1)).toBe(false);
  });

  it('completes single segment frames immediately', () => {
    const outcome = new SegmentReassembler().addSegment(seg(9, 0, 1, 'solo'));
    expect(outcome.status === 'complete' && outcome.frame.payload.toString()).toBe('solo');
  });

  it('produces the same payload for any arrival order', () => {
    const parts = ['aa', 'bb', 'cc', 'dd'];
    for (const order of [
      [0, 1, 2, 3],
      [3, 2, 1, 0],
      [2, 0, 3, 1],
      [1, 3, 0, 2],
    ]) {
      const reassembler = new SegmentReassembler({ frameTimeoutMs: 0 });
      const outcomes = order.map((segmentId) => reassembler.addSegment(seg(4, segmentId, 4, parts[segmentId])));
      const last = outcomes[outcomes.length - 1];
      expect(outcomes.slice(0, -1).every((outcome) => outcome.status === 'pending')).toBe(true);
      expect(last.status === 'complete' && last.frame.payload.toString()).toBe('aabbccdd');
    }
  });

  it('keeps the latest data when a segment is repeated', () => {
    const reassembler = new SegmentReassembler({ frameTimeoutMs: 0 });
    reassembler.addSegment(seg(2, 0, 2, 'old'));
    const repeat = reassembler.addSegment(seg(2, 0, 2, 'new'));
    expect(repeat).toEqual({ status: 'pending', frameId: 2, received: 1, totalSegments: 2 });

    const done = reassembler.addSegment(seg(2, 1, 2, '!'));
    expect(done.status === 'complete' && done.frame.payload.toString()).toBe('new!');
    expect(reassembler.stats().overwrittenSegments).toBe(1);
  });

  it('rejects a segment id at or beyond the total without touching state', () => {
    const reassembler = new SegmentReassembler({ frameTimeoutMs: 0 });
    const outcome = reassembler.addSegment(seg(3, 2, 2, 'x'));
    expect(outcome).toMatchObject({ status: 'rejected', error: { code: 'invalid_segment', frameId: 3, segmentId: 2 } });
    expect(reassembler.has(3)).toBe(false);
    expect(reassembler.stats().invalidSegments).toBe(1);
  });

  it('rejects a zero segment count', () => {
    const outcome = new SegmentReassembler().addSegment(seg(3, 0, 0, 'x'));
    expect(outcome.status).toBe('rejected');
  });

  it('keeps the first recorded segment count', () => {
    const reassembler = new SegmentReassembler({ frameTimeoutMs: 0 });
    reassembler.addSegment(seg(5, 0, 2, 'a'));
    const outcome = reassembler.addSegment(seg(5, 1, 3, 'b'));
    expect(outcome.status === 'complete' && outcome.frame.payload.toString()).toBe('ab');
  });

  it('rejects a segment beyond the recorded count even if its own count allows it', () => {
    const reassembler = new SegmentReassembler({ frameTimeoutMs: 0 });
    reassembler.addSegment(seg(5, 0, 2, 'a'));
    const outcome = reassembler.addSegment(seg(5, 2, 3, 'c'));
    expect(outcome).toMatchObject({ status: 'rejected', error: { code: 'invalid_segment' } });
    expect(reassembler.stats().pendingFrames).toBe(1);

    const done = reassembler.addSegment(seg(5, 1, 2, 'b'));
    expect(done.status === 'complete' && done.frame.payload.toString()).toBe('ab');
  });

  it('evicts the oldest frame when the pending limit is exceeded', () => {
    const discarded: DiscardedFrame[] = [];
    const reassembler = new SegmentReassembler({
      maxPendingFrames: 1,
      frameTimeoutMs: 0,
      onDiscard: (frame) => discarded.push(frame),
    });

    reassembler.addSegment(seg(1, 0, 2, 'a'));
    reassembler.addSegment(seg(2, 0, 2, 'b'));
    expect(reassembler.has(1)).toBe(false);
    expect(discarded).toEqual([
      { code: 'incomplete_frame_discarded', frameId: 1, received: 1, totalSegments: 2, reason: 'capacity' },
    ]);

    const late = reassembler.addSegment(seg(1, 1, 2, 'a2'));
    expect(late).toEqual({ status: 'pending', frameId: 1, received: 1, totalSegments: 2 });
    expect(discarded.map((frame) => frame.frameId)).toEqual([1, 2]);
    expect(reassembler.stats().incompleteFramesDiscarded).toBe(2);
  });

  it('does not evict for a frame that completes with its first segment', () => {
    const discarded: DiscardedFrame[] = [];
    const reassembler = new SegmentReassembler({
      maxPendingFrames: 1,
      frameTimeoutMs: 0,
      onDiscard: (frame) => discarded.push(frame),
    });

    reassembler.addSegment(seg(1, 0, 2, 'a'));
    const single = reassembler.addSegment(seg(2, 0, 1, 'solo'));
    expect(single.status === 'complete' && single.frame.payload.toString()).toBe('solo');
    expect(discarded).toEqual([]);
    expect(reassembler.stats().incompleteFramesDiscarded).toBe(0);

    const done = reassembler.addSegment(seg(1, 1, 2, 'b'));
    expect(done.status === 'complete' && done.frame.payload.toString()).toBe('ab');
  });

  it('drops frames that stopped receiving segments', () => {
    let now = 0;
    const onDiscard = vi.fn();
    const reassembler = new SegmentReassembler({ frameTimeoutMs: 100, now: () => now, onDiscard });

    reassembler.addSegment(seg(1, 0, 2, 'a'));
    now = 150;
    reassembler.addSegment(seg(2, 0, 2, 'b'));
    expect(reassembler.has(1)).toBe(false);
    expect(reassembler.has(2)).toBe(true);
    expect(onDiscard).toHaveBeenCalledWith(expect.objectContaining({ frameId: 1, reason: 'timeout' }));

    expect(reassembler.sweep(200)).toBe(0);
    expect(reassembler.sweep(250)).toBe(1);
    expect(reassembler.pendingFrames).toBe(0);
  });

  it('measures the timeout from the most recent segment', () => {
    let now = 0;
    const reassembler = new SegmentReassembler({ frameTimeoutMs: 100, now: () => now });
    reassembler.addSegment(seg(1, 0, 3, 'a'));
    now = 80;
    reassembler.addSegment(seg(1, 1, 3, 'b'));
    now = 150;
    expect(reassembler.sweep()).toBe(0);
    const done = reassembler.addSegment(seg(1, 2, 3, 'c'));
    expect(done.status === 'complete' && done.frame.payload.toString()).toBe('abc');
  });

  it('reuses a frame id after the frame completed', () => {
    const reassembler = new SegmentReassembler({ frameTimeoutMs: 0 });
    reassembler.addSegment(seg(7, 0, 1, 'first'));
    const outcome = reassembler.addSegment(seg(7, 0, 2, 'x'));
    expect(outcome).toEqual({ status: 'pending', frameId: 7, received: 1, totalSegments: 2 });
    expect(reassembler.stats().framesCompleted).toBe(1);
  });

  it('discards everything on clear', () => {
    const onDiscard = vi.fn();
    const reassembler = new SegmentReassembler({ frameTimeoutMs: 0, onDiscard });
    reassembler.addSegment(seg(1, 0, 2, 'a'));
    reassembler.addSegment(seg(2, 0, 2, 'b'));
    expect(reassembler.clear()).toBe(2);
    expect(onDiscard).toHaveBeenCalledTimes(2);
    expect(onDiscard).toHaveBeenLastCalledWith(expect.objectContaining({ frameId: 2, reason: 'closed' }));
    expect(reassembler.pendingFrames).toBe(0);
  });
});
