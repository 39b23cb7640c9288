import type { DiscardedFrame, ReassembledFrame, Segment, SegmentError, SegmentOutcome } from '../types.js';
import { MAX_FRAME_ID, MAX_SEGMENTS } from '../protocol/segment.js';

export interface SegmentReassemblerOptions {
  /** Frames tracked at once before the oldest-created one is dropped. */
  maxPendingFrames?: number;
  /** Drop a frame when no segment arrived for this long. 0 disables the age check. */
  frameTimeoutMs?: number;
  now?: () => number;
  onDiscard?: (discarded: DiscardedFrame) => void;
}

interface FrameAssembly {
  frameId: number;
  totalSegments: number;
  segments: Map<number, Buffer>;
  createdAt: number;
  updatedAt: number;
}

export interface ReassemblerStats {
  pendingFrames: number;
  framesCompleted: number;
  invalidSegments: number;
  overwrittenSegments: number;
  incompleteFramesDiscarded: number;
}

const DEFAULT_MAX_PENDING_FRAMES = 32;
const DEFAULT_FRAME_TIMEOUT_MS = 2_000;

export class SegmentReassembler {
  // Map iteration order is insertion order, so the first key is always the oldest assembly.
  #frames = new Map<number, FrameAssembly>();
  #maxPendingFrames: number;
  #frameTimeoutMs: number;
  #now: () => number;
  #onDiscard: ((discarded: DiscardedFrame) => void) | undefined;
  #stats = { framesCompleted: 0, invalidSegments: 0, overwrittenSegments: 0, incompleteFramesDiscarded: 0 };

  constructor(options: SegmentReassemblerOptions = {}) {
    this.#maxPendingFrames = Math.max(1, options.maxPendingFrames ?? DEFAULT_MAX_PENDING_FRAMES);
    this.#frameTimeoutMs = Math.max(0, options.frameTimeoutMs ?? DEFAULT_FRAME_TIMEOUT_MS);
    this.#now = options.now ?? Date.now;
    this.#onDiscard = options.onDiscard;
  }

  addSegment(segment: Segment): SegmentOutcome {
    const { frameId, segmentId, totalSegments, data } = segment;
    const invalid = validate(segment);
    if (invalid) {
      return this.#reject(invalid);
    }

    const now = this.#now();
    this.sweep(now);

    let assembly = this.#frames.get(frameId);
    if (assembly && segmentId >= assembly.totalSegments) {
      return this.#reject({
        code: 'invalid_segment',
        message: `segmentId ${segmentId} outside recorded total ${assembly.totalSegments} for frame ${frameId}`,
        frameId,
        segmentId,
      });
    }
    const created = !assembly;
    if (!assembly) {
      assembly = { frameId, totalSegments, segments: new Map(), createdAt: now, updatedAt: now };
      this.#frames.set(frameId, assembly);
    }

    if (assembly.segments.has(segmentId)) {
      this.#stats.overwrittenSegments += 1;
    }
    assembly.segments.set(segmentId, data);
    assembly.updatedAt = now;

    if (assembly.segments.size < assembly.totalSegments) {
      // Only a frame that stays pending counts against the limit.
      if (created) this.#enforceCapacity();
      return { status: 'pending', frameId, received: assembly.segments.size, totalSegments: assembly.totalSegments };
    }

    this.#frames.delete(frameId);
    this.#stats.framesCompleted += 1;
    return { status: 'complete', frame: assemble(assembly) };
  }

  /** Drops frames whose last segment is older than the timeout. Returns how many were dropped. */
  sweep(now = this.#now()): number {
    if (this.#frameTimeoutMs === 0) return 0;
    let dropped = 0;
    for (const assembly of [...this.#frames.values()]) {
      if (now - assembly.updatedAt >= this.#frameTimeoutMs) {
        this.#discard(assembly, 'timeout');
        dropped += 1;
      }
    }
    return dropped;
  }

  /** Drops every pending frame, e.g. when the link goes away. */
  clear(): number {
    const pending = [...this.#frames.values()];
    for (const assembly of pending) {
      this.#discard(assembly, 'closed');
    }
    return pending.length;
  }

  has(frameId: number): boolean {
    return this.#frames.has(frameId);
  }

  get pendingFrames(): number {
    return this.#frames.size;
  }

  stats(): ReassemblerStats {
    return { pendingFrames: this.#frames.size, ...this.#stats };
  }

  #enforceCapacity(): void {
    while (this.#frames.size > this.#maxPendingFrames) {
      const oldest = this.#frames.values().next();
      if (oldest.done) return;
      this.#discard(oldest.value, 'capacity');
    }
  }

  #discard(assembly: FrameAssembly, reason: DiscardedFrame['reason']): void {
    this.#frames.delete(assembly.frameId);
    this.#stats.incompleteFramesDiscarded += 1;
    this.#onDiscard?.({
      code: 'incomplete_frame_discarded',
      frameId: assembly.frameId,
      received: assembly.segments.size,
      totalSegments: assembly.totalSegments,
      reason,
    });
  }

  #reject(error: SegmentError): SegmentOutcome {
    this.#stats.invalidSegments += 1;
    return { status: 'rejected', error };
  }
}

function validate(segment: Segment): SegmentError | null {
  const { frameId, segmentId, totalSegments } = segment;
  if (!Number.isInteger(frameId) || frameId < 0 || frameId > MAX_FRAME_ID) {
    return { code: 'invalid_segment', message: `frameId out of range: ${frameId}`, segmentId };
  }
  if (!Number.isInteger(totalSegments) || totalSegments < 1 || totalSegments > MAX_SEGMENTS) {
    return { code: 'invalid_segment', message: `totalSegments out of range: ${totalSegments}`, frameId, segmentId };
  }
  if (!Number.isInteger(segmentId) || segmentId < 0 || segmentId >= totalSegments) {
    return {
      code: 'invalid_segment',
      message: `segmentId ${segmentId} must be below totalSegments ${totalSegments}`,
      frameId,
      segmentId,
    };
  }
  return null;
}

function assemble(assembly: FrameAssembly): ReassembledFrame {
  const parts: Buffer[] = [];
  for (let segmentId = 0; segmentId < assembly.totalSegments; segmentId += 1) {
    const part = assembly.segments.get(segmentId);
    if (!part) {
      throw new Error(`frame ${assembly.frameId} complete but segment ${segmentId} missing`);
    }
    parts.push(part);
  }
  return { frameId: assembly.frameId, payload: Buffer.concat(parts) };
}
