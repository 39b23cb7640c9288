import { LinkSession } from '../link/linkSession.js';
import type { LinkErrorCode, LinkStats, ReassembledFrame } from '../types.js';

export interface CaptureReplayOptions {
  /** Bytes handed to the session per simulated read. */
  chunkSize: number;
  mtu: number;
  maxPendingFrames?: number;
  frameTimeoutMs?: number;
  linkId?: string;
}

export interface CaptureReplayResult {
  frames: ReassembledFrame[];
  errors: Array<{ code: LinkErrorCode; message: string }>;
  stats: LinkStats;
}

/**
 * Runs a recorded link capture through the receive pipeline, one fixed-size read at a time.
 * The session clock stays at the replay's start time, so only capacity evicts frames.
 */
export function replayCapture(capture: Uint8Array, options: CaptureReplayOptions): CaptureReplayResult {
  if (!Number.isInteger(options.chunkSize) || options.chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, got ${options.chunkSize}`);
  }
  const startedAt = Date.now();
  const frames: ReassembledFrame[] = [];
  const errors: CaptureReplayResult['errors'] = [];
  const session = new LinkSession(
    {
      linkId: options.linkId ?? 'replay',
      mtu: options.mtu,
      maxPendingFrames: options.maxPendingFrames,
      frameTimeoutMs: options.frameTimeoutMs,
      now: () => startedAt,
    },
    {
      onFrame: (frame) => frames.push(frame),
      onError: (error) => errors.push({ code: error.code, message: error.message }),
    }
  );

  for (let offset = 0; offset < capture.length; offset += options.chunkSize) {
    session.feed(capture.subarray(offset, offset + options.chunkSize));
  }

  return { frames, errors, stats: session.close(startedAt) };
}
