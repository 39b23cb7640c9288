export enum MessageType {
  Control = 0x01,
  Data = 0x02,
  Error = 0x03,
  Ack = 0x04,
  Info = 0x05,
}

export const LINK_ERROR_CODES = [
  'truncated',
  'unknown_type',
  'length_mismatch',
  'checksum_mismatch',
  'invalid_segment',
  'incomplete_frame_discarded',
] as const;

export type LinkErrorCode = (typeof LINK_ERROR_CODES)[number];

export type DecodeErrorCode = Extract<
  LinkErrorCode,
  'truncated' | 'unknown_type' | 'length_mismatch' | 'checksum_mismatch'
>;

export interface Message {
  readonly type: MessageType;
  readonly length: number;
  readonly payload: Buffer;
  readonly checksum: number;
}

export interface DecodeError {
  readonly code: DecodeErrorCode;
  readonly message: string;
  /** Number of bytes the failed candidate occupied on the wire. */
  readonly byteLength: number;
}

export type DecodeResult = { ok: true; message: Message } | { ok: false; error: DecodeError };

/** One item produced by the deframer: a validated message or the reason a candidate was dropped. */
export type DeframedItem = { kind: 'message'; message: Message } | { kind: 'error'; error: DecodeError };

export interface Segment {
  frameId: number;
  segmentId: number;
  totalSegments: number;
  data: Buffer;
}

export interface SegmentError {
  readonly code: 'invalid_segment';
  readonly message: string;
  readonly frameId?: number;
  readonly segmentId?: number;
}

export type SegmentParseResult = { ok: true; segment: Segment } | { ok: false; error: SegmentError };

export interface ReassembledFrame {
  readonly frameId: number;
  readonly payload: Buffer;
}

export type SegmentOutcome =
  | { status: 'complete'; frame: ReassembledFrame }
  | { status: 'pending'; frameId: number; received: number; totalSegments: number }
  | { status: 'rejected'; error: SegmentError };

export interface DiscardedFrame {
  readonly code: 'incomplete_frame_discarded';
  readonly frameId: number;
  readonly received: number;
  readonly totalSegments: number;
  readonly reason: 'capacity' | 'timeout' | 'closed';
}

export type ControlPayload = { kind: 'mtu'; mtu: number } | { kind: 'opaque'; payload: Buffer };

export type LinkError =
  | DecodeError
  | SegmentError
  | (DiscardedFrame & { readonly message: string });

export interface LinkStats {
  linkId: string;
  openedAt: string;
  closedAt?: string;
  bytesReceived: number;
  /** Bytes that completed a message or a rejected candidate. */
  bytesFramed: number;
  pendingBytes: number;
  messages: number;
  /** Deframed items left undispatched because a handler threw. */
  undeliveredItems: number;
  framesCompleted: number;
  framesPending: number;
  peerMtu: number | null;
  errors: Record<LinkErrorCode, number>;
}

export interface StorageDriver<T> {
  init(): Promise<void>;
  append(record: T): Promise<void>;
  readAll(): Promise<T[]>;
  readRecent?(limit: number): Promise<T[]>;
}

export interface AppConfig {
  link: {
    mtu: number;
  };
  reassembly: {
    maxPendingFrames: number;
    frameTimeoutMs: number;
    sweepIntervalMs: number;
  };
  storage: {
    path: string;
    retentionDays: number;
    maxRows: number;
  };
}
