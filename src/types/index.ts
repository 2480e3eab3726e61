/**
 * Core type definitions for the live audio relay
 */

/**
 * PCM format shared by every frame of a session
 */
export interface AudioFormat {
  /** Samples per second */
  sampleRate: number;
  /** Interleaved channel count */
  channels: number;
  /** Bits per sample */
  bitDepth: number;
  /** Nominal frame duration in milliseconds */
  frameDurationMs: number;
}

/**
 * One fixed-duration slice of captured audio
 */
export interface AudioFrame {
  readonly deviceId: string;
  /** Monotonic per session, starting at 0 */
  readonly sequence: number;
  /** Raw PCM */
  readonly payload: Buffer;
  /** Capture-side epoch millis */
  readonly capturedAt: number;
}

export type TransportKind = 'polling' | 'push';

export type SessionState = 'IDLE' | 'STREAMING' | 'BUFFERING' | 'PLAYING' | 'STOPPED';

export type JitterBufferState = 'BUFFERING' | 'PLAYING' | 'STOPPED';

export type SessionRole = 'sender' | 'receiver';

export type HealthStatus = 'good' | 'degraded' | 'failed';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'unavailable';

export type StopReason = 'requested' | 'transport_unavailable' | 'capture_failed' | 'relay_stopped';

/**
 * Result of a control-channel operation
 */
export interface SessionOperationResult {
  success: boolean;
  state: SessionState;
  error?: string;
}

/**
 * Point-in-time view of a session's health
 */
export interface MetricsSnapshot {
  deviceId: string;
  role: SessionRole;
  sessionState: SessionState;
  connectionState: ConnectionState;
  health: HealthStatus;
  /** Human-readable reasons behind a non-good health */
  reasons: string[];
  /** Observed bytes per second over the rate window */
  bytesPerSecond: number;
  expectedBytesPerSecond: number;
  framesTotal: number;
  bytesTotal: number;
  queueDepth: number;
  queueCapacity: number;
  underrunsTotal: number;
  underrunsInWindow: number;
  droppedFrames: number;
  sequenceGaps: number;
  rttMs: number | null;
  errorCount: number;
  lastError: string | null;
  stopReason: StopReason | null;
  /** Milliseconds since the session started */
  uptimeMs: number;
  timestamp: string;
}

/**
 * Relay-side session status
 */
export interface RelaySessionStatus {
  deviceId: string;
  active: boolean;
  parentId: string | null;
  recording: boolean;
  startedAt: string | null;
  lastActivityAt: string | null;
  timeoutMinutes: number;
  framesReceived: number;
  framesDelivered: number;
  framesEvicted: number;
  bufferDepth: number;
  bufferCapacity: number;
  producerConnected: boolean;
  consumerConnected: boolean;
}

/**
 * Recording statistics from disk
 */
export interface RecordingStats {
  /** Total bytes stored */
  totalSize: number;
  /** Number of frame files */
  fileCount: number;
  /** Bytes per device */
  byDevice: Record<string, number>;
}

/**
 * Source of raw PCM on the transmitting device
 */
export interface AudioInput {
  open(format: AudioFormat): Promise<void>;
  /**
   * Read up to `maxBytes`. Resolves with whatever arrived once `maxBytes` are
   * available, `timeoutMs` elapses or `signal` aborts; rejects on device error.
   */
  read(maxBytes: number, options: { timeoutMs: number; signal: AbortSignal }): Promise<Buffer>;
  close(): Promise<void>;
}

/**
 * Audio sink on the receiving device
 */
export interface AudioOutput {
  open(format: AudioFormat): Promise<void>;
  /** Resolves once the device has consumed the payload */
  write(payload: Buffer): Promise<void>;
  close(): Promise<void>;
}
