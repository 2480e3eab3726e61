/**
 * Device-side transport contract
 */
import { AudioFrame, ConnectionState, TransportKind } from './index.js';
import { FrameAck, PeerStatusEvent, SessionEndedEvent, StreamCommand } from './protocol.js';
import { RelayError } from '../utils/errors.js';

export type SendResult = { ok: true; ack: FrameAck } | { ok: false; error: RelayError };

/**
 * Transport events
 */
export interface TransportEvents {
  /** Connection state changed */
  state: (state: ConnectionState) => void;
  /** Persistent failure; the transport will not recover by itself */
  unavailable: (error: RelayError) => void;
  /** Control command addressed to this device */
  command: (command: StreamCommand) => void;
  /** Measured round-trip time */
  rtt: (rttMs: number) => void;
  /** The device's counterpart connected or left (push only) */
  peer: (event: PeerStatusEvent) => void;
  /** The relay ended the subscribed device's session (push only) */
  'session:ended': (event: SessionEndedEvent) => void;
}

interface TransportBase {
  readonly kind: TransportKind;
  connect(): Promise<void>;
  close(): Promise<void>;
  /** Upload one frame; transient failures are retried before resolving */
  send(frame: AudioFrame): Promise<SendResult>;
  getConnectionState(): ConnectionState;
  on<K extends keyof TransportEvents>(event: K, listener: TransportEvents[K]): this;
  off<K extends keyof TransportEvents>(event: K, listener: TransportEvents[K]): this;
}

/**
 * Request/response transport; the receiver pulls frames
 */
export interface PollingTransport extends TransportBase {
  readonly kind: 'polling';
  /** Atomically dequeue up to `maxCount` oldest frames from the relay */
  receive(deviceId: string, maxCount: number): Promise<AudioFrame[]>;
  /** Pending control commands for a producer */
  fetchCommands(deviceId: string): Promise<StreamCommand[]>;
}

/**
 * Persistent socket transport; the relay forwards frames as they arrive
 */
export interface PushTransport extends TransportBase {
  readonly kind: 'push';
  /**
   * Register as the consumer of a device; `onFrame` runs once per frame
   * @returns unsubscribe function
   */
  subscribe(deviceId: string, onFrame: (frame: AudioFrame) => void): () => void;
}

export type Transport = PollingTransport | PushTransport;
