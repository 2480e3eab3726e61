/**
 * Wire protocol types shared by the relay server and device transports
 */

/**
 * Frame metadata carried alongside the binary payload
 */
export interface FrameMetadata {
  deviceId: string;
  sequence: number;
  capturedAt: number;
  /** Payload size in bytes */
  size: number;
  /** Persist this frame even if the session is not recording */
  recording?: boolean;
}

/**
 * Relay acknowledgement of an accepted frame
 */
export interface FrameAck {
  sequence: number;
  /** Relay buffer depth after the frame was handled */
  bufferDepth: number;
  /** True when the frame went straight to a subscribed consumer */
  forwarded: boolean;
}

/**
 * Error payload returned over HTTP or in a socket ack
 */
export interface WireError {
  error: string;
  code: string;
}

export type PeerRole = 'producer' | 'consumer';

export interface RegisterRequest {
  deviceId: string;
  role: PeerRole;
}

export type RegisterAck = { success: true; deviceId: string; role: PeerRole; sessionActive: boolean } | ({ success: false } & WireError);

export type FrameAckResponse = ({ success: true } & FrameAck) | ({ success: false } & WireError);

export interface PeerStatusEvent {
  deviceId: string;
  role: PeerRole;
  connected: boolean;
}

export type StreamCommandType = 'start_audio_stream' | 'stop_audio_stream';

export type RelayStopReason = 'requested' | 'idle_timeout' | 'session_timeout' | 'shutdown';

/**
 * Sent to a device's consumer when the relay ends its session
 */
export interface SessionEndedEvent {
  deviceId: string;
  reason: RelayStopReason;
}

/**
 * Control command queued for a producer device
 */
export interface StreamCommand {
  id: string;
  type: StreamCommandType;
  deviceId: string;
  issuedAt: string;
  params?: Record<string, unknown>;
}

/**
 * Frame as returned by the polling endpoint
 */
export interface WireFrame {
  sequence: number;
  /** Base64-encoded PCM */
  payload: string;
  capturedAt: number;
}

export interface ReceiveFramesResponse {
  success: true;
  deviceId: string;
  frames: WireFrame[];
  count: number;
}

export type SendFrameResponse = { success: true } & FrameAck;

/**
 * Socket.io events sent by device clients
 */
export interface ClientToServerEvents {
  register: (request: RegisterRequest, ack: (response: RegisterAck) => void) => void;
  audio_frame: (metadata: FrameMetadata, payload: Buffer, ack: (response: FrameAckResponse) => void) => void;
  ping: (sentAt: number, ack: (sentAt: number) => void) => void;
}

/**
 * Socket.io events sent by the relay
 */
export interface ServerToClientEvents {
  audio_frame: (metadata: FrameMetadata, payload: Buffer) => void;
  command: (command: StreamCommand) => void;
  'peer:status': (event: PeerStatusEvent) => void;
  'session:ended': (event: SessionEndedEvent) => void;
}

/**
 * Per-socket state kept by the relay
 */
export interface SocketData {
  deviceId?: string;
  role?: PeerRole;
}
