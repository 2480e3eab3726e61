/**
 * Push transport over a persistent socket.io connection to the relay
 */
import { io, Socket, ManagerOptions, SocketOptions } from 'socket.io-client';
import { EventEmitter } from 'events';
import { AudioFrame, ConnectionState } from '../types/index.js';
import {
  ClientToServerEvents,
  FrameAckResponse,
  FrameMetadata,
  PeerRole,
  RegisterRequest,
  ServerToClientEvents,
} from '../types/protocol.js';
import { PushTransport, SendResult, TransportEvents } from '../types/transport.js';
import {
  InvalidFrameError,
  InvalidRequestError,
  PayloadTooLargeError,
  RelayError,
  SessionUnknownError,
  TransportError,
  TransportUnavailableError,
  errorMessage,
} from '../utils/errors.js';
import { withRetry } from '../utils/retry.js';
import { contextLogger } from '../utils/logger.js';

const log = contextLogger('PushTransport');

export type ClientSocket = Socket<ServerToClientEvents, ClientToServerEvents>;

export type SocketFactory = (url: string, options: Partial<ManagerOptions & SocketOptions>) => ClientSocket;

/**
 * Push transport configuration
 */
export interface PushTransportConfig {
  /** Relay server URL */
  relayUrl: string;
  /** Device this transport sends for, or listens to */
  deviceId: string;
  /** Producers register on connect; consumers register on subscribe */
  role: PeerRole;
  /** Acknowledgement timeout per message */
  requestTimeoutMs: number;
  /** Retries after the first attempt for a frame */
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  /** Reconnection attempts before the transport is declared unavailable */
  reconnectAttempts: number;
  /** Initial reconnection delay in milliseconds */
  reconnectDelayMs: number;
  /** Reconnection delay ceiling in milliseconds */
  reconnectDelayMaxMs: number;
  /** Heartbeat period; 0 disables RTT measurement */
  pingIntervalMs: number;
}

function toRelayError(response: Extract<FrameAckResponse, { success: false }>, deviceId: string): RelayError {
  switch (response.code) {
    case 'SESSION_UNKNOWN':
      return new SessionUnknownError(deviceId);
    case 'PAYLOAD_TOO_LARGE':
      return new PayloadTooLargeError();
    case 'INVALID_FRAME':
      return new InvalidFrameError(response.error);
    case 'INVALID_REQUEST':
      return new InvalidRequestError(response.error);
    default:
      return new TransportError(response.error, { retryable: true });
  }
}

/**
 * Socket.io client transport with acknowledged sends
 */
export class PushTransportService extends EventEmitter implements PushTransport {
  readonly kind = 'push' as const;
  private config: PushTransportConfig;
  private createSocket: SocketFactory;
  private socket: ClientSocket | null = null;
  private state: ConnectionState = 'disconnected';
  private registration: RegisterRequest | null;
  private onFrame: ((frame: AudioFrame) => void) | null = null;
  private pingTimer: NodeJS.Timeout | null = null;
  private hasConnected: boolean = false;
  private closed: boolean = false;

  constructor(config: PushTransportConfig, createSocket: SocketFactory = io) {
    super();
    this.config = config;
    this.createSocket = createSocket;
    this.registration = config.role === 'producer' ? { deviceId: config.deviceId, role: 'producer' } : null;

    log('info', `PushTransport initialized for: ${config.relayUrl} (${config.role} ${config.deviceId})`);
  }

  /**
   * Connect to the relay; rejects once reconnection attempts are exhausted
   */
  async connect(): Promise<void> {
    if (this.socket) {
      log('warn', 'Already connected');
      return;
    }

    this.closed = false;
    this.setState('connecting');
    log('info', `Connecting to relay: ${this.config.relayUrl}`);

    const socket = this.createSocket(this.config.relayUrl, {
      reconnection: true,
      reconnectionAttempts: this.config.reconnectAttempts,
      reconnectionDelay: this.config.reconnectDelayMs,
      reconnectionDelayMax: this.config.reconnectDelayMaxMs,
      transports: ['websocket'],
    });
    this.socket = socket;

    this.setupEventHandlers(socket);

    return new Promise((resolve, reject) => {
      const cleanup = (): void => {
        socket.off('connect', onConnect);
        socket.io.off('reconnect_failed', onFailed);
      };
      const onConnect = (): void => {
        cleanup();
        resolve();
      };
      const onFailed = (): void => {
        cleanup();
        reject(new TransportUnavailableError(`Could not reach relay at ${this.config.relayUrl}`));
      };

      socket.on('connect', onConnect);
      socket.io.on('reconnect_failed', onFailed);
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    this.stopPing();

    if (!this.socket) {
      return;
    }

    log('info', 'Disconnecting from relay');
    this.socket.disconnect();
    this.socket = null;
    this.setState('disconnected');
  }

  /**
   * Send one frame and wait for the relay's acknowledgement
   */
  async send(frame: AudioFrame): Promise<SendResult> {
    const metadata: FrameMetadata = {
      deviceId: frame.deviceId,
      sequence: frame.sequence,
      capturedAt: frame.capturedAt,
      size: frame.payload.length,
    };

    try {
      const ack = await withRetry(async () => {
        const socket = this.socket;
        if (!socket || !socket.connected) {
          throw new TransportError('Not connected to relay', { retryable: true });
        }

        let response: FrameAckResponse;
        try {
          response = await socket.timeout(this.config.requestTimeoutMs).emitWithAck('audio_frame', metadata, frame.payload);
        } catch (error) {
          throw new TransportError(`No acknowledgement for frame ${frame.sequence}: ${errorMessage(error)}`, {
            retryable: true,
            cause: error,
          });
        }

        if (!response.success) {
          throw toRelayError(response, frame.deviceId);
        }
        return { sequence: response.sequence, bufferDepth: response.bufferDepth, forwarded: response.forwarded };
      }, {
        maxRetries: this.config.maxRetries,
        baseDelayMs: this.config.retryBaseDelayMs,
        maxDelayMs: this.config.retryMaxDelayMs,
        isRetryable: (error) => !this.closed && error instanceof TransportError && error.retryable,
        onRetry: (error, attempt, delayMs) => {
          log('warn', `Frame ${frame.sequence} failed (${errorMessage(error)}), retry ${attempt}/${this.config.maxRetries} in ${delayMs}ms`);
        },
      });

      return { ok: true, ack };
    } catch (error) {
      if (error instanceof TransportError && error.retryable) {
        const unavailable = new TransportUnavailableError(
          `Frame ${frame.sequence} failed after ${this.config.maxRetries + 1} attempts`,
          { cause: error }
        );
        this.markUnavailable(unavailable);
        return { ok: false, error: unavailable };
      }
      if (error instanceof RelayError) {
        return { ok: false, error };
      }
      throw error;
    }
  }

  /**
   * Register as the consumer of `deviceId` and deliver its frames to `onFrame`
   */
  subscribe(deviceId: string, onFrame: (frame: AudioFrame) => void): () => void {
    this.registration = { deviceId, role: 'consumer' };
    this.onFrame = onFrame;

    if (this.socket?.connected) {
      void this.register(this.socket);
    }

    return () => {
      if (this.onFrame === onFrame) {
        this.onFrame = null;
      }
    };
  }

  /**
   * Measure one heartbeat round trip
   */
  async ping(): Promise<number> {
    const socket = this.socket;
    if (!socket || !socket.connected) {
      throw new TransportError('Not connected to relay', { retryable: true });
    }

    const sentAt = Date.now();
    await socket.timeout(this.config.requestTimeoutMs).emitWithAck('ping', sentAt);
    const rttMs = Date.now() - sentAt;
    this.emit('rtt', rttMs);
    return rttMs;
  }

  getConnectionState(): ConnectionState {
    return this.state;
  }

  /**
   * Set up socket event handlers
   */
  private setupEventHandlers(socket: ClientSocket): void {
    socket.on('connect', () => {
      this.hasConnected = true;
      this.setState('connected');
      log('info', `Connected to relay (${socket.id ?? 'pending id'})`);
      void this.register(socket);
      this.startPing();
    });

    socket.on('disconnect', (reason) => {
      this.stopPing();
      if (this.closed) {
        return;
      }
      log('warn', `Disconnected from relay: ${reason}`);
      this.setState('connecting');

      // The manager does not reconnect after a server-side disconnect
      if (reason === 'io server disconnect') {
        socket.connect();
      }
    });

    socket.on('connect_error', (error) => {
      log('debug', `Connection error: ${error.message}`);
    });

    socket.io.on('reconnect_attempt', (attempt) => {
      log('info', `Reconnection attempt ${attempt}/${this.config.reconnectAttempts}`);
    });

    socket.io.on('reconnect_failed', () => {
      if (this.hasConnected) {
        this.markUnavailable(new TransportUnavailableError(
          `Lost relay connection after ${this.config.reconnectAttempts} reconnection attempts`
        ));
      }
    });

    socket.on('audio_frame', (metadata, payload) => {
      const onFrame = this.onFrame;
      if (!onFrame || metadata.deviceId !== this.registration?.deviceId) {
        return;
      }
      onFrame({
        deviceId: metadata.deviceId,
        sequence: metadata.sequence,
        capturedAt: metadata.capturedAt,
        payload: Buffer.isBuffer(payload) ? payload : Buffer.from(payload),
      });
    });

    socket.on('command', (command) => {
      log('info', `Received command ${command.type} for ${command.deviceId}`);
      this.emit('command', command);
    });

    socket.on('peer:status', (event) => {
      log('info', `Peer ${event.role} for ${event.deviceId} ${event.connected ? 'connected' : 'disconnected'}`);
      this.emit('peer', event);
    });

    socket.on('session:ended', (event) => {
      if (event.deviceId !== this.registration?.deviceId) {
        return;
      }
      log('info', `Relay ended session for ${event.deviceId}: ${event.reason}`);
      this.emit('session:ended', event);
    });
  }

  /**
   * Announce this device's identity; runs on every (re)connect
   */
  private async register(socket: ClientSocket): Promise<void> {
    const registration = this.registration;
    if (!registration) {
      return;
    }

    try {
      const ack = await socket.timeout(this.config.requestTimeoutMs).emitWithAck('register', registration);
      if (ack.success) {
        log('info', `Registered as ${registration.role} for ${registration.deviceId}`);
      } else {
        log('error', `Registration rejected: ${ack.code} ${ack.error}`);
      }
    } catch (error) {
      log('warn', `Registration not acknowledged: ${errorMessage(error)}`);
    }
  }

  private startPing(): void {
    if (this.pingTimer || this.config.pingIntervalMs <= 0) {
      return;
    }
    this.pingTimer = setInterval(() => {
      this.ping().catch((error: unknown) => {
        log('debug', `Heartbeat failed: ${errorMessage(error)}`);
      });
    }, this.config.pingIntervalMs);
    this.pingTimer.unref();
  }

  private stopPing(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
  }

  private markUnavailable(error: TransportUnavailableError): void {
    if (this.state === 'unavailable' || this.closed) {
      return;
    }
    log('error', `Relay unavailable: ${error.message}`);
    this.setState('unavailable');
    this.emit('unavailable', error);
  }

  private setState(state: ConnectionState): void {
    if (this.state !== state) {
      this.state = state;
      this.emit('state', state);
    }
  }

  /**
   * Get connection status
   */
  getStatus(): {
    state: ConnectionState;
    relayUrl: string;
    registration: RegisterRequest | null;
  } {
    return {
      state: this.state,
      relayUrl: this.config.relayUrl,
      registration: this.registration,
    };
  }

  // Typed event emitter methods
  on<K extends keyof TransportEvents>(event: K, listener: TransportEvents[K]): this {
    return super.on(event, listener);
  }

  off<K extends keyof TransportEvents>(event: K, listener: TransportEvents[K]): this {
    return super.off(event, listener);
  }

  emit<K extends keyof TransportEvents>(event: K, ...args: Parameters<TransportEvents[K]>): boolean {
    return super.emit(event, ...args);
  }
}
