/**
 * Polling transport: one HTTP request per uploaded frame, pull-based receive
 */
import { EventEmitter } from 'events';
import { AudioFrame, ConnectionState } from '../types/index.js';
import { StreamCommand } from '../types/protocol.js';
import { PollingTransport, SendResult, TransportEvents } from '../types/transport.js';
import { RelayApiClient, RelayApiClientConfig } from './relay-api.service.js';
import { RelayError, TransportUnavailableError, errorMessage } from '../utils/errors.js';
import { contextLogger } from '../utils/logger.js';

const log = contextLogger('PollingTransport');

/**
 * Polling transport configuration
 */
export type PollingTransportConfig = RelayApiClientConfig;

export class PollingTransportService extends EventEmitter implements PollingTransport {
  readonly kind = 'polling' as const;
  private client: RelayApiClient;
  private state: ConnectionState = 'disconnected';

  constructor(config: PollingTransportConfig, client?: RelayApiClient) {
    super();
    this.client = client ?? new RelayApiClient(config);

    log('info', `PollingTransport initialized for: ${config.relayUrl}`);
  }

  async connect(): Promise<void> {
    if (this.state === 'connected') {
      log('warn', 'Already connected');
      return;
    }
    // Stateless; reachability shows on the first request
    this.setState('connected');
  }

  async close(): Promise<void> {
    if (this.state === 'disconnected') {
      return;
    }
    this.client.cancelPending();
    this.setState('disconnected');
  }

  async send(frame: AudioFrame): Promise<SendResult> {
    const startedAt = Date.now();
    try {
      const ack = await this.client.uploadFrame(frame);
      this.emit('rtt', Date.now() - startedAt);
      return { ok: true, ack };
    } catch (error) {
      return { ok: false, error: this.handleFailure(error) };
    }
  }

  async receive(deviceId: string, maxCount: number): Promise<AudioFrame[]> {
    const startedAt = Date.now();
    try {
      const frames = await this.client.receiveFrames(deviceId, maxCount);
      this.emit('rtt', Date.now() - startedAt);
      return frames;
    } catch (error) {
      throw this.handleFailure(error);
    }
  }

  async fetchCommands(deviceId: string): Promise<StreamCommand[]> {
    try {
      const commands = await this.client.fetchCommands(deviceId);
      for (const command of commands) {
        this.emit('command', command);
      }
      return commands;
    } catch (error) {
      throw this.handleFailure(error);
    }
  }

  getConnectionState(): ConnectionState {
    return this.state;
  }

  private handleFailure(error: unknown): RelayError {
    const relayError = error instanceof RelayError
      ? error
      : new TransportUnavailableError(errorMessage(error), { cause: error });

    if (relayError instanceof TransportUnavailableError && this.state === 'connected') {
      log('error', `Relay unavailable: ${relayError.message}`);
      this.setState('unavailable');
      this.emit('unavailable', relayError);
    }

    return relayError;
  }

  private setState(state: ConnectionState): void {
    if (this.state !== state) {
      this.state = state;
      this.emit('state', state);
    }
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
