/**
 * In-process transports for pipeline and controller tests
 */
import { EventEmitter } from 'events';
import { AudioFrame, ConnectionState } from '../../src/types/index.js';
import { StreamCommand } from '../../src/types/protocol.js';
import { PollingTransport, PushTransport, SendResult, TransportEvents } from '../../src/types/transport.js';
import { RelayError } from '../../src/utils/errors.js';

abstract class FakeTransportBase extends EventEmitter {
  connects: number = 0;
  closes: number = 0;
  failConnect: Error | null = null;
  sendError: RelayError | null = null;
  sent: AudioFrame[] = [];
  private connectionState: ConnectionState = 'disconnected';

  async connect(): Promise<void> {
    if (this.failConnect) {
      throw this.failConnect;
    }
    this.connects++;
    this.setConnectionState('connected');
  }

  async close(): Promise<void> {
    this.closes++;
    this.setConnectionState('disconnected');
  }

  async send(frame: AudioFrame): Promise<SendResult> {
    if (this.sendError) {
      return { ok: false, error: this.sendError };
    }
    this.sent.push(frame);
    return { ok: true, ack: { sequence: frame.sequence, bufferDepth: this.sent.length, forwarded: false } };
  }

  getConnectionState(): ConnectionState {
    return this.connectionState;
  }

  setConnectionState(state: ConnectionState): void {
    this.connectionState = state;
    this.emit('state', state);
  }

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

/**
 * Polling transport backed by an in-memory inbox
 */
export class FakePollingTransport extends FakeTransportBase implements PollingTransport {
  readonly kind = 'polling' as const;
  inbox: AudioFrame[] = [];
  receiveError: Error | null = null;
  commands: StreamCommand[] = [];
  commandFetches: number = 0;

  async receive(_deviceId: string, maxCount: number): Promise<AudioFrame[]> {
    if (this.receiveError) {
      throw this.receiveError;
    }
    return this.inbox.splice(0, maxCount);
  }

  async fetchCommands(_deviceId: string): Promise<StreamCommand[]> {
    this.commandFetches++;
    const commands = this.commands;
    this.commands = [];
    commands.forEach((command) => this.emit('command', command));
    return commands;
  }
}

/**
 * Push transport whose subscriber is fed by `deliver`
 */
export class FakePushTransport extends FakeTransportBase implements PushTransport {
  readonly kind = 'push' as const;
  subscribedDeviceId: string | null = null;
  private onFrame: ((frame: AudioFrame) => void) | null = null;

  subscribe(deviceId: string, onFrame: (frame: AudioFrame) => void): () => void {
    this.subscribedDeviceId = deviceId;
    this.onFrame = onFrame;
    return () => {
      this.subscribedDeviceId = null;
      this.onFrame = null;
    };
  }

  deliver(frame: AudioFrame): void {
    this.onFrame?.(frame);
  }
}
