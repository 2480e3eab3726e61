/**
 * Session Controller Module
 * Device-side control channel: starts and stops one streaming session,
 * owns its pipeline and reports its health
 */
import { EventEmitter } from 'events';
import {
  AudioFormat,
  AudioInput,
  AudioOutput,
  MetricsSnapshot,
  SessionOperationResult,
  SessionRole,
  SessionState,
  StopReason,
} from '../types/index.js';
import { StreamCommand } from '../types/protocol.js';
import { Transport } from '../types/transport.js';
import { SenderPipeline } from './SenderPipeline.js';
import { ReceiverPipeline } from './ReceiverPipeline.js';
import { JitterBuffer, JitterBufferConfig, PlaybackBuffer } from './JitterBuffer.js';
import { AdaptiveJitterBuffer, AdaptiveJitterBufferConfig } from './AdaptiveJitterBuffer.js';
import { MetricsCollector, MetricsCollectorConfig } from './MetricsCollector.js';
import {
  CaptureUnavailableError,
  InvalidRequestError,
  RelayError,
  SessionUnknownError,
  TransportUnavailableError,
  errorMessage,
} from '../utils/errors.js';
import { contextLogger } from '../utils/logger.js';

const log = contextLogger('SessionController');

/**
 * Relay-side session lifecycle, as exposed by the relay HTTP API
 */
export interface RelaySessionControl {
  startSession(deviceId: string): Promise<unknown>;
  stopSession(deviceId: string): Promise<unknown>;
}

/**
 * SessionController configuration
 */
export interface SessionControllerConfig {
  role: SessionRole;
  format: AudioFormat;
  /** Long-lived transport; connected on start, closed on stop */
  transport: Transport;
  /** Creates and ends the relay-side session, when set */
  relay?: RelaySessionControl;
  /** Capture device (sender) */
  input?: AudioInput;
  /** Playback device (receiver) */
  output?: AudioOutput;
  sender?: {
    outboundCapacity?: number;
    maxOpenAttempts?: number;
    commandPollIntervalMs?: number;
  };
  receiver?: {
    pollIntervalMs?: number;
    pollMaxCount?: number;
    jitter?: JitterBufferConfig;
    /** Adaptive fill threshold; omitted means a fixed threshold */
    adaptive?: Omit<AdaptiveJitterBufferConfig, 'frameDurationMs' | 'now'>;
  };
  metrics?: Omit<MetricsCollectorConfig, 'deviceId' | 'role' | 'format' | 'now'>;
  /** Clock, for tests */
  now?: () => number;
}

/**
 * SessionController events
 */
export interface SessionControllerEvents {
  'session:started': (deviceId: string) => void;
  'session:stopped': (deviceId: string, reason: StopReason, error?: RelayError) => void;
  'state': (state: SessionState, previous: SessionState) => void;
}

interface ActiveSession {
  deviceId: string;
  generation: number;
  pipeline: SenderPipeline | ReceiverPipeline;
  buffer: PlaybackBuffer | null;
}

export class SessionController extends EventEmitter {
  private config: SessionControllerConfig;
  private now: () => number;
  private state: SessionState = 'IDLE';
  private session: ActiveSession | null = null;
  private metrics: MetricsCollector | null = null;
  private lastDeviceId: string | null = null;
  private generation: number = 0;
  private operations: Promise<unknown> = Promise.resolve();

  constructor(config: SessionControllerConfig) {
    super();
    this.config = config;
    this.now = config.now ?? Date.now;

    const { transport } = config;
    transport.on('state', (state) => this.metrics?.setConnectionState(state));
    transport.on('rtt', (rttMs) => {
      this.metrics?.recordRtt(rttMs);
      const buffer = this.session?.buffer;
      if (buffer instanceof AdaptiveJitterBuffer) {
        buffer.observeRtt(rttMs);
      }
    });
    transport.on('unavailable', (error) => {
      const session = this.session;
      if (session) {
        this.metrics?.recordError(error);
        this.fail(session.generation, 'transport_unavailable', error);
      }
    });
    transport.on('command', (command) => this.handleCommand(command));
    transport.on('session:ended', (event) => {
      const active = this.session;
      if (active && event.deviceId === active.deviceId) {
        log('info', `Relay ended session for ${event.deviceId}: ${event.reason}`);
        this.fail(active.generation, 'relay_stopped');
      }
    });
  }

  /**
   * Start streaming for a device; a no-op if already streaming for it
   */
  startSession(deviceId: string): Promise<SessionOperationResult> {
    return this.serialize(() => this.doStart(deviceId));
  }

  /**
   * Stop the active session; a no-op if nothing is streaming
   */
  stopSession(deviceId: string): Promise<SessionOperationResult> {
    return this.serialize(() => this.doStop(deviceId));
  }

  /**
   * Health snapshot of the current (or last) session for a device
   */
  getSessionHealth(deviceId: string): MetricsSnapshot {
    if (this.metrics && this.lastDeviceId === deviceId) {
      return this.metrics.getSnapshot();
    }
    return this.createMetrics(deviceId).getSnapshot();
  }

  getState(): SessionState {
    return this.state;
  }

  private serialize<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.operations.then(operation);
    this.operations = result.catch(() => undefined);
    return result;
  }

  private async doStart(deviceId: string): Promise<SessionOperationResult> {
    if (!deviceId) {
      return { success: false, state: this.state, error: 'deviceId is required' };
    }

    const active = this.session;
    if (active) {
      if (active.deviceId === deviceId) {
        log('warn', `Session already active for ${deviceId}`);
        return { success: true, state: this.state };
      }
      return { success: false, state: this.state, error: `Session already active for ${active.deviceId}` };
    }

    const { role, transport } = this.config;
    const generation = ++this.generation;
    const metrics = this.createMetrics(deviceId);
    this.metrics = metrics;
    this.lastDeviceId = deviceId;
    metrics.markStarted();
    metrics.setConnectionState(transport.getConnectionState());

    log('info', `Starting ${role} session for ${deviceId} over ${transport.kind}`);

    let session: ActiveSession | null = null;
    try {
      if (transport.getConnectionState() === 'unavailable') {
        await transport.close();
      }
      await transport.connect();
      await this.config.relay?.startSession(deviceId);

      session = role === 'sender'
        ? this.createSenderSession(deviceId, generation, metrics)
        : this.createReceiverSession(deviceId, generation, metrics);
      this.session = session;

      await session.pipeline.start();
    } catch (error) {
      const relayError = error instanceof RelayError
        ? error
        : new TransportUnavailableError(errorMessage(error), { cause: error });
      const reason: StopReason = relayError instanceof CaptureUnavailableError ? 'capture_failed' : 'transport_unavailable';

      log('error', `Failed to start session for ${deviceId}: ${relayError.message}`);
      this.session = null;
      metrics.recordError(relayError);
      await this.release(session);
      metrics.setSessionState('STOPPED', reason);
      this.setState('STOPPED');

      return { success: false, state: this.state, error: relayError.message };
    }

    // Frames may already have filled the buffer while the output was opening
    const state: SessionState = session.buffer
      ? (session.buffer.getState() === 'PLAYING' ? 'PLAYING' : 'BUFFERING')
      : 'STREAMING';
    metrics.setSessionState(state);
    this.setState(state);
    log('info', `Session started for ${deviceId}`);
    this.emit('session:started', deviceId);

    return { success: true, state: this.state };
  }

  private async doStop(deviceId: string): Promise<SessionOperationResult> {
    const active = this.session;
    if (!active) {
      return { success: true, state: this.state };
    }
    if (active.deviceId !== deviceId) {
      return { success: false, state: this.state, error: `No session for ${deviceId}` };
    }

    await this.teardown(active, 'requested');

    try {
      await this.config.relay?.stopSession(deviceId);
    } catch (error) {
      log('warn', `Relay session stop failed for ${deviceId}: ${errorMessage(error)}`);
    }

    return { success: true, state: this.state };
  }

  /**
   * Stop a session because of a persistent failure; stale events from an
   * earlier session are ignored
   */
  private fail(generation: number, reason: StopReason, error?: RelayError): void {
    void this.serialize(async () => {
      const active = this.session;
      if (!active || active.generation !== generation) {
        return;
      }
      log('error', `Stopping session for ${active.deviceId}: ${reason}${error ? ` (${error.message})` : ''}`);
      await this.teardown(active, reason, error);
    });
  }

  private async teardown(active: ActiveSession, reason: StopReason, error?: RelayError): Promise<void> {
    this.session = null;
    await this.release(active);

    this.metrics?.setSessionState('STOPPED', reason);
    this.setState('STOPPED');

    log('info', `Session stopped for ${active.deviceId}: ${reason}`);
    this.emit('session:stopped', active.deviceId, reason, error);
  }

  private async release(active: ActiveSession | null): Promise<void> {
    try {
      await this.config.transport.close();
    } catch (error) {
      log('warn', `Error closing transport: ${errorMessage(error)}`);
    }

    if (!active) {
      return;
    }
    try {
      await active.pipeline.stop();
    } catch (error) {
      log('warn', `Error stopping pipeline: ${errorMessage(error)}`);
    }
  }

  private createSenderSession(deviceId: string, generation: number, metrics: MetricsCollector): ActiveSession {
    const { input, transport, format, sender = {} } = this.config;
    if (!input) {
      throw new InvalidRequestError('A sender session needs an audio input');
    }

    const pipeline = new SenderPipeline({
      deviceId,
      format,
      transport,
      input,
      outboundCapacity: sender.outboundCapacity,
      maxOpenAttempts: sender.maxOpenAttempts,
      commandPollIntervalMs: sender.commandPollIntervalMs,
      now: this.now,
    });

    pipeline.on('frame:sent', (frame) => metrics.recordFrame(frame.payload.length));
    pipeline.on('frame:dropped', () => metrics.recordDropped());
    pipeline.on('capture:error', (error) => metrics.recordError(error));
    pipeline.on('capture:failed', (error) => {
      metrics.recordError(error);
      this.fail(generation, 'capture_failed', error);
    });
    pipeline.on('send:error', (error) => {
      metrics.recordError(error);
      this.failOnPersistentError(generation, error);
    });
    metrics.setQueueGauge(() => ({ depth: pipeline.queueDepth, capacity: pipeline.queueCapacity }));

    return { deviceId, generation, pipeline, buffer: null };
  }

  private createReceiverSession(deviceId: string, generation: number, metrics: MetricsCollector): ActiveSession {
    const { output, transport, format, receiver = {} } = this.config;
    if (!output) {
      throw new InvalidRequestError('A receiver session needs an audio output');
    }

    const fixed = new JitterBuffer(receiver.jitter);
    const buffer: PlaybackBuffer = receiver.adaptive
      ? new AdaptiveJitterBuffer(fixed, { ...receiver.adaptive, frameDurationMs: format.frameDurationMs, now: this.now })
      : fixed;

    buffer.on('underrun', () => metrics.recordUnderrun());
    buffer.on('frame:dropped', () => metrics.recordDropped());
    buffer.on('sequence:gap', (expected, received) => metrics.recordSequenceGap(received - expected));
    buffer.on('state', (state) => {
      if (state === 'STOPPED' || this.session?.generation !== generation) {
        return;
      }
      metrics.setSessionState(state);
      this.setState(state);
    });

    const pipeline = new ReceiverPipeline({
      deviceId,
      format,
      transport,
      buffer,
      output,
      pollIntervalMs: receiver.pollIntervalMs,
      pollMaxCount: receiver.pollMaxCount,
    });

    pipeline.on('frame:received', (frame) => metrics.recordFrame(frame.payload.length));
    pipeline.on('output:error', (error) => metrics.recordError(error));
    pipeline.on('receive:error', (error) => {
      metrics.recordError(error);
      this.failOnPersistentError(generation, error);
    });
    metrics.setQueueGauge(() => {
      const status = buffer.getStatus();
      return { depth: status.depth, capacity: status.capacity };
    });

    return { deviceId, generation, pipeline, buffer };
  }

  private failOnPersistentError(generation: number, error: RelayError): void {
    if (error instanceof SessionUnknownError) {
      this.fail(generation, 'relay_stopped', error);
    } else if (error instanceof TransportUnavailableError) {
      this.fail(generation, 'transport_unavailable', error);
    }
  }

  private handleCommand(command: StreamCommand): void {
    const active = this.session;
    if (!active || command.deviceId !== active.deviceId) {
      return;
    }
    if (command.type === 'stop_audio_stream') {
      log('info', `Relay requested stop for ${command.deviceId}`);
      this.fail(active.generation, 'relay_stopped');
    }
  }

  private createMetrics(deviceId: string): MetricsCollector {
    return new MetricsCollector({
      ...this.config.metrics,
      deviceId,
      role: this.config.role,
      format: this.config.format,
      now: this.now,
    });
  }

  private setState(state: SessionState): void {
    const previous = this.state;
    if (previous === state) {
      return;
    }
    this.state = state;
    this.emit('state', state, previous);
  }

  // Typed event emitter methods
  on<K extends keyof SessionControllerEvents>(event: K, listener: SessionControllerEvents[K]): this {
    return super.on(event, listener);
  }

  off<K extends keyof SessionControllerEvents>(event: K, listener: SessionControllerEvents[K]): this {
    return super.off(event, listener);
  }

  emit<K extends keyof SessionControllerEvents>(event: K, ...args: Parameters<SessionControllerEvents[K]>): boolean {
    return super.emit(event, ...args);
  }
}
