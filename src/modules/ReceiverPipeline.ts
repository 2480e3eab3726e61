/**
 * Receiver Pipeline Module
 * Inbound loop (poll or push subscription) feeding the jitter buffer, and
 * the playback loop draining it
 */
import { EventEmitter } from 'events';
import { AudioFormat, AudioFrame, AudioOutput } from '../types/index.js';
import { Transport } from '../types/transport.js';
import { PlaybackBuffer } from './JitterBuffer.js';
import { PlaybackScheduler } from './PlaybackScheduler.js';
import { RelayError, TransportError, errorMessage } from '../utils/errors.js';
import { sleep } from '../utils/retry.js';
import { contextLogger } from '../utils/logger.js';

const log = contextLogger('ReceiverPipeline');

/**
 * ReceiverPipeline configuration
 */
export interface ReceiverPipelineConfig {
  deviceId: string;
  format: AudioFormat;
  transport: Transport;
  buffer: PlaybackBuffer;
  output: AudioOutput;
  /** Delay between polls when the relay had no backlog (default: 100) */
  pollIntervalMs?: number;
  /** Frames requested per poll (default: 10) */
  pollMaxCount?: number;
}

/**
 * ReceiverPipeline events
 */
export interface ReceiverPipelineEvents {
  'frame:received': (frame: AudioFrame) => void;
  'frame:played': (frame: AudioFrame) => void;
  'receive:error': (error: RelayError) => void;
  'output:error': (error: Error) => void;
}

export class ReceiverPipeline extends EventEmitter {
  private config: ReceiverPipelineConfig;
  private scheduler: PlaybackScheduler;
  private abortController: AbortController | null = null;
  private inboundLoop: Promise<void> | null = null;
  private unsubscribe: (() => void) | null = null;
  private running: boolean = false;
  private framesReceived: number = 0;
  private receiveErrors: number = 0;

  constructor(config: ReceiverPipelineConfig) {
    super();
    this.config = config;
    this.scheduler = new PlaybackScheduler({
      buffer: config.buffer,
      output: config.output,
      format: config.format,
    });

    this.scheduler.on('frame:played', (frame) => this.emit('frame:played', frame));
    this.scheduler.on('output:error', (error) => this.emit('output:error', error));
  }

  /**
   * Open the output and start the inbound and playback loops
   */
  async start(): Promise<void> {
    if (this.running) {
      log('warn', 'Receiver pipeline already running');
      return;
    }

    await this.scheduler.start();
    this.running = true;

    const { transport, deviceId } = this.config;
    if (transport.kind === 'push') {
      this.unsubscribe = transport.subscribe(deviceId, (frame) => this.accept(frame));
    } else {
      this.abortController = new AbortController();
      this.inboundLoop = this.runPollLoop(this.abortController.signal);
    }

    log('info', `Receiver pipeline started for ${deviceId} over ${transport.kind}`);
  }

  /**
   * Stop both loops, discard buffered frames and close the output
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;

    this.unsubscribe?.();
    this.unsubscribe = null;

    this.abortController?.abort();
    await this.inboundLoop;
    this.inboundLoop = null;
    this.abortController = null;

    this.config.buffer.stop();
    await this.scheduler.stop();

    log('info', `Receiver pipeline stopped after ${this.framesReceived} frames`);
  }

  isRunning(): boolean {
    return this.running;
  }

  private accept(frame: AudioFrame): void {
    if (!this.running) {
      return;
    }
    this.framesReceived++;
    this.emit('frame:received', frame);
    this.config.buffer.push(frame);
  }

  private async runPollLoop(signal: AbortSignal): Promise<void> {
    const { transport, deviceId } = this.config;
    if (transport.kind !== 'polling') {
      return;
    }
    const pollIntervalMs = this.config.pollIntervalMs ?? 100;
    const maxCount = this.config.pollMaxCount ?? 10;

    while (!signal.aborted) {
      let frames: AudioFrame[];
      try {
        frames = await transport.receive(deviceId, maxCount);
      } catch (error) {
        this.receiveErrors++;
        const relayError = error instanceof RelayError
          ? error
          : new TransportError(errorMessage(error), { retryable: false, cause: error });
        if (!signal.aborted) {
          log('warn', `Frame poll failed: ${relayError.code} ${relayError.message}`);
          this.emit('receive:error', relayError);
        }
        await sleep(pollIntervalMs, signal);
        continue;
      }

      for (const frame of frames) {
        this.accept(frame);
      }

      // A full batch means the relay has a backlog; poll again immediately
      if (frames.length < maxCount) {
        await sleep(pollIntervalMs, signal);
      }
    }
  }

  /**
   * Get pipeline status
   */
  getStatus(): {
    isRunning: boolean;
    framesReceived: number;
    receiveErrors: number;
    buffer: ReturnType<PlaybackBuffer['getStatus']>;
    playback: ReturnType<PlaybackScheduler['getStatus']>;
  } {
    return {
      isRunning: this.running,
      framesReceived: this.framesReceived,
      receiveErrors: this.receiveErrors,
      buffer: this.config.buffer.getStatus(),
      playback: this.scheduler.getStatus(),
    };
  }

  // Typed event emitter methods
  on<K extends keyof ReceiverPipelineEvents>(event: K, listener: ReceiverPipelineEvents[K]): this {
    return super.on(event, listener);
  }

  emit<K extends keyof ReceiverPipelineEvents>(event: K, ...args: Parameters<ReceiverPipelineEvents[K]>): boolean {
    return super.emit(event, ...args);
  }
}
