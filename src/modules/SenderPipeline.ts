/**
 * Sender Pipeline Module
 * Capture loop and outbound transport loop joined by a bounded queue
 */
import { EventEmitter } from 'events';
import { AudioFormat, AudioFrame, AudioInput } from '../types/index.js';
import { FrameAck } from '../types/protocol.js';
import { SendResult, Transport } from '../types/transport.js';
import { CaptureChunker } from './CaptureChunker.js';
import { BoundedQueue } from '../utils/bounded-queue.js';
import { CaptureUnavailableError, RelayError, errorMessage } from '../utils/errors.js';
import { contextLogger } from '../utils/logger.js';

const log = contextLogger('SenderPipeline');

/**
 * SenderPipeline configuration
 */
export interface SenderPipelineConfig {
  deviceId: string;
  format: AudioFormat;
  transport: Transport;
  input: AudioInput;
  /** Frames held while the transport catches up (default: 50) */
  outboundCapacity?: number;
  /** Consecutive capture failures without a frame before giving up (default: 5) */
  maxOpenAttempts?: number;
  /** Command poll period for the polling transport; 0 disables (default: 1000) */
  commandPollIntervalMs?: number;
  /** Clock for capturedAt, for tests */
  now?: () => number;
}

/**
 * SenderPipeline events
 */
export interface SenderPipelineEvents {
  'frame:captured': (frame: AudioFrame) => void;
  'frame:sent': (frame: AudioFrame, ack: FrameAck) => void;
  'frame:dropped': (frame: AudioFrame) => void;
  'send:error': (error: RelayError, frame: AudioFrame) => void;
  'capture:error': (error: CaptureUnavailableError) => void;
  'capture:failed': (error: CaptureUnavailableError) => void;
}

export class SenderPipeline extends EventEmitter {
  private config: SenderPipelineConfig;
  private chunker: CaptureChunker;
  private outbound: BoundedQueue<AudioFrame>;
  private wake: (() => void) | null = null;
  private abortController: AbortController | null = null;
  private sendLoop: Promise<void> | null = null;
  private commandTimer: NodeJS.Timeout | null = null;
  private commandPollInFlight: boolean = false;
  private framesSent: number = 0;
  private sendErrors: number = 0;

  constructor(config: SenderPipelineConfig) {
    super();
    this.config = config;
    this.outbound = new BoundedQueue<AudioFrame>(config.outboundCapacity ?? 50);
    this.chunker = new CaptureChunker({
      input: config.input,
      sink: (frame) => this.enqueue(frame),
      maxOpenAttempts: config.maxOpenAttempts,
      now: config.now,
    });

    this.chunker.on('capture:error', (error) => this.emit('capture:error', error));
    this.chunker.on('failed', (error) => this.emit('capture:failed', error));
  }

  /**
   * Open the capture device and start both loops
   * @throws CaptureUnavailableError if the device cannot be opened
   */
  async start(): Promise<void> {
    if (this.sendLoop) {
      log('warn', 'Sender pipeline already running');
      return;
    }

    this.outbound.clear();
    await this.chunker.start({ deviceId: this.config.deviceId, ...this.config.format });

    this.abortController = new AbortController();
    this.sendLoop = this.runSendLoop(this.abortController.signal);
    this.startCommandPolling();

    log('info', `Sender pipeline started for ${this.config.deviceId} over ${this.config.transport.kind}`);
  }

  /**
   * Stop capturing, let the in-flight send finish and discard the backlog
   */
  async stop(): Promise<void> {
    if (!this.sendLoop) {
      return;
    }

    this.stopCommandPolling();
    await this.chunker.stop();

    this.abortController?.abort();
    this.wake?.();
    await this.sendLoop;
    this.sendLoop = null;
    this.abortController = null;

    const discarded = this.outbound.clear();
    log('info', `Sender pipeline stopped: ${this.framesSent} frames sent, ${discarded.length} discarded`);
  }

  isRunning(): boolean {
    return this.sendLoop !== null;
  }

  get queueDepth(): number {
    return this.outbound.length;
  }

  get queueCapacity(): number {
    return this.outbound.maxSize;
  }

  private enqueue(frame: AudioFrame): void {
    this.emit('frame:captured', frame);

    const dropped = this.outbound.push(frame);
    if (dropped) {
      log('debug', `Outbound queue full, dropped frame ${dropped.sequence}`);
      this.emit('frame:dropped', dropped);
    }

    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private nextFrame(signal: AbortSignal): Promise<AudioFrame | null> {
    const frame = this.outbound.shift();
    if (frame || signal.aborted) {
      return Promise.resolve(frame ?? null);
    }

    return new Promise((resolve) => {
      this.wake = () => {
        resolve(signal.aborted ? null : this.outbound.shift() ?? null);
      };
    });
  }

  private async runSendLoop(signal: AbortSignal): Promise<void> {
    const { transport } = this.config;

    while (!signal.aborted) {
      const frame = await this.nextFrame(signal);
      if (!frame) {
        continue;
      }

      let result: SendResult;
      try {
        result = await transport.send(frame);
      } catch (error) {
        this.sendErrors++;
        log('error', `Unexpected send failure for frame ${frame.sequence}: ${errorMessage(error)}`);
        continue;
      }

      if (result.ok) {
        this.framesSent++;
        this.emit('frame:sent', frame, result.ack);
      } else {
        this.sendErrors++;
        log('warn', `Frame ${frame.sequence} not delivered: ${result.error.code} ${result.error.message}`);
        this.emit('send:error', result.error, frame);
      }
    }
  }

  private startCommandPolling(): void {
    const { transport } = this.config;
    const intervalMs = this.config.commandPollIntervalMs ?? 1000;
    if (transport.kind !== 'polling' || intervalMs <= 0) {
      return;
    }

    this.commandTimer = setInterval(() => {
      // A poll retrying through a relay outage can outlast several ticks
      if (this.commandPollInFlight) {
        return;
      }
      this.commandPollInFlight = true;
      transport.fetchCommands(this.config.deviceId)
        .catch((error: unknown) => {
          log('debug', `Command poll failed: ${errorMessage(error)}`);
        })
        .finally(() => {
          this.commandPollInFlight = false;
        });
    }, intervalMs);
    this.commandTimer.unref();
  }

  private stopCommandPolling(): void {
    if (this.commandTimer) {
      clearInterval(this.commandTimer);
      this.commandTimer = null;
    }
  }

  /**
   * Get pipeline status
   */
  getStatus(): {
    isRunning: boolean;
    queueDepth: number;
    queueCapacity: number;
    framesSent: number;
    framesDropped: number;
    sendErrors: number;
    capture: ReturnType<CaptureChunker['getStatus']>;
  } {
    return {
      isRunning: this.sendLoop !== null,
      queueDepth: this.outbound.length,
      queueCapacity: this.outbound.maxSize,
      framesSent: this.framesSent,
      framesDropped: this.outbound.evictedCount,
      sendErrors: this.sendErrors,
      capture: this.chunker.getStatus(),
    };
  }

  // Typed event emitter methods
  on<K extends keyof SenderPipelineEvents>(event: K, listener: SenderPipelineEvents[K]): this {
    return super.on(event, listener);
  }

  emit<K extends keyof SenderPipelineEvents>(event: K, ...args: Parameters<SenderPipelineEvents[K]>): boolean {
    return super.emit(event, ...args);
  }
}
