/**
 * Capture Chunker Module
 * Owns the capture device and slices its PCM into fixed-duration frames
 */
import { EventEmitter } from 'events';
import { AudioFormat, AudioFrame, AudioInput } from '../types/index.js';
import { bytesPerFrame, bytesPerSampleFrame } from '../utils/audio-format.js';
import { CaptureUnavailableError, InvalidRequestError, errorMessage } from '../utils/errors.js';
import { sleep } from '../utils/retry.js';
import { contextLogger } from '../utils/logger.js';

const log = contextLogger('CaptureChunker');

/**
 * CaptureChunker configuration
 */
export interface CaptureChunkerConfig {
  /** Capture device */
  input: AudioInput;
  /** Receives every completed frame */
  sink: (frame: AudioFrame) => void;
  /** Consecutive open or read failures without a frame before giving up (default: 5) */
  maxOpenAttempts?: number;
  /** Clock for capturedAt, for tests */
  now?: () => number;
}

export interface CaptureStartParams extends AudioFormat {
  deviceId: string;
}

/**
 * CaptureChunker events
 */
export interface CaptureChunkerEvents {
  'started': (deviceId: string) => void;
  'stopped': (deviceId: string) => void;
  'capture:error': (error: CaptureUnavailableError) => void;
  'failed': (error: CaptureUnavailableError) => void;
}

/**
 * Capture loop: one read per frame interval, frames handed to the sink
 */
export class CaptureChunker extends EventEmitter {
  private config: CaptureChunkerConfig;
  private maxOpenAttempts: number;
  private now: () => number;
  private params: CaptureStartParams | null = null;
  private abortController: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private deviceOpen: boolean = false;
  private sequence: number = 0;
  private framesEmitted: number = 0;
  private shortFrames: number = 0;
  private errorCount: number = 0;
  private lastError: string | null = null;

  constructor(config: CaptureChunkerConfig) {
    super();
    this.config = config;
    this.maxOpenAttempts = config.maxOpenAttempts ?? 5;
    this.now = config.now ?? Date.now;
  }

  /**
   * Open the device and start emitting frames
   * @throws CaptureUnavailableError if the device cannot be opened
   */
  async start(params: CaptureStartParams): Promise<void> {
    if (this.params) {
      if (this.params.deviceId === params.deviceId) {
        log('warn', `Capture already running for ${params.deviceId}`);
        return;
      }
      throw new InvalidRequestError(`Capture already running for ${this.params.deviceId}`);
    }

    const frameBytes = bytesPerFrame(params);
    if (frameBytes <= 0) {
      throw new InvalidRequestError(`Frame duration ${params.frameDurationMs}ms yields no samples`);
    }

    try {
      await this.config.input.open(params);
    } catch (error) {
      this.recordError(error);
      throw new CaptureUnavailableError(`Cannot open capture device: ${errorMessage(error)}`, { cause: error });
    }

    this.deviceOpen = true;
    this.params = params;
    this.sequence = 0;
    this.abortController = new AbortController();

    log('info', `Capture started for ${params.deviceId}: ${params.sampleRate}Hz, ${params.channels}ch, ` +
      `${params.bitDepth}-bit, ${params.frameDurationMs}ms frames (${frameBytes} bytes)`);
    this.emit('started', params.deviceId);

    this.loop = this.runLoop(params, frameBytes, this.abortController.signal);
  }

  /**
   * Stop capturing and release the device; a partial frame is discarded
   */
  async stop(): Promise<void> {
    const params = this.params;
    if (!params) {
      return;
    }

    this.abortController?.abort();
    await this.loop;

    await this.closeDevice();
    this.params = null;
    this.abortController = null;
    this.loop = null;

    log('info', `Capture stopped for ${params.deviceId} after ${this.framesEmitted} frames`);
    this.emit('stopped', params.deviceId);
  }

  isRunning(): boolean {
    return this.params !== null;
  }

  private async runLoop(params: CaptureStartParams, frameBytes: number, signal: AbortSignal): Promise<void> {
    const sampleBytes = bytesPerSampleFrame(params);
    let failures = 0;

    while (!signal.aborted) {
      if (!this.deviceOpen) {
        try {
          await this.config.input.open(params);
          this.deviceOpen = true;
          log('info', 'Capture device re-opened');
        } catch (error) {
          failures++;
          if (this.giveUp(failures, error)) {
            return;
          }
          await sleep(params.frameDurationMs, signal);
          continue;
        }
      }

      let payload: Buffer;
      try {
        payload = await this.config.input.read(frameBytes, { timeoutMs: params.frameDurationMs, signal });
      } catch (error) {
        failures++;
        await this.closeDevice();
        if (this.giveUp(failures, error)) {
          return;
        }
        await sleep(params.frameDurationMs, signal);
        continue;
      }

      // Whole samples only, so a dropped frame never shifts the ones after it
      const aligned = payload.length - (payload.length % sampleBytes);
      if (signal.aborted || aligned === 0) {
        continue;
      }
      if (aligned < payload.length) {
        payload = payload.subarray(0, aligned);
      }

      if (payload.length < frameBytes) {
        this.shortFrames++;
      }

      failures = 0;
      const frame: AudioFrame = {
        deviceId: params.deviceId,
        sequence: this.sequence++,
        payload,
        capturedAt: this.now(),
      };
      this.framesEmitted++;
      this.config.sink(frame);
    }
  }

  /**
   * Record a capture failure; emits `failed` and returns true once the
   * consecutive failures reach the limit
   */
  private giveUp(failures: number, error: unknown): boolean {
    const captureError = this.recordError(error);
    if (failures < this.maxOpenAttempts) {
      return false;
    }

    log('error', `Capture device unavailable after ${failures} attempts`);
    this.emit('failed', new CaptureUnavailableError(
      `Capture device unavailable after ${failures} attempts: ${captureError.message}`,
      { cause: error }
    ));
    return true;
  }

  private recordError(error: unknown): CaptureUnavailableError {
    const captureError = error instanceof CaptureUnavailableError
      ? error
      : new CaptureUnavailableError(errorMessage(error), { cause: error });

    this.errorCount++;
    this.lastError = captureError.message;
    log('warn', `Capture error: ${captureError.message}`);
    this.emit('capture:error', captureError);
    return captureError;
  }

  private async closeDevice(): Promise<void> {
    if (!this.deviceOpen) {
      return;
    }
    this.deviceOpen = false;
    try {
      await this.config.input.close();
    } catch (error) {
      log('warn', `Error closing capture device: ${errorMessage(error)}`);
    }
  }

  /**
   * Get capture status
   */
  getStatus(): {
    isRunning: boolean;
    deviceId: string | null;
    nextSequence: number;
    framesEmitted: number;
    shortFrames: number;
    errorCount: number;
    lastError: string | null;
  } {
    return {
      isRunning: this.params !== null,
      deviceId: this.params?.deviceId ?? null,
      nextSequence: this.sequence,
      framesEmitted: this.framesEmitted,
      shortFrames: this.shortFrames,
      errorCount: this.errorCount,
      lastError: this.lastError,
    };
  }

  // Typed event emitter methods
  on<K extends keyof CaptureChunkerEvents>(event: K, listener: CaptureChunkerEvents[K]): this {
    return super.on(event, listener);
  }

  emit<K extends keyof CaptureChunkerEvents>(event: K, ...args: Parameters<CaptureChunkerEvents[K]>): boolean {
    return super.emit(event, ...args);
  }
}
