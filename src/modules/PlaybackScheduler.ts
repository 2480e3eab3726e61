/**
 * Playback Scheduler Module
 * Drains the jitter buffer into the audio output; the output's write
 * completion paces the loop
 */
import { EventEmitter } from 'events';
import { AudioFormat, AudioFrame, AudioOutput } from '../types/index.js';
import { PlaybackBuffer } from './JitterBuffer.js';
import { errorMessage } from '../utils/errors.js';
import { contextLogger } from '../utils/logger.js';

const log = contextLogger('PlaybackScheduler');

/**
 * PlaybackScheduler configuration
 */
export interface PlaybackSchedulerConfig {
  buffer: PlaybackBuffer;
  output: AudioOutput;
  format: AudioFormat;
}

/**
 * PlaybackScheduler events
 */
export interface PlaybackSchedulerEvents {
  'frame:played': (frame: AudioFrame) => void;
  'output:error': (error: Error) => void;
  'stopped': () => void;
}

export class PlaybackScheduler extends EventEmitter {
  private config: PlaybackSchedulerConfig;
  private abortController: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private framesPlayed: number = 0;
  private bytesPlayed: number = 0;
  private writeErrors: number = 0;
  private lastSequence: number | null = null;

  constructor(config: PlaybackSchedulerConfig) {
    super();
    this.config = config;
  }

  /**
   * Open the output and start the playback loop
   */
  async start(): Promise<void> {
    if (this.loop) {
      log('warn', 'Playback already running');
      return;
    }

    await this.config.output.open(this.config.format);

    this.abortController = new AbortController();
    this.loop = this.runLoop(this.abortController.signal);

    log('info', 'Playback started');
  }

  /**
   * Stop after the in-flight write completes and close the output
   */
  async stop(): Promise<void> {
    if (!this.loop) {
      return;
    }

    this.abortController?.abort();
    await this.loop;
    this.loop = null;
    this.abortController = null;

    try {
      await this.config.output.close();
    } catch (error) {
      log('warn', `Error closing audio output: ${errorMessage(error)}`);
    }

    log('info', `Playback stopped after ${this.framesPlayed} frames`);
    this.emit('stopped');
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    const { buffer, output } = this.config;

    while (!signal.aborted) {
      const playing = await buffer.waitUntilPlaying(signal);
      if (!playing) {
        break;
      }

      const frame = buffer.poll();
      if (!frame) {
        // Underrun; the buffer is back to BUFFERING
        continue;
      }

      try {
        await output.write(frame.payload);
        this.framesPlayed++;
        this.bytesPlayed += frame.payload.length;
        this.lastSequence = frame.sequence;
        this.emit('frame:played', frame);
      } catch (error) {
        this.writeErrors++;
        const writeError = error instanceof Error ? error : new Error(String(error));
        log('warn', `Audio output write failed: ${writeError.message}`);
        this.emit('output:error', writeError);
      }
    }
  }

  /**
   * Get playback status
   */
  getStatus(): {
    isRunning: boolean;
    framesPlayed: number;
    bytesPlayed: number;
    writeErrors: number;
    lastSequence: number | null;
  } {
    return {
      isRunning: this.loop !== null,
      framesPlayed: this.framesPlayed,
      bytesPlayed: this.bytesPlayed,
      writeErrors: this.writeErrors,
      lastSequence: this.lastSequence,
    };
  }

  // Typed event emitter methods
  on<K extends keyof PlaybackSchedulerEvents>(event: K, listener: PlaybackSchedulerEvents[K]): this {
    return super.on(event, listener);
  }

  emit<K extends keyof PlaybackSchedulerEvents>(event: K, ...args: Parameters<PlaybackSchedulerEvents[K]>): boolean {
    return super.emit(event, ...args);
  }
}
