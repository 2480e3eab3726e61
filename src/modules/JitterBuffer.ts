/**
 * Jitter Buffer Module
 * Receiver-side FIFO that withholds frames until enough are queued to play
 * through network jitter
 */
import { EventEmitter } from 'events';
import { AudioFrame, JitterBufferState } from '../types/index.js';
import { BoundedQueue } from '../utils/bounded-queue.js';
import { contextLogger } from '../utils/logger.js';

const log = contextLogger('JitterBuffer');

/**
 * JitterBuffer configuration
 */
export interface JitterBufferConfig {
  /** Frames required before playback starts or resumes (default: 8) */
  minFillThreshold?: number;
  /** Frames held at most; the oldest is dropped beyond this (default: 100) */
  maxCapacity?: number;
}

/**
 * JitterBuffer events
 */
export interface JitterBufferEvents {
  'state': (state: JitterBufferState, previous: JitterBufferState) => void;
  'underrun': (totalUnderruns: number) => void;
  'frame:dropped': (frame: AudioFrame) => void;
  'sequence:gap': (expected: number, received: number) => void;
}

export interface JitterBufferStatus {
  state: JitterBufferState;
  depth: number;
  capacity: number;
  minFillThreshold: number;
  framesReceived: number;
  framesPlayed: number;
  underruns: number;
  droppedFrames: number;
  sequenceGaps: number;
}

/**
 * What the playback loop needs from a buffer; implemented by JitterBuffer
 * and its adaptive decorator
 */
export interface PlaybackBuffer {
  push(frame: AudioFrame): boolean;
  poll(): AudioFrame | null;
  /** Resolves true once PLAYING, false if stopped or aborted first */
  waitUntilPlaying(signal?: AbortSignal): Promise<boolean>;
  stop(): void;
  getState(): JitterBufferState;
  getMinFillThreshold(): number;
  setMinFillThreshold(threshold: number): void;
  getStatus(): JitterBufferStatus;
  on<K extends keyof JitterBufferEvents>(event: K, listener: JitterBufferEvents[K]): this;
  off<K extends keyof JitterBufferEvents>(event: K, listener: JitterBufferEvents[K]): this;
}

type Waiter = (playing: boolean) => void;

export class JitterBuffer extends EventEmitter implements PlaybackBuffer {
  private queue: BoundedQueue<AudioFrame>;
  private state: JitterBufferState = 'BUFFERING';
  private minFillThreshold: number;
  private waiters: Set<Waiter> = new Set();
  private lastSequence: number | null = null;
  private framesReceived: number = 0;
  private framesPlayed: number = 0;
  private underruns: number = 0;
  private droppedFrames: number = 0;
  private sequenceGaps: number = 0;

  constructor(config: JitterBufferConfig = {}) {
    super();
    const maxCapacity = config.maxCapacity ?? 100;
    this.queue = new BoundedQueue<AudioFrame>(maxCapacity);
    this.minFillThreshold = this.clampThreshold(config.minFillThreshold ?? 8);

    log('debug', `JitterBuffer created: threshold ${this.minFillThreshold}, capacity ${maxCapacity}`);
  }

  /**
   * Enqueue a frame in arrival order
   * @returns false if the buffer is stopped or the frame repeats the last sequence
   */
  push(frame: AudioFrame): boolean {
    if (this.state === 'STOPPED') {
      return false;
    }

    // A retried upload the relay had already accepted
    if (frame.sequence === this.lastSequence) {
      this.droppedFrames++;
      log('debug', `Dropped duplicate frame ${frame.sequence}`);
      this.emit('frame:dropped', frame);
      return false;
    }

    this.framesReceived++;
    this.trackSequence(frame.sequence);

    const dropped = this.queue.push(frame);
    if (dropped) {
      this.droppedFrames++;
      this.emit('frame:dropped', dropped);
    }

    if (this.state === 'BUFFERING' && this.queue.length >= this.minFillThreshold) {
      this.setState('PLAYING');
    }

    return true;
  }

  /**
   * Take the oldest frame while PLAYING. An empty PLAYING buffer is an
   * underrun and falls back to BUFFERING.
   */
  poll(): AudioFrame | null {
    if (this.state !== 'PLAYING') {
      return null;
    }

    const frame = this.queue.shift();
    if (!frame) {
      this.underruns++;
      log('debug', `Underrun #${this.underruns}, rebuffering to ${this.minFillThreshold} frames`);
      this.setState('BUFFERING');
      this.emit('underrun', this.underruns);
      return null;
    }

    this.framesPlayed++;
    return frame;
  }

  waitUntilPlaying(signal?: AbortSignal): Promise<boolean> {
    if (this.state === 'PLAYING') {
      return Promise.resolve(true);
    }
    if (this.state === 'STOPPED' || signal?.aborted) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      const onAbort = (): void => {
        this.waiters.delete(waiter);
        resolve(false);
      };
      const waiter: Waiter = (playing) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(playing);
      };

      this.waiters.add(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Discard every frame and stop for good
   */
  stop(): void {
    if (this.state === 'STOPPED') {
      return;
    }
    const discarded = this.queue.clear();
    if (discarded.length > 0) {
      log('debug', `Discarded ${discarded.length} frames on stop`);
    }
    this.setState('STOPPED');
  }

  getState(): JitterBufferState {
    return this.state;
  }

  getMinFillThreshold(): number {
    return this.minFillThreshold;
  }

  /**
   * Change the fill threshold; a BUFFERING buffer that already meets the new
   * threshold starts playing
   */
  setMinFillThreshold(threshold: number): void {
    const clamped = this.clampThreshold(threshold);
    if (clamped === this.minFillThreshold) {
      return;
    }

    log('debug', `Fill threshold ${this.minFillThreshold} -> ${clamped}`);
    this.minFillThreshold = clamped;

    if (this.state === 'BUFFERING' && this.queue.length >= this.minFillThreshold) {
      this.setState('PLAYING');
    }
  }

  get depth(): number {
    return this.queue.length;
  }

  getStatus(): JitterBufferStatus {
    return {
      state: this.state,
      depth: this.queue.length,
      capacity: this.queue.maxSize,
      minFillThreshold: this.minFillThreshold,
      framesReceived: this.framesReceived,
      framesPlayed: this.framesPlayed,
      underruns: this.underruns,
      droppedFrames: this.droppedFrames,
      sequenceGaps: this.sequenceGaps,
    };
  }

  private trackSequence(sequence: number): void {
    const last = this.lastSequence;
    this.lastSequence = sequence;

    // Sequences restart at 0 with each sender session
    if (last === null || sequence <= last) {
      return;
    }

    if (sequence > last + 1) {
      this.sequenceGaps += sequence - last - 1;
      this.emit('sequence:gap', last + 1, sequence);
    }
  }

  private clampThreshold(threshold: number): number {
    return Math.max(1, Math.min(this.queue.maxSize, Math.round(threshold)));
  }

  private setState(state: JitterBufferState): void {
    const previous = this.state;
    if (previous === state) {
      return;
    }
    this.state = state;
    this.emit('state', state, previous);

    if (state !== 'BUFFERING') {
      const waiters = [...this.waiters];
      this.waiters.clear();
      for (const waiter of waiters) {
        waiter(state === 'PLAYING');
      }
    }
  }

  // Typed event emitter methods
  on<K extends keyof JitterBufferEvents>(event: K, listener: JitterBufferEvents[K]): this {
    return super.on(event, listener);
  }

  off<K extends keyof JitterBufferEvents>(event: K, listener: JitterBufferEvents[K]): this {
    return super.off(event, listener);
  }

  emit<K extends keyof JitterBufferEvents>(event: K, ...args: Parameters<JitterBufferEvents[K]>): boolean {
    return super.emit(event, ...args);
  }
}
