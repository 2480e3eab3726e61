/**
 * Adaptive fill policy layered over a PlaybackBuffer: the fill threshold
 * tracks observed arrival jitter
 */
import { EventEmitter } from 'events';
import { AudioFrame, JitterBufferState } from '../types/index.js';
import { JitterBufferEvents, JitterBufferStatus, PlaybackBuffer } from './JitterBuffer.js';
import { contextLogger } from '../utils/logger.js';

const log = contextLogger('AdaptiveJitterBuffer');

const MIN_SAMPLES = 10;

/**
 * AdaptiveJitterBuffer configuration
 */
export interface AdaptiveJitterBufferConfig {
  /** Nominal frame duration */
  frameDurationMs: number;
  /** Lower bound for the computed threshold (default: 3) */
  minThreshold?: number;
  /** Upper bound for the computed threshold (default: 50) */
  maxThreshold?: number;
  /** Standard deviations of headroom (default: 2) */
  k?: number;
  /** Inter-arrival intervals kept (default: 50) */
  windowSize?: number;
  /** Frames between recomputations (default: 25) */
  recomputeEvery?: number;
  /** Clock, for tests */
  now?: () => number;
}

function meanAndStdDev(values: number[]): { mean: number; stdDev: number } {
  if (values.length === 0) {
    return { mean: 0, stdDev: 0 };
  }
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
  return { mean, stdDev: Math.sqrt(variance) };
}

export class AdaptiveJitterBuffer extends EventEmitter implements PlaybackBuffer {
  private inner: PlaybackBuffer;
  private frameDurationMs: number;
  private minThreshold: number;
  private maxThreshold: number;
  private k: number;
  private windowSize: number;
  private recomputeEvery: number;
  private now: () => number;
  private intervals: number[] = [];
  private rttSamples: number[] = [];
  private lastArrival: number | null = null;
  private sinceRecompute: number = 0;
  private adjustments: number = 0;

  constructor(inner: PlaybackBuffer, config: AdaptiveJitterBufferConfig) {
    super();
    this.inner = inner;
    this.frameDurationMs = config.frameDurationMs;
    this.minThreshold = config.minThreshold ?? 3;
    this.maxThreshold = config.maxThreshold ?? 50;
    this.k = config.k ?? 2;
    this.windowSize = config.windowSize ?? 50;
    this.recomputeEvery = config.recomputeEvery ?? 25;
    this.now = config.now ?? Date.now;

    inner.on('state', (state, previous) => this.emit('state', state, previous));
    inner.on('underrun', (total) => this.emit('underrun', total));
    inner.on('frame:dropped', (frame) => this.emit('frame:dropped', frame));
    inner.on('sequence:gap', (expected, received) => this.emit('sequence:gap', expected, received));
  }

  push(frame: AudioFrame): boolean {
    const accepted = this.inner.push(frame);
    if (!accepted) {
      return false;
    }

    const arrival = this.now();
    if (this.lastArrival !== null) {
      this.addSample(this.intervals, arrival - this.lastArrival);
    }
    this.lastArrival = arrival;

    this.sinceRecompute++;
    if (this.sinceRecompute >= this.recomputeEvery) {
      this.sinceRecompute = 0;
      this.recompute();
    }

    return true;
  }

  /**
   * Feed a transport round-trip measurement into the next recomputation
   */
  observeRtt(rttMs: number): void {
    this.addSample(this.rttSamples, rttMs);
  }

  /**
   * Threshold implied by the samples gathered so far, or null with too few
   */
  computeThreshold(): number | null {
    if (this.intervals.length < MIN_SAMPLES) {
      return null;
    }

    const arrival = meanAndStdDev(this.intervals);
    const rtt = meanAndStdDev(this.rttSamples);
    const targetMs = arrival.mean + this.k * arrival.stdDev + rtt.stdDev / 2;
    const frames = Math.ceil(targetMs / this.frameDurationMs);

    return Math.max(this.minThreshold, Math.min(this.maxThreshold, frames));
  }

  poll(): AudioFrame | null {
    return this.inner.poll();
  }

  waitUntilPlaying(signal?: AbortSignal): Promise<boolean> {
    return this.inner.waitUntilPlaying(signal);
  }

  stop(): void {
    this.inner.stop();
  }

  getState(): JitterBufferState {
    return this.inner.getState();
  }

  getMinFillThreshold(): number {
    return this.inner.getMinFillThreshold();
  }

  setMinFillThreshold(threshold: number): void {
    this.inner.setMinFillThreshold(threshold);
  }

  getStatus(): JitterBufferStatus {
    return this.inner.getStatus();
  }

  getAdaptiveStatus(): { threshold: number; samples: number; adjustments: number } {
    return {
      threshold: this.inner.getMinFillThreshold(),
      samples: this.intervals.length,
      adjustments: this.adjustments,
    };
  }

  private recompute(): void {
    const threshold = this.computeThreshold();
    if (threshold === null || threshold === this.inner.getMinFillThreshold()) {
      return;
    }

    log('debug', `Adapting fill threshold ${this.inner.getMinFillThreshold()} -> ${threshold}`);
    this.adjustments++;
    this.inner.setMinFillThreshold(threshold);
  }

  private addSample(samples: number[], value: number): void {
    samples.push(value);
    if (samples.length > this.windowSize) {
      samples.shift();
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
