/**
 * Metrics Collector Module
 * Read-only observer of a streaming session; listeners update counters and
 * snapshots are computed on demand
 */
import {
  AudioFormat,
  ConnectionState,
  HealthStatus,
  MetricsSnapshot,
  SessionRole,
  SessionState,
  StopReason,
} from '../types/index.js';
import { expectedBytesPerSecond } from '../utils/audio-format.js';

/**
 * MetricsCollector configuration
 */
export interface MetricsCollectorConfig {
  deviceId: string;
  role: SessionRole;
  format: AudioFormat;
  /** Window for the observed data rate (default: 5000) */
  rateWindowMs?: number;
  /** Window for counting recent underruns (default: 10000) */
  underrunWindowMs?: number;
  /** Underruns within the window above which health degrades (default: 5) */
  underrunThreshold?: number;
  /** Fraction of the expected rate below which health degrades (default: 0.8) */
  degradedRateFraction?: number;
  /** RTT above which health degrades (default: 200) */
  rttWarnMs?: number;
  /** Clock, for tests */
  now?: () => number;
}

interface RateSample {
  at: number;
  bytes: number;
}

const ACTIVE_STATES: ReadonlySet<SessionState> = new Set<SessionState>(['STREAMING', 'BUFFERING', 'PLAYING']);
const FAILURE_REASONS: ReadonlySet<StopReason> = new Set<StopReason>(['transport_unavailable', 'capture_failed']);

export class MetricsCollector {
  private config: Required<Omit<MetricsCollectorConfig, 'now'>>;
  private now: () => number;
  private expectedRate: number;

  private sessionState: SessionState = 'IDLE';
  private connectionState: ConnectionState = 'disconnected';
  private stopReason: StopReason | null = null;
  private startedAt: number | null = null;

  private rateSamples: RateSample[] = [];
  private underrunTimes: number[] = [];
  private framesTotal: number = 0;
  private bytesTotal: number = 0;
  private underrunsTotal: number = 0;
  private droppedFrames: number = 0;
  private sequenceGaps: number = 0;
  private rttMs: number | null = null;
  private errorCount: number = 0;
  private lastError: string | null = null;
  private queueGauge: (() => { depth: number; capacity: number }) | null = null;

  constructor(config: MetricsCollectorConfig) {
    this.config = {
      deviceId: config.deviceId,
      role: config.role,
      format: config.format,
      rateWindowMs: config.rateWindowMs ?? 5000,
      underrunWindowMs: config.underrunWindowMs ?? 10000,
      underrunThreshold: config.underrunThreshold ?? 5,
      degradedRateFraction: config.degradedRateFraction ?? 0.8,
      rttWarnMs: config.rttWarnMs ?? 200,
    };
    this.now = config.now ?? Date.now;
    this.expectedRate = expectedBytesPerSecond(config.format);
  }

  /**
   * Begin a new measurement period
   */
  markStarted(): void {
    this.startedAt = this.now();
    this.stopReason = null;
    this.rateSamples = [];
    this.underrunTimes = [];
  }

  setSessionState(state: SessionState, stopReason?: StopReason): void {
    this.sessionState = state;
    if (state === 'STOPPED') {
      this.stopReason = stopReason ?? 'requested';
    }
  }

  setConnectionState(state: ConnectionState): void {
    this.connectionState = state;
  }

  /**
   * Report the queue this session should expose (outbound or jitter buffer)
   */
  setQueueGauge(gauge: (() => { depth: number; capacity: number }) | null): void {
    this.queueGauge = gauge;
  }

  recordFrame(bytes: number): void {
    this.framesTotal++;
    this.bytesTotal += bytes;
    this.rateSamples.push({ at: this.now(), bytes });
    this.prune(this.now());
  }

  recordUnderrun(): void {
    this.underrunsTotal++;
    this.underrunTimes.push(this.now());
  }

  recordDropped(count: number = 1): void {
    this.droppedFrames += count;
  }

  recordSequenceGap(missing: number): void {
    this.sequenceGaps += missing;
  }

  recordRtt(rttMs: number): void {
    this.rttMs = rttMs;
  }

  recordError(error: unknown): void {
    this.errorCount++;
    this.lastError = error instanceof Error ? error.message : String(error);
  }

  getSnapshot(): MetricsSnapshot {
    const now = this.now();
    this.prune(now);

    const bytesPerSecond = this.observedRate(now);
    const underrunsInWindow = this.underrunTimes.length;
    const queue = this.queueGauge?.() ?? { depth: 0, capacity: 0 };
    const { health, reasons } = this.classify(now, bytesPerSecond, underrunsInWindow);

    return {
      deviceId: this.config.deviceId,
      role: this.config.role,
      sessionState: this.sessionState,
      connectionState: this.connectionState,
      health,
      reasons,
      bytesPerSecond,
      expectedBytesPerSecond: this.expectedRate,
      framesTotal: this.framesTotal,
      bytesTotal: this.bytesTotal,
      queueDepth: queue.depth,
      queueCapacity: queue.capacity,
      underrunsTotal: this.underrunsTotal,
      underrunsInWindow,
      droppedFrames: this.droppedFrames,
      sequenceGaps: this.sequenceGaps,
      rttMs: this.rttMs,
      errorCount: this.errorCount,
      lastError: this.lastError,
      stopReason: this.sessionState === 'STOPPED' ? this.stopReason : null,
      uptimeMs: this.startedAt === null ? 0 : now - this.startedAt,
      timestamp: new Date(now).toISOString(),
    };
  }

  private classify(now: number, bytesPerSecond: number, underrunsInWindow: number): { health: HealthStatus; reasons: string[] } {
    if (this.connectionState === 'unavailable') {
      return { health: 'failed', reasons: ['transport unavailable'] };
    }
    if (this.sessionState === 'STOPPED' && this.stopReason !== null && FAILURE_REASONS.has(this.stopReason)) {
      return { health: 'failed', reasons: [`session stopped: ${this.stopReason}`] };
    }
    if (!ACTIVE_STATES.has(this.sessionState)) {
      return { health: 'good', reasons: [] };
    }

    const reasons: string[] = [];

    if (this.connectionState !== 'connected') {
      reasons.push(`connection ${this.connectionState}`);
    }

    const warm = this.startedAt !== null && now - this.startedAt >= this.config.rateWindowMs;
    const minimumRate = this.expectedRate * this.config.degradedRateFraction;
    if (warm && bytesPerSecond < minimumRate) {
      reasons.push(`data rate ${Math.round(bytesPerSecond)} B/s below ${Math.round(minimumRate)} B/s`);
    }

    if (underrunsInWindow > this.config.underrunThreshold) {
      reasons.push(`${underrunsInWindow} underruns in the last ${this.config.underrunWindowMs}ms`);
    }

    if (this.rttMs !== null && this.rttMs > this.config.rttWarnMs) {
      reasons.push(`round trip ${this.rttMs}ms above ${this.config.rttWarnMs}ms`);
    }

    return { health: reasons.length > 0 ? 'degraded' : 'good', reasons };
  }

  private observedRate(now: number): number {
    if (this.startedAt === null) {
      return 0;
    }
    const spanMs = Math.min(this.config.rateWindowMs, now - this.startedAt);
    if (spanMs <= 0) {
      return 0;
    }
    const bytes = this.rateSamples.reduce((sum, sample) => sum + sample.bytes, 0);
    return (bytes * 1000) / spanMs;
  }

  private prune(now: number): void {
    const rateCutoff = now - this.config.rateWindowMs;
    while (this.rateSamples.length > 0 && this.rateSamples[0].at <= rateCutoff) {
      this.rateSamples.shift();
    }

    const underrunCutoff = now - this.config.underrunWindowMs;
    while (this.underrunTimes.length > 0 && this.underrunTimes[0] <= underrunCutoff) {
      this.underrunTimes.shift();
    }
  }
}
