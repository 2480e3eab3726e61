/**
 * Relay buffer holding a device's frames until a consumer takes them
 */
import { EventEmitter } from 'events';
import { AudioFrame } from '../types/index.js';
import { BoundedQueue } from '../utils/bounded-queue.js';
import { contextLogger } from '../utils/logger.js';

const log = contextLogger('RelayBuffer');

/**
 * Relay buffer events
 */
export interface RelayBufferEvents {
  'frame:evicted': (frame: AudioFrame) => void;
}

/**
 * Bounded per-device FIFO with consume-once delivery
 */
export class RelayBuffer extends EventEmitter {
  readonly deviceId: string;
  private queue: BoundedQueue<AudioFrame>;
  private received: number = 0;
  private delivered: number = 0;

  constructor(deviceId: string, capacity: number = 30) {
    super();
    this.deviceId = deviceId;
    this.queue = new BoundedQueue<AudioFrame>(capacity);

    log('debug', `RelayBuffer created for ${deviceId} with capacity ${capacity}`);
  }

  /**
   * Append a frame, evicting the oldest when full
   * @returns depth after the append
   */
  push(frame: AudioFrame): number {
    this.received++;
    const evicted = this.queue.push(frame);

    if (evicted) {
      log('debug', `Evicted frame ${evicted.sequence} for ${this.deviceId}`);
      this.emit('frame:evicted', evicted);
    }

    return this.queue.length;
  }

  /**
   * Remove and return up to `maxCount` oldest frames
   */
  drain(maxCount: number = Infinity): AudioFrame[] {
    const frames = this.queue.drain(maxCount);
    this.delivered += frames.length;
    return frames;
  }

  /**
   * Count a frame that bypassed the queue
   */
  markForwarded(): void {
    this.received++;
    this.delivered++;
  }

  clear(): void {
    const dropped = this.queue.clear();
    if (dropped.length > 0) {
      log('info', `Cleared ${dropped.length} undelivered frames for ${this.deviceId}`);
    }
  }

  get depth(): number {
    return this.queue.length;
  }

  get capacity(): number {
    return this.queue.maxSize;
  }

  getStatus(): {
    depth: number;
    capacity: number;
    received: number;
    delivered: number;
    evicted: number;
  } {
    return {
      depth: this.queue.length,
      capacity: this.queue.maxSize,
      received: this.received,
      delivered: this.delivered,
      evicted: this.queue.evictedCount,
    };
  }

  // Typed event emitter methods
  on<K extends keyof RelayBufferEvents>(event: K, listener: RelayBufferEvents[K]): this {
    return super.on(event, listener);
  }

  emit<K extends keyof RelayBufferEvents>(event: K, ...args: Parameters<RelayBufferEvents[K]>): boolean {
    return super.emit(event, ...args);
  }
}
