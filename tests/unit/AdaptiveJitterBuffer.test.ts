/**
 * Unit tests for AdaptiveJitterBuffer
 */
import { describe, it, expect, vi } from 'vitest';
import { AdaptiveJitterBuffer } from '../../src/modules/AdaptiveJitterBuffer.js';
import { JitterBuffer } from '../../src/modules/JitterBuffer.js';
import { AudioFrame } from '../../src/types/index.js';
import { initLogger } from '../../src/utils/logger.js';

initLogger({
  level: 'error',
  format: 'simple',
  toFile: false,
  toConsole: false,
  logsPath: './test-logs',
});

function frame(sequence: number): AudioFrame {
  return { deviceId: 'child-1', sequence, capturedAt: 0, payload: Buffer.alloc(640) };
}

describe('AdaptiveJitterBuffer', () => {
  it('should not adapt before enough intervals are observed', () => {
    let clock = 0;
    const buffer = new AdaptiveJitterBuffer(new JitterBuffer({ minFillThreshold: 8, maxCapacity: 100 }), {
      frameDurationMs: 20,
      now: () => clock,
    });

    for (let seq = 0; seq < 10; seq++) {
      buffer.push(frame(seq));
      clock += 20;
    }

    // Ten arrivals give nine intervals
    expect(buffer.computeThreshold()).toBeNull();
    expect(buffer.getMinFillThreshold()).toBe(8);
  });

  it('should settle at the minimum for perfectly regular arrivals', () => {
    let clock = 0;
    const buffer = new AdaptiveJitterBuffer(new JitterBuffer({ minFillThreshold: 8, maxCapacity: 100 }), {
      frameDurationMs: 20,
      minThreshold: 3,
      recomputeEvery: 25,
      now: () => clock,
    });

    for (let seq = 0; seq < 25; seq++) {
      buffer.push(frame(seq));
      clock += 20;
    }

    // mean 20ms, no deviation: one frame, clamped up to the minimum
    expect(buffer.computeThreshold()).toBe(3);
    expect(buffer.getMinFillThreshold()).toBe(3);
    expect(buffer.getAdaptiveStatus()).toEqual({ threshold: 3, samples: 24, adjustments: 1 });
  });

  it('should raise the threshold for bursty arrivals', () => {
    let clock = 0;
    const buffer = new AdaptiveJitterBuffer(new JitterBuffer({ minFillThreshold: 3, maxCapacity: 100 }), {
      frameDurationMs: 20,
      k: 2,
      recomputeEvery: 1000,
      now: () => clock,
    });

    // Alternating 0ms and 40ms gaps: mean 20, stddev 20
    buffer.push(frame(0));
    for (let seq = 1; seq <= 20; seq++) {
      clock += seq % 2 === 0 ? 0 : 40;
      buffer.push(frame(seq));
    }

    // ceil((20 + 2 * 20) / 20) = 3; RTT spread adds to it
    expect(buffer.computeThreshold()).toBe(3);

    [10, 90, 10, 90].forEach((rtt) => buffer.observeRtt(rtt));
    // rtt stddev 40 -> +20ms -> ceil(80 / 20) = 4
    expect(buffer.computeThreshold()).toBe(4);
  });

  it('should clamp to the maximum', () => {
    let clock = 0;
    const buffer = new AdaptiveJitterBuffer(new JitterBuffer({ minFillThreshold: 3, maxCapacity: 100 }), {
      frameDurationMs: 20,
      maxThreshold: 10,
      recomputeEvery: 1000,
      now: () => clock,
    });

    for (let seq = 0; seq <= 10; seq++) {
      buffer.push(frame(seq));
      clock += 1000;
    }

    expect(buffer.computeThreshold()).toBe(10);
  });

  it('should forward events and delegate playback to the inner buffer', () => {
    const inner = new JitterBuffer({ minFillThreshold: 2, maxCapacity: 10 });
    const buffer = new AdaptiveJitterBuffer(inner, { frameDurationMs: 20 });
    const onState = vi.fn();
    const onUnderrun = vi.fn();
    buffer.on('state', onState);
    buffer.on('underrun', onUnderrun);

    buffer.push(frame(0));
    buffer.push(frame(1));
    expect(onState).toHaveBeenCalledWith('PLAYING', 'BUFFERING');

    expect(buffer.poll()?.sequence).toBe(0);
    expect(buffer.poll()?.sequence).toBe(1);
    expect(buffer.poll()).toBeNull();
    expect(onUnderrun).toHaveBeenCalledWith(1);

    buffer.stop();
    expect(inner.getState()).toBe('STOPPED');
    expect(buffer.push(frame(2))).toBe(false);
  });
});
