/**
 * Unit tests for JitterBuffer
 */
import { describe, it, expect, vi } from 'vitest';
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
  return { deviceId: 'child-1', sequence, capturedAt: sequence * 20, payload: Buffer.alloc(640) };
}

describe('JitterBuffer', () => {
  describe('fill threshold', () => {
    it('should start playing at the threshold and drain from the first frame', () => {
      const buffer = new JitterBuffer({ minFillThreshold: 3, maxCapacity: 10 });

      buffer.push(frame(0));
      buffer.push(frame(1));
      expect(buffer.getState()).toBe('BUFFERING');

      buffer.push(frame(2));
      expect(buffer.getState()).toBe('PLAYING');

      expect(buffer.poll()?.sequence).toBe(0);
      expect(buffer.poll()?.sequence).toBe(1);
      expect(buffer.poll()?.sequence).toBe(2);
    });

    it('should never drain below the threshold', () => {
      const buffer = new JitterBuffer({ minFillThreshold: 3, maxCapacity: 10 });

      buffer.push(frame(0));
      buffer.push(frame(1));

      expect(buffer.poll()).toBeNull();
      expect(buffer.poll()).toBeNull();
      expect(buffer.getState()).toBe('BUFFERING');
      expect(buffer.depth).toBe(2);
    });

    it('should emit state transitions', () => {
      const buffer = new JitterBuffer({ minFillThreshold: 1, maxCapacity: 10 });
      const onState = vi.fn();
      buffer.on('state', onState);

      buffer.push(frame(0));
      buffer.stop();

      expect(onState.mock.calls).toEqual([
        ['PLAYING', 'BUFFERING'],
        ['STOPPED', 'PLAYING'],
      ]);
    });
  });

  describe('underruns', () => {
    it('should rebuffer after running dry and resume at the threshold', () => {
      const buffer = new JitterBuffer({ minFillThreshold: 2, maxCapacity: 10 });
      const onUnderrun = vi.fn();
      buffer.on('underrun', onUnderrun);

      buffer.push(frame(0));
      buffer.push(frame(1));
      buffer.poll();
      buffer.poll();

      expect(buffer.poll()).toBeNull();
      expect(buffer.getState()).toBe('BUFFERING');
      expect(onUnderrun).toHaveBeenCalledWith(1);

      buffer.push(frame(2));
      expect(buffer.poll()).toBeNull();

      buffer.push(frame(3));
      expect(buffer.getState()).toBe('PLAYING');
      expect(buffer.poll()?.sequence).toBe(2);
      expect(buffer.getStatus().underruns).toBe(1);
    });
  });

  describe('capacity', () => {
    it('should drop the oldest frame when full', () => {
      const buffer = new JitterBuffer({ minFillThreshold: 3, maxCapacity: 3 });
      const onDropped = vi.fn();
      buffer.on('frame:dropped', onDropped);

      for (let seq = 0; seq < 5; seq++) {
        buffer.push(frame(seq));
      }

      expect(buffer.depth).toBe(3);
      expect(onDropped.mock.calls.map(([f]) => f.sequence)).toEqual([0, 1]);
      expect(buffer.poll()?.sequence).toBe(2);
      expect(buffer.getStatus().droppedFrames).toBe(2);
    });

    it('should clamp the threshold to the capacity', () => {
      const buffer = new JitterBuffer({ minFillThreshold: 50, maxCapacity: 4 });
      expect(buffer.getMinFillThreshold()).toBe(4);

      buffer.setMinFillThreshold(0);
      expect(buffer.getMinFillThreshold()).toBe(1);
    });
  });

  describe('sequence gaps', () => {
    it('should count missing sequences without reordering', () => {
      const buffer = new JitterBuffer({ minFillThreshold: 1, maxCapacity: 10 });
      const onGap = vi.fn();
      buffer.on('sequence:gap', onGap);

      buffer.push(frame(0));
      buffer.push(frame(3));
      buffer.push(frame(4));

      expect(onGap).toHaveBeenCalledWith(1, 3);
      expect(buffer.getStatus().sequenceGaps).toBe(2);
      expect([buffer.poll(), buffer.poll(), buffer.poll()].map((f) => f?.sequence)).toEqual([0, 3, 4]);
    });

    it('should treat a restart at zero as a new session, not a gap', () => {
      const buffer = new JitterBuffer({ minFillThreshold: 1, maxCapacity: 10 });

      buffer.push(frame(7));
      buffer.push(frame(0));
      buffer.push(frame(1));

      expect(buffer.getStatus().sequenceGaps).toBe(0);
    });
  });

  describe('duplicates', () => {
    it('should drop a frame repeating the previous sequence', () => {
      const buffer = new JitterBuffer({ minFillThreshold: 1, maxCapacity: 10 });
      const onDropped = vi.fn();
      buffer.on('frame:dropped', onDropped);

      expect(buffer.push(frame(4))).toBe(true);
      expect(buffer.push(frame(4))).toBe(false);
      expect(buffer.push(frame(5))).toBe(true);

      expect(onDropped).toHaveBeenCalledTimes(1);
      expect(buffer.getStatus()).toMatchObject({ depth: 2, framesReceived: 2, droppedFrames: 1, sequenceGaps: 0 });
      expect([buffer.poll(), buffer.poll()].map((f) => f?.sequence)).toEqual([4, 5]);
    });
  });

  describe('waitUntilPlaying', () => {
    it('should resolve when the threshold is reached', async () => {
      const buffer = new JitterBuffer({ minFillThreshold: 2, maxCapacity: 10 });
      const waiting = buffer.waitUntilPlaying();

      buffer.push(frame(0));
      buffer.push(frame(1));

      await expect(waiting).resolves.toBe(true);
    });

    it('should resolve false when stopped or aborted', async () => {
      const buffer = new JitterBuffer({ minFillThreshold: 2, maxCapacity: 10 });
      const controller = new AbortController();
      const aborted = buffer.waitUntilPlaying(controller.signal);
      const stopped = buffer.waitUntilPlaying();

      controller.abort();
      buffer.stop();

      await expect(aborted).resolves.toBe(false);
      await expect(stopped).resolves.toBe(false);
    });

    it('should start playing when the threshold is lowered below the depth', async () => {
      const buffer = new JitterBuffer({ minFillThreshold: 5, maxCapacity: 10 });
      buffer.push(frame(0));
      buffer.push(frame(1));
      const waiting = buffer.waitUntilPlaying();

      buffer.setMinFillThreshold(2);

      await expect(waiting).resolves.toBe(true);
    });
  });

  describe('stop', () => {
    it('should discard frames and refuse new ones', () => {
      const buffer = new JitterBuffer({ minFillThreshold: 1, maxCapacity: 10 });
      buffer.push(frame(0));

      buffer.stop();

      expect(buffer.getState()).toBe('STOPPED');
      expect(buffer.depth).toBe(0);
      expect(buffer.push(frame(1))).toBe(false);
      expect(buffer.poll()).toBeNull();
    });
  });
});
