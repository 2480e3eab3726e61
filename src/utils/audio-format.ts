/**
 * PCM format arithmetic and frame wire encoding
 */
import { AudioFormat, AudioFrame } from '../types/index.js';
import { WireFrame } from '../types/protocol.js';

export const DEFAULT_AUDIO_FORMAT: AudioFormat = {
  sampleRate: 16000,
  channels: 1,
  bitDepth: 16,
  frameDurationMs: 20,
};

/**
 * Bytes in one interleaved sample across all channels
 */
export function bytesPerSampleFrame(format: AudioFormat): number {
  return format.channels * (format.bitDepth / 8);
}

export function expectedBytesPerSecond(format: AudioFormat): number {
  return format.sampleRate * bytesPerSampleFrame(format);
}

/**
 * Nominal payload size of one frame, aligned to whole samples
 */
export function bytesPerFrame(format: AudioFormat): number {
  const samples = Math.floor((format.sampleRate * format.frameDurationMs) / 1000);
  return samples * bytesPerSampleFrame(format);
}

export function toWireFrame(frame: AudioFrame): WireFrame {
  return {
    sequence: frame.sequence,
    payload: frame.payload.toString('base64'),
    capturedAt: frame.capturedAt,
  };
}

export function fromWireFrame(deviceId: string, wire: WireFrame): AudioFrame {
  return {
    deviceId,
    sequence: wire.sequence,
    payload: Buffer.from(wire.payload, 'base64'),
    capturedAt: wire.capturedAt,
  };
}

/**
 * Parse a non-negative integer query or metadata value
 */
export function parseNonNegativeInt(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 ? value : null;
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    return parseInt(value, 10);
  }
  return null;
}
