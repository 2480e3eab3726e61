/**
 * HTTP client for the relay API
 */
import axios, { AxiosRequestConfig, isAxiosError } from 'axios';
import { AudioFrame, RelaySessionStatus } from '../types/index.js';
import { ReceiveFramesResponse, SendFrameResponse, StreamCommand, FrameAck } from '../types/protocol.js';
import { fromWireFrame } from '../utils/audio-format.js';
import {
  InvalidFrameError,
  InvalidRequestError,
  PayloadTooLargeError,
  RelayError,
  SessionUnknownError,
  TransportError,
  TransportUnavailableError,
} from '../utils/errors.js';
import { withRetry } from '../utils/retry.js';
import { contextLogger } from '../utils/logger.js';

const log = contextLogger('RelayApiClient');

/**
 * Statuses worth another attempt
 */
const RETRYABLE_STATUS_CODES = [500, 502, 503, 504];

/**
 * Relay API client configuration
 */
export interface RelayApiClientConfig {
  /** Relay base URL, e.g. http://localhost:3000 */
  relayUrl: string;
  /** Per-request timeout */
  requestTimeoutMs: number;
  /** Retries after the first attempt for transient failures */
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
}

function readWireCode(data: unknown): string | undefined {
  if (typeof data === 'object' && data !== null && 'code' in data && typeof data.code === 'string') {
    return data.code;
  }
  return undefined;
}

/**
 * Translate an axios failure into the relay error taxonomy
 */
export function classifyHttpError(error: unknown, deviceId: string): RelayError {
  if (error instanceof RelayError) {
    return error;
  }

  if (!isAxiosError(error)) {
    return new TransportError(error instanceof Error ? error.message : String(error), {
      retryable: false,
      cause: error,
    });
  }

  const status = error.response?.status;
  if (status === undefined) {
    // Timeout, reset or refused connection
    return new TransportError(`Relay unreachable: ${error.code ?? error.message}`, { retryable: true, cause: error });
  }

  const code = readWireCode(error.response?.data);
  if (status === 404 && code === 'SESSION_UNKNOWN') {
    return new SessionUnknownError(deviceId);
  }
  if (status === 413) {
    return new PayloadTooLargeError();
  }
  if (status === 400) {
    return code === 'INVALID_FRAME'
      ? new InvalidFrameError(`Relay rejected frame for ${deviceId}`)
      : new InvalidRequestError(`Relay rejected request for ${deviceId}`);
  }

  return new TransportError(`Relay responded with status ${status}`, {
    retryable: RETRYABLE_STATUS_CODES.includes(status),
    status,
    cause: error,
  });
}

/**
 * Axios-backed relay client with bounded retry
 */
export class RelayApiClient {
  private config: RelayApiClientConfig;
  private baseUrl: string;
  private controller: AbortController = new AbortController();

  constructor(config: RelayApiClientConfig) {
    this.config = config;
    this.baseUrl = `${config.relayUrl.replace(/\/+$/, '')}/api/streaming`;
  }

  /**
   * Run a request with retry; exhausted transient failures become
   * TransportUnavailableError
   */
  async request<T>(deviceId: string, description: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const signal = this.controller.signal;
    try {
      return await withRetry(async () => {
        try {
          return await fn(signal);
        } catch (error) {
          throw classifyHttpError(error, deviceId);
        }
      }, {
        maxRetries: this.config.maxRetries,
        baseDelayMs: this.config.retryBaseDelayMs,
        maxDelayMs: this.config.retryMaxDelayMs,
        isRetryable: (error) => error instanceof TransportError && error.retryable,
        onRetry: (error, attempt, delayMs) => {
          log('warn', `${description} failed (${error instanceof Error ? error.message : String(error)}), retry ${attempt}/${this.config.maxRetries} in ${delayMs}ms`);
        },
        signal,
      });
    } catch (error) {
      if (error instanceof TransportError && error.retryable) {
        throw new TransportUnavailableError(`${description} failed after ${this.config.maxRetries + 1} attempts`, { cause: error });
      }
      throw error;
    }
  }

  async uploadFrame(frame: AudioFrame, recording: boolean = false): Promise<FrameAck> {
    const data = await this.request(frame.deviceId, `Upload of frame ${frame.sequence}`, async (signal) => {
      const response = await axios.post<SendFrameResponse>(
        this.url(`/frames/${encodeURIComponent(frame.deviceId)}`),
        frame.payload,
        this.requestConfig(signal, {
          params: { sequence: frame.sequence, capturedAt: frame.capturedAt, ...(recording && { recording: 'true' }) },
          headers: { 'Content-Type': 'application/octet-stream' },
        })
      );
      return response.data;
    });

    return { sequence: data.sequence, bufferDepth: data.bufferDepth, forwarded: data.forwarded };
  }

  async receiveFrames(deviceId: string, maxCount: number): Promise<AudioFrame[]> {
    const data = await this.request(deviceId, 'Frame poll', async (signal) => {
      const response = await axios.get<ReceiveFramesResponse>(
        this.url(`/frames/${encodeURIComponent(deviceId)}`),
        this.requestConfig(signal, { params: { maxCount } })
      );
      return response.data;
    });

    return data.frames.map((wire) => fromWireFrame(deviceId, wire));
  }

  async fetchCommands(deviceId: string): Promise<StreamCommand[]> {
    const data = await this.request(deviceId, 'Command poll', async (signal) => {
      const response = await axios.get<{ success: true; commands: StreamCommand[] }>(
        this.url(`/commands/${encodeURIComponent(deviceId)}`),
        this.requestConfig(signal)
      );
      return response.data;
    });
    return data.commands;
  }

  async startSession(deviceId: string, options: { parentId?: string; timeoutMinutes?: number } = {}): Promise<RelaySessionStatus> {
    const data = await this.request(deviceId, 'Relay session start', async (signal) => {
      const response = await axios.post<{ success: true; session: RelaySessionStatus }>(
        this.url(`/sessions/${encodeURIComponent(deviceId)}/start`),
        options,
        this.requestConfig(signal)
      );
      return response.data;
    });
    log('info', `Relay session active for ${deviceId}`);
    return data.session;
  }

  async stopSession(deviceId: string): Promise<boolean> {
    const data = await this.request(deviceId, 'Relay session stop', async (signal) => {
      const response = await axios.post<{ success: true; stopped: boolean }>(
        this.url(`/sessions/${encodeURIComponent(deviceId)}/stop`),
        {},
        this.requestConfig(signal)
      );
      return response.data;
    });
    return data.stopped;
  }

  /**
   * Abort in-flight requests and retry waits
   */
  cancelPending(): void {
    this.controller.abort();
    this.controller = new AbortController();
  }

  private url(pathname: string): string {
    return `${this.baseUrl}${pathname}`;
  }

  private requestConfig(signal: AbortSignal, extra: AxiosRequestConfig = {}): AxiosRequestConfig {
    return {
      timeout: this.config.requestTimeoutMs,
      signal,
      ...extra,
    };
  }
}
