/**
 * Relay-side session registry: per-device buffers, control commands and
 * timeout sweeping
 */
import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import { AudioFrame, RelaySessionStatus } from '../types/index.js';
import { RelayStopReason, StreamCommand, StreamCommandType } from '../types/protocol.js';
import { RelayBuffer } from './relay-buffer.service.js';
import { BoundedQueue } from '../utils/bounded-queue.js';
import { InvalidFrameError, PayloadTooLargeError, SessionUnknownError } from '../utils/errors.js';
import { contextLogger } from '../utils/logger.js';

const log = contextLogger('RelayRegistry');

const MAX_PENDING_COMMANDS = 20;

export type { RelayStopReason };

/**
 * Session fields known to the registry (peer presence is tracked by the push relay)
 */
export type RelaySessionInfo = Omit<RelaySessionStatus, 'producerConnected' | 'consumerConnected'>;

/**
 * Relay registry configuration
 */
export interface RelayRegistryConfig {
  /** Relay buffer capacity per device, in frames */
  capacity: number;
  /** Largest accepted frame payload */
  maxFrameBytes: number;
  /** Sessions without traffic for this long are torn down */
  idleTimeoutMs: number;
  /** Sweep period; 0 disables the background sweep */
  sweepIntervalMs: number;
  /** Session lifetime when the start request names none */
  defaultTimeoutMinutes: number;
  /** Clock, for tests */
  now?: () => number;
}

export interface StartSessionOptions {
  parentId?: string;
  timeoutMinutes?: number;
}

interface PendingCommands {
  queue: BoundedQueue<StreamCommand>;
  updatedAt: number;
}

interface RelaySession {
  deviceId: string;
  parentId: string | null;
  recording: boolean;
  startedAt: number;
  lastActivityAt: number;
  timeoutMinutes: number;
  buffer: RelayBuffer;
}

/**
 * Relay registry events
 */
export interface RelayRegistryEvents {
  'session:started': (info: RelaySessionInfo) => void;
  'session:stopped': (deviceId: string, reason: RelayStopReason) => void;
  'command:queued': (command: StreamCommand) => void;
  'frame:accepted': (frame: AudioFrame, recording: boolean) => void;
  'frame:evicted': (frame: AudioFrame) => void;
}

/**
 * Owns every relay session and its buffer
 */
export class RelayRegistry extends EventEmitter {
  private config: RelayRegistryConfig;
  private sessions: Map<string, RelaySession> = new Map();
  private commands: Map<string, PendingCommands> = new Map();
  private sweepTimer: NodeJS.Timeout | null = null;
  private readonly now: () => number;

  constructor(config: RelayRegistryConfig) {
    super();
    this.config = config;
    this.now = config.now ?? Date.now;

    log('info', `RelayRegistry initialized (capacity ${config.capacity}, idle timeout ${config.idleTimeoutMs}ms)`);
  }

  /**
   * Start the periodic timeout sweep
   */
  start(): void {
    if (this.sweepTimer || this.config.sweepIntervalMs <= 0) {
      return;
    }

    this.sweepTimer = setInterval(() => this.sweep(), this.config.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  /**
   * Stop sweeping and tear down every session
   */
  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }

    for (const deviceId of [...this.sessions.keys()]) {
      this.stopSession(deviceId, 'shutdown');
    }
  }

  /**
   * Create a session, or return the active one unchanged
   */
  startSession(deviceId: string, options: StartSessionOptions = {}): { created: boolean; session: RelaySessionInfo } {
    const existing = this.sessions.get(deviceId);
    if (existing) {
      log('debug', `Session already active for ${deviceId}`);
      return { created: false, session: this.toInfo(deviceId, existing) };
    }

    const now = this.now();
    const buffer = new RelayBuffer(deviceId, this.config.capacity);
    buffer.on('frame:evicted', (frame) => this.emit('frame:evicted', frame));

    const session: RelaySession = {
      deviceId,
      parentId: options.parentId ?? null,
      recording: false,
      startedAt: now,
      lastActivityAt: now,
      timeoutMinutes: options.timeoutMinutes ?? this.config.defaultTimeoutMinutes,
      buffer,
    };
    this.sessions.set(deviceId, session);

    log('info', `Session started for ${deviceId} (timeout ${session.timeoutMinutes} min)`);

    const info = this.toInfo(deviceId, session);
    this.emit('session:started', info);
    this.queueCommand(deviceId, 'start_audio_stream', { timeoutMinutes: session.timeoutMinutes });

    return { created: true, session: info };
  }

  /**
   * Tear down a session and free its buffer
   * @returns false if no session was active
   */
  stopSession(deviceId: string, reason: RelayStopReason = 'requested'): boolean {
    const session = this.sessions.get(deviceId);
    if (!session) {
      return false;
    }

    session.buffer.clear();
    session.buffer.removeAllListeners();
    this.sessions.delete(deviceId);

    log('info', `Session stopped for ${deviceId}: ${reason}`);

    this.emit('session:stopped', deviceId, reason);
    if (reason !== 'shutdown') {
      this.queueCommand(deviceId, 'stop_audio_stream', { reason });
    }

    return true;
  }

  hasSession(deviceId: string): boolean {
    return this.sessions.has(deviceId);
  }

  /**
   * Validate an inbound frame against its session and record the activity.
   * `recording` marks a single frame for persistence regardless of the
   * session flag.
   * @throws PayloadTooLargeError, InvalidFrameError, SessionUnknownError
   */
  admit(frame: AudioFrame, recording: boolean = false): void {
    if (frame.payload.length > this.config.maxFrameBytes) {
      throw new PayloadTooLargeError(frame.payload.length, this.config.maxFrameBytes);
    }

    if (frame.payload.length === 0) {
      throw new InvalidFrameError('Frame payload is empty');
    }

    if (!Number.isInteger(frame.sequence) || frame.sequence < 0) {
      throw new InvalidFrameError(`Invalid frame sequence: ${frame.sequence}`);
    }

    const session = this.requireSession(frame.deviceId);
    session.lastActivityAt = this.now();
    this.emit('frame:accepted', frame, session.recording || recording);
  }

  /**
   * Buffer an admitted frame
   * @returns buffer depth after the append
   */
  enqueue(frame: AudioFrame): number {
    return this.requireSession(frame.deviceId).buffer.push(frame);
  }

  /**
   * Count an admitted frame that went straight to a consumer
   */
  recordForwarded(deviceId: string): void {
    this.requireSession(deviceId).buffer.markForwarded();
  }

  /**
   * Remove and return up to `maxCount` oldest frames
   */
  drain(deviceId: string, maxCount: number = Infinity): AudioFrame[] {
    const session = this.requireSession(deviceId);
    session.lastActivityAt = this.now();
    return session.buffer.drain(maxCount);
  }

  setRecording(deviceId: string, recording: boolean): RelaySessionInfo {
    const session = this.requireSession(deviceId);
    session.recording = recording;

    log('info', `Recording ${recording ? 'enabled' : 'disabled'} for ${deviceId}`);
    return this.toInfo(deviceId, session);
  }

  isRecording(deviceId: string): boolean {
    return this.sessions.get(deviceId)?.recording ?? false;
  }

  queueCommand(deviceId: string, type: StreamCommandType, params?: Record<string, unknown>): StreamCommand {
    const command: StreamCommand = {
      id: randomUUID(),
      type,
      deviceId,
      issuedAt: new Date(this.now()).toISOString(),
      params,
    };

    let pending = this.commands.get(deviceId);
    if (!pending) {
      pending = { queue: new BoundedQueue<StreamCommand>(MAX_PENDING_COMMANDS), updatedAt: 0 };
      this.commands.set(deviceId, pending);
    }
    pending.queue.push(command);
    pending.updatedAt = this.now();

    log('debug', `Queued ${type} for ${deviceId}`);
    this.emit('command:queued', command);
    return command;
  }

  /**
   * Remove and return pending commands for a device
   */
  takeCommands(deviceId: string): StreamCommand[] {
    const pending = this.commands.get(deviceId);
    if (!pending) {
      return [];
    }
    this.commands.delete(deviceId);
    return pending.queue.drain();
  }

  /**
   * Drop a pending command that was delivered another way
   */
  discardCommand(deviceId: string, commandId: string): void {
    const queue = this.commands.get(deviceId)?.queue;
    if (!queue) {
      return;
    }
    const remaining = queue.drain().filter((command) => command.id !== commandId);
    if (remaining.length === 0) {
      this.commands.delete(deviceId);
      return;
    }
    for (const command of remaining) {
      queue.push(command);
    }
  }

  /**
   * Stop sessions that went idle or outlived their timeout, and forget
   * commands no device collected within the idle timeout
   * @returns device ids that were stopped
   */
  sweep(now: number = this.now()): string[] {
    const stopped: string[] = [];

    for (const [deviceId, session] of [...this.sessions]) {
      if (now - session.lastActivityAt > this.config.idleTimeoutMs) {
        this.stopSession(deviceId, 'idle_timeout');
        stopped.push(deviceId);
      } else if (now - session.startedAt > session.timeoutMinutes * 60 * 1000) {
        this.stopSession(deviceId, 'session_timeout');
        stopped.push(deviceId);
      }
    }

    for (const [deviceId, pending] of [...this.commands]) {
      if (!this.sessions.has(deviceId) && now - pending.updatedAt > this.config.idleTimeoutMs) {
        this.commands.delete(deviceId);
        log('debug', `Dropped ${pending.queue.length} uncollected command(s) for ${deviceId}`);
      }
    }

    if (stopped.length > 0) {
      log('info', `Swept ${stopped.length} session(s): ${stopped.join(', ')}`);
    }

    return stopped;
  }

  getSessionInfo(deviceId: string): RelaySessionInfo {
    const session = this.sessions.get(deviceId);
    if (!session) {
      return {
        deviceId,
        active: false,
        parentId: null,
        recording: false,
        startedAt: null,
        lastActivityAt: null,
        timeoutMinutes: 0,
        framesReceived: 0,
        framesDelivered: 0,
        framesEvicted: 0,
        bufferDepth: 0,
        bufferCapacity: this.config.capacity,
      };
    }
    return this.toInfo(deviceId, session);
  }

  getStats(): { activeSessions: number; deviceIds: string[]; bufferedFrames: number; pendingCommandQueues: number } {
    let bufferedFrames = 0;
    for (const session of this.sessions.values()) {
      bufferedFrames += session.buffer.depth;
    }
    return {
      activeSessions: this.sessions.size,
      deviceIds: [...this.sessions.keys()],
      bufferedFrames,
      pendingCommandQueues: this.commands.size,
    };
  }

  private requireSession(deviceId: string): RelaySession {
    const session = this.sessions.get(deviceId);
    if (!session) {
      throw new SessionUnknownError(deviceId);
    }
    return session;
  }

  private toInfo(deviceId: string, session: RelaySession): RelaySessionInfo {
    const buffer = session.buffer.getStatus();
    return {
      deviceId,
      active: true,
      parentId: session.parentId,
      recording: session.recording,
      startedAt: new Date(session.startedAt).toISOString(),
      lastActivityAt: new Date(session.lastActivityAt).toISOString(),
      timeoutMinutes: session.timeoutMinutes,
      framesReceived: buffer.received,
      framesDelivered: buffer.delivered,
      framesEvicted: buffer.evicted,
      bufferDepth: buffer.depth,
      bufferCapacity: buffer.capacity,
    };
  }

  // Typed event emitter methods
  on<K extends keyof RelayRegistryEvents>(event: K, listener: RelayRegistryEvents[K]): this {
    return super.on(event, listener);
  }

  emit<K extends keyof RelayRegistryEvents>(event: K, ...args: Parameters<RelayRegistryEvents[K]>): boolean {
    return super.emit(event, ...args);
  }
}
