/**
 * Push delivery: tracks producer and consumer sockets per device and forwards
 * frames as they arrive
 */
import { Socket } from 'socket.io';
import { AudioFrame } from '../types/index.js';
import {
  ClientToServerEvents,
  FrameAck,
  FrameMetadata,
  PeerRole,
  RegisterAck,
  RegisterRequest,
  RelayStopReason,
  ServerToClientEvents,
  SocketData,
  StreamCommand,
} from '../types/protocol.js';
import { RelayRegistry } from './relay-registry.service.js';
import { contextLogger } from '../utils/logger.js';

const log = contextLogger('PushRelay');

export type InterServerEvents = Record<string, never>;

export type RelaySocket = Socket<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

interface DevicePeers {
  producer?: RelaySocket;
  consumer?: RelaySocket;
}

function toMetadata(frame: AudioFrame): FrameMetadata {
  return {
    deviceId: frame.deviceId,
    sequence: frame.sequence,
    capturedAt: frame.capturedAt,
    size: frame.payload.length,
  };
}

/**
 * Push relay for socket-connected devices
 */
export class PushRelay {
  private registry: RelayRegistry;
  private peers: Map<string, DevicePeers> = new Map();

  constructor(registry: RelayRegistry) {
    this.registry = registry;

    this.registry.on('command:queued', (command) => this.pushCommand(command));
    this.registry.on('session:stopped', (deviceId, reason) => this.notifySessionEnded(deviceId, reason));

    log('info', 'PushRelay initialized');
  }

  /**
   * Register a socket as the producer or consumer of a device, replacing any
   * previous peer in that role
   */
  register(socket: RelaySocket, request: RegisterRequest): RegisterAck {
    const { deviceId, role } = request;

    const peers = this.peers.get(deviceId) ?? {};
    const previous = peers[role];
    if (previous && previous.id !== socket.id) {
      log('warn', `Replacing ${role} for ${deviceId}: ${previous.id} -> ${socket.id}`);
      previous.data.deviceId = undefined;
      previous.data.role = undefined;
    }

    peers[role] = socket;
    this.peers.set(deviceId, peers);
    socket.data.deviceId = deviceId;
    socket.data.role = role;

    log('info', `Registered ${role} ${socket.id} for ${deviceId}`);

    const other: PeerRole = role === 'producer' ? 'consumer' : 'producer';
    const otherSocket = peers[other];

    otherSocket?.emit('peer:status', { deviceId, role, connected: true });
    socket.emit('peer:status', { deviceId, role: other, connected: otherSocket !== undefined });

    if (role === 'consumer') {
      this.flush(deviceId, socket);
    } else {
      this.replayCommands(deviceId, socket);
    }

    return { success: true, deviceId, role, sessionActive: this.registry.hasSession(deviceId) };
  }

  /**
   * Admit a frame and forward it to the subscribed consumer, or buffer it when
   * none is connected
   * @throws the registry's admission errors
   */
  deliver(frame: AudioFrame, recording: boolean = false): FrameAck {
    this.registry.admit(frame, recording);

    const consumer = this.peers.get(frame.deviceId)?.consumer;
    if (consumer) {
      consumer.emit('audio_frame', toMetadata(frame), frame.payload);
      this.registry.recordForwarded(frame.deviceId);
      return {
        sequence: frame.sequence,
        bufferDepth: this.registry.getSessionInfo(frame.deviceId).bufferDepth,
        forwarded: true,
      };
    }

    const bufferDepth = this.registry.enqueue(frame);
    return { sequence: frame.sequence, bufferDepth, forwarded: false };
  }

  /**
   * Forget a socket and tell the other side
   */
  handleDisconnect(socket: RelaySocket): void {
    const { deviceId, role } = socket.data;
    if (!deviceId || !role) {
      return;
    }

    const peers = this.peers.get(deviceId);
    if (!peers || peers[role]?.id !== socket.id) {
      return;
    }

    delete peers[role];
    if (!peers.producer && !peers.consumer) {
      this.peers.delete(deviceId);
    }

    log('info', `Unregistered ${role} ${socket.id} for ${deviceId}`);

    const other: PeerRole = role === 'producer' ? 'consumer' : 'producer';
    peers[other]?.emit('peer:status', { deviceId, role, connected: false });
  }

  isRegistered(socket: RelaySocket, deviceId: string, role: PeerRole): boolean {
    return this.peers.get(deviceId)?.[role]?.id === socket.id;
  }

  getPresence(deviceId: string): { producerConnected: boolean; consumerConnected: boolean } {
    const peers = this.peers.get(deviceId);
    return {
      producerConnected: peers?.producer !== undefined,
      consumerConnected: peers?.consumer !== undefined,
    };
  }

  getStats(): { devices: number; producers: number; consumers: number } {
    let producers = 0;
    let consumers = 0;
    this.peers.forEach((peers) => {
      if (peers.producer) producers++;
      if (peers.consumer) consumers++;
    });
    return { devices: this.peers.size, producers, consumers };
  }

  private flush(deviceId: string, consumer: RelaySocket): void {
    if (!this.registry.hasSession(deviceId)) {
      return;
    }

    const frames = this.registry.drain(deviceId);
    for (const frame of frames) {
      consumer.emit('audio_frame', toMetadata(frame), frame.payload);
    }

    if (frames.length > 0) {
      log('info', `Flushed ${frames.length} buffered frames to ${consumer.id} for ${deviceId}`);
    }
  }

  private replayCommands(deviceId: string, producer: RelaySocket): void {
    const pending = this.registry.takeCommands(deviceId);
    for (const command of pending) {
      producer.emit('command', command);
    }

    // A producer joining mid-session must start streaming
    if (this.registry.hasSession(deviceId) && !pending.some((command) => command.type === 'start_audio_stream')) {
      this.registry.queueCommand(deviceId, 'start_audio_stream', { replay: true });
    }
  }

  private notifySessionEnded(deviceId: string, reason: RelayStopReason): void {
    const consumer = this.peers.get(deviceId)?.consumer;
    if (!consumer) {
      return;
    }

    consumer.emit('session:ended', { deviceId, reason });
    log('info', `Told consumer ${consumer.id} that ${deviceId} ended: ${reason}`);
  }

  private pushCommand(command: StreamCommand): void {
    const producer = this.peers.get(command.deviceId)?.producer;
    if (!producer) {
      return;
    }

    producer.emit('command', command);
    this.registry.discardCommand(command.deviceId, command.id);
    log('debug', `Pushed ${command.type} to ${producer.id}`);
  }
}
