/**
 * Unit tests for PushRelay and the relay socket handlers
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EventEmitter } from 'events';
import { PushRelay, RelaySocket } from '../../src/services/push-relay.service.js';
import { RelayRegistry } from '../../src/services/relay-registry.service.js';
import { setupSocketHandlers } from '../../src/handlers/socket.handler.js';
import { AudioFrame } from '../../src/types/index.js';
import { SocketData } from '../../src/types/protocol.js';
import { initLogger } from '../../src/utils/logger.js';

initLogger({
  level: 'error',
  format: 'simple',
  toFile: false,
  toConsole: false,
  logsPath: './test-logs',
});

/**
 * In-memory stand-in for a server-side socket: `emit` records outbound
 * messages, `receive` dispatches an inbound one to the handlers
 */
class FakeSocket extends EventEmitter {
  data: SocketData = {};
  sent: Array<{ event: string; args: unknown[] }> = [];

  constructor(public id: string) {
    super();
  }

  emit(event: string, ...args: unknown[]): boolean {
    this.sent.push({ event, args });
    return true;
  }

  receive(event: string, ...args: unknown[]): void {
    for (const listener of this.listeners(event)) {
      listener(...args);
    }
  }

  sentArgs(event: string): unknown[][] {
    return this.sent.filter((message) => message.event === event).map((message) => message.args);
  }
}

function asSocket(fake: FakeSocket): RelaySocket {
  return fake as unknown as RelaySocket;
}

function frame(sequence: number): AudioFrame {
  return { deviceId: 'child-1', sequence, capturedAt: 1000 + sequence, payload: Buffer.from([sequence, 1, 2]) };
}

describe('PushRelay', () => {
  let registry: RelayRegistry;
  let relay: PushRelay;

  beforeEach(() => {
    registry = new RelayRegistry({
      capacity: 5,
      maxFrameBytes: 1024,
      idleTimeoutMs: 60000,
      sweepIntervalMs: 0,
      defaultTimeoutMinutes: 10,
    });
    relay = new PushRelay(registry);
  });

  afterEach(() => {
    registry.stop();
  });

  describe('deliver', () => {
    it('should forward frames straight to a registered consumer', () => {
      const consumer = new FakeSocket('consumer-1');
      registry.startSession('child-1');
      relay.register(asSocket(consumer), { deviceId: 'child-1', role: 'consumer' });

      const ack = relay.deliver(frame(0));

      expect(ack).toEqual({ sequence: 0, bufferDepth: 0, forwarded: true });
      expect(consumer.sentArgs('audio_frame')).toEqual([
        [{ deviceId: 'child-1', sequence: 0, capturedAt: 1000, size: 3 }, Buffer.from([0, 1, 2])],
      ]);
      expect(registry.getSessionInfo('child-1').framesDelivered).toBe(1);
    });

    it('should buffer without a consumer and flush in order on registration', () => {
      registry.startSession('child-1');

      expect(relay.deliver(frame(0))).toEqual({ sequence: 0, bufferDepth: 1, forwarded: false });
      expect(relay.deliver(frame(1))).toEqual({ sequence: 1, bufferDepth: 2, forwarded: false });

      const consumer = new FakeSocket('consumer-1');
      relay.register(asSocket(consumer), { deviceId: 'child-1', role: 'consumer' });

      const sequences = consumer.sentArgs('audio_frame').map(([metadata]) =>
        typeof metadata === 'object' && metadata !== null && 'sequence' in metadata ? metadata.sequence : null
      );
      expect(sequences).toEqual([0, 1]);
      expect(registry.drain('child-1')).toEqual([]);
    });

    it('should send to the newest consumer after re-registration', () => {
      const first = new FakeSocket('consumer-1');
      const second = new FakeSocket('consumer-2');
      registry.startSession('child-1');
      relay.register(asSocket(first), { deviceId: 'child-1', role: 'consumer' });
      relay.register(asSocket(second), { deviceId: 'child-1', role: 'consumer' });

      relay.deliver(frame(0));

      expect(first.sentArgs('audio_frame')).toHaveLength(0);
      expect(second.sentArgs('audio_frame')).toHaveLength(1);
      expect(first.data).toEqual({ deviceId: undefined, role: undefined });

      relay.handleDisconnect(asSocket(first));
      expect(relay.getPresence('child-1').consumerConnected).toBe(true);
    });
  });

  describe('peer status', () => {
    it('should tell each side about the other', () => {
      const consumer = new FakeSocket('consumer-1');
      const producer = new FakeSocket('producer-1');

      relay.register(asSocket(consumer), { deviceId: 'child-1', role: 'consumer' });
      expect(consumer.sentArgs('peer:status')).toEqual([
        [{ deviceId: 'child-1', role: 'producer', connected: false }],
      ]);

      relay.register(asSocket(producer), { deviceId: 'child-1', role: 'producer' });
      expect(consumer.sentArgs('peer:status')[1]).toEqual([{ deviceId: 'child-1', role: 'producer', connected: true }]);
      expect(producer.sentArgs('peer:status')).toEqual([
        [{ deviceId: 'child-1', role: 'consumer', connected: true }],
      ]);

      relay.handleDisconnect(asSocket(producer));
      expect(consumer.sentArgs('peer:status')[2]).toEqual([{ deviceId: 'child-1', role: 'producer', connected: false }]);
      expect(relay.getPresence('child-1')).toEqual({ producerConnected: false, consumerConnected: true });
      expect(relay.getStats()).toEqual({ devices: 1, producers: 0, consumers: 1 });
    });
  });

  describe('session end', () => {
    it('should tell the consumer when the session stops', () => {
      const consumer = new FakeSocket('consumer-1');
      const producer = new FakeSocket('producer-1');
      registry.startSession('child-1');
      relay.register(asSocket(consumer), { deviceId: 'child-1', role: 'consumer' });
      relay.register(asSocket(producer), { deviceId: 'child-1', role: 'producer' });

      registry.stopSession('child-1');

      expect(consumer.sentArgs('session:ended')).toEqual([[{ deviceId: 'child-1', reason: 'requested' }]]);
      expect(producer.sentArgs('session:ended')).toEqual([]);
    });

    it('should tell the consumer about an idle sweep', () => {
      const consumer = new FakeSocket('consumer-1');
      registry.startSession('child-1');
      relay.register(asSocket(consumer), { deviceId: 'child-1', role: 'consumer' });

      registry.sweep(Date.now() + 60001);

      expect(consumer.sentArgs('session:ended')).toEqual([[{ deviceId: 'child-1', reason: 'idle_timeout' }]]);
    });
  });

  describe('commands', () => {
    it('should replay pending commands to a producer that registers', () => {
      registry.startSession('child-1');
      const producer = new FakeSocket('producer-1');

      const ack = relay.register(asSocket(producer), { deviceId: 'child-1', role: 'producer' });

      expect(ack).toEqual({ success: true, deviceId: 'child-1', role: 'producer', sessionActive: true });
      const commands = producer.sentArgs('command');
      expect(commands).toHaveLength(1);
      expect(commands[0][0]).toMatchObject({ type: 'start_audio_stream', deviceId: 'child-1' });
    });

    it('should push new commands to a connected producer', () => {
      const producer = new FakeSocket('producer-1');
      relay.register(asSocket(producer), { deviceId: 'child-1', role: 'producer' });

      registry.startSession('child-1');

      expect(producer.sentArgs('command')[0][0]).toMatchObject({ type: 'start_audio_stream' });
      expect(registry.takeCommands('child-1')).toEqual([]);
    });

    it('should issue a start command to a producer joining mid-session', () => {
      registry.startSession('child-1');
      registry.takeCommands('child-1');
      const producer = new FakeSocket('producer-1');

      relay.register(asSocket(producer), { deviceId: 'child-1', role: 'producer' });

      expect(producer.sentArgs('command')[0][0]).toMatchObject({
        type: 'start_audio_stream',
        params: { replay: true },
      });
    });
  });
});

describe('setupSocketHandlers', () => {
  let registry: RelayRegistry;
  let relay: PushRelay;
  let socket: FakeSocket;

  beforeEach(() => {
    registry = new RelayRegistry({
      capacity: 5,
      maxFrameBytes: 8,
      idleTimeoutMs: 60000,
      sweepIntervalMs: 0,
      defaultTimeoutMinutes: 10,
    });
    relay = new PushRelay(registry);
    socket = new FakeSocket('socket-1');
    setupSocketHandlers(asSocket(socket), relay);
  });

  afterEach(() => {
    registry.stop();
  });

  const metadata = (sequence: number) => ({ deviceId: 'child-1', sequence, capturedAt: 1000, size: 2 });

  it('should reject malformed registrations', () => {
    const ack = vi.fn();
    socket.receive('register', { deviceId: '', role: 'producer' }, ack);

    expect(ack).toHaveBeenCalledWith({
      success: false,
      error: 'deviceId and role (producer|consumer) are required',
      code: 'INVALID_REQUEST',
    });
  });

  it('should acknowledge a registration', () => {
    const ack = vi.fn();
    socket.receive('register', { deviceId: 'child-1', role: 'producer' }, ack);

    expect(ack).toHaveBeenCalledWith({ success: true, deviceId: 'child-1', role: 'producer', sessionActive: false });
    expect(socket.data).toEqual({ deviceId: 'child-1', role: 'producer' });
  });

  it('should refuse frames from a socket that is not the producer', () => {
    const ack = vi.fn();
    socket.receive('audio_frame', metadata(0), Buffer.from([1, 2]), ack);

    expect(ack).toHaveBeenCalledWith({
      success: false,
      error: 'Socket is not the registered producer for child-1',
      code: 'INVALID_REQUEST',
    });
  });

  it('should refuse frames without a binary payload', () => {
    const ack = vi.fn();
    socket.receive('audio_frame', metadata(0), 'not-binary', ack);

    expect(ack.mock.calls[0][0]).toMatchObject({ success: false, code: 'INVALID_FRAME' });
  });

  it('should report an unknown session', () => {
    socket.receive('register', { deviceId: 'child-1', role: 'producer' }, vi.fn());
    const ack = vi.fn();
    socket.receive('audio_frame', metadata(0), Buffer.from([1, 2]), ack);

    expect(ack.mock.calls[0][0]).toMatchObject({ success: false, code: 'SESSION_UNKNOWN' });
  });

  it('should report an oversized payload', () => {
    registry.startSession('child-1');
    socket.receive('register', { deviceId: 'child-1', role: 'producer' }, vi.fn());
    const ack = vi.fn();
    socket.receive('audio_frame', metadata(0), Buffer.alloc(9), ack);

    expect(ack.mock.calls[0][0]).toMatchObject({ success: false, code: 'PAYLOAD_TOO_LARGE' });
  });

  it('should accept frames from the registered producer', () => {
    registry.startSession('child-1');
    socket.receive('register', { deviceId: 'child-1', role: 'producer' }, vi.fn());
    const ack = vi.fn();
    socket.receive('audio_frame', metadata(0), Buffer.from([1, 2]), ack);

    expect(ack).toHaveBeenCalledWith({ success: true, sequence: 0, bufferDepth: 1, forwarded: false });
  });

  it('should echo ping timestamps', () => {
    const ack = vi.fn();
    socket.receive('ping', 12345, ack);

    expect(ack).toHaveBeenCalledWith(12345);
  });

  it('should unregister on disconnect', () => {
    socket.receive('register', { deviceId: 'child-1', role: 'producer' }, vi.fn());
    socket.receive('disconnect', 'transport close');

    expect(relay.getPresence('child-1').producerConnected).toBe(false);
  });
});
