import { PushRelay, RelaySocket } from '../services/push-relay.service.js';
import { FrameAckResponse, FrameMetadata, RegisterRequest } from '../types/protocol.js';
import { InvalidFrameError, InvalidRequestError, RelayError } from '../utils/errors.js';
import { contextLogger } from '../utils/logger.js';

const log = contextLogger('SocketHandler');

function isRegisterRequest(value: unknown): value is RegisterRequest {
  if (typeof value !== 'object' || value === null || !('deviceId' in value) || !('role' in value)) {
    return false;
  }
  return (
    typeof value.deviceId === 'string' &&
    value.deviceId.length > 0 &&
    (value.role === 'producer' || value.role === 'consumer')
  );
}

function isFrameMetadata(value: unknown): value is FrameMetadata {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'deviceId' in value &&
    typeof value.deviceId === 'string' &&
    'sequence' in value &&
    typeof value.sequence === 'number' &&
    'capturedAt' in value &&
    typeof value.capturedAt === 'number'
  );
}

function toFailure(error: unknown): { success: false; error: string; code: string } {
  if (error instanceof RelayError) {
    return { success: false, error: error.message, code: error.code };
  }
  return { success: false, error: 'Internal relay error', code: 'INTERNAL_ERROR' };
}

export function setupSocketHandlers(socket: RelaySocket, pushRelay: PushRelay): void {
  log('info', `Client connected: ${socket.id}`);

  socket.on('register', (request, ack) => {
    if (typeof ack !== 'function') {
      return;
    }
    if (!isRegisterRequest(request)) {
      ack(toFailure(new InvalidRequestError('deviceId and role (producer|consumer) are required')));
      return;
    }

    ack(pushRelay.register(socket, request));
  });

  socket.on('audio_frame', (metadata, payload, ack) => {
    const reply = (response: FrameAckResponse): void => {
      if (typeof ack === 'function') {
        ack(response);
      }
    };

    try {
      if (!isFrameMetadata(metadata) || !Buffer.isBuffer(payload)) {
        throw new InvalidFrameError('Frame metadata and binary payload are required');
      }
      if (!pushRelay.isRegistered(socket, metadata.deviceId, 'producer')) {
        throw new InvalidRequestError(`Socket is not the registered producer for ${metadata.deviceId}`);
      }

      const frameAck = pushRelay.deliver({
        deviceId: metadata.deviceId,
        sequence: metadata.sequence,
        capturedAt: metadata.capturedAt,
        payload,
      }, metadata.recording === true);
      reply({ success: true, ...frameAck });
    } catch (error) {
      if (!(error instanceof RelayError)) {
        log('error', `Unexpected error handling frame from ${socket.id}:`, error);
      }
      reply(toFailure(error));
    }
  });

  socket.on('ping', (sentAt, ack) => {
    if (typeof ack === 'function') {
      ack(sentAt);
    }
  });

  socket.on('disconnect', (reason) => {
    log('info', `Client disconnected: ${socket.id}, reason: ${reason}`);
    pushRelay.handleDisconnect(socket);
  });

  socket.on('error', (error) => {
    log('error', `Socket error for ${socket.id}:`, error);
  });
}
