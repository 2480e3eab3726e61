/**
 * Unit tests for StreamingController and the error middleware
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Request, Response, NextFunction } from 'express';
import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import { StreamingController } from '../../src/controllers/StreamingController.js';
import { RelayRegistry } from '../../src/services/relay-registry.service.js';
import { PushRelay } from '../../src/services/push-relay.service.js';
import { StorageService } from '../../src/services/storage.service.js';
import {
  asyncHandler,
  errorHandler,
  getStatusCodeForRelayError,
} from '../../src/middleware/errorHandler.js';
import {
  InvalidFrameError,
  InvalidRequestError,
  PayloadTooLargeError,
  SessionUnknownError,
} from '../../src/utils/errors.js';
import { initLogger } from '../../src/utils/logger.js';

initLogger({
  level: 'error',
  format: 'simple',
  toFile: false,
  toConsole: false,
  logsPath: './test-logs',
});

interface MockResponse {
  statusCode: number;
  body: unknown;
  contentType: string | null;
  headersSent: boolean;
  status: (code: number) => MockResponse;
  json: (body: unknown) => MockResponse;
  type: (contentType: string) => MockResponse;
  send: (body: unknown) => MockResponse;
}

function mockResponse(): MockResponse {
  const res: MockResponse = {
    statusCode: 0,
    body: undefined,
    contentType: null,
    headersSent: false,
    status: (code) => {
      res.statusCode = code;
      return res;
    },
    json: (body) => {
      res.body = body;
      return res;
    },
    type: (contentType) => {
      res.contentType = contentType;
      return res;
    },
    send: (body) => {
      res.body = body;
      return res;
    },
  };
  return res;
}

function mockRequest(options: {
  params?: Record<string, string>;
  query?: Record<string, string>;
  body?: unknown;
}): Request {
  return {
    method: 'POST',
    path: '/test',
    params: options.params ?? {},
    query: options.query ?? {},
    body: options.body,
  } as unknown as Request;
}

function asResponse(res: MockResponse): Response {
  return res as unknown as Response;
}

describe('StreamingController', () => {
  let registry: RelayRegistry;
  let controller: StreamingController;
  let storage: StorageService;
  const params = { deviceId: 'child-1' };
  const storagePath = path.join(os.tmpdir(), `audio-relay-controller-${process.pid}`);

  beforeEach(() => {
    registry = new RelayRegistry({
      capacity: 5,
      maxFrameBytes: 1024,
      idleTimeoutMs: 60000,
      sweepIntervalMs: 0,
      defaultTimeoutMinutes: 10,
    });
    storage = new StorageService({
      basePath: storagePath,
      recordingsPath: path.join(storagePath, 'recordings'),
      logsPath: path.join(storagePath, 'logs'),
    });
    controller = new StreamingController(registry, new PushRelay(registry), storage, 10);
  });

  afterEach(async () => {
    registry.stop();
    await fs.remove(storagePath);
  });

  describe('sessions', () => {
    it('should start a session with the requested options', async () => {
      const res = mockResponse();
      await controller.startSession(mockRequest({ params, body: { parentId: 'parent-1', timeoutMinutes: 5 } }), asResponse(res));

      expect(res.statusCode).toBe(200);
      expect(res.body).toMatchObject({
        success: true,
        created: true,
        session: {
          deviceId: 'child-1',
          active: true,
          parentId: 'parent-1',
          timeoutMinutes: 5,
          producerConnected: false,
          consumerConnected: false,
        },
      });
    });

    it('should report an existing session without recreating it', async () => {
      await controller.startSession(mockRequest({ params }), asResponse(mockResponse()));
      const res = mockResponse();
      await controller.startSession(mockRequest({ params }), asResponse(res));

      expect(res.body).toMatchObject({ success: true, created: false });
    });

    it('should validate the start options', async () => {
      await expect(
        controller.startSession(mockRequest({ params, body: { timeoutMinutes: -1 } }), asResponse(mockResponse()))
      ).rejects.toThrow(InvalidRequestError);
      await expect(
        controller.startSession(mockRequest({ params, body: { parentId: 42 } }), asResponse(mockResponse()))
      ).rejects.toThrow(InvalidRequestError);
    });

    it('should stop idempotently', async () => {
      registry.startSession('child-1');

      const first = mockResponse();
      await controller.stopSession(mockRequest({ params }), asResponse(first));
      const second = mockResponse();
      await controller.stopSession(mockRequest({ params }), asResponse(second));

      expect(first.body).toMatchObject({ success: true, stopped: true, session: { active: false } });
      expect(second.body).toMatchObject({ success: true, stopped: false });
    });
  });

  describe('uploadFrame', () => {
    it('should buffer an uploaded frame', async () => {
      registry.startSession('child-1');
      const res = mockResponse();

      await controller.uploadFrame(
        mockRequest({ params, query: { sequence: '3', capturedAt: '1700000000000' }, body: Buffer.from([1, 2]) }),
        asResponse(res)
      );

      expect(res.body).toEqual({ success: true, sequence: 3, bufferDepth: 1, forwarded: false });
      expect(registry.drain('child-1')[0]).toEqual({
        deviceId: 'child-1',
        sequence: 3,
        capturedAt: 1700000000000,
        payload: Buffer.from([1, 2]),
      });
    });

    it('should require a binary body', async () => {
      await expect(
        controller.uploadFrame(mockRequest({ params, query: { sequence: '0' }, body: {} }), asResponse(mockResponse()))
      ).rejects.toThrow(InvalidFrameError);
    });

    it('should require a valid sequence', async () => {
      await expect(
        controller.uploadFrame(mockRequest({ params, query: { sequence: '-1' }, body: Buffer.from([1]) }), asResponse(mockResponse()))
      ).rejects.toThrow(InvalidFrameError);
    });

    it('should reject frames for an unknown session', async () => {
      await expect(
        controller.uploadFrame(mockRequest({ params, query: { sequence: '0' }, body: Buffer.from([1]) }), asResponse(mockResponse()))
      ).rejects.toThrow(SessionUnknownError);
    });

    it('should pass the recording flag through', async () => {
      registry.startSession('child-1');
      const accepted = vi.fn();
      registry.on('frame:accepted', accepted);

      await controller.uploadFrame(
        mockRequest({ params, query: { sequence: '0', recording: 'true' }, body: Buffer.from([1]) }),
        asResponse(mockResponse())
      );

      expect(accepted.mock.calls[0][1]).toBe(true);
    });
  });

  describe('receiveFrames', () => {
    it('should return and remove the oldest frames', async () => {
      registry.startSession('child-1');
      registry.enqueue({ deviceId: 'child-1', sequence: 0, capturedAt: 10, payload: Buffer.from([1, 2]) });
      registry.enqueue({ deviceId: 'child-1', sequence: 1, capturedAt: 30, payload: Buffer.from([3]) });

      const res = mockResponse();
      await controller.receiveFrames(mockRequest({ params, query: { maxCount: '1' } }), asResponse(res));

      expect(res.body).toEqual({
        success: true,
        deviceId: 'child-1',
        frames: [{ sequence: 0, payload: 'AQI=', capturedAt: 10 }],
        count: 1,
      });
      expect(registry.drain('child-1').map((f) => f.sequence)).toEqual([1]);
    });

    it('should reject a zero maxCount', async () => {
      registry.startSession('child-1');
      await expect(
        controller.receiveFrames(mockRequest({ params, query: { maxCount: '0' } }), asResponse(mockResponse()))
      ).rejects.toThrow(InvalidRequestError);
    });
  });

  describe('commands and recording', () => {
    it('should hand out pending commands once', async () => {
      registry.startSession('child-1');

      const first = mockResponse();
      await controller.getCommands(mockRequest({ params }), asResponse(first));
      const second = mockResponse();
      await controller.getCommands(mockRequest({ params }), asResponse(second));

      expect(first.body).toMatchObject({ success: true, deviceId: 'child-1', count: 1 });
      expect(second.body).toEqual({ success: true, deviceId: 'child-1', commands: [], count: 0 });
    });

    it('should toggle the recording flag', async () => {
      registry.startSession('child-1');

      const res = mockResponse();
      await controller.startRecording(mockRequest({ params }), asResponse(res));
      expect(res.body).toMatchObject({ success: true, session: { recording: true } });

      await controller.stopRecording(mockRequest({ params }), asResponse(mockResponse()));
      expect(registry.isRecording('child-1')).toBe(false);
    });

    it('should serve a device recording as one PCM stream', async () => {
      await storage.saveFrame({ deviceId: 'child-1', sequence: 1, capturedAt: 2000, payload: Buffer.from([3, 4]) });
      await storage.saveFrame({ deviceId: 'child-1', sequence: 0, capturedAt: 1000, payload: Buffer.from([1, 2]) });

      const res = mockResponse();
      await controller.getRecording(mockRequest({ params }), asResponse(res));

      expect(res.statusCode).toBe(200);
      expect(res.contentType).toBe('application/octet-stream');
      expect(res.body).toEqual(Buffer.from([1, 2, 3, 4]));
    });

    it('should answer 404 for a device without a recording', async () => {
      const res = mockResponse();
      await controller.getRecording(mockRequest({ params }), asResponse(res));

      expect(res.statusCode).toBe(404);
      expect(res.body).toEqual({ success: false, error: 'No recording for child-1', code: 'NOT_FOUND' });
    });
  });

  describe('getStats', () => {
    it('should include sessions, connections and recordings', async () => {
      registry.startSession('child-1');
      await storage.saveFrame({ deviceId: 'child-1', sequence: 0, capturedAt: 1000, payload: Buffer.from([1, 2, 3]) });

      const res = mockResponse();
      await controller.getStats(mockRequest({}), asResponse(res));

      expect(res.body).toEqual({
        success: true,
        sessions: { activeSessions: 1, deviceIds: ['child-1'], bufferedFrames: 0, pendingCommandQueues: 1 },
        connections: { devices: 0, producers: 0, consumers: 0 },
        recordings: { totalSize: 3, fileCount: 1, byDevice: { 'child-1': 3 } },
      });
    });
  });
});

describe('errorHandler', () => {
  const next: NextFunction = vi.fn();

  it('should map relay error codes to statuses', () => {
    expect(getStatusCodeForRelayError('SESSION_UNKNOWN')).toBe(404);
    expect(getStatusCodeForRelayError('PAYLOAD_TOO_LARGE')).toBe(413);
    expect(getStatusCodeForRelayError('INVALID_FRAME')).toBe(400);
    expect(getStatusCodeForRelayError('INVALID_REQUEST')).toBe(400);
    expect(getStatusCodeForRelayError('TRANSPORT_UNAVAILABLE')).toBe(503);
    expect(getStatusCodeForRelayError('TRANSPORT_ERROR')).toBe(500);
  });

  it('should render relay errors with their code', () => {
    const res = mockResponse();
    errorHandler(new SessionUnknownError('child-1'), mockRequest({}), asResponse(res), next);

    expect(res.statusCode).toBe(404);
    expect(res.body).toEqual({
      success: false,
      error: 'No active session for device: child-1',
      code: 'SESSION_UNKNOWN',
    });
  });

  it('should render payload errors as 413', () => {
    const res = mockResponse();
    errorHandler(new PayloadTooLargeError(2048, 1024), mockRequest({}), asResponse(res), next);

    expect(res.statusCode).toBe(413);
    expect(res.body).toEqual({
      success: false,
      error: 'Frame of 2048 bytes exceeds limit of 1024 bytes',
      code: 'PAYLOAD_TOO_LARGE',
    });
  });

  it('should map body-parser size rejections to 413', () => {
    const res = mockResponse();
    errorHandler({ type: 'entity.too.large' }, mockRequest({}), asResponse(res), next);

    expect(res.statusCode).toBe(413);
    expect(res.body).toMatchObject({ code: 'PAYLOAD_TOO_LARGE' });
  });

  it('should hide unexpected errors outside development', () => {
    const res = mockResponse();
    errorHandler(new Error('database exploded'), mockRequest({}), asResponse(res), next);

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ success: false, error: 'Internal server error', code: 'INTERNAL_ERROR' });
  });

  it('should defer to express once headers are sent', () => {
    const res = mockResponse();
    res.headersSent = true;
    const deferred = vi.fn();
    const error = new Error('late');

    errorHandler(error, mockRequest({}), asResponse(res), deferred);

    expect(deferred).toHaveBeenCalledWith(error);
    expect(res.statusCode).toBe(0);
  });

  it('should forward async rejections to next', async () => {
    const error = new InvalidRequestError('bad');
    const forwarded = vi.fn();
    const handler = asyncHandler(async () => {
      throw error;
    });

    handler(mockRequest({}), asResponse(mockResponse()), forwarded);
    await vi.waitFor(() => expect(forwarded).toHaveBeenCalledWith(error));
  });
});
