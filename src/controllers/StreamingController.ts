import type { Request, Response } from 'express';
import { RelaySessionStatus } from '../types/index.js';
import { ReceiveFramesResponse } from '../types/protocol.js';
import { RelayRegistry } from '../services/relay-registry.service.js';
import { PushRelay } from '../services/push-relay.service.js';
import { StorageService } from '../services/storage.service.js';
import { parseNonNegativeInt, toWireFrame } from '../utils/audio-format.js';
import { InvalidFrameError, InvalidRequestError } from '../utils/errors.js';

/**
 * Streaming Controller
 *
 * Relay session control, polling upload/download of frames and pending
 * commands. Errors are thrown and mapped by the error middleware.
 */
export class StreamingController {
  private registry: RelayRegistry;
  private pushRelay: PushRelay;
  private storage: StorageService;
  private defaultMaxCount: number;

  constructor(registry: RelayRegistry, pushRelay: PushRelay, storage: StorageService, defaultMaxCount: number = 10) {
    this.registry = registry;
    this.pushRelay = pushRelay;
    this.storage = storage;
    this.defaultMaxCount = defaultMaxCount;
  }

  async startSession(req: Request, res: Response): Promise<void> {
    const { deviceId } = req.params;
    const body: unknown = req.body;

    let parentId: string | undefined;
    let timeoutMinutes: number | undefined;

    if (typeof body === 'object' && body !== null) {
      if ('parentId' in body && body.parentId !== undefined) {
        if (typeof body.parentId !== 'string') {
          throw new InvalidRequestError('parentId must be a string');
        }
        parentId = body.parentId;
      }
      if ('timeoutMinutes' in body && body.timeoutMinutes !== undefined) {
        if (typeof body.timeoutMinutes !== 'number' || !(body.timeoutMinutes > 0)) {
          throw new InvalidRequestError('timeoutMinutes must be a positive number');
        }
        timeoutMinutes = body.timeoutMinutes;
      }
    }

    const { created } = this.registry.startSession(deviceId, { parentId, timeoutMinutes });

    res.status(200).json({
      success: true,
      created,
      session: this.buildStatus(deviceId),
    });
  }

  async stopSession(req: Request, res: Response): Promise<void> {
    const { deviceId } = req.params;
    const stopped = this.registry.stopSession(deviceId, 'requested');

    res.status(200).json({
      success: true,
      stopped,
      session: this.buildStatus(deviceId),
    });
  }

  async getStatus(req: Request, res: Response): Promise<void> {
    const { deviceId } = req.params;

    res.status(200).json({
      success: true,
      session: this.buildStatus(deviceId),
    });
  }

  /**
   * POST /frames/:deviceId?sequence=N&capturedAt=T&recording=true
   */
  async uploadFrame(req: Request, res: Response): Promise<void> {
    const { deviceId } = req.params;
    const data: unknown = req.body;

    if (!Buffer.isBuffer(data)) {
      throw new InvalidFrameError('Request body must be binary data (application/octet-stream)');
    }

    const sequence = parseNonNegativeInt(req.query.sequence);
    if (sequence === null) {
      throw new InvalidFrameError('sequence query parameter must be a non-negative integer');
    }

    let capturedAt = Date.now();
    if (req.query.capturedAt !== undefined) {
      const parsed = parseNonNegativeInt(req.query.capturedAt);
      if (parsed === null) {
        throw new InvalidFrameError('capturedAt query parameter must be epoch milliseconds');
      }
      capturedAt = parsed;
    }

    const ack = this.pushRelay.deliver({ deviceId, sequence, capturedAt, payload: data }, req.query.recording === 'true');

    res.status(200).json({ success: true, ...ack });
  }

  /**
   * GET /frames/:deviceId?maxCount=N
   */
  async receiveFrames(req: Request, res: Response): Promise<void> {
    const { deviceId } = req.params;

    let maxCount = this.defaultMaxCount;
    if (req.query.maxCount !== undefined) {
      const parsed = parseNonNegativeInt(req.query.maxCount);
      if (parsed === null || parsed === 0) {
        throw new InvalidRequestError('maxCount must be a positive integer');
      }
      maxCount = parsed;
    }

    const frames = this.registry.drain(deviceId, maxCount).map(toWireFrame);
    const body: ReceiveFramesResponse = { success: true, deviceId, frames, count: frames.length };

    res.status(200).json(body);
  }

  async getCommands(req: Request, res: Response): Promise<void> {
    const { deviceId } = req.params;
    const commands = this.registry.takeCommands(deviceId);

    res.status(200).json({ success: true, deviceId, commands, count: commands.length });
  }

  async startRecording(req: Request, res: Response): Promise<void> {
    const { deviceId } = req.params;
    this.registry.setRecording(deviceId, true);

    res.status(200).json({ success: true, session: this.buildStatus(deviceId) });
  }

  async stopRecording(req: Request, res: Response): Promise<void> {
    const { deviceId } = req.params;
    this.registry.setRecording(deviceId, false);

    res.status(200).json({ success: true, session: this.buildStatus(deviceId) });
  }

  /**
   * GET /recordings/:deviceId - the device's recorded frames as one PCM stream
   */
  async getRecording(req: Request, res: Response): Promise<void> {
    const { deviceId } = req.params;
    const files = await this.storage.listRecordings(deviceId);
    if (files.length === 0) {
      res.status(404).json({ success: false, error: `No recording for ${deviceId}`, code: 'NOT_FOUND' });
      return;
    }

    const pcm = await this.storage.readRecording(deviceId);
    res.status(200).type('application/octet-stream').send(pcm);
  }

  async getStats(_req: Request, res: Response): Promise<void> {
    res.status(200).json({
      success: true,
      sessions: this.registry.getStats(),
      connections: this.pushRelay.getStats(),
      recordings: await this.storage.getStats(),
    });
  }

  private buildStatus(deviceId: string): RelaySessionStatus {
    return {
      ...this.registry.getSessionInfo(deviceId),
      ...this.pushRelay.getPresence(deviceId),
    };
  }
}
