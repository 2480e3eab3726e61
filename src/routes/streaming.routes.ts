import express from 'express';
import type { StreamingController } from '../controllers/StreamingController.js';
import { asyncHandler } from '../middleware/errorHandler.js';

/**
 * Streaming Router
 *
 * Frame uploads are raw PCM; the parser limit rejects oversized frames with 413
 */
export function createStreamingRouter(controller: StreamingController, maxFrameBytes: number): express.Router {
  const router = express.Router();

  const rawParser = express.raw({
    type: 'application/octet-stream',
    limit: maxFrameBytes,
  });

  /**
   * POST /api/streaming/sessions/:deviceId/start
   */
  router.post('/sessions/:deviceId/start', asyncHandler(async (req, res) => {
    await controller.startSession(req, res);
  }));

  /**
   * POST /api/streaming/sessions/:deviceId/stop
   */
  router.post('/sessions/:deviceId/stop', asyncHandler(async (req, res) => {
    await controller.stopSession(req, res);
  }));

  /**
   * GET /api/streaming/sessions/:deviceId/status
   */
  router.get('/sessions/:deviceId/status', asyncHandler(async (req, res) => {
    await controller.getStatus(req, res);
  }));

  router.post('/sessions/:deviceId/recording/start', asyncHandler(async (req, res) => {
    await controller.startRecording(req, res);
  }));

  router.post('/sessions/:deviceId/recording/stop', asyncHandler(async (req, res) => {
    await controller.stopRecording(req, res);
  }));

  /**
   * POST /api/streaming/frames/:deviceId?sequence=N
   */
  router.post('/frames/:deviceId', rawParser, asyncHandler(async (req, res) => {
    await controller.uploadFrame(req, res);
  }));

  /**
   * GET /api/streaming/frames/:deviceId?maxCount=N
   */
  router.get('/frames/:deviceId', asyncHandler(async (req, res) => {
    await controller.receiveFrames(req, res);
  }));

  router.get('/commands/:deviceId', asyncHandler(async (req, res) => {
    await controller.getCommands(req, res);
  }));

  router.get('/recordings/:deviceId', asyncHandler(async (req, res) => {
    await controller.getRecording(req, res);
  }));

  router.get('/stats', asyncHandler(async (req, res) => {
    await controller.getStats(req, res);
  }));

  return router;
}
