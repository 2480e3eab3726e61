/**
 * Relay server assembly: express API, socket.io push channel and the
 * services behind them
 */
import express, { Request, Response } from 'express';
import { createServer, Server as HttpServer } from 'http';
import { Server } from 'socket.io';
import { Config } from './utils/config.js';
import { contextLogger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';
import { RelayRegistry } from './services/relay-registry.service.js';
import { InterServerEvents, PushRelay } from './services/push-relay.service.js';
import { StorageService } from './services/storage.service.js';
import { StreamingController } from './controllers/StreamingController.js';
import { createStreamingRouter } from './routes/streaming.routes.js';
import { errorHandler } from './middleware/errorHandler.js';
import { setupSocketHandlers } from './handlers/socket.handler.js';
import { ClientToServerEvents, ServerToClientEvents, SocketData } from './types/protocol.js';

const log = contextLogger('RelayServer');

export type RelayIo = Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

export interface RelayServer {
  app: express.Express;
  httpServer: HttpServer;
  io: RelayIo;
  registry: RelayRegistry;
  pushRelay: PushRelay;
  storage: StorageService;
}

export type RelayServerConfig = Pick<Config, 'relay' | 'storage' | 'transport'>;

/**
 * Build the relay without listening
 */
export function createRelayServer(config: RelayServerConfig): RelayServer {
  const registry = new RelayRegistry({
    capacity: config.relay.capacity,
    maxFrameBytes: config.relay.maxFrameBytes,
    idleTimeoutMs: config.relay.idleTimeoutMs,
    sweepIntervalMs: config.relay.sweepIntervalMs,
    defaultTimeoutMinutes: config.relay.defaultTimeoutMinutes,
  });
  const pushRelay = new PushRelay(registry);
  const storage = new StorageService({
    basePath: config.storage.basePath,
    recordingsPath: config.storage.recordingsPath,
    logsPath: config.storage.logsPath,
  });

  // Recorded frames are written off the delivery path
  registry.on('frame:accepted', (frame, recording) => {
    if (!recording) {
      return;
    }
    storage.saveFrame(frame).catch((error: unknown) => {
      log('error', `Failed to persist frame ${frame.sequence} for ${frame.deviceId}: ${errorMessage(error)}`);
    });
  });

  const app = express();
  app.use(express.json());

  /**
   * Health check endpoint
   */
  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      sessions: registry.getStats().activeSessions,
    });
  });

  const controller = new StreamingController(registry, pushRelay, storage, config.transport.pollMaxCount);
  app.use('/api/streaming', createStreamingRouter(controller, config.relay.maxFrameBytes));

  app.use(errorHandler);

  const httpServer = createServer(app);

  const io: RelayIo = new Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>(httpServer, {
    cors: {
      origin: '*',
      methods: ['GET', 'POST'],
    },
    // Metadata and framing on top of the largest payload
    maxHttpBufferSize: config.relay.maxFrameBytes + 4096,
  });

  io.on('connection', (socket) => {
    setupSocketHandlers(socket, pushRelay);
  });

  return { app, httpServer, io, registry, pushRelay, storage };
}
