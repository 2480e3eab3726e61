/**
 * Live Audio Relay - Main Entry Point
 * Express + socket.io relay between transmitting and listening devices
 */
import { getConfig, Config } from './utils/config.js';
import { initLogger, getLogger } from './utils/logger.js';
import { createRelayServer } from './server.js';

// Load configuration
const config: Config = getConfig();

// Initialize logger
initLogger({
  ...config.logging,
  logsPath: config.storage.logsPath,
});
const logger = getLogger();

const relay = createRelayServer(config);

/**
 * Graceful shutdown
 */
const shutdown = (): void => {
  logger.info('Shutting down gracefully...');

  relay.registry.stop();
  relay.storage.stopCleanup();
  relay.io.close(() => {
    logger.info('Server closed');
    process.exit(0);
  });
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

async function main(): Promise<void> {
  await relay.storage.initialize();
  relay.storage.startCleanup(config.storage.cleanupIntervalMs, config.storage.retentionHours);
  relay.registry.start();

  relay.httpServer.listen(config.server.port, config.server.host, () => {
    logger.info('Live Audio Relay started');
    logger.info(`HTTP API: http://${config.server.host}:${config.server.port}/api/streaming`);
    logger.info(`Push channel: ws://${config.server.host}:${config.server.port}`);
    logger.info(
      `Relay capacity ${config.relay.capacity} frames, max frame ${config.relay.maxFrameBytes} bytes, ` +
      `idle timeout ${config.relay.idleTimeoutMs}ms`
    );
  });
}

main().catch((error: unknown) => {
  logger.error('Failed to start relay:', error);
  process.exit(1);
});
