/**
 * Live Audio Relay - Device Agent
 * Runs one sender or receiver session against the relay until stopped
 */
import { getConfig, validateAgentConfig, Config } from './utils/config.js';
import { initLogger, getLogger } from './utils/logger.js';
import { createSessionController } from './device.js';

const config: Config = getConfig();
validateAgentConfig(config);

initLogger({
  ...config.logging,
  logsPath: config.storage.logsPath,
});
const logger = getLogger();

const { deviceId, role } = config.agent;
const controller = createSessionController(config);

let healthTimer: NodeJS.Timeout | null = null;

controller.on('session:stopped', (stoppedId, reason, error) => {
  logger.info(`Session for ${stoppedId} stopped: ${reason}${error ? ` (${error.message})` : ''}`);
  if (healthTimer) {
    clearInterval(healthTimer);
  }
  process.exit(reason === 'requested' || reason === 'relay_stopped' ? 0 : 1);
});

/**
 * Graceful shutdown
 */
const shutdown = (): void => {
  logger.info('Shutting down gracefully...');
  controller.stopSession(deviceId).catch((error: unknown) => {
    logger.error('Error while stopping session:', error);
    process.exit(1);
  });
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

async function main(): Promise<void> {
  logger.info(`Device agent starting: ${role} for ${deviceId} via ${config.transport.kind} at ${config.transport.relayUrl}`);

  const result = await controller.startSession(deviceId);
  if (!result.success) {
    throw new Error(result.error ?? `Session did not start (${result.state})`);
  }

  healthTimer = setInterval(() => {
    const health = controller.getSessionHealth(deviceId);
    const summary = `${health.sessionState} ${health.health}, ${Math.round(health.bytesPerSecond)}/${health.expectedBytesPerSecond} B/s, ` +
      `queue ${health.queueDepth}/${health.queueCapacity}, underruns ${health.underrunsTotal}, rtt ${health.rttMs ?? '-'}ms`;
    if (health.health === 'good') {
      logger.debug(summary);
    } else {
      logger.warn(`${summary}: ${health.reasons.join('; ')}`);
    }
  }, config.metrics.rateWindowMs);
}

main().catch((error: unknown) => {
  logger.error('Failed to start device agent:', error);
  process.exit(1);
});
