/**
 * Wiring for the device side: transport selection and session controller
 * assembly from configuration
 */
import { Config } from './utils/config.js';
import { AudioFormat, AudioInput, AudioOutput } from './types/index.js';
import { PeerRole } from './types/protocol.js';
import { Transport } from './types/transport.js';
import { PollingTransportService } from './services/polling-transport.service.js';
import { PushTransportService, SocketFactory } from './services/push-transport.service.js';
import { RelayApiClient } from './services/relay-api.service.js';
import { ProcessAudioInput, ProcessAudioOutput } from './services/process-audio.service.js';
import { SessionController } from './modules/SessionController.js';

export type DeviceConfig = Pick<Config, 'audio' | 'transport' | 'capture' | 'jitter' | 'metrics' | 'agent'>;

export interface DeviceDependencies {
  input?: AudioInput;
  output?: AudioOutput;
  createSocket?: SocketFactory;
}

export function audioFormatOf(config: Pick<Config, 'audio'>): AudioFormat {
  return {
    sampleRate: config.audio.sampleRate,
    channels: config.audio.channels,
    bitDepth: config.audio.bitDepth,
    frameDurationMs: config.audio.frameDurationMs,
  };
}

/**
 * Build the configured transport; senders are producers, receivers consumers
 */
export function createTransport(config: DeviceConfig, createSocket?: SocketFactory): Transport {
  const { transport } = config;
  const clientConfig = {
    relayUrl: transport.relayUrl,
    requestTimeoutMs: transport.requestTimeoutMs,
    maxRetries: transport.maxRetries,
    retryBaseDelayMs: transport.retryBaseDelayMs,
    retryMaxDelayMs: transport.retryMaxDelayMs,
  };

  if (transport.kind === 'polling') {
    return new PollingTransportService(clientConfig);
  }

  const role: PeerRole = config.agent.role === 'sender' ? 'producer' : 'consumer';
  return new PushTransportService({
    ...clientConfig,
    deviceId: config.agent.deviceId,
    role,
    reconnectAttempts: transport.reconnectAttempts,
    reconnectDelayMs: transport.reconnectDelayMs,
    reconnectDelayMaxMs: transport.reconnectDelayMaxMs,
    pingIntervalMs: config.metrics.pingIntervalMs,
  }, createSocket);
}

/**
 * Assemble a session controller for this device
 */
export function createSessionController(config: DeviceConfig, deps: DeviceDependencies = {}): SessionController {
  const { transport, capture, jitter, metrics, agent } = config;
  const sender = agent.role === 'sender';

  return new SessionController({
    role: agent.role,
    format: audioFormatOf(config),
    transport: createTransport(config, deps.createSocket),
    relay: new RelayApiClient({
      relayUrl: transport.relayUrl,
      requestTimeoutMs: transport.requestTimeoutMs,
      maxRetries: transport.maxRetries,
      retryBaseDelayMs: transport.retryBaseDelayMs,
      retryMaxDelayMs: transport.retryMaxDelayMs,
    }),
    input: sender ? deps.input ?? new ProcessAudioInput(capture.captureCommand) : undefined,
    output: sender ? undefined : deps.output ?? new ProcessAudioOutput(capture.playbackCommand),
    sender: {
      outboundCapacity: transport.outboundQueueCapacity,
      maxOpenAttempts: capture.maxOpenAttempts,
      commandPollIntervalMs: transport.pollIntervalMs * 10,
    },
    receiver: {
      pollIntervalMs: transport.pollIntervalMs,
      pollMaxCount: transport.pollMaxCount,
      jitter: {
        minFillThreshold: jitter.minFillThreshold,
        maxCapacity: jitter.maxCapacity,
      },
      adaptive: jitter.adaptive
        ? { minThreshold: jitter.adaptiveMinThreshold, maxThreshold: jitter.adaptiveMaxThreshold }
        : undefined,
    },
    metrics: {
      rateWindowMs: metrics.rateWindowMs,
      underrunWindowMs: metrics.underrunWindowMs,
      underrunThreshold: metrics.underrunThreshold,
      degradedRateFraction: metrics.degradedRateFraction,
      rttWarnMs: metrics.rttWarnMs,
    },
  });
}
