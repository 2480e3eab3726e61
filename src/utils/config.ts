/**
 * Configuration loader and validator
 */
import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';
import { TransportKind } from '../types/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Load environment variables from the project root
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

export type AgentRole = 'sender' | 'receiver';

/**
 * Application configuration
 */
export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: string;
  };
  audio: {
    sampleRate: number;
    channels: number;
    bitDepth: number;
    frameDurationMs: number;
  };
  relay: {
    capacity: number;
    maxFrameBytes: number;
    idleTimeoutMs: number;
    sweepIntervalMs: number;
    defaultTimeoutMinutes: number;
  };
  transport: {
    kind: TransportKind;
    relayUrl: string;
    requestTimeoutMs: number;
    maxRetries: number;
    retryBaseDelayMs: number;
    retryMaxDelayMs: number;
    pollIntervalMs: number;
    pollMaxCount: number;
    reconnectAttempts: number;
    reconnectDelayMs: number;
    reconnectDelayMaxMs: number;
    outboundQueueCapacity: number;
  };
  capture: {
    maxOpenAttempts: number;
    captureCommand: string;
    playbackCommand: string;
  };
  jitter: {
    minFillThreshold: number;
    maxCapacity: number;
    adaptive: boolean;
    adaptiveMinThreshold: number;
    adaptiveMaxThreshold: number;
  };
  metrics: {
    rateWindowMs: number;
    underrunWindowMs: number;
    underrunThreshold: number;
    degradedRateFraction: number;
    rttWarnMs: number;
    pingIntervalMs: number;
  };
  storage: {
    basePath: string;
    recordingsPath: string;
    logsPath: string;
    /** Recorded frames older than this are deleted; 0 keeps them forever */
    retentionHours: number;
    cleanupIntervalMs: number;
  };
  logging: {
    level: string;
    format: 'json' | 'simple';
    toFile: boolean;
    toConsole: boolean;
    moduleFilter?: string[];
  };
  agent: {
    role: AgentRole;
    deviceId: string;
  };
}

function intEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  return raw === undefined || raw === '' ? fallback : parseInt(raw, 10);
}

function floatEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  return raw === undefined || raw === '' ? fallback : parseFloat(raw);
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): Config {
  return {
    server: {
      port: intEnv('PORT', 3000),
      host: process.env.HOST || '0.0.0.0',
      nodeEnv: process.env.NODE_ENV || 'development',
    },
    audio: {
      sampleRate: intEnv('AUDIO_SAMPLE_RATE', 16000),
      channels: intEnv('AUDIO_CHANNELS', 1),
      bitDepth: intEnv('AUDIO_BIT_DEPTH', 16),
      frameDurationMs: intEnv('FRAME_DURATION_MS', 20),
    },
    relay: {
      capacity: intEnv('RELAY_CAPACITY', 30),
      maxFrameBytes: intEnv('MAX_FRAME_BYTES', 64 * 1024),
      idleTimeoutMs: intEnv('SESSION_IDLE_TIMEOUT_MS', 5 * 60 * 1000),
      sweepIntervalMs: intEnv('SESSION_SWEEP_INTERVAL_MS', 30 * 1000),
      defaultTimeoutMinutes: intEnv('DEFAULT_SESSION_TIMEOUT_MINUTES', 10),
    },
    transport: {
      kind: process.env.TRANSPORT_KIND === 'polling' ? 'polling' : 'push',
      relayUrl: process.env.RELAY_URL || 'http://localhost:3000',
      requestTimeoutMs: intEnv('REQUEST_TIMEOUT_MS', 5000),
      maxRetries: intEnv('TRANSPORT_MAX_RETRIES', 3),
      retryBaseDelayMs: intEnv('RETRY_BASE_DELAY_MS', 250),
      retryMaxDelayMs: intEnv('RETRY_MAX_DELAY_MS', 4000),
      pollIntervalMs: intEnv('POLL_INTERVAL_MS', 100),
      pollMaxCount: intEnv('POLL_MAX_COUNT', 10),
      reconnectAttempts: intEnv('SOCKET_RECONNECT_ATTEMPTS', 5),
      reconnectDelayMs: intEnv('SOCKET_RECONNECT_DELAY_MS', 1000),
      reconnectDelayMaxMs: intEnv('SOCKET_RECONNECT_DELAY_MAX_MS', 10000),
      outboundQueueCapacity: intEnv('OUTBOUND_QUEUE_CAPACITY', 50),
    },
    capture: {
      maxOpenAttempts: intEnv('CAPTURE_MAX_OPEN_ATTEMPTS', 5),
      captureCommand: process.env.CAPTURE_COMMAND || 'arecord -q -t raw -f S16_LE -r 16000 -c 1',
      playbackCommand: process.env.PLAYBACK_COMMAND || 'aplay -q -t raw -f S16_LE -r 16000 -c 1',
    },
    jitter: {
      minFillThreshold: intEnv('JITTER_MIN_FILL', 8),
      maxCapacity: intEnv('JITTER_MAX_CAPACITY', 100),
      adaptive: process.env.JITTER_ADAPTIVE === 'true',
      adaptiveMinThreshold: intEnv('JITTER_ADAPTIVE_MIN', 3),
      adaptiveMaxThreshold: intEnv('JITTER_ADAPTIVE_MAX', 50),
    },
    metrics: {
      rateWindowMs: intEnv('METRICS_RATE_WINDOW_MS', 5000),
      underrunWindowMs: intEnv('METRICS_UNDERRUN_WINDOW_MS', 10000),
      underrunThreshold: intEnv('METRICS_UNDERRUN_THRESHOLD', 5),
      degradedRateFraction: floatEnv('METRICS_DEGRADED_RATE_FRACTION', 0.8),
      rttWarnMs: intEnv('METRICS_RTT_WARN_MS', 200),
      pingIntervalMs: intEnv('METRICS_PING_INTERVAL_MS', 2000),
    },
    storage: {
      basePath: process.env.STORAGE_BASE_PATH || './storage',
      recordingsPath: process.env.RECORDINGS_PATH || './storage/recordings',
      logsPath: process.env.LOGS_PATH || './storage/logs',
      retentionHours: intEnv('RECORDING_RETENTION_HOURS', 24),
      cleanupIntervalMs: intEnv('RECORDING_CLEANUP_INTERVAL_MS', 60 * 60 * 1000),
    },
    logging: {
      level: process.env.LOG_LEVEL || 'info',
      format: process.env.LOG_FORMAT === 'json' ? 'json' : 'simple',
      toFile: process.env.LOG_TO_FILE === 'true',
      toConsole: process.env.LOG_TO_CONSOLE !== 'false',
      moduleFilter: process.env.LOG_MODULE_FILTER
        ? process.env.LOG_MODULE_FILTER.split(',').map(m => m.trim()).filter(m => m.length > 0)
        : undefined,
    },
    agent: {
      role: process.env.AGENT_ROLE === 'sender' ? 'sender' : 'receiver',
      deviceId: process.env.DEVICE_ID || '',
    },
  };
}

/**
 * Validate configuration
 * @throws Error if configuration is invalid
 */
export function validateConfig(config: Config): void {
  const errors: string[] = [];

  if (!(config.server.port > 0 && config.server.port <= 65535)) {
    errors.push('PORT must be between 1 and 65535');
  }

  if (!(config.audio.sampleRate > 0)) {
    errors.push('AUDIO_SAMPLE_RATE must be positive');
  }

  if (!(config.audio.channels > 0)) {
    errors.push('AUDIO_CHANNELS must be positive');
  }

  if (![8, 16, 24, 32].includes(config.audio.bitDepth)) {
    errors.push('AUDIO_BIT_DEPTH must be one of 8, 16, 24, 32');
  }

  if (!(config.audio.frameDurationMs > 0)) {
    errors.push('FRAME_DURATION_MS must be positive');
  }

  if (!(config.relay.capacity > 0)) {
    errors.push('RELAY_CAPACITY must be positive');
  }

  if (!(config.relay.maxFrameBytes > 0)) {
    errors.push('MAX_FRAME_BYTES must be positive');
  }

  if (!(config.storage.retentionHours >= 0)) {
    errors.push('RECORDING_RETENTION_HOURS must not be negative');
  }

  if (!(config.jitter.minFillThreshold > 0)) {
    errors.push('JITTER_MIN_FILL must be positive');
  }

  if (!(config.jitter.maxCapacity >= config.jitter.minFillThreshold)) {
    errors.push('JITTER_MAX_CAPACITY must be at least JITTER_MIN_FILL');
  }

  if (config.jitter.adaptiveMinThreshold > config.jitter.adaptiveMaxThreshold) {
    errors.push('JITTER_ADAPTIVE_MIN must not exceed JITTER_ADAPTIVE_MAX');
  }

  if (!(config.transport.maxRetries >= 0)) {
    errors.push('TRANSPORT_MAX_RETRIES must not be negative');
  }

  if (!(config.metrics.degradedRateFraction > 0 && config.metrics.degradedRateFraction <= 1)) {
    errors.push('METRICS_DEGRADED_RATE_FRACTION must be in (0, 1]');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }
}

/**
 * Validate the device agent settings on top of the base configuration
 */
export function validateAgentConfig(config: Config): void {
  const errors: string[] = [];

  if (!config.agent.deviceId) {
    errors.push('DEVICE_ID is required');
  }

  if (!config.transport.relayUrl) {
    errors.push('RELAY_URL is required');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }
}

/**
 * Get validated configuration
 */
export function getConfig(): Config {
  const config = loadConfig();
  validateConfig(config);
  return config;
}
