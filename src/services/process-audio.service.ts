/**
 * Audio devices backed by external processes: raw PCM is read from a capture
 * command's stdout and written to a playback command's stdin
 */
import { spawn, ChildProcessWithoutNullStreams } from 'child_process';
import { AudioFormat, AudioInput, AudioOutput } from '../types/index.js';
import { bytesPerSampleFrame, expectedBytesPerSecond } from '../utils/audio-format.js';
import { CaptureUnavailableError, errorMessage } from '../utils/errors.js';
import { sleep } from '../utils/retry.js';
import { contextLogger } from '../utils/logger.js';

const log = contextLogger('ProcessAudio');

export type SpawnProcess = (command: string) => ChildProcessWithoutNullStreams;

const spawnShell: SpawnProcess = (command) => spawn(command, { shell: true, stdio: 'pipe' });

/**
 * Wait for a spawned process to either start or fail to start
 */
function awaitSpawn(child: ChildProcessWithoutNullStreams, command: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = (): void => {
      child.off('error', onError);
      resolve();
    };
    const onError = (error: Error): void => {
      child.off('spawn', onSpawn);
      reject(new CaptureUnavailableError(`Cannot start "${command}": ${error.message}`, { cause: error }));
    };
    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
}

/**
 * Capture device reading PCM from a command such as `arecord -t raw`
 */
export class ProcessAudioInput implements AudioInput {
  private command: string;
  private spawnProcess: SpawnProcess;
  private child: ChildProcessWithoutNullStreams | null = null;
  private chunks: Buffer[] = [];
  private buffered: number = 0;
  private maxBuffered: number = 0;
  private sampleBytes: number = 1;
  private failure: Error | null = null;
  private wake: (() => void) | null = null;

  constructor(command: string, spawnProcess: SpawnProcess = spawnShell) {
    this.command = command;
    this.spawnProcess = spawnProcess;
  }

  async open(format: AudioFormat): Promise<void> {
    if (this.child) {
      return;
    }

    this.chunks = [];
    this.buffered = 0;
    this.failure = null;
    this.sampleBytes = bytesPerSampleFrame(format);
    // Two seconds of audio; older data is discarded if the reader stalls
    this.maxBuffered = expectedBytesPerSecond(format) * 2;

    const child = this.spawnProcess(this.command);
    await awaitSpawn(child, this.command);
    this.child = child;

    child.stdout.on('data', (data: Buffer) => this.append(data));
    child.stderr.on('data', (data: Buffer) => {
      log('debug', `capture stderr: ${data.toString().trim()}`);
    });
    child.on('error', (error) => this.fail(error));
    child.on('exit', (code, signal) => {
      this.fail(new Error(`Capture process exited (${signal ?? `code ${code}`})`));
    });

    log('info', `Capture process started: ${this.command}`);
  }

  read(maxBytes: number, options: { timeoutMs: number; signal: AbortSignal }): Promise<Buffer> {
    if (this.buffered >= maxBytes) {
      return Promise.resolve(this.take(maxBytes));
    }
    if (this.failure && this.buffered === 0) {
      return Promise.reject(this.failure);
    }
    if (!this.child && !this.failure) {
      return Promise.reject(new CaptureUnavailableError('Capture device is not open'));
    }

    return new Promise((resolve) => {
      const finish = (): void => {
        clearTimeout(timer);
        options.signal.removeEventListener('abort', finish);
        this.wake = null;
        resolve(this.take(maxBytes));
      };
      const timer = setTimeout(finish, options.timeoutMs);
      options.signal.addEventListener('abort', finish, { once: true });

      this.wake = () => {
        if (this.buffered >= maxBytes || this.failure) {
          finish();
        }
      };
    });
  }

  async close(): Promise<void> {
    const child = this.child;
    this.child = null;
    this.chunks = [];
    this.buffered = 0;
    if (!child) {
      return;
    }
    child.removeAllListeners('exit');
    child.stdout.removeAllListeners('data');
    if (child.exitCode === null) {
      child.kill('SIGTERM');
    }
    log('info', 'Capture process stopped');
  }

  private append(data: Buffer): void {
    this.chunks.push(data);
    this.buffered += data.length;

    if (this.buffered > this.maxBuffered) {
      const excess = this.buffered - this.maxBuffered;
      const dropped = Math.ceil(excess / this.sampleBytes) * this.sampleBytes;
      const rest = Buffer.concat(this.chunks).subarray(dropped);
      this.chunks = [rest];
      this.buffered = rest.length;
    }

    this.wake?.();
  }

  /**
   * Take up to `maxBytes` in whole samples; a trailing partial sample stays
   * buffered for the next read
   */
  private take(maxBytes: number): Buffer {
    const all = Buffer.concat(this.chunks);
    const available = Math.min(maxBytes, all.length);
    const taken = all.subarray(0, available - (available % this.sampleBytes));
    const rest = all.subarray(taken.length);
    this.chunks = rest.length > 0 ? [rest] : [];
    this.buffered = rest.length;
    return taken;
  }

  private fail(error: Error): void {
    if (!this.child) {
      return;
    }
    log('warn', `Capture process failed: ${error.message}`);
    this.failure = error;
    this.child = null;
    this.wake?.();
  }
}

/**
 * Playback device writing PCM to a command such as `aplay -t raw`
 */
export class ProcessAudioOutput implements AudioOutput {
  private command: string;
  private spawnProcess: SpawnProcess;
  private child: ChildProcessWithoutNullStreams | null = null;
  private bytesPerSecond: number = 0;
  private playedUntil: number = 0;
  private abortController: AbortController | null = null;

  constructor(command: string, spawnProcess: SpawnProcess = spawnShell) {
    this.command = command;
    this.spawnProcess = spawnProcess;
  }

  async open(format: AudioFormat): Promise<void> {
    if (this.child) {
      return;
    }

    this.bytesPerSecond = expectedBytesPerSecond(format);
    this.playedUntil = 0;
    this.abortController = new AbortController();

    const child = this.spawnProcess(this.command);
    await awaitSpawn(child, this.command);
    this.child = child;

    child.stderr.on('data', (data: Buffer) => {
      log('debug', `playback stderr: ${data.toString().trim()}`);
    });
    child.stdin.on('error', (error) => {
      log('warn', `Playback input closed: ${error.message}`);
    });
    child.on('exit', (code, signal) => {
      log('warn', `Playback process exited (${signal ?? `code ${code}`})`);
      this.child = null;
    });

    log('info', `Playback process started: ${this.command}`);
  }

  /**
   * Resolves once the pipe has accepted the payload and the device has
   * played everything written before it, keeping one frame queued ahead
   * of the playhead
   */
  write(payload: Buffer): Promise<void> {
    const child = this.child;
    const signal = this.abortController?.signal;
    if (!child || !child.stdin.writable || !signal) {
      return Promise.reject(new Error('Playback device is not open'));
    }

    const now = Date.now();
    const startsAt = Math.max(now, this.playedUntil);
    this.playedUntil = startsAt + (payload.length * 1000) / this.bytesPerSecond;

    const written = new Promise<void>((resolve, reject) => {
      child.stdin.write(payload, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
    const consumed = startsAt > now ? sleep(startsAt - now, signal) : Promise.resolve();

    return Promise.all([written, consumed]).then(() => undefined);
  }

  async close(): Promise<void> {
    const child = this.child;
    this.child = null;
    this.abortController?.abort();
    this.abortController = null;
    if (!child) {
      return;
    }
    child.removeAllListeners('exit');
    try {
      child.stdin.end();
    } catch (error) {
      log('debug', `Error ending playback input: ${errorMessage(error)}`);
    }
    if (child.exitCode === null) {
      child.kill('SIGTERM');
    }
    log('info', 'Playback process stopped');
  }
}
