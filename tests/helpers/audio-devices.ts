/**
 * In-memory audio devices for tests
 */
import { AudioFormat, AudioInput, AudioOutput } from '../../src/types/index.js';

/**
 * Capture device fed from a script of reads; a read with nothing scripted
 * waits until more is scripted or the caller aborts
 */
export class FakeAudioInput implements AudioInput {
  opens: number = 0;
  closes: number = 0;
  failOpens: number = 0;
  readSizes: number[] = [];
  format: AudioFormat | null = null;
  private script: Array<Buffer | Error> = [];
  private waiter: (() => void) | null = null;

  enqueue(...items: Array<Buffer | Error>): void {
    this.script.push(...items);
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }

  async open(format: AudioFormat): Promise<void> {
    if (this.failOpens > 0) {
      this.failOpens--;
      throw new Error('device busy');
    }
    this.opens++;
    this.format = format;
  }

  async read(maxBytes: number, options: { timeoutMs: number; signal: AbortSignal }): Promise<Buffer> {
    this.readSizes.push(maxBytes);

    while (this.script.length === 0) {
      if (options.signal.aborted) {
        return Buffer.alloc(0);
      }
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
        options.signal.addEventListener('abort', () => resolve(), { once: true });
      });
    }

    const next = this.script.shift();
    if (next instanceof Error) {
      throw next;
    }
    return next ?? Buffer.alloc(0);
  }

  async close(): Promise<void> {
    this.closes++;
  }
}

/**
 * Playback device recording every payload; `hold()` makes writes wait for
 * `release()`
 */
export class FakeAudioOutput implements AudioOutput {
  opened: boolean = false;
  closed: boolean = false;
  written: Buffer[] = [];
  failNextWrite: boolean = false;
  private held: boolean = false;
  private pending: Array<() => void> = [];

  async open(_format: AudioFormat): Promise<void> {
    this.opened = true;
  }

  async write(payload: Buffer): Promise<void> {
    if (this.failNextWrite) {
      this.failNextWrite = false;
      throw new Error('output underflow');
    }
    if (this.held) {
      await new Promise<void>((resolve) => this.pending.push(resolve));
    }
    this.written.push(payload);
  }

  hold(): void {
    this.held = true;
  }

  release(): void {
    this.held = false;
    const pending = this.pending;
    this.pending = [];
    pending.forEach((resolve) => resolve());
  }

  get inFlight(): number {
    return this.pending.length;
  }

  async close(): Promise<void> {
    this.release();
    this.closed = true;
  }
}
