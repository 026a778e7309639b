import { BusyError, ClosedError, ConnectionError, WriteError } from '../../companion/errors';
import type { ByteTransport, TransportKind } from './types';

type TransportState = 'idle' | 'open' | 'lost' | 'closed';

/**
 * Shared read side for the stream-backed transports: incoming chunks are
 * appended to a buffer and handed out by readTimeout(), which waits on a
 * single timer-bounded waiter when the buffer is empty.
 */
export abstract class BufferedTransport implements ByteTransport {
  abstract readonly kind: TransportKind;
  abstract readonly address: string;

  private state: TransportState = 'idle';
  private buffer: Buffer = Buffer.alloc(0);
  private waiter: (() => void) | null = null;
  private lostReason: Error | null = null;

  get isOpen(): boolean {
    return this.state === 'open';
  }

  protected abstract openStream(): Promise<void>;
  protected abstract writeStream(data: Uint8Array): Promise<void>;
  protected abstract closeStream(): Promise<void>;

  async open(): Promise<void> {
    if (this.state === 'open') return;

    this.buffer = Buffer.alloc(0);
    this.lostReason = null;
    try {
      await this.openStream();
    } catch (err) {
      this.state = 'closed';
      if (err instanceof ConnectionError) throw err;
      throw new ConnectionError(`Failed to open ${this.kind} transport ${this.address}`, { cause: err });
    }
    this.state = 'open';
  }

  async readTimeout(maxBytes: number, timeoutMs: number): Promise<Buffer> {
    this.assertUsable();
    if (this.waiter) {
      throw new BusyError(`Concurrent read on ${this.address}`);
    }

    if (this.buffer.length === 0 && this.state === 'open' && timeoutMs > 0) {
      await new Promise<void>((resolve) => {
        const done = () => {
          clearTimeout(timer);
          this.waiter = null;
          resolve();
        };
        const timer = setTimeout(done, timeoutMs);
        this.waiter = done;
      });
    }

    if (this.buffer.length === 0) {
      if (this.state === 'lost') throw this.lostError();
      return Buffer.alloc(0);
    }

    const out = Buffer.from(this.buffer.subarray(0, Math.max(0, maxBytes)));
    this.buffer = this.buffer.subarray(out.length);
    return out;
  }

  async write(data: Uint8Array): Promise<void> {
    this.assertUsable();
    if (this.state === 'lost') throw this.lostError();
    try {
      await this.writeStream(data);
    } catch (err) {
      if (this.state === 'closed') {
        throw new ClosedError(`Transport ${this.address} closed during write`, { cause: err });
      }
      throw new WriteError(`Write to ${this.address} failed`, { cause: err });
    }
  }

  async close(): Promise<void> {
    const previous = this.state;
    this.state = 'closed';
    this.wake();
    if (previous === 'open' || previous === 'lost') {
      await this.closeStream();
    }
  }

  /** Called by subclasses for every chunk the device sends. */
  protected receive(data: Buffer): void {
    if (this.state !== 'open' || data.length === 0) return;
    this.buffer = Buffer.concat([this.buffer, data]);
    this.wake();
  }

  /** Called by subclasses when the peer goes away while the transport is open. */
  protected lost(reason: Error): void {
    if (this.state !== 'open') return;
    this.state = 'lost';
    this.lostReason = reason;
    this.wake();
  }

  private wake() {
    const waiter = this.waiter;
    if (waiter) waiter();
  }

  private assertUsable() {
    if (this.state === 'idle' || this.state === 'closed') {
      throw new ClosedError(`Transport ${this.address} is not open`);
    }
  }

  private lostError(): ConnectionError {
    return new ConnectionError(`Connection to ${this.address} lost`, { cause: this.lostReason ?? undefined });
  }
}
