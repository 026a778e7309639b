import { SerialPort } from 'serialport';
import { ConnectionError } from '../../companion/errors';
import { BufferedTransport } from './buffered';

export const DEFAULT_BAUD_RATE = 115200;

export class SerialTransport extends BufferedTransport {
  readonly kind = 'serial' as const;

  private port: SerialPort | null = null;

  constructor(
    private readonly path: string,
    private readonly baudRate: number = DEFAULT_BAUD_RATE,
  ) {
    super();
  }

  get address(): string {
    return this.path;
  }

  protected openStream(): Promise<void> {
    return new Promise((resolve, reject) => {
      const port = new SerialPort({
        path: this.path,
        baudRate: this.baudRate,
        autoOpen: false,
      });

      port.open((err) => {
        if (err) {
          reject(new ConnectionError(`Cannot open serial device ${this.path}: ${err.message}`, { cause: err }));
          return;
        }
        this.port = port;
        resolve();
      });

      port.on('data', (data: Buffer) => this.receive(data));
      port.on('error', (err: Error) => this.lost(err));
      port.on('close', () => this.lost(new Error(`Serial device ${this.path} closed`)));
    });
  }

  protected writeStream(data: Uint8Array): Promise<void> {
    const port = this.port;
    if (!port) return Promise.reject(new Error('Port not open'));

    return new Promise((resolve, reject) => {
      port.write(Buffer.from(data), (err) => {
        if (err) {
          reject(err);
          return;
        }
        port.drain((drainErr) => {
          if (drainErr) reject(drainErr);
          else resolve();
        });
      });
    });
  }

  protected closeStream(): Promise<void> {
    const port = this.port;
    this.port = null;
    if (!port || !port.isOpen) return Promise.resolve();

    return new Promise((resolve, reject) => {
      port.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
