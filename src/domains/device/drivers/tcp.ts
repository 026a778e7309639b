import { Socket } from 'net';
import { ConnectionError } from '../../companion/errors';
import { BufferedTransport } from './buffered';

export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

export class TcpTransport extends BufferedTransport {
  readonly kind = 'tcp' as const;

  private socket: Socket | null = null;

  constructor(
    private readonly host: string,
    private readonly port: number,
    private readonly connectTimeoutMs: number = DEFAULT_CONNECT_TIMEOUT_MS,
  ) {
    super();
  }

  get address(): string {
    return `${this.host}:${this.port}`;
  }

  protected openStream(): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = new Socket();
      let connected = false;

      const timeout = setTimeout(() => {
        socket.destroy();
        reject(new ConnectionError(`Connection to ${this.address} timed out`));
      }, this.connectTimeoutMs);

      socket.setNoDelay(true);

      socket.on('connect', () => {
        clearTimeout(timeout);
        connected = true;
        this.socket = socket;
        resolve();
      });

      socket.on('data', (data: Buffer) => this.receive(data));

      socket.on('error', (err) => {
        if (!connected) {
          clearTimeout(timeout);
          reject(new ConnectionError(`Cannot connect to ${this.address}: ${err.message}`, { cause: err }));
          return;
        }
        this.lost(err);
      });

      socket.on('close', () => {
        this.lost(new Error(`Connection to ${this.address} closed by peer`));
      });

      socket.connect(this.port, this.host);
    });
  }

  protected writeStream(data: Uint8Array): Promise<void> {
    const socket = this.socket;
    if (!socket) return Promise.reject(new Error('Socket not connected'));

    return new Promise((resolve, reject) => {
      socket.write(data, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  protected async closeStream(): Promise<void> {
    if (this.socket) {
      this.socket.destroy();
      this.socket = null;
    }
  }
}
