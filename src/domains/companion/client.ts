import mitt, { type Emitter } from 'mitt';
import {
  CommandCode,
  DEVICE_MARKER,
  EXPECTED_RESPONSE,
  FrameDecoder,
  Protocol,
  ResponseCode,
  STATS_REQUEST_SHAPES,
  buildAppStart,
  buildDeviceQuery,
  buildSetRadioParams,
  describeCode,
  isPushCode,
  parseDeviceInfo,
  parseErrorCode,
  parseRadioStats,
  type DeviceInfo,
  type Frame,
  type RadioParams,
  type RadioStats,
} from './protocol';
import { BusyError, ClosedError, HandshakeError, ProtocolError, TimeoutError } from './errors';
import type { ByteTransport } from '../device/drivers/types';
import type { Logger } from '../observability/types';
import { rootLogger } from '../observability/logger';

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 5_000;
export const DEFAULT_ATTEMPTS = 3;
export const DEFAULT_APP_NAME = 'NoiseFloorScanner';

const READ_CHUNK = 256;

export interface CompanionClientOptions {
  /** Per-attempt response timeout. */
  timeoutMs?: number;
  handshakeTimeoutMs?: number;
  attempts?: number;
  appName?: string;
  /** Log every frame sent and received as hex. */
  debug?: boolean;
  logger?: Logger;
}

export interface RequestOptions {
  timeoutMs?: number;
  attempts?: number;
}

/** A reply still owed for an attempt that timed out before its request settled. */
interface OwedReply {
  expected: ResponseCode;
  until: number;
}

type CompanionEvents = {
  push: Frame;
  closed: void;
};

/**
 * Synchronous request/response client for the companion protocol. At most one
 * request is outstanding; a timed-out attempt re-sends the identical frame.
 */
export class CompanionClient {
  public readonly events: Emitter<CompanionEvents> = mitt<CompanionEvents>();

  private readonly decoder = new FrameDecoder();
  private readonly queue: Frame[] = [];
  private owed: OwedReply[] = [];
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly handshakeTimeoutMs: number;
  private readonly attempts: number;
  private readonly appName: string;
  private readonly debug: boolean;

  private inFlight = false;
  private closed = false;
  private ready = false;
  private info: DeviceInfo | null = null;
  private statsShape: Buffer | null = null;

  constructor(private readonly transport: ByteTransport, options: CompanionClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;
    this.attempts = Math.max(1, options.attempts ?? DEFAULT_ATTEMPTS);
    this.appName = options.appName ?? DEFAULT_APP_NAME;
    this.debug = options.debug ?? false;
    this.logger = (options.logger ?? rootLogger).child({ component: 'Companion', address: transport.address });
  }

  get isReady(): boolean {
    return this.ready;
  }

  get deviceInfo(): DeviceInfo | null {
    return this.info;
  }

  async connect(): Promise<void> {
    if (this.closed) throw new ClosedError('Client is closed');
    await this.transport.open();
    this.decoder.reset();
    this.queue.length = 0;
    this.owed = [];
    this.logger.info(`Connected over ${this.transport.kind}`);
  }

  /**
   * DEVICE_QUERY then APP_START. Must succeed before any other command.
   */
  async handshake(): Promise<DeviceInfo> {
    const options = { timeoutMs: this.handshakeTimeoutMs };

    let info: DeviceInfo;
    try {
      const reply = await this.exchange(CommandCode.DEVICE_QUERY, buildDeviceQuery(), options);
      info = parseDeviceInfo(reply.payload);
    } catch (err) {
      throw this.handshakeFailure('device-query', err);
    }

    try {
      await this.exchange(CommandCode.APP_START, buildAppStart(this.appName), options);
    } catch (err) {
      throw this.handshakeFailure('app-start', err);
    }

    this.info = info;
    this.ready = true;
    this.logger.info('Handshake complete', { ...info });
    return info;
  }

  async request(code: CommandCode, payload: Buffer = Buffer.alloc(0), options: RequestOptions = {}): Promise<Frame> {
    if (!this.ready && code !== CommandCode.DEVICE_QUERY && code !== CommandCode.APP_START) {
      throw new HandshakeError('pending', `Handshake required before ${describeCode(code)}`);
    }
    return this.exchange(code, payload, options);
  }

  async setRadioParams(frequencyMhz: number, params: RadioParams): Promise<void> {
    await this.request(CommandCode.SET_RADIO_PARAMS, buildSetRadioParams({ frequencyMhz, ...params }));
  }

  async getNoiseFloor(): Promise<number> {
    const stats = await this.getRadioStats();
    return stats.noiseFloor;
  }

  /**
   * Firmware builds disagree on the GET_STATS body. The first shape that
   * yields STATS is cached; if it later starts failing, probing runs again.
   */
  async getRadioStats(): Promise<RadioStats> {
    if (this.statsShape) {
      try {
        return await this.requestStats(this.statsShape);
      } catch (err) {
        if (!(err instanceof ProtocolError)) throw err;
        this.logger.debug('Cached GET_STATS shape rejected, probing again', { deviceCode: err.deviceCode });
        this.statsShape = null;
      }
    }

    let lastError: ProtocolError | null = null;
    for (const shape of STATS_REQUEST_SHAPES) {
      try {
        const stats = await this.requestStats(shape);
        this.statsShape = shape;
        this.logger.debug('GET_STATS shape accepted', { shape: shape.toString('hex') });
        return stats;
      } catch (err) {
        if (!(err instanceof ProtocolError)) throw err;
        lastError = err;
        this.logger.debug('GET_STATS shape rejected', { shape: shape.toString('hex'), deviceCode: err.deviceCode });
      }
    }
    throw lastError ?? new ProtocolError('GET_STATS rejected', null);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.ready = false;
    await this.transport.close();
    this.logger.info('Connection closed');
    this.events.emit('closed');
  }

  private async requestStats(shape: Buffer): Promise<RadioStats> {
    const reply = await this.request(CommandCode.GET_STATS, shape);
    return parseRadioStats(reply.payload);
  }

  private async exchange(code: CommandCode, payload: Buffer, options: RequestOptions): Promise<Frame> {
    if (this.closed) throw new ClosedError(`Client is closed, cannot send ${describeCode(code)}`);
    if (this.inFlight) throw new BusyError(`${describeCode(code)} issued while another request is outstanding`);

    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const attempts = Math.max(1, options.attempts ?? this.attempts);
    const frame = Protocol.encode(code, payload);
    const expected = EXPECTED_RESPONSE[code];

    this.inFlight = true;
    try {
      // Anything already received predates this request.
      await this.drainTransport();

      for (let attempt = 1; attempt <= attempts; attempt++) {
        this.trace('TX', frame);
        await this.transport.write(frame);

        const reply = await this.awaitResponse(expected, timeoutMs);
        if (reply) {
          this.oweReplies(expected, attempt - 1, timeoutMs);
          if (reply.code === ResponseCode.ERR) {
            const deviceCode = parseErrorCode(reply.payload);
            throw new ProtocolError(`${describeCode(code)} failed (device error code=${deviceCode})`, deviceCode);
          }
          return reply;
        }
        this.logger.warn(`${describeCode(code)} timed out`, { attempt, attempts, timeoutMs });
      }

      throw new TimeoutError(`${describeCode(code)} got no response after ${attempts} attempts`, attempts);
    } catch (err) {
      if (this.closed && !(err instanceof ClosedError)) {
        throw new ClosedError(`Client closed during ${describeCode(code)}`, { cause: err });
      }
      throw err;
    } finally {
      this.inFlight = false;
    }
  }

  private async awaitResponse(expected: ResponseCode, timeoutMs: number): Promise<Frame | null> {
    const deadline = Date.now() + timeoutMs;

    while (true) {
      const frame = this.queue.shift();
      if (frame) {
        if (frame.code !== expected && frame.code !== ResponseCode.ERR) {
          this.handleStray(frame);
        } else if (!this.settleOwed(frame)) {
          return frame;
        }
        continue;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) return null;

      const chunk = await this.transport.readTimeout(READ_CHUNK, remaining);
      if (this.closed) throw new ClosedError('Client closed while awaiting a response');
      if (chunk.length > 0) this.ingest(chunk);
    }
  }

  private ingest(chunk: Buffer) {
    let result = this.decoder.push(chunk);
    while (true) {
      for (const frame of result.frames) {
        this.trace('RX', Protocol.encode(frame.code, frame.payload, DEVICE_MARKER));
        this.queue.push(frame);
      }
      if (!result.error) return;

      this.logger.warn('Malformed frame from device, resynchronising', { reason: result.error.message });
      this.decoder.resync();
      result = this.decoder.push();
    }
  }

  private async drainTransport() {
    while (true) {
      const chunk = await this.transport.readTimeout(READ_CHUNK, 0);
      if (chunk.length === 0) break;
      this.ingest(chunk);
    }
    this.drainQueue();
  }

  /**
   * The device answers in order, so the replies to earlier timed-out attempts
   * of a settled request arrive ahead of anything sent later. Each one expires
   * a timeout-length slot after the one before it.
   */
  private oweReplies(expected: ResponseCode, count: number, timeoutMs: number) {
    const now = Date.now();
    for (let i = 1; i <= count; i++) {
      this.owed.push({ expected, until: now + (i + 1) * timeoutMs });
    }
  }

  /** Consumes the frame if it is a late reply to an already settled request. */
  private settleOwed(frame: Frame): boolean {
    const now = Date.now();
    this.owed = this.owed.filter((entry) => entry.until > now);
    const next = this.owed[0];
    if (!next || (frame.code !== next.expected && frame.code !== ResponseCode.ERR)) return false;

    this.owed.shift();
    this.logger.debug('Discarding late reply to an earlier attempt', { code: frame.code, owed: this.owed.length });
    return true;
  }

  private drainQueue() {
    while (this.queue.length > 0) {
      const frame = this.queue.shift();
      if (frame) this.handleStray(frame);
    }
  }

  private handleStray(frame: Frame) {
    if (isPushCode(frame.code)) {
      this.events.emit('push', frame);
      return;
    }
    if (this.settleOwed(frame)) return;
    this.logger.debug('Ignoring unexpected frame', { code: frame.code, length: frame.payload.length });
  }

  private handshakeFailure(step: 'device-query' | 'app-start', err: unknown): Error {
    if (err instanceof ClosedError) return err;
    const reason = err instanceof Error ? err.message : String(err);
    return new HandshakeError(step, `Handshake failed at ${step}: ${reason}`, { cause: err });
  }

  private trace(direction: 'TX' | 'RX', bytes: Buffer) {
    if (this.debug) {
      this.logger.debug(`[${direction}] ${bytes.toString('hex')}`);
    }
  }
}
