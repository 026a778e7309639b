import { BufferedTransport } from './buffered';
import {
  CommandCode,
  DEVICE_MARKER,
  FrameDecoder,
  HOST_MARKER,
  Protocol,
  ResponseCode,
  STATS_REQUEST_SHAPES,
  buildDeviceInfo,
  buildRadioStats,
  parseSetRadioParams,
  type Frame,
  type RadioSettings,
} from '../../companion/protocol';
import type { Logger } from '../../observability/types';

export const ERR_UNSUPPORTED = 1;

export type MockReply =
  | { kind: 'frames'; frames: Frame[]; delayMs?: number }
  | { kind: 'raw'; bytes: Buffer; delayMs?: number }
  | { kind: 'error'; code: number | null; delayMs?: number }
  | { kind: 'silent' }
  | { kind: 'hangup'; delayMs?: number };

export interface MockDeviceState {
  radio: RadioSettings | null;
  appStarted: boolean;
  /** Stats samples served since the radio was last retuned. */
  sampleIndex: number;
  /** Every request frame received, in order. */
  requests: Frame[];
}

/** Returns undefined to fall through to the default firmware behaviour. */
export type MockScript = (request: Frame, device: MockDeviceState) => MockReply | undefined;

export interface MockCompanionOptions {
  script?: MockScript;
  noise?: (radio: RadioSettings | null, sampleIndex: number) => number;
  /** GET_STATS body this firmware accepts; other shapes get ERR 1. */
  statsShape?: Buffer;
  /** Deliver replies in chunks of this many bytes, one tick apart. */
  chunkSize?: number;
  responseDelayMs?: number;
  /** How many of the most recent host frames `requests` keeps. */
  requestHistory?: number;
  logger?: Logger;
}

const DEFAULT_REQUEST_HISTORY = 1000;

function defaultNoise(): number {
  return -112 + Math.round(Math.random() * 6);
}

/**
 * In-process companion device. Parses host frames and answers the way the
 * firmware does, unless a script overrides the reply.
 */
export class MockCompanionTransport extends BufferedTransport {
  readonly kind = 'mock' as const;
  readonly address: string;

  readonly device: MockDeviceState = { radio: null, appStarted: false, sampleIndex: 0, requests: [] };

  private readonly inbound = new FrameDecoder(HOST_MARKER);
  private readonly timers = new Set<ReturnType<typeof setTimeout>>();

  constructor(
    private readonly options: MockCompanionOptions = {},
    name = 'mock-companion',
  ) {
    super();
    this.address = name;
  }

  get requests(): Frame[] {
    return this.device.requests;
  }

  protected async openStream(): Promise<void> {
    this.inbound.reset();
    this.options.logger?.debug('Mock companion opened', { address: this.address });
  }

  protected async writeStream(data: Uint8Array): Promise<void> {
    let result = this.inbound.push(data);
    while (true) {
      for (const frame of result.frames) {
        this.record(frame);
        this.dispatch(this.options.script?.(frame, this.device) ?? this.firmware(frame));
      }
      if (!result.error) break;
      this.options.logger?.warn('Mock companion dropped malformed host bytes', { reason: result.error.message });
      this.inbound.resync();
      result = this.inbound.push();
    }
  }

  protected async closeStream(): Promise<void> {
    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();
  }

  private record(frame: Frame) {
    const requests = this.device.requests;
    requests.push(frame);
    const limit = Math.max(0, this.options.requestHistory ?? DEFAULT_REQUEST_HISTORY);
    if (requests.length > limit) requests.splice(0, requests.length - limit);
  }

  /** Pushes bytes at the host as if the device had sent them unprompted. */
  simulateIncoming(data: Buffer): void {
    this.deliver(data, 0);
  }

  private firmware(request: Frame): MockReply {
    switch (request.code) {
      case CommandCode.DEVICE_QUERY:
        return this.reply(ResponseCode.DEVICE_INFO, buildDeviceInfo({
          firmwareVersion: 7,
          buildDate: '01 Jan 2025',
          model: 'Mock Companion',
          version: 'v1.0.0',
        }));
      case CommandCode.APP_START:
        this.device.appStarted = true;
        return this.reply(ResponseCode.SELF_INFO, Buffer.alloc(4));
      case CommandCode.SET_RADIO_PARAMS:
        this.device.radio = parseSetRadioParams(request.payload);
        this.device.sampleIndex = 0;
        return this.reply(ResponseCode.OK, Buffer.alloc(0));
      case CommandCode.GET_STATS: {
        const accepted = this.options.statsShape ?? STATS_REQUEST_SHAPES[0];
        if (!request.payload.equals(accepted)) {
          return { kind: 'error', code: ERR_UNSUPPORTED };
        }
        const noise = this.options.noise ?? defaultNoise;
        const noiseFloor = noise(this.device.radio, this.device.sampleIndex);
        this.device.sampleIndex++;
        return this.reply(ResponseCode.STATS, buildRadioStats({ noiseFloor, lastRssi: noiseFloor + 20, lastSnr: 6.25 }));
      }
      default:
        return { kind: 'error', code: ERR_UNSUPPORTED };
    }
  }

  private reply(code: ResponseCode, payload: Buffer): MockReply {
    return { kind: 'frames', frames: [{ code, payload }] };
  }

  private dispatch(reply: MockReply) {
    const delay = this.options.responseDelayMs ?? 0;
    switch (reply.kind) {
      case 'silent':
        return;
      case 'hangup':
        this.schedule(reply.delayMs ?? delay, () => this.lost(new Error('Mock device hung up')));
        return;
      case 'error': {
        const payload = reply.code === null ? Buffer.alloc(0) : Buffer.from([reply.code]);
        this.deliver(Protocol.encode(ResponseCode.ERR, payload, DEVICE_MARKER), reply.delayMs ?? delay);
        return;
      }
      case 'raw':
        this.deliver(reply.bytes, reply.delayMs ?? delay);
        return;
      case 'frames': {
        const bytes = Buffer.concat(reply.frames.map((f) => Protocol.encode(f.code, f.payload, DEVICE_MARKER)));
        this.deliver(bytes, reply.delayMs ?? delay);
        return;
      }
    }
  }

  private deliver(bytes: Buffer, delayMs: number) {
    const size = this.options.chunkSize ?? bytes.length;
    const chunks: Buffer[] = [];
    for (let offset = 0; offset < bytes.length; offset += Math.max(1, size)) {
      chunks.push(bytes.subarray(offset, offset + Math.max(1, size)));
    }

    const next = () => {
      const chunk = chunks.shift();
      if (!chunk) return;
      this.receive(chunk);
      if (chunks.length > 0) this.schedule(0, next);
    };
    this.schedule(delayMs, next);
  }

  private schedule(delayMs: number, fn: () => void) {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      fn();
    }, delayMs);
    this.timers.add(timer);
  }
}
