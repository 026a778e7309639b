import { FrameError, ProtocolError } from './errors';

/**
 * Companion wire format
 *
 *   host → device:  '<' | length (u16 LE) | code (u8) | payload
 *   device → host:  '>' | length (u16 LE) | code (u8) | payload
 *
 * `length` counts the code byte plus the payload.
 */
export const HOST_MARKER = 0x3c; // '<'
export const DEVICE_MARKER = 0x3e; // '>'
export const HEADER_SIZE = 3; // Marker(1) + Length(2)
export const MAX_FRAME_BODY = 172;

export const PROTOCOL_VERSION = 7;
export const STATS_TYPE_RADIO = 1;

export enum CommandCode {
  APP_START = 1,
  SET_RADIO_PARAMS = 11,
  DEVICE_QUERY = 22,
  GET_STATS = 56,
}

export enum ResponseCode {
  OK = 0,
  ERR = 1,
  SELF_INFO = 5,
  DEVICE_INFO = 13,
  STATS = 24,
}

// Codes at or above this are unsolicited pushes from the device.
export const PUSH_CODE_MIN = 0x80;

export const EXPECTED_RESPONSE: Record<CommandCode, ResponseCode> = {
  [CommandCode.APP_START]: ResponseCode.SELF_INFO,
  [CommandCode.SET_RADIO_PARAMS]: ResponseCode.OK,
  [CommandCode.DEVICE_QUERY]: ResponseCode.DEVICE_INFO,
  [CommandCode.GET_STATS]: ResponseCode.STATS,
};

export interface Frame {
  code: number;
  payload: Buffer;
}

export interface DecodeResult {
  frames: Frame[];
  error?: FrameError;
}

const COMMAND_CODES = new Set<number>([
  CommandCode.APP_START,
  CommandCode.SET_RADIO_PARAMS,
  CommandCode.DEVICE_QUERY,
  CommandCode.GET_STATS,
]);

const RESPONSE_CODES = new Set<number>([
  ResponseCode.OK,
  ResponseCode.ERR,
  ResponseCode.SELF_INFO,
  ResponseCode.DEVICE_INFO,
  ResponseCode.STATS,
]);

export function isPushCode(code: number): boolean {
  return code >= PUSH_CODE_MIN && code <= 0xff;
}

function isKnownCode(code: number, marker: number): boolean {
  if (marker === HOST_MARKER) return COMMAND_CODES.has(code);
  return RESPONSE_CODES.has(code) || isPushCode(code);
}

export function describeCode(code: number): string {
  return CommandCode[code] ?? `0x${code.toString(16).padStart(2, '0')}`;
}

export class Protocol {
  static encode(code: number, payload: Uint8Array = Buffer.alloc(0), marker: number = HOST_MARKER): Buffer {
    if (!Number.isInteger(code) || code < 0 || code > 0xff) {
      throw new FrameError(`Frame code out of range: ${code}`);
    }
    const length = 1 + payload.length;
    if (length > MAX_FRAME_BODY) {
      throw new FrameError(`Frame body of ${length} bytes exceeds ${MAX_FRAME_BODY}`);
    }

    const header = Buffer.alloc(HEADER_SIZE + 1);
    header.writeUInt8(marker, 0);
    header.writeUInt16LE(length, 1);
    header.writeUInt8(code, 3);

    return Buffer.concat([header, payload]);
  }

  /**
   * Decodes the frame at the head of `buffer`. Returns null until the whole
   * frame is present; throws FrameError when the head cannot be a frame.
   */
  static decode(buffer: Buffer, marker: number = DEVICE_MARKER): { frame: Frame; consumed: number } | null {
    if (buffer.length === 0) return null;

    const start = buffer.readUInt8(0);
    if (start !== marker) {
      throw new FrameError(`Unexpected start byte 0x${start.toString(16).padStart(2, '0')}`);
    }
    if (buffer.length < HEADER_SIZE) return null;

    const length = buffer.readUInt16LE(1);
    if (length === 0 || length > MAX_FRAME_BODY) {
      throw new FrameError(`Declared frame length ${length} outside 1..${MAX_FRAME_BODY}`);
    }

    const consumed = HEADER_SIZE + length;
    if (buffer.length < consumed) {
      return null; // Not enough data
    }

    const code = buffer.readUInt8(HEADER_SIZE);
    if (!isKnownCode(code, marker)) {
      throw new FrameError(`Unknown frame code ${code}`, consumed);
    }

    return {
      frame: { code, payload: Buffer.from(buffer.subarray(HEADER_SIZE + 1, consumed)) },
      consumed,
    };
  }
}

/**
 * Incremental decoder. Holds the bytes of a trailing partial frame between
 * pushes; stops at the first malformed header and leaves recovery to the caller.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  private pendingSkip = 0;

  constructor(private readonly marker: number = DEVICE_MARKER) {}

  get buffered(): number {
    return this.buffer.length;
  }

  push(chunk: Uint8Array = Buffer.alloc(0)): DecodeResult {
    if (chunk.length > 0) {
      this.buffer = Buffer.concat([this.buffer, chunk]);
    }

    const frames: Frame[] = [];
    while (true) {
      let result: { frame: Frame; consumed: number } | null;
      try {
        result = Protocol.decode(this.buffer, this.marker);
      } catch (err) {
        if (!(err instanceof FrameError)) throw err;
        this.pendingSkip = err.skip;
        return { frames, error: err };
      }
      if (!result) break;

      frames.push(result.frame);
      this.buffer = this.buffer.subarray(result.consumed);
    }
    return { frames };
  }

  /** Drops the malformed bytes and everything up to the next start marker. */
  resync(): void {
    const offset = Math.min(Math.max(1, this.pendingSkip), this.buffer.length);
    const next = this.buffer.indexOf(this.marker, offset);
    this.buffer = next === -1 ? Buffer.alloc(0) : this.buffer.subarray(next);
    this.pendingSkip = 0;
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
    this.pendingSkip = 0;
  }
}

// ---------------------------------------------------------------------------
// Command bodies
// ---------------------------------------------------------------------------

export interface RadioParams {
  bandwidthKhz: number;
  spreadingFactor: number;
  codingRate: number;
}

export interface RadioSettings extends RadioParams {
  frequencyMhz: number;
}

export interface DeviceInfo {
  firmwareVersion: number;
  buildDate?: string;
  model?: string;
  version?: string;
}

export interface RadioStats {
  noiseFloor: number;
  lastRssi?: number;
  lastSnr?: number;
  txAirTimeS?: number;
  rxAirTimeS?: number;
}

export const SET_RADIO_PARAMS_SIZE = 10;

export function buildDeviceQuery(): Buffer {
  return Buffer.from([PROTOCOL_VERSION]);
}

export function buildAppStart(appName: string): Buffer {
  return Buffer.concat([Buffer.from([PROTOCOL_VERSION, 0, 0, 0, 0, 0, 0]), Buffer.from(appName, 'utf8')]);
}

export function buildSetRadioParams(settings: RadioSettings): Buffer {
  const body = Buffer.alloc(SET_RADIO_PARAMS_SIZE);
  body.writeUInt32LE(Math.round(settings.frequencyMhz * 1000), 0);
  body.writeUInt32LE(Math.round(settings.bandwidthKhz * 1000), 4);
  body.writeInt8(settings.spreadingFactor, 8);
  body.writeInt8(settings.codingRate, 9);
  return body;
}

export function parseSetRadioParams(payload: Buffer): RadioSettings {
  if (payload.length < SET_RADIO_PARAMS_SIZE) {
    throw new FrameError(`SET_RADIO_PARAMS body too short (${payload.length} bytes)`);
  }
  return {
    frequencyMhz: payload.readUInt32LE(0) / 1000,
    bandwidthKhz: payload.readUInt32LE(4) / 1000,
    spreadingFactor: payload.readInt8(8),
    codingRate: payload.readInt8(9),
  };
}

/**
 * GET_STATS body variants seen across firmware builds, in probing order.
 * The first one is what current firmware expects.
 */
export const STATS_REQUEST_SHAPES: readonly Buffer[] = [
  Buffer.from([STATS_TYPE_RADIO]),
  Buffer.from([PROTOCOL_VERSION, STATS_TYPE_RADIO]),
  Buffer.from([PROTOCOL_VERSION, STATS_TYPE_RADIO, 0]),
  Buffer.from([PROTOCOL_VERSION, STATS_TYPE_RADIO, 0, 0]),
  Buffer.from([STATS_TYPE_RADIO, 0]),
  Buffer.from([STATS_TYPE_RADIO, 0, 0]),
];

export function buildRadioStats(stats: RadioStats): Buffer {
  const body = Buffer.alloc(13);
  body.writeUInt8(STATS_TYPE_RADIO, 0);
  body.writeInt16LE(stats.noiseFloor, 1);
  body.writeInt8(stats.lastRssi ?? 0, 3);
  body.writeInt8(Math.round((stats.lastSnr ?? 0) * 4), 4);
  body.writeUInt32LE(stats.txAirTimeS ?? 0, 5);
  body.writeUInt32LE(stats.rxAirTimeS ?? 0, 9);
  return body;
}

export function parseRadioStats(payload: Buffer): RadioStats {
  if (payload.length < 3) {
    throw new ProtocolError(`STATS response too short (${payload.length} bytes)`, null);
  }
  const stats: RadioStats = { noiseFloor: payload.readInt16LE(1) };
  if (payload.length >= 5) {
    stats.lastRssi = payload.readInt8(3);
    stats.lastSnr = payload.readInt8(4) / 4;
  }
  if (payload.length >= 13) {
    stats.txAirTimeS = payload.readUInt32LE(5);
    stats.rxAirTimeS = payload.readUInt32LE(9);
  }
  return stats;
}

// DEVICE_INFO layout: fw(1) contacts/2(1) channels(1) pin(4) date(12) model(40) version(20)
const BUILD_DATE_OFFSET = 7;
const MODEL_OFFSET = 19;
const VERSION_OFFSET = 59;
const DEVICE_INFO_SIZE = 79;

function readCString(buffer: Buffer, start: number, length: number): string | undefined {
  if (buffer.length < start + length) return undefined;
  const field = buffer.subarray(start, start + length);
  const end = field.indexOf(0);
  const text = field.toString('utf8', 0, end === -1 ? field.length : end).trim();
  return text.length > 0 ? text : undefined;
}

export function buildDeviceInfo(info: DeviceInfo): Buffer {
  const body = Buffer.alloc(DEVICE_INFO_SIZE);
  body.writeUInt8(info.firmwareVersion, 0);
  body.write(info.buildDate ?? '', BUILD_DATE_OFFSET, 12, 'utf8');
  body.write(info.model ?? '', MODEL_OFFSET, 40, 'utf8');
  body.write(info.version ?? '', VERSION_OFFSET, 20, 'utf8');
  return body;
}

export function parseDeviceInfo(payload: Buffer): DeviceInfo {
  const info: DeviceInfo = { firmwareVersion: payload.length > 0 ? payload.readUInt8(0) : 0 };
  const buildDate = readCString(payload, BUILD_DATE_OFFSET, 12);
  const model = readCString(payload, MODEL_OFFSET, 40);
  const version = readCString(payload, VERSION_OFFSET, 20);
  if (buildDate) info.buildDate = buildDate;
  if (model) info.model = model;
  if (version) info.version = version;
  return info;
}

export function parseErrorCode(payload: Buffer): number | null {
  return payload.length > 0 ? payload.readUInt8(0) : null;
}
