/**
 * Error taxonomy shared by the transports, the framer and the companion client.
 * The scan controller decides what is fatal by class, so keep these distinct.
 */
export class CompanionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Transport unreachable, refused, missing or lost. */
export class ConnectionError extends CompanionError {}

export class WriteError extends CompanionError {}

/** Operation attempted after close(), or interrupted by it. */
export class ClosedError extends CompanionError {}

/** A second request was issued while one is still outstanding. */
export class BusyError extends CompanionError {}

export class FrameError extends CompanionError {
  /** Bytes a resync has to drop before searching for the next start marker. */
  readonly skip: number;

  constructor(message: string, skip = 1) {
    super(message);
    this.skip = skip;
  }
}

/** The device answered with an explicit error response. */
export class ProtocolError extends CompanionError {
  readonly deviceCode: number | null;

  constructor(message: string, deviceCode: number | null, options?: { cause?: unknown }) {
    super(message, options);
    this.deviceCode = deviceCode;
  }
}

export class TimeoutError extends CompanionError {
  readonly attempts: number;

  constructor(message: string, attempts: number) {
    super(message);
    this.attempts = attempts;
  }
}

export type HandshakeStep = 'device-query' | 'app-start' | 'pending';

export class HandshakeError extends CompanionError {
  readonly step: HandshakeStep;

  constructor(step: HandshakeStep, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.step = step;
  }
}
