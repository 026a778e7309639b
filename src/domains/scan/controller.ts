import mitt, { type Emitter } from 'mitt';
import { ProtocolError, TimeoutError } from '../companion/errors';
import type { DeviceInfo, RadioParams } from '../companion/protocol';
import type { Logger } from '../observability/types';
import { rootLogger } from '../observability/logger';
import { systemClock, type Clock } from './clock';
import { frequencyPlan, type SweepRange } from './plan';
import { StatsAggregator } from './stats';

export type ScanState =
  | 'idle'
  | 'handshaking'
  | 'setting-params'
  | 'dwelling'
  | 'emitting'
  | 'finished'
  | 'failed';

export interface FrequencyRecord {
  readonly frequencyMhz: number;
  readonly samples: number;
  readonly average: number;
  readonly min: number;
  readonly max: number;
  readonly stdev: number;
}

export interface ScanSettings {
  sweep: SweepRange;
  radio: RadioParams;
  dwellMs: number;
  sampleIntervalMs: number;
  settleMs: number;
  maxConsecutiveFailures?: number;
}

/** The slice of CompanionClient the controller drives. */
export interface NoiseFloorDevice {
  connect(): Promise<void>;
  handshake(): Promise<DeviceInfo>;
  setRadioParams(frequencyMhz: number, params: RadioParams): Promise<void>;
  getNoiseFloor(): Promise<number>;
  close(): Promise<void>;
}

export interface RecordSink {
  append(record: FrequencyRecord): Promise<void>;
}

export interface ChartRenderer {
  render(records: readonly FrequencyRecord[]): Promise<void>;
}

export interface ScanProgress {
  index: number;
  total: number;
  frequencyMhz: number;
}

export interface ScanWarning {
  message: string;
  frequencyMhz?: number;
  error?: unknown;
}

export interface ScanSummary {
  state: ScanState;
  records: readonly FrequencyRecord[];
  skipped: readonly number[];
  stopped: boolean;
}

type ScanEvents = {
  state: { from: ScanState; to: ScanState };
  progress: ScanProgress;
  record: FrequencyRecord;
  warning: ScanWarning;
};

export interface ScanControllerDeps {
  sink: RecordSink;
  renderer?: ChartRenderer;
  clock?: Clock;
  logger?: Logger;
}

export const DEFAULT_MAX_CONSECUTIVE_FAILURES = 3;

export class ConsecutiveFailuresError extends Error {
  constructor(readonly failures: number, options?: { cause?: unknown }) {
    super(`${failures} consecutive frequencies failed, device appears to be offline`, options);
    this.name = 'ConsecutiveFailuresError';
  }
}

/** Errors the scan survives at single-frequency granularity. */
function isRecoverable(err: unknown): err is ProtocolError | TimeoutError {
  return err instanceof ProtocolError || err instanceof TimeoutError;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Drives one noise-floor sweep: handshake, then for every frequency retune,
 * settle, dwell-sample and emit a record. Records reach the sink before the
 * next frequency starts.
 */
export class ScanController {
  public readonly events: Emitter<ScanEvents> = mitt<ScanEvents>();

  private current: ScanState = 'idle';
  private failedIn: ScanState | null = null;
  private stopRequested = false;
  private consecutiveFailures = 0;
  private readonly records: FrequencyRecord[] = [];
  private readonly skipped: number[] = [];
  private readonly aggregator = new StatsAggregator();

  private readonly sink: RecordSink;
  private readonly renderer?: ChartRenderer;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly maxFailures: number;

  constructor(
    private readonly device: NoiseFloorDevice,
    private readonly settings: ScanSettings,
    deps: ScanControllerDeps,
  ) {
    this.sink = deps.sink;
    this.renderer = deps.renderer;
    this.clock = deps.clock ?? systemClock;
    this.logger = (deps.logger ?? rootLogger).child({ component: 'Scan' });
    this.maxFailures = Math.max(1, settings.maxConsecutiveFailures ?? DEFAULT_MAX_CONSECUTIVE_FAILURES);
  }

  get state(): ScanState {
    return this.current;
  }

  /** The state the scan was in when it failed, if it did. */
  get failedStep(): ScanState | null {
    return this.failedIn;
  }

  /** Graceful cancel: takes effect before the next frequency starts. */
  stop(): void {
    if (!this.stopRequested) {
      this.stopRequested = true;
      this.logger.info('Stop requested, finishing after the current frequency');
    }
  }

  async run(): Promise<ScanSummary> {
    if (this.current !== 'idle') {
      throw new Error(`Scan already ran (state: ${this.current})`);
    }

    const frequencies = Array.from(frequencyPlan(this.settings.sweep));
    try {
      this.transition('handshaking');
      await this.device.connect();
      await this.device.handshake();

      for (let i = 0; i < frequencies.length; i++) {
        if (this.stopRequested) break;
        const frequencyMhz = frequencies[i];
        this.events.emit('progress', { index: i + 1, total: frequencies.length, frequencyMhz });
        await this.measure(frequencyMhz);
      }

      this.transition('finished');
    } catch (err) {
      this.failedIn = this.current;
      this.transition('failed');
      this.logger.error(`Scan failed while ${this.failedIn}`, err);
      throw err;
    } finally {
      await this.device.close();
    }

    await this.render();
    return {
      state: this.current,
      records: [...this.records],
      skipped: [...this.skipped],
      stopped: this.stopRequested,
    };
  }

  private async measure(frequencyMhz: number) {
    this.transition('setting-params');
    try {
      await this.device.setRadioParams(frequencyMhz, this.settings.radio);
    } catch (err) {
      if (!isRecoverable(err)) throw err;
      this.warn(`Skipping ${frequencyMhz} MHz: radio params not applied (${describeError(err)})`, frequencyMhz, err);
      this.skipped.push(frequencyMhz);
      this.noteFailure(err);
      return;
    }
    await this.clock.sleep(this.settings.settleMs);

    this.transition('dwelling');
    this.aggregator.reset();
    const dwellEnd = this.clock.now() + this.settings.dwellMs;
    let aborted = false;

    while (this.clock.now() < dwellEnd) {
      try {
        this.aggregator.observe(await this.device.getNoiseFloor());
      } catch (err) {
        if (!isRecoverable(err)) throw err;
        this.warn(`Dwell at ${frequencyMhz} MHz aborted: ${describeError(err)}`, frequencyMhz, err);
        aborted = true;
        break;
      }
      await this.clock.sleep(this.settings.sampleIntervalMs);
    }

    this.transition('emitting');
    const stats = this.aggregator.finalize();
    const record: FrequencyRecord = Object.freeze({
      frequencyMhz,
      samples: stats.count,
      average: stats.average,
      min: stats.min,
      max: stats.max,
      stdev: stats.stdev,
    });
    this.records.push(record);
    this.events.emit('record', record);

    try {
      await this.sink.append(record);
    } catch (err) {
      this.warn(`Failed to persist record for ${frequencyMhz} MHz: ${describeError(err)}`, frequencyMhz, err);
    }

    if (aborted && stats.count === 0) {
      this.noteFailure();
    } else {
      this.consecutiveFailures = 0;
    }
  }

  private noteFailure(cause?: unknown) {
    this.consecutiveFailures++;
    if (this.consecutiveFailures >= this.maxFailures) {
      throw new ConsecutiveFailuresError(this.consecutiveFailures, { cause });
    }
  }

  private async render() {
    if (!this.renderer) return;
    try {
      await this.renderer.render([...this.records]);
    } catch (err) {
      this.warn(`Chart rendering failed: ${describeError(err)}`, undefined, err);
    }
  }

  private warn(message: string, frequencyMhz?: number, error?: unknown) {
    this.logger.warn(message, frequencyMhz === undefined ? {} : { frequencyMhz });
    this.events.emit('warning', { message, frequencyMhz, error });
  }

  private transition(to: ScanState) {
    const from = this.current;
    if (from === to) return;
    this.current = to;
    this.logger.debug(`State ${from} -> ${to}`);
    this.events.emit('state', { from, to });
  }
}
