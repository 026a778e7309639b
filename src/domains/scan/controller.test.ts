import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  ConsecutiveFailuresError,
  ScanController,
  type ChartRenderer,
  type FrequencyRecord,
  type NoiseFloorDevice,
  type RecordSink,
  type ScanSettings,
  type ScanState,
  type ScanWarning,
} from './controller';
import type { Clock } from './clock';
import { CompanionClient } from '../companion/client';
import { CommandCode } from '../companion/protocol';
import { ConnectionError, ProtocolError, TimeoutError } from '../companion/errors';
import { MockCompanionTransport, type MockCompanionOptions } from '../device/drivers/mock-companion';
import { CsvRecordSink } from '../output/csv-sink';
import { ConsoleLogger } from '../observability/logger';

const logger = new ConsoleLogger({ level: 'error' });

/** Time only moves when the scan sleeps. */
class FakeClock implements Clock {
  private t = 1_000_000;
  readonly sleeps: number[] = [];

  now(): number {
    return this.t;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.t += ms;
  }
}

class MemorySink implements RecordSink {
  readonly records: FrequencyRecord[] = [];
  failOn: number | null = null;

  async append(record: FrequencyRecord): Promise<void> {
    if (record.frequencyMhz === this.failOn) throw new Error('disk full');
    this.records.push(record);
  }
}

class MemoryRenderer implements ChartRenderer {
  rendered: FrequencyRecord[] | null = null;

  async render(records: readonly FrequencyRecord[]): Promise<void> {
    this.rendered = [...records];
  }
}

const settings: ScanSettings = {
  sweep: { startMhz: 915, endMhz: 915.25, stepMhz: 0.125 },
  radio: { bandwidthKhz: 250, spreadingFactor: 10, codingRate: 5 },
  dwellMs: 15_000,
  sampleIntervalMs: 5_000,
  settleMs: 2_000,
};

const SAMPLES = [-110, -108, -112];

function mockClient(options: MockCompanionOptions = {}) {
  const transport = new MockCompanionTransport({ noise: (_radio, index) => SAMPLES[index % SAMPLES.length], ...options });
  const client = new CompanionClient(transport, { timeoutMs: 20, handshakeTimeoutMs: 20, logger });
  return { transport, client };
}

function statsErrorAt(...frequencies: number[]): MockCompanionOptions['script'] {
  return (req, device) =>
    req.code === CommandCode.GET_STATS && device.radio !== null && frequencies.includes(device.radio.frequencyMhz)
      ? { kind: 'error', code: 1 }
      : undefined;
}

describe('ScanController', () => {
  let clock: FakeClock;
  let sink: MemorySink;
  let renderer: MemoryRenderer;

  beforeEach(() => {
    clock = new FakeClock();
    sink = new MemorySink();
    renderer = new MemoryRenderer();
  });

  it('measures every frequency and emits one record each, in order', async () => {
    const { transport, client } = mockClient();
    const controller = new ScanController(client, settings, { sink, renderer, clock, logger });

    const summary = await controller.run();

    expect(summary.state).toBe('finished');
    expect(summary.stopped).toBe(false);
    expect(summary.skipped).toEqual([]);
    expect(sink.records.map((r) => r.frequencyMhz)).toEqual([915, 915.125, 915.25]);
    for (const record of sink.records) {
      expect(record.samples).toBe(3);
      expect(record.average).toBe(-110);
      expect(record.min).toBe(-112);
      expect(record.max).toBe(-108);
      expect(record.stdev).toBeCloseTo(1.63299, 5);
    }
    expect(renderer.rendered).toEqual(sink.records);
    expect(transport.isOpen).toBe(false);
  });

  it('settles after retuning and samples at fixed intervals until the dwell ends', async () => {
    const { client } = mockClient();
    const controller = new ScanController(client, { ...settings, sweep: { startMhz: 915, endMhz: 915, stepMhz: 1 } }, {
      sink,
      clock,
      logger,
    });

    await controller.run();

    expect(clock.sleeps).toEqual([2_000, 5_000, 5_000, 5_000]);
  });

  it('walks the state machine', async () => {
    const { client } = mockClient();
    const controller = new ScanController(client, { ...settings, sweep: { startMhz: 915, endMhz: 915, stepMhz: 1 } }, {
      sink,
      clock,
      logger,
    });
    const states: ScanState[] = [];
    controller.events.on('state', ({ to }) => states.push(to));

    await controller.run();

    expect(states).toEqual(['handshaking', 'setting-params', 'dwelling', 'emitting', 'finished']);
    expect(controller.state).toBe('finished');
    expect(controller.failedStep).toBeNull();
  });

  it('reports progress before each frequency', async () => {
    const { client } = mockClient();
    const controller = new ScanController(client, settings, { sink, clock, logger });
    const progress: string[] = [];
    controller.events.on('progress', (p) => progress.push(`${p.index}/${p.total}@${p.frequencyMhz}`));

    await controller.run();

    expect(progress).toEqual(['1/3@915', '2/3@915.125', '3/3@915.25']);
  });

  it('writes a zero-sample record when the device rejects GET_STATS and moves on', async () => {
    const { client } = mockClient({ script: statsErrorAt(915.125) });
    const controller = new ScanController(client, settings, { sink, renderer, clock, logger });
    const warnings: ScanWarning[] = [];
    controller.events.on('warning', (w) => warnings.push(w));

    const summary = await controller.run();

    expect(summary.state).toBe('finished');
    expect(sink.records.map((r) => r.samples)).toEqual([3, 0, 3]);
    const failed = sink.records[1];
    expect(failed.frequencyMhz).toBe(915.125);
    expect(failed.average).toBeNaN();
    expect(failed.stdev).toBeNaN();
    expect(warnings).toHaveLength(1);
    expect(warnings[0].frequencyMhz).toBe(915.125);
    expect(warnings[0].error).toBeInstanceOf(ProtocolError);
    expect(renderer.rendered?.map((r) => r.frequencyMhz)).toEqual([915, 915.125, 915.25]);
  });

  it('keeps samples gathered before a dwell is aborted', async () => {
    // The device goes quiet after the first sample at 915 MHz.
    const { client } = mockClient({
      script: (req, device) =>
        req.code === CommandCode.GET_STATS && device.radio?.frequencyMhz === 915 && device.sampleIndex >= 1
          ? { kind: 'silent' }
          : undefined,
    });
    const controller = new ScanController(client, { ...settings, sweep: { startMhz: 915, endMhz: 915.125, stepMhz: 0.125 } }, {
      sink,
      clock,
      logger,
    });
    const warnings: ScanWarning[] = [];
    controller.events.on('warning', (w) => warnings.push(w));

    await controller.run();

    expect(sink.records.map((r) => r.samples)).toEqual([1, 3]);
    expect(sink.records[0].average).toBe(-110);
    expect(warnings[0].error).toBeInstanceOf(TimeoutError);
  });

  it('skips a frequency whose radio params are rejected', async () => {
    const { client } = mockClient({
      script: (req, device) =>
        req.code === CommandCode.SET_RADIO_PARAMS && device.requests.filter((r) => r.code === CommandCode.SET_RADIO_PARAMS).length === 2
          ? { kind: 'error', code: 2 }
          : undefined,
    });
    const controller = new ScanController(client, settings, { sink, clock, logger });

    const summary = await controller.run();

    expect(summary.skipped).toEqual([915.125]);
    expect(sink.records.map((r) => r.frequencyMhz)).toEqual([915, 915.25]);
  });

  it('gives up after consecutive failed frequencies', async () => {
    const { transport, client } = mockClient({ script: statsErrorAt(915.125, 915.25, 915.375) });
    const controller = new ScanController(client, { ...settings, sweep: { startMhz: 915, endMhz: 915.5, stepMhz: 0.125 } }, {
      sink,
      renderer,
      clock,
      logger,
    });

    const err = await controller.run().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConsecutiveFailuresError);
    expect(err).toMatchObject({ failures: 3 });
    expect(controller.state).toBe('failed');
    expect(sink.records.map((r) => r.samples)).toEqual([3, 0, 0, 0]);
    expect(renderer.rendered).toBeNull();
    expect(transport.isOpen).toBe(false);
  });

  it('resets the failure count after a good frequency', async () => {
    const { client } = mockClient({ script: statsErrorAt(915, 915.125, 915.375, 915.5) });
    const controller = new ScanController(client, { ...settings, sweep: { startMhz: 915, endMhz: 915.5, stepMhz: 0.125 } }, {
      sink,
      clock,
      logger,
    });

    const summary = await controller.run();

    expect(summary.state).toBe('finished');
    expect(sink.records.map((r) => r.samples)).toEqual([0, 0, 3, 0, 0]);
  });

  it('treats a persistence failure as a warning', async () => {
    sink.failOn = 915.125;
    const { client } = mockClient();
    const controller = new ScanController(client, settings, { sink, renderer, clock, logger });
    const warnings: ScanWarning[] = [];
    controller.events.on('warning', (w) => warnings.push(w));

    const summary = await controller.run();

    expect(summary.records).toHaveLength(3);
    expect(sink.records.map((r) => r.frequencyMhz)).toEqual([915, 915.25]);
    expect(warnings.map((w) => w.message)).toEqual(['Failed to persist record for 915.125 MHz: disk full']);
  });

  it('finishes immediately on an empty sweep', async () => {
    const { transport, client } = mockClient();
    const controller = new ScanController(client, { ...settings, sweep: { startMhz: 928, endMhz: 915, stepMhz: 0.125 } }, {
      sink,
      renderer,
      clock,
      logger,
    });

    const summary = await controller.run();

    expect(summary.state).toBe('finished');
    expect(summary.records).toEqual([]);
    expect(renderer.rendered).toEqual([]);
    expect(transport.requests.map((r) => r.code)).toEqual([CommandCode.DEVICE_QUERY, CommandCode.APP_START]);
  });

  it('stops gracefully after the current frequency', async () => {
    const { client } = mockClient();
    const controller = new ScanController(client, settings, { sink, renderer, clock, logger });
    controller.events.on('record', () => controller.stop());

    const summary = await controller.run();

    expect(summary.state).toBe('finished');
    expect(summary.stopped).toBe(true);
    expect(sink.records.map((r) => r.frequencyMhz)).toEqual([915]);
    expect(renderer.rendered).toHaveLength(1);
  });

  it('fails in the handshaking state when the device never answers', async () => {
    const { transport, client } = mockClient({ script: () => ({ kind: 'silent' }) });
    const controller = new ScanController(client, settings, { sink, clock, logger });

    await expect(controller.run()).rejects.toThrow(/Handshake failed at device-query/);
    expect(controller.failedStep).toBe('handshaking');
    expect(sink.records).toEqual([]);
    expect(transport.isOpen).toBe(false);
  });

  it('refuses to run twice', async () => {
    const { client } = mockClient();
    const controller = new ScanController(client, { ...settings, sweep: { startMhz: 915, endMhz: 915, stepMhz: 1 } }, {
      sink,
      clock,
      logger,
    });
    await controller.run();

    await expect(controller.run()).rejects.toThrow(/already ran/);
  });

  it('closes the device even when it fails mid-dwell', async () => {
    let closed = 0;
    const device: NoiseFloorDevice = {
      connect: async () => {},
      handshake: async () => ({ firmwareVersion: 7 }),
      setRadioParams: async () => {},
      getNoiseFloor: async () => {
        throw new RangeError('unexpected');
      },
      close: async () => {
        closed++;
      },
    };
    const controller = new ScanController(device, settings, { sink, clock, logger });

    await expect(controller.run()).rejects.toThrow(RangeError);
    expect(controller.failedStep).toBe('dwelling');
    expect(closed).toBe(1);
  });

  describe('durability', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'noisefloor-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('keeps every finished record on disk when the link drops mid-scan', async () => {
      const csvPath = path.join(dir, 'scan.csv');
      const csv = await CsvRecordSink.create(csvPath);
      const { client } = mockClient({
        script: (req, device) =>
          req.code === CommandCode.SET_RADIO_PARAMS && device.requests.filter((r) => r.code === CommandCode.SET_RADIO_PARAMS).length === 3
            ? { kind: 'hangup' }
            : undefined,
      });
      const controller = new ScanController(client, settings, { sink: csv, clock, logger });

      await expect(controller.run()).rejects.toThrow(ConnectionError);
      expect(controller.failedStep).toBe('setting-params');

      // Read before closing the sink: appends must already be durable.
      const lines = (await fs.readFile(csvPath, 'utf8')).trimEnd().split('\n');
      await csv.close();

      expect(lines).toHaveLength(3);
      expect(lines[0]).toBe('freq_mhz,samples,noise_floor_avg,noise_floor_min,noise_floor_max,noise_floor_stdev');
      expect(lines[1]).toMatch(/^915,3,-110,-112,-108,1\.63299/);
      expect(lines[2]).toMatch(/^915\.125,3,-110,-112,-108,1\.63299/);
    });
  });
});
