import fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import type { FrequencyRecord, RecordSink } from '../scan/controller';

export const CSV_COLUMNS = [
  'freq_mhz',
  'samples',
  'noise_floor_avg',
  'noise_floor_min',
  'noise_floor_max',
  'noise_floor_stdev',
] as const;

function formatNumber(value: number): string {
  return Number.isFinite(value) ? String(value) : '';
}

export function formatCsvRow(record: FrequencyRecord): string {
  return [
    record.frequencyMhz,
    record.samples,
    record.average,
    record.min,
    record.max,
    record.stdev,
  ].map(formatNumber).join(',');
}

/**
 * Appends one line per record and fsyncs before resolving, so a crash loses
 * at most the frequency being measured.
 */
export class CsvRecordSink implements RecordSink {
  private constructor(
    readonly path: string,
    private handle: FileHandle | null,
  ) {}

  static async create(path: string): Promise<CsvRecordSink> {
    const handle = await fs.open(path, 'w');
    try {
      await handle.write(`${CSV_COLUMNS.join(',')}\n`);
      await handle.sync();
    } catch (err) {
      await handle.close();
      throw err;
    }
    return new CsvRecordSink(path, handle);
  }

  async append(record: FrequencyRecord): Promise<void> {
    if (!this.handle) {
      throw new Error(`CSV sink ${this.path} is closed`);
    }
    await this.handle.write(`${formatCsvRow(record)}\n`);
    await this.handle.sync();
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (handle) await handle.close();
  }
}
