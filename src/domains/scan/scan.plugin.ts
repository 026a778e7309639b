import type { Plugin } from "../../core/plugin";
import type { CompanionPlugin } from "../companion/companion.plugin";
import type { ScanConfig } from "../config/cli";
import type { Logger } from "../observability/types";
import { CsvRecordSink } from "../output/csv-sink";
import { SvgChartRenderer, chartPathFor } from "../output/chart";
import { ScanController, type ScanSummary } from "./controller";
import type { Clock } from "./clock";
import { frequencyPlan } from "./plan";

export function chartTitle(config: ScanConfig): { title: string; subtitle: string } {
  const { radio, sweep } = config;
  return {
    title: `Noise Floor vs Frequency - BW: ${Math.trunc(radio.bandwidthKhz)} SF: ${radio.spreadingFactor} CR: ${radio.codingRate}`,
    subtitle: `Freq: ${sweep.startMhz}-${sweep.endMhz} MHz Steps: ${sweep.stepMhz}`,
  };
}

/**
 * Runs the sweep when the application starts. Holds the CSV sink open from
 * setup until stop.
 */
export class ScanPlugin implements Plugin {
  readonly name = "scan";
  private sink?: CsvRecordSink;
  private controller?: ScanController;
  private result?: ScanSummary;

  constructor(
    private readonly companion: CompanionPlugin,
    private readonly config: ScanConfig,
    private readonly logger: Logger,
    private readonly clock?: Clock,
  ) {}

  get summary(): ScanSummary | undefined {
    return this.result;
  }

  get failedStep() {
    return this.controller?.failedStep ?? null;
  }

  async setup(): Promise<void> {
    const { config } = this;
    this.sink = await CsvRecordSink.create(config.outPath);

    const chartPath = chartPathFor(config.outPath);
    const renderer = new SvgChartRenderer(chartPath, chartTitle(config), this.logger);

    this.controller = new ScanController(this.companion.client, {
      sweep: config.sweep,
      radio: config.radio,
      dwellMs: config.dwellMs,
      sampleIntervalMs: config.sampleIntervalMs,
      settleMs: config.settleMs,
    }, { sink: this.sink, renderer, clock: this.clock, logger: this.logger });

    const total = Array.from(frequencyPlan(config.sweep)).length;
    this.logger.info(`Output CSV : ${config.outPath}`);
    this.logger.info(`Freq range : ${config.sweep.startMhz} -> ${config.sweep.endMhz} MHz (step ${config.sweep.stepMhz} MHz) | total ${total}`);
    this.logger.info(`Radio      : BW ${config.radio.bandwidthKhz} kHz | SF ${config.radio.spreadingFactor} | CR ${config.radio.codingRate}`);

    this.controller.events.on("progress", ({ index, total, frequencyMhz }) => {
      this.logger.info(`[${index}/${total}] Measuring ${frequencyMhz} MHz`);
    });
    this.controller.events.on("record", (record) => {
      this.logger.info(`    avg=${Number.isFinite(record.average) ? record.average.toFixed(2) : "n/a"} (${record.samples} samples)`);
    });
  }

  async start(): Promise<void> {
    if (!this.controller) {
      throw new Error("ScanPlugin has not been set up");
    }
    this.result = await this.controller.run();
    this.logger.info(this.result.stopped ? "Scan stopped." : "Scan complete.", {
      records: this.result.records.length,
      skipped: this.result.skipped.length,
    });
  }

  /** Graceful cancel; the sweep ends after the frequency being measured. */
  cancel(): void {
    this.controller?.stop();
  }

  async stop(): Promise<void> {
    this.controller?.stop();
    await this.sink?.close();
  }
}
