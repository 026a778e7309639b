import type { Plugin } from "../../core/plugin";
import type { ScanConfig } from "../config/cli";
import { createTransport } from "../device/manager";
import type { Logger } from "../observability/types";
import { CompanionClient } from "./client";
import { describeCode, type Frame } from "./protocol";

/**
 * Owns the companion link for the lifetime of the application.
 */
export class CompanionPlugin implements Plugin {
  readonly name = "companion";
  private companion?: CompanionClient;

  constructor(
    private readonly config: ScanConfig,
    private readonly logger: Logger,
  ) {}

  get client(): CompanionClient {
    if (!this.companion) {
      throw new Error("CompanionPlugin has not been set up");
    }
    return this.companion;
  }

  setup(): void {
    const transport = createTransport(this.config.transport, this.logger);
    this.companion = new CompanionClient(transport, {
      timeoutMs: this.config.timeoutMs,
      debug: this.config.debug,
      logger: this.logger,
    });
    this.companion.events.on("push", (frame: Frame) => {
      this.logger.debug(`Unsolicited push ${describeCode(frame.code)}`, { length: frame.payload.length });
    });
  }

  async stop(): Promise<void> {
    await this.companion?.close();
  }
}
