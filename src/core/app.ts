import type { Plugin } from "./plugin";
import type { Logger } from "../domains/observability/types";
import { rootLogger } from "../domains/observability/logger";

export class Application {
  private plugins: Map<string, Plugin> = new Map();
  private started: Plugin[] = [];
  private logger: Logger;

  constructor(logger: Logger = rootLogger) {
    this.logger = logger.child({ component: "Core" });
  }

  async use(plugin: Plugin) {
    if (this.plugins.has(plugin.name)) {
      throw new Error(`Plugin ${plugin.name} is already registered.`);
    }
    if (plugin.setup) {
      await plugin.setup();
    }
    this.plugins.set(plugin.name, plugin);
    this.logger.debug(`Plugin registered: ${plugin.name}`);
    return this;
  }

  async start() {
    this.logger.debug("Application starting...");
    for (const plugin of this.plugins.values()) {
      this.started.push(plugin);
      if (plugin.start) {
        await plugin.start();
      }
    }
    this.logger.debug("Application started successfully.");
  }

  /**
   * Stops started plugins in reverse order. Every plugin gets its stop() call
   * even if an earlier one throws; the first error is rethrown afterwards.
   */
  async stop() {
    this.logger.debug("Application stopping...");
    let firstError: unknown = null;
    const plugins = this.started.length > 0 ? this.started : Array.from(this.plugins.values());
    for (const plugin of [...plugins].reverse()) {
      if (!plugin.stop) continue;
      try {
        await plugin.stop();
      } catch (err) {
        this.logger.error(`Plugin ${plugin.name} failed to stop`, err);
        firstError ??= err;
      }
    }
    this.started = [];
    this.logger.debug("Application stopped.");
    if (firstError !== null) throw firstError;
  }
}
