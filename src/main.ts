import { Application } from "./core/app";
import { ConfigError, parseCli } from "./domains/config/cli";
import { CompanionPlugin } from "./domains/companion/companion.plugin";
import { ScanPlugin } from "./domains/scan/scan.plugin";
import { createLogger } from "./domains/observability/logger";

// Exit codes: 1 = scan failed, 2 = bad command line
export async function bootstrap(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let cli: ReturnType<typeof parseCli>;
  try {
    cli = parseCli(argv, env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`${error.message}\n\n${error.usage}`);
      return 2;
    }
    throw error;
  }

  if (cli.kind === "help") {
    console.log(cli.usage);
    return 0;
  }

  const { config } = cli;
  const logger = createLogger({ component: "NoiseFloor", level: config.debug ? "debug" : undefined });
  const app = new Application(logger);

  const companion = new CompanionPlugin(config, logger);
  const scan = new ScanPlugin(companion, config, logger);

  // Handle graceful shutdown
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn(`Received ${signal}, stopping after the current frequency`);
    scan.cancel();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    await app.use(companion);
    await app.use(scan);
    await app.start();
    return 0;
  } catch (error) {
    const step = scan.failedStep ?? "setup";
    logger.error(`Scan aborted during ${step}`, error);
    return 1;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    try {
      await app.stop();
    } catch (error) {
      logger.error("Failed to shut down cleanly", error);
    }
  }
}
