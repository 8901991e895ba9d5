import { MarqueeApp } from "./app.js";
import { ConfigError, loadConfig } from "./config/config.js";
import { Logger } from "./utils/logger.js";

async function main(): Promise<void> {
  const logger = new Logger("Main", true);

  let app: MarqueeApp;
  try {
    const config = loadConfig();
    logger.setEnabled(config.logConsole);
    app = new MarqueeApp(config);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  const shutdown = async (signal: string) => {
    logger.log(`Received ${signal}, shutting down...`);
    try {
      const result = await app.stop();
      if (result.abandoned > 0) {
        logger.warn(`${result.abandoned} stream(s) abandoned during shutdown`);
      }
    } catch (error) {
      logger.error("Error during shutdown:", error);
      process.exitCode = 1;
    } finally {
      Logger.closeFileStream();
    }
  };

  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));

  await app.start();
  logger.log(`Log file: ${Logger.getLogFilePath()}`);
}

main().catch((error: unknown) => {
  console.error("Failed to start:", error);
  Logger.closeFileStream();
  process.exit(1);
});
