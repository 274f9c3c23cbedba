import { createApp } from "./app";
import { loadConfigSafe, setConfig } from "./config";
import { initLogger } from "./utils/logger";

function main(): void {
  const { config, errors } = loadConfigSafe();
  if (!config) {
    // console.error is intentional: the logger level comes from the config
    console.error(`Invalid configuration:\n  ${errors.join("\n  ")}`);
    process.exit(1);
  }

  setConfig(config);
  const logger = initLogger(config);

  const app = createApp({ config, logger });
  const server = app.listen(config.port, config.host, () => {
    logger.info(
      {
        host: config.host,
        port: config.port,
        algorithm: config.rateLimitAlgorithm,
      },
      "Server listening"
    );
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Shutting down");
    server.close((err) => {
      if (err) {
        logger.error({ err }, "Error while closing server");
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main();
