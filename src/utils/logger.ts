import pino from "pino";
import { getConfig, type Config } from "../config";

let _logger: pino.Logger | null = null;

/**
 * Build a logger for the given logging settings.
 */
export function createLogger(
  config: Pick<Config, "logLevel" | "logFormat">
): pino.Logger {
  return pino({
    level: config.logLevel,
    transport:
      config.logFormat === "pretty"
        ? { target: "pino-pretty", options: { colorize: true } }
        : undefined,
  });
}

/**
 * Initialize the global logger from config.
 * Call once at startup after config is available.
 */
export function initLogger(config: Config = getConfig()): pino.Logger {
  _logger = createLogger(config);
  return _logger;
}

/**
 * Get the global logger instance (lazy-initialized if needed).
 */
export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = initLogger();
  }
  return _logger;
}
