import path from "node:path";
import log from "electron-log/node.js";
import type { AppConfig } from "./config";

// Errors only until the entry point applies the configuration.
log.transports.console.level = "error";
log.transports.file.level = false;

export const configureLogger = (config: Pick<AppConfig, "logLevel" | "logFile">): void => {
  log.transports.console.level = config.logLevel;

  if (config.logFile) {
    const logFile = path.resolve(config.logFile);
    log.transports.file.resolvePathFn = () => logFile;
    log.transports.file.maxSize = 5 * 1024 * 1024;
    log.transports.file.level = config.logLevel;
  }
};

export const logger = log;
