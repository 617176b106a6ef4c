import fs from "node:fs";
import type { Server } from "node:http";
import path from "node:path";
import { LockedError, normalizeError } from "../../../packages/core/src/index";
import { IN_MEMORY_DB_PATH, SQLiteVaultRepository } from "../../../packages/storage/src/index";
import { loadConfig } from "./config";
import { createApp, listen } from "./http/register";
import { configureLogger, logger } from "./logger";
import { createTerminalPrompt } from "./prompt";
import { openVault, type VaultContext } from "./services/container";

/** Exit code after master password verification runs out of attempts. */
const LOCKED_EXIT_CODE = 2;

const main = async (): Promise<void> => {
  const config = loadConfig(process.env);
  configureLogger(config);

  if (config.dbPath !== IN_MEMORY_DB_PATH) {
    fs.mkdirSync(path.dirname(path.resolve(config.dbPath)), { recursive: true });
  }
  const repository = new SQLiteVaultRepository(config.dbPath);
  logger.info("[Startup] database ready", { path: repository.getDbPath() });

  const prompt = createTerminalPrompt();
  let context: VaultContext;
  try {
    context = await openVault({ repository, prompt });
  } catch (error) {
    repository.close();
    if (error instanceof LockedError) {
      prompt.notify("Too many wrong master passwords. Exiting.");
      logger.error("[Startup] vault locked", { attempts: error.attempts });
      process.exitCode = LOCKED_EXIT_CODE;
      return;
    }
    throw error;
  } finally {
    prompt.close();
  }

  const app = createApp(context.vault, { staticDir: config.staticDir });
  let server: Server;
  try {
    server = await listen(app, config.port, config.host);
  } catch (error) {
    context.repository.close();
    throw error;
  }
  logger.info(`[Startup] listening on http://${config.host}:${config.port}`);

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info(`[Startup] ${signal} received, shutting down`);
    server.close((error) => {
      if (error) {
        logger.warn("[Startup] server close failed", { reason: normalizeError(error) });
      }
      context.repository.close();
    });
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
};

main().catch((error: unknown) => {
  logger.error("[Startup] failed", { reason: normalizeError(error) });
  process.exitCode = 1;
});
