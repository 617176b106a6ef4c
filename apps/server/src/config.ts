import { fileURLToPath } from "node:url";
import { z } from "zod";
import { InvalidArgumentError } from "../../../packages/core/src/index";
import { formatValidationError, trimToOptionalString } from "../../../packages/shared/src/index";

export const LOG_LEVELS = ["error", "warn", "info", "verbose", "debug", "silly"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  dbPath: string;
  host: string;
  port: number;
  staticDir: string;
  logLevel: LogLevel;
  logFile?: string;
}

const DEFAULT_STATIC_DIR = fileURLToPath(new URL("../static", import.meta.url));

const envSchema = z.object({
  KEYPASS_DB_PATH: z.preprocess(trimToOptionalString, z.string().default("keypass.db")),
  KEYPASS_HOST: z.preprocess(trimToOptionalString, z.string().default("127.0.0.1")),
  KEYPASS_PORT: z.preprocess(
    trimToOptionalString,
    z.coerce.number().int().min(1).max(65535).default(8000)
  ),
  KEYPASS_STATIC_DIR: z.preprocess(trimToOptionalString, z.string().default(DEFAULT_STATIC_DIR)),
  KEYPASS_LOG_LEVEL: z.preprocess(trimToOptionalString, z.enum(LOG_LEVELS).default("info")),
  KEYPASS_LOG_FILE: z.preprocess(trimToOptionalString, z.string().optional())
});

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new InvalidArgumentError(`Invalid configuration: ${formatValidationError(result.error)}`);
  }

  const parsed = result.data;
  return {
    dbPath: parsed.KEYPASS_DB_PATH,
    host: parsed.KEYPASS_HOST,
    port: parsed.KEYPASS_PORT,
    staticDir: parsed.KEYPASS_STATIC_DIR,
    logLevel: parsed.KEYPASS_LOG_LEVEL,
    logFile: parsed.KEYPASS_LOG_FILE
  };
};
