import type { Server } from "node:http";
import path from "node:path";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { ZodError, type z } from "zod";
import {
  InvalidArgumentError,
  NotFoundError,
  isVaultError,
  type VaultErrorCode
} from "../../../../packages/core/src/index";
import {
  credentialCreateSchema,
  credentialKeyParamsSchema,
  credentialTitleParamsSchema,
  credentialUpdateSchema,
  formatValidationError,
  type ErrorResponse,
  type VaultApi
} from "../../../../packages/shared/src/index";
import { logger } from "../logger";

export interface RegisterRoutesOptions {
  staticDir: string;
}

const STATUS_BY_CODE: Record<VaultErrorCode, number> = {
  invalid_argument: 422,
  duplicate_entry: 400,
  not_found: 404,
  invalid_credentials: 401,
  uninitialized: 503,
  locked: 503
};

const parsePayload = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, actionLabel: string): T => {
  try {
    return schema.parse(payload);
  } catch (error) {
    if (error instanceof ZodError) {
      logger.warn(`[HTTP Validation] ${actionLabel}`, formatValidationError(error));
      throw new InvalidArgumentError(`${actionLabel} payload is invalid: ${formatValidationError(error)}`);
    }

    throw error;
  }
};

const isMalformedJson = (error: unknown): boolean => {
  return typeof error === "object" && error !== null && "type" in error && error.type === "entity.parse.failed";
};

const sendError = (res: Response, status: number, detail: string): void => {
  const body: ErrorResponse = { detail };
  res.status(status).json(body);
};

export const registerRoutes = (app: Express, vault: VaultApi, options: RegisterRoutesOptions): void => {
  const staticDir = path.resolve(options.staticDir);

  app.use("/static", express.static(staticDir));

  app.get("/", (_req, res, next) => {
    res.sendFile(path.join(staticDir, "index.html"), (error) => {
      if (error) {
        next(new NotFoundError("Frontend not found."));
      }
    });
  });

  app.post("/passwords/", (req, res) => {
    const input = parsePayload(credentialCreateSchema, req.body, "Create password");
    res.json(vault.create(input));
  });

  app.get("/passwords/:title", (req, res) => {
    const params = parsePayload(credentialTitleParamsSchema, req.params, "Read passwords");
    res.json(vault.listByTitle(params.title));
  });

  app.get("/passwords/:title/:username", (req, res) => {
    const params = parsePayload(credentialKeyParamsSchema, req.params, "Read password");
    res.json(vault.getOne(params.title, params.username));
  });

  app.put("/passwords/", (req, res) => {
    const input = parsePayload(credentialUpdateSchema, req.body, "Update password");
    res.json(vault.update(input));
  });

  app.delete("/passwords/:title/:username", (req, res) => {
    const params = parsePayload(credentialKeyParamsSchema, req.params, "Delete password");
    res.json(vault.delete(params.title, params.username));
  });

  app.get("/titles/", (_req, res) => {
    res.json(vault.listDistinctTitles());
  });

  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (isMalformedJson(error)) {
      sendError(res, 400, "Request body is not valid JSON.");
      return;
    }

    if (isVaultError(error)) {
      const status = STATUS_BY_CODE[error.code];
      if (status >= 500) {
        logger.error(`[HTTP] ${req.method} ${req.path}`, error);
      }
      sendError(res, status, error.message);
      return;
    }

    logger.error(`[HTTP] ${req.method} ${req.path}`, error);
    sendError(res, 500, "Internal server error.");
  });
};

export const createApp = (vault: VaultApi, options: RegisterRoutesOptions): Express => {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.json());
  registerRoutes(app, vault, options);
  return app;
};

/** Resolves once the server is listening; bind failures such as EADDRINUSE reject. */
export const listen = (app: Express, port: number, host: string): Promise<Server> => {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    const onError = (error: Error): void => {
      server.off("listening", onListening);
      reject(error);
    };
    const onListening = (): void => {
      server.off("error", onError);
      resolve(server);
    };
    server.once("error", onError);
    server.once("listening", onListening);
  });
};
