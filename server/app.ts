import express, { type Express, type Request, type Response, type NextFunction } from "express";
import { registerRoutes, type RouteDependencies } from "./routes";
import { requestLogger } from "./log";
import { AppError, ErrorCode, toAppError } from "./error-handling";

// base64 JSON uploads are ~4/3 of the raw frame
const JSON_LIMIT = "20mb";

function statusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  return typeof err.status === "number" ? err.status : undefined;
}

export function createApp(deps: RouteDependencies): Express {
  const app = express();

  app.use(express.json({ limit: JSON_LIMIT }));
  app.use(requestLogger);

  registerRoutes(app, deps);

  // Body parser failures (malformed JSON, oversized upload) land here
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    const appError =
      status !== undefined && status >= 400 && status < 500
        ? new AppError(status === 413 ? ErrorCode.INVALID_IMAGE : ErrorCode.INVALID_INPUT, err instanceof Error ? err : undefined)
        : toAppError(err);

    if (appError.getStatusCode() >= 500) {
      console.error(`[express] ${appError.code}: ${appError.describe()}`);
    }
    res.status(appError.getStatusCode()).json(appError.toJSON());
  });

  return app;
}
