import express from "express";
import cors from "cors";

import { errorHandler, notFoundHandler } from "./middleware/errors";
import { requestContext } from "./middleware/requestContext";
import { requestLogger } from "./middleware/requestLogger";
import { createBatchRouter } from "./routes/batch";
import { createHealthRouter } from "./routes/health";
import { createHistoryRouter } from "./routes/history";
import { createOcrRouter } from "./routes/ocr";
import { createReviewRouter } from "./routes/review";
import type { AppServices } from "./routes/types";

function corsOptions(allowlist: string[]): cors.CorsOptions {
  if (allowlist.includes("*")) {
    return { origin: true };
  }
  return { origin: allowlist };
}

export function buildApp(services: AppServices): express.Express {
  const app = express();

  app.disable("x-powered-by");
  app.use(requestContext);
  app.use(cors(corsOptions(services.settings.corsAllowlist)));
  app.use(requestLogger);

  app.use("/health", createHealthRouter(services.clock));
  app.use("/api/v1/ocr", createOcrRouter(services));
  app.use("/api/v1/ocr", createHistoryRouter(services));
  app.use("/api/v1/batch", createBatchRouter(services));
  app.use("/api/v1/queue", createReviewRouter(services));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
