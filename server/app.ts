import express from "express";
import { REQUEST_BODY_SIZE_LIMIT } from "./config";
import type { ServerContext } from "./context";
import { requestIdMiddleware } from "./middleware/request-id";
import { errorHandler, notFoundHandler } from "./middleware/error-handler";
import { createHealthRouter } from "./routes/health";
import { createWebhooksRouter } from "./routes/webhooks";
import { createDispatchRouter } from "./routes/dispatch";

/**
 * Express application for a server context. Does not listen.
 */
export function createApp(context: ServerContext): express.Express {
  const { config, bus, senders, router } = context;
  const app = express();

  // Behind a reverse proxy: needed for per-client rate limiting
  app.set("trust proxy", 1);

  app.use(requestIdMiddleware);
  app.use(express.json({ limit: REQUEST_BODY_SIZE_LIMIT }));

  app.use(createHealthRouter(config, senders));
  app.use(createWebhooksRouter({ config, bus }));

  // Manual dispatch exists only with a token
  if (config.dispatchApiToken) {
    app.use(createDispatchRouter({ token: config.dispatchApiToken, router }));
  }

  // 404 handler - must be after all routes
  app.use(notFoundHandler);

  // Global error handler - must be last
  app.use(errorHandler);

  return app;
}
