import "./load-env";
import { createServer } from "http";
import { loadConfig } from "./config";
import { type ServerContext, createServerContext } from "./context";
import { createApp } from "./app";
import { setupUncaughtExceptionHandler, setupUnhandledRejectionHandler } from "./middleware/error-handler";
import logger, { logError } from "./utils/logger";

setupUnhandledRejectionHandler();
setupUncaughtExceptionHandler();

function bootstrap(): ServerContext {
  try {
    return createServerContext(loadConfig());
  } catch (error) {
    logError("Failed to start: invalid configuration", error);
    process.exit(1);
  }
}

const context = bootstrap();

const { config } = context;
const server = createServer(createApp(context));

server.listen(config.port, () => {
  logger.info(`🚀 Server running on port ${config.port}`);
  logger.info(`🏥 Health check: http://localhost:${config.port}/health`);
  logger.info(`⚙️  Configuration:`);
  logger.info(`   - Helpdesk: ${config.helpdesk.baseUrl} (account ${config.helpdesk.accountId})`);
  logger.info(`   - Channels: ${[...context.senders.keys()].join(", ") || "none"}`);
  logger.info(`   - Wasender: ${config.wasender ? "✓" : "✗"}`);
  logger.info(`   - VK: ${config.vk ? "✓" : "✗"}`);
  logger.info(`   - Telegram inbox: ${config.telegram?.inboxId ?? "✗"} (sender ${context.senders.has("telegram") ? "✓" : "✗"})`);
  logger.info(`   - Manual dispatch: ${config.dispatchApiToken ? "✓" : "✗"}`);
});

const shutdown = (signal: string) => {
  logger.info(`${signal} received, closing server`);
  context.dispose();
  server.close((error) => {
    if (error) {
      logError("Error while closing server", error);
      process.exit(1);
    }
    process.exit(0);
  });
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
