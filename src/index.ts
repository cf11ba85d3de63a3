import { Webhooks } from "@octokit/webhooks";
import { config } from "./env";
import { CodeAnalyzer } from "./analysis/analyzer";
import { ConfigurationError } from "./errors";
import { createLlmClient, resolveLlmSettings } from "./integrations/llm";
import { createPullRequestGateway, createWebhooks, registerEventHandlers } from "./integrations/github";
import { createApp } from "./server";
import { errorMessage, logger } from "./logger";

function buildAnalyzer(): CodeAnalyzer {
  try {
    return new CodeAnalyzer(createLlmClient(resolveLlmSettings(config)));
  } catch (err) {
    if (err instanceof ConfigurationError) {
      logger.error("FATAL: LLM client not configured", { error: err.message });
      process.exit(1);
    }
    throw err;
  }
}

// The client is built once here and handed to everything that needs it
const analyzer = buildAnalyzer();

let webhooks: Webhooks | undefined;
if (config.GITHUB_WEBHOOK_SECRET) {
  webhooks = createWebhooks(config.GITHUB_WEBHOOK_SECRET);
  registerEventHandlers(webhooks, {
    analyzer,
    gatewayFor: (installationId) => createPullRequestGateway(installationId),
  });
} else {
  logger.warn("GITHUB_WEBHOOK_SECRET not set, pull request webhooks are disabled");
}

const app = createApp({ analyzer, webhooks });
const port = Number(config.PORT) || 8000;

// Graceful shutdown
let isShuttingDown = false;

function shutdown(signal: string): void {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  logger.info("Graceful shutdown started", { signal });

  server.close(() => {
    logger.info("HTTP server closed");
    process.exit(0);
  });

  // Give in-flight reviews time to complete (max 10 seconds)
  setTimeout(() => {
    logger.warn("Shutdown timed out, exiting");
    process.exit(0);
  }, 10_000).unref();
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled rejection", { error: errorMessage(reason) });
});

const server = app.listen(port, "0.0.0.0", () => {
  logger.info("Server listening", { host: "0.0.0.0", port, provider: analyzer.provider, model: analyzer.model });
});
