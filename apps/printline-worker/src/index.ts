import { buildWorker } from "./worker/build.js";
import { runWorker } from "./worker/run.js";
import { createLogger } from "./logger.js";
import config, { checkConfig } from "./config.js";

const logger = createLogger("worker", config.logLevel);

async function main() {
  const apiBaseUrl = config.apiBaseUrl;
  if (!apiBaseUrl) {
    logger.error("API_BASE_URL is not set; point it at the queue API (e.g. https://example.com/api)");
    process.exit(1);
  }

  const problems = checkConfig(config);
  if (problems.length > 0) {
    for (const problem of problems) logger.error(problem);
    process.exit(1);
  }

  const controller = new AbortController();
  const ctx = buildWorker(config, apiBaseUrl, controller.signal);

  logger.info(`API base URL: ${apiBaseUrl}`);
  logger.info(`Printer: ${ctx.device.description}`);
  logger.info(`Poll interval: ${config.pollIntervalMs}ms, reconnect delay: ${config.reconnectDelayMs}ms`);

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, stopping after the current step...`);
    controller.abort();
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  await runWorker(ctx);
  logger.info("Printer worker stopped");
}

main().catch((err) => {
  logger.error("Fatal error:", err);
  process.exit(1);
});
