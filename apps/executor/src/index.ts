import "dotenv/config";
import { serve } from "@hono/node-server";
import { LocalDockerSandboxProvider } from "@code-exec/sandbox-docker";
import { loadExecutorConfig } from "./config.js";
import { describeError } from "./errors.js";
import { SandboxExecutor } from "./executor.js";
import { createApp } from "./routes/app.js";
import { createLogger, LogLevel } from "./utils/logger.js";

const logger = createLogger(LogLevel.INFO, "Executor");

function main(): void {
  const config = loadExecutorConfig();
  const provider = new LocalDockerSandboxProvider({
    user: config.sandbox.user,
    defaultTimeoutSec: config.sandbox.execTimeoutSec,
  });
  const executor = new SandboxExecutor({ provider, config });
  const app = createApp(executor);

  executor.start();
  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info("Executor listening", {
      port: info.port,
      image: config.sandbox.image,
      warmPoolSize: config.warmPoolSize,
    });
  });

  let stopping = false;
  const stop = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info("Received shutdown signal", { signal });

    executor
      .shutdown()
      .catch((error: unknown) => {
        logger.error("Shutdown drain failed", { error: describeError(error) });
      })
      .finally(() => {
        server.close(() => process.exit(0));
      });
  };

  process.once("SIGTERM", stop);
  process.once("SIGINT", stop);
}

try {
  main();
} catch (error) {
  logger.error("Executor failed to start", { error: describeError(error) });
  process.exit(1);
}
