import { Hono } from "hono";
import { describeError } from "../errors.js";
import type { SandboxExecutor } from "../executor.js";
import { registerExecuteRoutes } from "../server/routes/execute.js";
import { registerPoolRoutes } from "../server/routes/pool.js";
import { registerSessionRoutes } from "../server/routes/sessions.js";
import { createLogger, LogLevel } from "../utils/logger.js";

const logger = createLogger(LogLevel.INFO, "App");

export function createApp(executor: SandboxExecutor): Hono {
  const app = new Hono();

  registerExecuteRoutes(app, executor);
  registerSessionRoutes(app, executor);
  registerPoolRoutes(app, executor);

  app.onError((error, ctx) => {
    logger.error("Unhandled request error", {
      path: ctx.req.path,
      error: describeError(error),
    });
    return ctx.json({ error: describeError(error) }, 500);
  });

  return app;
}
