import type { Hono } from "hono";
import type { SandboxExecutor } from "../../executor.js";
import { createLogger, LogLevel } from "../../utils/logger.js";
import { respondWithError } from "./respond.js";

const logger = createLogger(LogLevel.INFO, "PoolRoute");

export function registerPoolRoutes(app: Hono, executor: SandboxExecutor) {
  app.post("/prewarm", async (ctx) => {
    try {
      const outcome = await executor.prewarm();
      const status =
        outcome === "full"
          ? "Prewarm pool already at maximum size"
          : "Container prewarmed successfully";
      logger.info(status, executor.health().pool);
      return ctx.json({ status });
    } catch (error) {
      return respondWithError(ctx, logger, error);
    }
  });

  app.get("/health", (ctx) => ctx.json({ status: "ok", ...executor.health() }));
}
