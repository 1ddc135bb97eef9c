import type { Hono } from "hono";
import type { SandboxExecutor } from "../../executor.js";
import { createLogger, LogLevel } from "../../utils/logger.js";
import { respondWithError } from "./respond.js";

const logger = createLogger(LogLevel.INFO, "SessionRoute");

export function registerSessionRoutes(app: Hono, executor: SandboxExecutor) {
  app.get("/result/:sessionId", async (ctx) => {
    const sessionId = ctx.req.param("sessionId");
    try {
      const result = await executor.pollResult(sessionId);
      if (result.state === "running") {
        return ctx.json({ status: "running" }, 202);
      }
      return ctx.json({ logs: result.logs });
    } catch (error) {
      return respondWithError(ctx, logger, error, { sessionId });
    }
  });

  app.post("/cleanup/:sessionId", async (ctx) => {
    const sessionId = ctx.req.param("sessionId");
    try {
      await executor.cleanup(sessionId);
      return ctx.json({ status: "cleaned up" });
    } catch (error) {
      return respondWithError(ctx, logger, error, { sessionId });
    }
  });
}
